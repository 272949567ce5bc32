export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type LogRecord = LogFields & {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
};

export type LogSink = (record: LogRecord) => void;

export type Logger = {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
};

export type LoggerOptions = {
  level?: LogLevel;
  fields?: LogFields;
  sink?: LogSink;
};

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  return isLogLevel(normalized) ? normalized : fallback;
}

// Error instances serialize to {} with JSON.stringify
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export const consoleSink: LogSink = (record) => {
  const line = JSON.stringify(record);
  if (record.level === 'error') {
    console.error(line);
  } else if (record.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_WEIGHT[options.level ?? 'info'];
  const bound = options.fields ?? {};
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, fields: LogFields = {}): void => {
    if (LEVEL_WEIGHT[level] < threshold) return;

    const merged: LogFields = {};
    for (const [key, value] of Object.entries({ ...bound, ...fields })) {
      merged[key] = serializeValue(value);
    }

    sink({
      ...merged,
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
    });
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (fields) =>
      createLogger(component, {
        level: options.level,
        fields: { ...bound, ...fields },
        sink,
      }),
  };
}
