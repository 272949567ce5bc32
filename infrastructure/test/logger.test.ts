import { type LogRecord, consoleSink, createLogger, resolveLogLevel } from '../lib/functions/shared/logger';

describe('createLogger', () => {
  let records: LogRecord[];
  const sink = (record: LogRecord) => records.push(record);

  beforeEach(() => {
    records = [];
  });

  test('writes component, level, message and fields on one record', () => {
    const logger = createLogger('auto-stop', { sink });

    logger.info('Action taken', { resource: 'service', result: 'acted' });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      component: 'auto-stop',
      level: 'info',
      message: 'Action taken',
      resource: 'service',
      result: 'acted',
    });
    expect(new Date(records[0].timestamp).toISOString()).toBe(records[0].timestamp);
  });

  test('drops records below the configured level', () => {
    const logger = createLogger('auto-stop', { level: 'warn', sink });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(records.map((record) => record.level)).toEqual(['warn', 'error']);
  });

  test('child loggers carry bound fields and keep the parent level', () => {
    const logger = createLogger('auto-start', { level: 'info', sink, fields: { environment: 'dev' } });
    const child = logger.child({ requestId: 'req-1' });

    child.debug('hidden');
    child.info('Starting auto-start', { source: 'manual' });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ environment: 'dev', requestId: 'req-1', source: 'manual' });
  });

  test('serializes errors to name and message', () => {
    const logger = createLogger('auto-stop', { sink });
    const error = new RangeError('out of range');

    logger.error('Action failed', { error });

    expect(records[0].error).toEqual({ name: 'RangeError', message: 'out of range' });
  });

  test('record keys cannot be overridden by fields', () => {
    const logger = createLogger('auto-stop', { sink });

    logger.info('real message', { message: 'spoofed', level: 'error' });

    expect(records[0].message).toBe('real message');
    expect(records[0].level).toBe('info');
  });
});

describe('resolveLogLevel', () => {
  test.each([
    ['DEBUG', 'debug'],
    ['info', 'info'],
    [' Warning ', 'warn'],
    ['ERROR', 'error'],
  ])('maps %p to %p', (value, expected) => {
    expect(resolveLogLevel(value)).toBe(expected);
  });

  test('falls back for unknown or missing values', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('verbose', 'warn')).toBe('warn');
  });
});

describe('consoleSink', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('writes errors to stderr as a JSON line', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const record: LogRecord = { timestamp: '2026-01-01T00:00:00.000Z', level: 'error', component: 'auto-stop', message: 'boom' };

    consoleSink(record);

    expect(errorSpy).toHaveBeenCalledWith(
      '{"timestamp":"2026-01-01T00:00:00.000Z","level":"error","component":"auto-stop","message":"boom"}',
    );
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('writes warnings with console.warn and the rest with console.log', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    consoleSink({ timestamp: 't', level: 'warn', component: 'c', message: 'w' });
    consoleSink({ timestamp: 't', level: 'debug', component: 'c', message: 'd' });

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('{"timestamp":"t","level":"debug","component":"c","message":"d"}');
  });
});
