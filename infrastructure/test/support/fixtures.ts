import type { Context, ScheduledEvent } from 'aws-lambda';
import { type EnvironmentVariables, type SchedulerConfig, loadSchedulerConfig } from '../../lib/functions/shared/config';
import { type LogRecord, type Logger, createLogger } from '../../lib/functions/shared/logger';

export const TARGET_GROUP_ARN =
  'arn:aws:elasticloadbalancing:ap-south-1:123456789012:targetgroup/dev-storefront-tg/0123456789abcdef';

export const SCHEDULER_ENV: EnvironmentVariables = {
  ENVIRONMENT: 'dev',
  ECS_CLUSTER: 'dev-storefront-cluster',
  ECS_SERVICE: 'dev-storefront-service',
  RDS_INSTANCE: 'dev-storefront-db',
  ALB_NAME: 'app/dev-storefront-alb/0123456789abcdef',
  TARGET_GROUP_ARN,
  METRIC_NAMESPACE: 'Storefront/AutoScheduler',
};

export function schedulerConfig(overrides: Partial<SchedulerConfig> = {}): SchedulerConfig {
  return { ...loadSchedulerConfig(SCHEDULER_ENV), ...overrides };
}

export function captureLogs(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger('test', { level: 'debug', sink: (record) => records.push(record) });
  return { logger, records };
}

export function messagesOf(records: LogRecord[]): string[] {
  return records.map((record) => record.message);
}

export function platformError(name: string, message = `${name} raised by test`): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export function lambdaContext(awsRequestId: string, functionName = 'dev-storefront-auto-stop'): Context {
  return {
    callbackWaitsForEmptyEventLoop: true,
    functionName,
    functionVersion: '$LATEST',
    invokedFunctionArn: `arn:aws:lambda:ap-south-1:123456789012:function:${functionName}`,
    memoryLimitInMB: '128',
    awsRequestId,
    logGroupName: `/aws/lambda/${functionName}`,
    logStreamName: '2026/01/01/[$LATEST]0000',
    getRemainingTimeInMillis: () => 300_000,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
  };
}

export function scheduledEvent(time: string): ScheduledEvent {
  return {
    id: 'test-event',
    version: '0',
    account: '123456789012',
    time,
    region: 'ap-south-1',
    resources: ['arn:aws:events:ap-south-1:123456789012:rule/dev-storefront-auto-stop'],
    source: 'aws.events',
    'detail-type': 'Scheduled Event',
    detail: {},
  };
}
