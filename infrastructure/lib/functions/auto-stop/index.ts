import type { Context, ScheduledEvent } from 'aws-lambda';
import { createAwsControlPlane } from '../shared/aws-platform';
import { type EnvironmentVariables, type SchedulerConfig, loadSchedulerConfig } from '../shared/config';
import { errorFields } from '../shared/errors';
import { type Logger, createLogger, resolveLogLevel } from '../shared/logger';
import type { ControlPlane } from '../shared/platform';
import { type AutoStopReport, runAutoStop } from './auto-stop';

export type AutoStopHandlerOptions = {
  env?: EnvironmentVariables;
  controlPlane?: () => ControlPlane;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type AutoStopHandler = (event?: ScheduledEvent, context?: Context) => Promise<AutoStopReport>;

export function createAutoStopHandler(options: AutoStopHandlerOptions = {}): AutoStopHandler {
  const baseLogger =
    options.logger ?? createLogger('auto-stop', { level: resolveLogLevel((options.env ?? process.env).LOG_LEVEL) });
  const buildControlPlane = options.controlPlane ?? (() => createAwsControlPlane());
  let controlPlane: ControlPlane | undefined;

  return async (event, context) => {
    const logger = baseLogger.child({ requestId: context?.awsRequestId });

    let config: SchedulerConfig;
    try {
      config = loadSchedulerConfig(options.env ?? process.env, { requireLoadBalancer: true });
    } catch (error) {
      logger.error('Invalid configuration, no action possible', errorFields(error));
      throw error;
    }

    logger.debug('Scheduled tick received', { time: event?.time, ruleArns: event?.resources });

    if (!controlPlane) {
      controlPlane = buildControlPlane();
    }

    return runAutoStop({
      config,
      platform: controlPlane,
      logger,
      now: options.now,
      sleep: options.sleep,
    });
  };
}

export const handler = createAutoStopHandler();
