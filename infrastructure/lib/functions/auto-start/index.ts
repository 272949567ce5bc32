import type { Context } from 'aws-lambda';
import { createAwsControlPlane } from '../shared/aws-platform';
import { type EnvironmentVariables, type SchedulerConfig, loadSchedulerConfig } from '../shared/config';
import { errorFields } from '../shared/errors';
import { type Logger, createLogger, resolveLogLevel } from '../shared/logger';
import type { ControlPlane } from '../shared/platform';
import { type AutoStartReport, runAutoStart } from './auto-start';
import { parseTargetChangeEvent } from './event';

export type AutoStartHandlerOptions = {
  env?: EnvironmentVariables;
  controlPlane?: () => ControlPlane;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type AutoStartHandler = (event?: unknown, context?: Context) => Promise<AutoStartReport>;

export function createAutoStartHandler(options: AutoStartHandlerOptions = {}): AutoStartHandler {
  const baseLogger =
    options.logger ?? createLogger('auto-start', { level: resolveLogLevel((options.env ?? process.env).LOG_LEVEL) });
  const buildControlPlane = options.controlPlane ?? (() => createAwsControlPlane());
  let controlPlane: ControlPlane | undefined;

  return async (event, context) => {
    const logger = baseLogger.child({ requestId: context?.awsRequestId });

    let config: SchedulerConfig;
    try {
      config = loadSchedulerConfig(options.env ?? process.env);
    } catch (error) {
      logger.error('Invalid configuration, no action possible', errorFields(error));
      throw error;
    }

    if (!controlPlane) {
      controlPlane = buildControlPlane();
    }

    return runAutoStart(
      {
        config,
        platform: controlPlane,
        logger,
        sleep: options.sleep,
      },
      parseTargetChangeEvent(event),
    );
  };
}

export const handler = createAutoStartHandler();
