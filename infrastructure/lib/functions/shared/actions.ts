import type { SchedulerConfig } from './config';
import { classifyPlatformError, errorFields } from './errors';
import type { Logger } from './logger';
import type { ControlPlane, ServiceRef } from './platform';
import { withRetry } from './retry';

export type ActionResult = 'acted' | 'skipped' | 'failed';

export type ActionOutcome = {
  resource: 'service' | 'database';
  id: string;
  result: ActionResult;
  reason: string;
  observedState?: string;
  targetState?: string;
};

export type ActionTarget = Pick<ActionOutcome, 'resource' | 'id'>;

export type TriggerContext = {
  config: SchedulerConfig;
  platform: ControlPlane;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export function serviceRefOf(config: SchedulerConfig): ServiceRef {
  return { clusterName: config.clusterName, serviceName: config.serviceName };
}

export function serviceTarget(config: SchedulerConfig): ActionTarget {
  return { resource: 'service', id: `${config.clusterName}/${config.serviceName}` };
}

export function databaseTarget(config: SchedulerConfig): ActionTarget {
  return { resource: 'database', id: config.databaseInstanceId };
}

export function retrying<T>(context: TriggerContext, operation: string, call: () => Promise<T>): Promise<T> {
  return withRetry(call, {
    policy: context.config.retry,
    operation,
    logger: context.logger,
    sleep: context.sleep,
  });
}

function logOutcome(logger: Logger, outcome: ActionOutcome, extra: Record<string, unknown> = {}): void {
  const fields = { ...outcome, ...extra };
  if (outcome.result === 'acted') {
    logger.info('Action taken', fields);
  } else if (outcome.result === 'skipped') {
    logger.info('Action skipped', fields);
  } else {
    logger.error('Action failed', fields);
  }
}

/**
 * Runs one corrective action in isolation. Whatever the action throws is turned
 * into an outcome here, so the next action of the same invocation still runs.
 */
export async function runAction(
  context: TriggerContext,
  target: ActionTarget,
  action: () => Promise<ActionOutcome>,
): Promise<ActionOutcome> {
  try {
    const outcome = await action();
    logOutcome(context.logger, outcome);
    return outcome;
  } catch (error) {
    const kind = classifyPlatformError(error);
    const outcome: ActionOutcome =
      kind === 'invalid-state'
        ? { ...target, result: 'skipped', reason: 'rejected by platform: resource not in a valid state' }
        : { ...target, result: 'failed', reason: kind === 'transient' ? 'retries exhausted' : `${kind} platform error` };
    logOutcome(context.logger, outcome, { errorKind: kind, ...errorFields(error) });
    return outcome;
  }
}

export async function publishExecutionMetric(
  context: TriggerContext,
  metricName: string,
  outcomes: ActionOutcome[],
): Promise<boolean> {
  const { config, platform, logger } = context;
  const namespace = config.metricNamespace;
  if (!namespace || !outcomes.some((outcome) => outcome.result === 'acted')) {
    return false;
  }

  try {
    await retrying(context, 'PutMetricData', () =>
      platform.metrics.recordExecution(namespace, metricName, {
        Environment: config.environment,
        Service: config.serviceName,
      }),
    );
    return true;
  } catch (error) {
    logger.warn('Could not publish execution metric', { metricName, ...errorFields(error) });
    return false;
  }
}
