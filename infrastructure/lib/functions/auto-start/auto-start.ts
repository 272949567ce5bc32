import {
  type ActionOutcome,
  type TriggerContext,
  databaseTarget,
  publishExecutionMetric,
  retrying,
  runAction,
  serviceRefOf,
  serviceTarget,
} from '../shared/actions';
import { errorFields } from '../shared/errors';
import { DatabaseStatus, ServiceState, type TargetHealthSummary } from '../shared/platform';
import { ECS_SERVICE_PRINCIPAL, appliesToTargetGroup, type TargetChangeSignal } from './event';

export type AutoStartReport = {
  status: 'completed' | 'ignored';
  signal: TargetChangeSignal;
  reason?: string;
  database?: ActionOutcome;
  service?: ActionOutcome;
  targetHealth?: TargetHealthSummary;
  metricPublished: boolean;
};

export const AUTO_START_METRIC = 'AutoStartExecuted';

const RUNNING_OR_STARTING = new Set<string>([DatabaseStatus.AVAILABLE, DatabaseStatus.STARTING]);

async function startDatabase(context: TriggerContext): Promise<ActionOutcome> {
  const { config, platform } = context;
  const target = databaseTarget(config);
  const instanceId = config.databaseInstanceId;

  return runAction(context, target, async () => {
    const status = await retrying(context, 'DescribeDBInstances', () => platform.database.describeInstance(instanceId));
    if (status === undefined) {
      return { ...target, result: 'failed', reason: 'database instance not found' };
    }

    if (status === DatabaseStatus.STOPPED) {
      await retrying(context, 'StartDBInstance', () => platform.database.startInstance(instanceId));
      return { ...target, result: 'acted', reason: 'start requested', observedState: status, targetState: DatabaseStatus.AVAILABLE };
    }

    // stopping: the next registration event picks it up once the stop settles
    const reason = RUNNING_OR_STARTING.has(status) ? `already ${status}` : `cannot start while ${status}`;
    return { ...target, result: 'skipped', reason, observedState: status };
  });
}

async function scaleServiceUp(context: TriggerContext): Promise<ActionOutcome> {
  const { config, platform } = context;
  const target = serviceTarget(config);
  const ref = serviceRefOf(config);
  const desiredCount = config.runningDesiredCount;

  return runAction(context, target, async () => {
    const service = await retrying(context, 'DescribeServices', () => platform.compute.describeService(ref));
    if (!service) {
      return { ...target, result: 'failed', reason: 'service not found' };
    }

    const observedState = `desired=${service.desiredCount} running=${service.runningCount}`;
    if (service.status !== ServiceState.ACTIVE) {
      return { ...target, result: 'failed', reason: `service is ${service.status}`, observedState };
    }
    if (service.desiredCount > 0) {
      return { ...target, result: 'skipped', reason: 'already running', observedState };
    }

    await retrying(context, 'UpdateService', () => platform.compute.updateDesiredCount(ref, desiredCount));
    return { ...target, result: 'acted', reason: 'scaled service up', observedState, targetState: `desired=${desiredCount}` };
  });
}

async function reportTargetHealth(context: TriggerContext, targetGroupArn: string): Promise<TargetHealthSummary | undefined> {
  const { platform, logger } = context;
  try {
    const health = await retrying(context, 'DescribeTargetHealth', () => platform.activity.describeTargetHealth(targetGroupArn));
    logger.info('Target health', { targetGroupArn, ...health });
    return health;
  } catch (error) {
    logger.warn('Could not read target health', { targetGroupArn, ...errorFields(error) });
    return undefined;
  }
}

/**
 * Target deregistration is only traffic when someone other than ECS made it
 * while the service is meant to run. ECS deregisters the tasks it drains,
 * which includes every auto-stop scale-down.
 */
async function drainReason(context: TriggerContext, signal: TargetChangeSignal): Promise<string | undefined> {
  if (signal.eventName !== 'DeregisterTargets') return undefined;
  if (signal.invokedBy === ECS_SERVICE_PRINCIPAL) return 'deregistration issued by ECS';

  const { config, platform, logger } = context;
  try {
    const service = await retrying(context, 'DescribeServices', () => platform.compute.describeService(serviceRefOf(config)));
    if (service && service.desiredCount === 0) return 'deregistration while the service is scaled to zero';
  } catch (error) {
    logger.warn('Could not read service before handling deregistration', errorFields(error));
  }
  return undefined;
}

/**
 * Issues the database start before the service scale-up but does not wait for
 * the instance to become available; tasks that come up first fail their health
 * checks and are replaced by ECS until the database accepts connections.
 */
export async function runAutoStart(context: TriggerContext, signal: TargetChangeSignal): Promise<AutoStartReport> {
  const { config, logger } = context;

  if (!appliesToTargetGroup(signal, config.targetGroupArn)) {
    logger.info('Event is for another target group, ignoring', {
      eventTargetGroupArn: signal.targetGroupArn,
      targetGroupArn: config.targetGroupArn,
    });
    return { status: 'ignored', signal, reason: 'event is for another target group', metricPublished: false };
  }

  const drained = await drainReason(context, signal);
  if (drained) {
    logger.info('Deregistration is not traffic, ignoring', {
      reason: drained,
      eventName: signal.eventName,
      invokedBy: signal.invokedBy,
    });
    return { status: 'ignored', signal, reason: drained, metricPublished: false };
  }

  logger.info('Starting auto-start', {
    source: signal.source,
    eventName: signal.eventName,
    clusterName: config.clusterName,
    serviceName: config.serviceName,
    databaseInstanceId: config.databaseInstanceId,
  });

  const database = await startDatabase(context);
  const service = await scaleServiceUp(context);

  const targetHealth = config.targetGroupArn ? await reportTargetHealth(context, config.targetGroupArn) : undefined;
  const metricPublished = await publishExecutionMetric(context, AUTO_START_METRIC, [database, service]);

  logger.info('Auto-start completed', { database: database.result, service: service.result });

  return { status: 'completed', signal, database, service, targetHealth, metricPublished };
}
