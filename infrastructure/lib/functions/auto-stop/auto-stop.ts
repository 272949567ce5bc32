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
import { DatabaseStatus, ServiceState } from '../shared/platform';

export type ActivityCheck = {
  lookbackMinutes: number;
  requestCount?: number;
  error?: string;
};

export type AutoStopReport = {
  status: 'completed' | 'skipped-active';
  activity?: ActivityCheck;
  service?: ActionOutcome;
  database?: ActionOutcome;
  metricPublished: boolean;
};

export const AUTO_STOP_METRIC = 'AutoStopExecuted';

const MINUTE_MS = 60_000;

const STOPPED_OR_STOPPING = new Set<string>([DatabaseStatus.STOPPED, DatabaseStatus.STOPPING]);

/**
 * `active` is true when the load balancer served requests in the lookback
 * window, or when that cannot be determined.
 */
async function checkRecentActivity(context: TriggerContext, loadBalancerName: string): Promise<ActivityCheck & { active: boolean }> {
  const { config, platform, logger } = context;
  const end = context.now?.() ?? new Date();
  const start = new Date(end.getTime() - config.idleLookbackMinutes * MINUTE_MS);
  const lookbackMinutes = config.idleLookbackMinutes;

  try {
    const requestCount = await retrying(context, 'GetMetricStatistics', () =>
      platform.activity.countRequests(loadBalancerName, { start, end }),
    );

    if (requestCount > 0) {
      logger.info('Recent activity detected, skipping auto-stop', { loadBalancerName, requestCount, lookbackMinutes });
      return { active: true, lookbackMinutes, requestCount };
    }

    logger.info('No recent activity detected', { loadBalancerName, lookbackMinutes });
    return { active: false, lookbackMinutes, requestCount };
  } catch (error) {
    // Unknown activity counts as activity
    logger.warn('Could not check load balancer activity, skipping auto-stop', { loadBalancerName, ...errorFields(error) });
    return { active: true, lookbackMinutes, error: errorFields(error).errorMessage };
  }
}

async function scaleServiceToZero(context: TriggerContext): Promise<ActionOutcome> {
  const { config, platform } = context;
  const target = serviceTarget(config);
  const ref = serviceRefOf(config);

  return runAction(context, target, async () => {
    const service = await retrying(context, 'DescribeServices', () => platform.compute.describeService(ref));
    if (!service) {
      return { ...target, result: 'failed', reason: 'service not found' };
    }

    const observedState = `desired=${service.desiredCount} running=${service.runningCount}`;
    if (service.status !== ServiceState.ACTIVE) {
      return { ...target, result: 'failed', reason: `service is ${service.status}`, observedState };
    }
    if (service.desiredCount === 0) {
      return { ...target, result: 'skipped', reason: 'already scaled to zero', observedState, targetState: 'desired=0' };
    }

    await retrying(context, 'UpdateService', () => platform.compute.updateDesiredCount(ref, 0));
    return { ...target, result: 'acted', reason: 'scaled service to zero', observedState, targetState: 'desired=0' };
  });
}

async function stopDatabase(context: TriggerContext): Promise<ActionOutcome> {
  const { config, platform } = context;
  const target = databaseTarget(config);
  const instanceId = config.databaseInstanceId;

  return runAction(context, target, async () => {
    const status = await retrying(context, 'DescribeDBInstances', () => platform.database.describeInstance(instanceId));
    if (status === undefined) {
      return { ...target, result: 'failed', reason: 'database instance not found' };
    }

    if (status === DatabaseStatus.AVAILABLE) {
      await retrying(context, 'StopDBInstance', () => platform.database.stopInstance(instanceId));
      return { ...target, result: 'acted', reason: 'stop requested', observedState: status, targetState: DatabaseStatus.STOPPED };
    }

    const reason = STOPPED_OR_STOPPING.has(status) ? `already ${status}` : `cannot stop while ${status}`;
    return { ...target, result: 'skipped', reason, observedState: status };
  });
}

export async function runAutoStop(context: TriggerContext): Promise<AutoStopReport> {
  const { config, logger } = context;

  logger.info('Starting auto-stop check', {
    clusterName: config.clusterName,
    serviceName: config.serviceName,
    databaseInstanceId: config.databaseInstanceId,
  });

  let activity: ActivityCheck | undefined;
  if (config.loadBalancerName) {
    const { active, ...check } = await checkRecentActivity(context, config.loadBalancerName);
    activity = check;
    if (active) {
      return { status: 'skipped-active', activity, metricPublished: false };
    }
  }

  const service = await scaleServiceToZero(context);
  const database = await stopDatabase(context);
  const metricPublished = await publishExecutionMetric(context, AUTO_STOP_METRIC, [service, database]);

  logger.info('Auto-stop check completed', { service: service.result, database: database.result });

  return { status: 'completed', activity, service, database, metricPublished };
}
