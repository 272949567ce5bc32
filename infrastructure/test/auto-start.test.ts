import { AUTO_START_METRIC, runAutoStart } from '../lib/functions/auto-start/auto-start';
import { type TargetChangeSignal, parseTargetChangeEvent } from '../lib/functions/auto-start/event';
import { runAutoStop } from '../lib/functions/auto-stop/auto-stop';
import type { TriggerContext } from '../lib/functions/shared/actions';
import type { SchedulerConfig } from '../lib/functions/shared/config';
import { FakeControlPlane } from './support/fake-control-plane';
import { TARGET_GROUP_ARN, captureLogs, messagesOf, platformError, recordingSleep, schedulerConfig } from './support/fixtures';

const REGISTER: TargetChangeSignal = {
  source: 'aws.elasticloadbalancing',
  eventName: 'RegisterTargets',
  targetGroupArn: TARGET_GROUP_ARN,
  targetCount: 1,
};

const STOPPED_SERVICE = { desiredCount: 0, runningCount: 0, pendingCount: 0, status: 'ACTIVE' };

function setup(fake: FakeControlPlane, config: Partial<SchedulerConfig> = {}) {
  const { logger, records } = captureLogs();
  const { sleep } = recordingSleep();
  const context: TriggerContext = { config: schedulerConfig(config), platform: fake.platform, logger, sleep };
  return { context, records };
}

describe('runAutoStart', () => {
  test('starts the database, then scales the service up', async () => {
    const fake = new FakeControlPlane({
      service: { ...STOPPED_SERVICE },
      databaseStatus: 'stopped',
      targetHealth: { total: 1, healthy: 0, unhealthy: 0, other: 1 },
    });
    const { context } = setup(fake);

    const report = await runAutoStart(context, REGISTER);

    expect(report).toEqual({
      status: 'completed',
      signal: REGISTER,
      database: {
        resource: 'database',
        id: 'dev-storefront-db',
        result: 'acted',
        reason: 'start requested',
        observedState: 'stopped',
        targetState: 'available',
      },
      service: {
        resource: 'service',
        id: 'dev-storefront-cluster/dev-storefront-service',
        result: 'acted',
        reason: 'scaled service up',
        observedState: 'desired=0 running=0',
        targetState: 'desired=1',
      },
      targetHealth: { total: 1, healthy: 0, unhealthy: 0, other: 1 },
      metricPublished: true,
    });
    expect(fake.operations()).toEqual([
      'describeInstance',
      'startInstance',
      'describeService',
      'updateDesiredCount',
      'describeTargetHealth',
      'recordExecution',
    ]);
    expect(fake.state.metrics).toEqual([
      {
        namespace: 'Storefront/AutoScheduler',
        metricName: AUTO_START_METRIC,
        dimensions: { Environment: 'dev', Service: 'dev-storefront-service' },
      },
    ]);
  });

  test('scales up to the configured desired count', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'stopped' });
    const { context } = setup(fake, { runningDesiredCount: 3 });

    const report = await runAutoStart(context, REGISTER);

    expect(report.service?.targetState).toBe('desired=3');
    expect(fake.callsTo('updateDesiredCount')).toEqual([
      [{ clusterName: 'dev-storefront-cluster', serviceName: 'dev-storefront-service' }, 3],
    ]);
  });

  test('is a no-op when everything already runs', async () => {
    const fake = new FakeControlPlane();
    const { context } = setup(fake);

    const report = await runAutoStart(context, REGISTER);

    expect(report.database).toMatchObject({ result: 'skipped', reason: 'already available' });
    expect(report.service).toMatchObject({ result: 'skipped', reason: 'already running', observedState: 'desired=1 running=1' });
    expect(report.metricPublished).toBe(false);
    expect(fake.callsTo('startInstance')).toEqual([]);
    expect(fake.callsTo('updateDesiredCount')).toEqual([]);
  });

  test('running it twice makes no further calls', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'stopped' });
    const { context } = setup(fake);

    await runAutoStart(context, REGISTER);
    const second = await runAutoStart(context, REGISTER);

    expect(second.database).toMatchObject({ result: 'skipped', reason: 'already starting' });
    expect(second.service).toMatchObject({ result: 'skipped', reason: 'already running', observedState: 'desired=1 running=0' });
    expect(second.metricPublished).toBe(false);
    expect(fake.callsTo('startInstance')).toHaveLength(1);
    expect(fake.callsTo('updateDesiredCount')).toHaveLength(1);
  });

  test('does not start a database that is already starting', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'starting' });
    const { context } = setup(fake);

    const report = await runAutoStart(context, REGISTER);

    expect(report.database).toMatchObject({ result: 'skipped', reason: 'already starting' });
    expect(report.service?.result).toBe('acted');
  });

  test('skips a database that is still stopping but scales the service up', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'stopping' });
    const { context } = setup(fake);

    const report = await runAutoStart(context, REGISTER);

    expect(report.database).toMatchObject({ result: 'skipped', reason: 'cannot start while stopping', observedState: 'stopping' });
    expect(report.service?.result).toBe('acted');
    expect(report.metricPublished).toBe(true);
  });

  test('still scales the service when starting the database fails', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'stopped' }).failNext(
      'startInstance',
      platformError('AccessDeniedException'),
    );
    const { context } = setup(fake);

    const report = await runAutoStart(context, REGISTER);

    expect(report.database).toMatchObject({ result: 'failed', reason: 'fatal platform error' });
    expect(report.service?.result).toBe('acted');
  });

  test('ignores events for another target group', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'stopped' });
    const { context, records } = setup(fake);
    const signal: TargetChangeSignal = {
      ...REGISTER,
      targetGroupArn: 'arn:aws:elasticloadbalancing:ap-south-1:123456789012:targetgroup/other-tg/fedcba9876543210',
    };

    const report = await runAutoStart(context, signal);

    expect(report).toEqual({ status: 'ignored', signal, reason: 'event is for another target group', metricPublished: false });
    expect(fake.calls).toEqual([]);
    expect(messagesOf(records)).toEqual(['Event is for another target group, ignoring']);
  });

  test('does not undo an auto-stop when ECS drains the stopped task', async () => {
    const fake = new FakeControlPlane();
    const { context, records } = setup(fake);

    await runAutoStop(context);
    const signal = parseTargetChangeEvent({
      source: 'aws.elasticloadbalancing',
      'detail-type': 'AWS API Call via CloudTrail',
      detail: {
        eventName: 'DeregisterTargets',
        userIdentity: { type: 'AWSService', invokedBy: 'ecs.amazonaws.com' },
        requestParameters: { targetGroupArn: TARGET_GROUP_ARN, targets: [{ id: '10.0.3.12', port: 8000 }] },
      },
    });
    const callsAfterStop = fake.calls.length;

    const report = await runAutoStart(context, signal);

    expect(report).toEqual({
      status: 'ignored',
      signal,
      reason: 'deregistration issued by ECS',
      metricPublished: false,
    });
    expect(fake.calls).toHaveLength(callsAfterStop);
    expect(fake.state.service?.desiredCount).toBe(0);
    expect(fake.state.databaseStatus).toBe('stopping');
    expect(records[records.length - 1]).toMatchObject({
      level: 'info',
      message: 'Deregistration is not traffic, ignoring',
      reason: 'deregistration issued by ECS',
      invokedBy: 'ecs.amazonaws.com',
    });
  });

  test('ignores any deregistration while the service is scaled to zero', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'stopped' });
    const { context } = setup(fake);

    const report = await runAutoStart(context, { ...REGISTER, eventName: 'DeregisterTargets' });

    expect(report.status).toBe('ignored');
    expect(report.reason).toBe('deregistration while the service is scaled to zero');
    expect(fake.operations()).toEqual(['describeService']);
  });

  test('handles a deregistration made by someone else while the service runs', async () => {
    const fake = new FakeControlPlane({ databaseStatus: 'stopped' });
    const { context } = setup(fake);

    const report = await runAutoStart(context, { ...REGISTER, eventName: 'DeregisterTargets' });

    expect(report.status).toBe('completed');
    expect(report.database?.result).toBe('acted');
    expect(report.service).toMatchObject({ result: 'skipped', reason: 'already running' });
  });

  test.each(['INACTIVE', 'DRAINING'])('reports a %s service as a failure', async (status) => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE, status }, databaseStatus: 'available' });
    const { context, records } = setup(fake);

    const report = await runAutoStart(context, REGISTER);

    expect(report.service).toEqual({
      resource: 'service',
      id: 'dev-storefront-cluster/dev-storefront-service',
      result: 'failed',
      reason: `service is ${status}`,
      observedState: 'desired=0 running=0',
    });
    expect(fake.callsTo('updateDesiredCount')).toEqual([]);
    expect(records.find((record) => record.message === 'Action failed')).toMatchObject({ level: 'error', resource: 'service' });
  });

  test('acts on a manual invocation', async () => {
    const fake = new FakeControlPlane({ service: { ...STOPPED_SERVICE }, databaseStatus: 'stopped' });
    const { context } = setup(fake);

    const report = await runAutoStart(context, { source: 'manual' });

    expect(report.status).toBe('completed');
    expect(report.database?.result).toBe('acted');
    expect(report.service?.result).toBe('acted');
  });

  test('does not read target health without a target group', async () => {
    const fake = new FakeControlPlane();
    const { context } = setup(fake, { targetGroupArn: undefined });

    const report = await runAutoStart(context, REGISTER);

    expect(report.targetHealth).toBeUndefined();
    expect(fake.callsTo('describeTargetHealth')).toEqual([]);
  });

  test('a target health failure does not fail the run', async () => {
    const fake = new FakeControlPlane().failNext('describeTargetHealth', platformError('TargetGroupNotFoundException'));
    const { context, records } = setup(fake);

    const report = await runAutoStart(context, REGISTER);

    expect(report.status).toBe('completed');
    expect(report.targetHealth).toBeUndefined();
    expect(records.find((record) => record.level === 'warn')).toMatchObject({
      message: 'Could not read target health',
      targetGroupArn: TARGET_GROUP_ARN,
      errorName: 'TargetGroupNotFoundException',
    });
  });
});
