import type {
  ControlPlane,
  ServiceStatus,
  TargetHealthSummary,
} from '../../lib/functions/shared/platform';

export type FakeOperation =
  | 'describeService'
  | 'updateDesiredCount'
  | 'describeInstance'
  | 'startInstance'
  | 'stopInstance'
  | 'countRequests'
  | 'describeTargetHealth'
  | 'recordExecution';

export type RecordedMetric = {
  namespace: string;
  metricName: string;
  dimensions: Record<string, string>;
};

export type FakeState = {
  service?: ServiceStatus;
  databaseStatus?: string;
  requestCount: number;
  targetHealth: TargetHealthSummary;
  metrics: RecordedMetric[];
};

/**
 * In-memory stand-in for ECS, RDS, the load balancer and CloudWatch. State
 * changes the way the real platform reports them right after the call returns.
 */
export class FakeControlPlane {
  readonly state: FakeState;
  readonly calls: Array<{ operation: FakeOperation; args: unknown[] }> = [];
  private readonly failures = new Map<FakeOperation, unknown[]>();

  constructor(initial: Partial<FakeState> = {}) {
    this.state = {
      service: { desiredCount: 1, runningCount: 1, pendingCount: 0, status: 'ACTIVE' },
      databaseStatus: 'available',
      requestCount: 0,
      targetHealth: { total: 0, healthy: 0, unhealthy: 0, other: 0 },
      metrics: [],
      ...initial,
    };
  }

  /** Makes the next calls to `operation` reject with `errors`, in order. */
  failNext(operation: FakeOperation, ...errors: unknown[]): this {
    this.failures.set(operation, [...(this.failures.get(operation) ?? []), ...errors]);
    return this;
  }

  operations(): FakeOperation[] {
    return this.calls.map((call) => call.operation);
  }

  callsTo(operation: FakeOperation): unknown[][] {
    return this.calls.filter((call) => call.operation === operation).map((call) => call.args);
  }

  get platform(): ControlPlane {
    return {
      compute: {
        describeService: (ref) =>
          this.invoke('describeService', [ref], () => (this.state.service ? { ...this.state.service } : undefined)),
        updateDesiredCount: (ref, desiredCount) =>
          this.invoke('updateDesiredCount', [ref, desiredCount], () => {
            if (this.state.service) this.state.service.desiredCount = desiredCount;
          }),
      },
      database: {
        describeInstance: (instanceId) => this.invoke('describeInstance', [instanceId], () => this.state.databaseStatus),
        startInstance: (instanceId) =>
          this.invoke('startInstance', [instanceId], () => {
            this.state.databaseStatus = 'starting';
          }),
        stopInstance: (instanceId) =>
          this.invoke('stopInstance', [instanceId], () => {
            this.state.databaseStatus = 'stopping';
          }),
      },
      activity: {
        countRequests: (loadBalancerName, window) =>
          this.invoke('countRequests', [loadBalancerName, window], () => this.state.requestCount),
        describeTargetHealth: (targetGroupArn) =>
          this.invoke('describeTargetHealth', [targetGroupArn], () => ({ ...this.state.targetHealth })),
      },
      metrics: {
        recordExecution: (namespace, metricName, dimensions) =>
          this.invoke('recordExecution', [namespace, metricName, dimensions], () => {
            this.state.metrics.push({ namespace, metricName, dimensions });
          }),
      },
    };
  }

  private async invoke<T>(operation: FakeOperation, args: unknown[], respond: () => T): Promise<T> {
    this.calls.push({ operation, args });
    const queued = this.failures.get(operation);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }
    return respond();
  }
}
