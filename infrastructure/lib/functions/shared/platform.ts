export type ServiceRef = {
  clusterName: string;
  serviceName: string;
};

export type ServiceStatus = {
  desiredCount: number;
  runningCount: number;
  pendingCount: number;
  status: string;
};

/** ECS reports deleted services as INACTIVE for a while after deletion. */
export const ServiceState = {
  ACTIVE: 'ACTIVE',
  DRAINING: 'DRAINING',
  INACTIVE: 'INACTIVE',
} as const;

/** RDS statuses the triggers act on; any other status is reported and skipped. */
export const DatabaseStatus = {
  AVAILABLE: 'available',
  STOPPED: 'stopped',
  STOPPING: 'stopping',
  STARTING: 'starting',
} as const;

export type TimeWindow = {
  start: Date;
  end: Date;
};

export type TargetHealthSummary = {
  total: number;
  healthy: number;
  unhealthy: number;
  other: number;
};

export type ComputePlatform = {
  /** Resolves `undefined` when the service does not exist. */
  describeService(ref: ServiceRef): Promise<ServiceStatus | undefined>;
  updateDesiredCount(ref: ServiceRef, desiredCount: number): Promise<void>;
};

export type DatabasePlatform = {
  /** Resolves the instance status, or `undefined` when the instance does not exist. */
  describeInstance(instanceId: string): Promise<string | undefined>;
  startInstance(instanceId: string): Promise<void>;
  stopInstance(instanceId: string): Promise<void>;
};

export type ActivityPlatform = {
  countRequests(loadBalancerName: string, window: TimeWindow): Promise<number>;
  describeTargetHealth(targetGroupArn: string): Promise<TargetHealthSummary>;
};

export type MetricsPlatform = {
  recordExecution(namespace: string, metricName: string, dimensions: Record<string, string>): Promise<void>;
};

export type ControlPlane = {
  compute: ComputePlatform;
  database: DatabasePlatform;
  activity: ActivityPlatform;
  metrics: MetricsPlatform;
};
