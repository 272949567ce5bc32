import { ConfigurationError } from './errors';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry';

export type EnvironmentVariables = Record<string, string | undefined>;

export type SchedulerConfig = {
  environment: string;
  clusterName: string;
  serviceName: string;
  databaseInstanceId: string;
  /** CloudWatch `LoadBalancer` dimension value, `app/<name>/<id>`. */
  loadBalancerName?: string;
  targetGroupArn?: string;
  runningDesiredCount: number;
  idleLookbackMinutes: number;
  metricNamespace?: string;
  retry: RetryPolicy;
};

export type LoadConfigOptions = {
  requireLoadBalancer?: boolean;
};

const DB_INSTANCE_ID_PATTERN = /^[a-zA-Z](?!.*--)[a-zA-Z0-9-]{0,62}(?<!-)$/;
const LOAD_BALANCER_DIMENSION_PATTERN = /^app\/[A-Za-z0-9-]+\/[A-Za-z0-9]+$/;
const TARGET_GROUP_ARN_PATTERN = /^arn:aws[a-zA-Z-]*:elasticloadbalancing:[a-z0-9-]+:\d{12}:targetgroup\/[A-Za-z0-9-]+\/[A-Za-z0-9]+$/;

function parseIntSafe(value: string | undefined, fallback: number, min: number, max: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

function readString(env: EnvironmentVariables, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadSchedulerConfig(
  env: EnvironmentVariables = process.env,
  options: LoadConfigOptions = {},
): SchedulerConfig {
  const missing: string[] = [];
  const invalid: string[] = [];

  const requireValue = (key: string): string => {
    const value = readString(env, key);
    if (!value) missing.push(key);
    return value ?? '';
  };

  const clusterName = requireValue('ECS_CLUSTER');
  const serviceName = requireValue('ECS_SERVICE');
  const databaseInstanceId = requireValue('RDS_INSTANCE');
  const loadBalancerName = options.requireLoadBalancer ? requireValue('ALB_NAME') : readString(env, 'ALB_NAME');
  const targetGroupArn = readString(env, 'TARGET_GROUP_ARN');

  if (databaseInstanceId && !DB_INSTANCE_ID_PATTERN.test(databaseInstanceId)) {
    invalid.push('RDS_INSTANCE');
  }
  if (loadBalancerName && !LOAD_BALANCER_DIMENSION_PATTERN.test(loadBalancerName)) {
    invalid.push('ALB_NAME');
  }
  if (targetGroupArn && !TARGET_GROUP_ARN_PATTERN.test(targetGroupArn)) {
    invalid.push('TARGET_GROUP_ARN');
  }

  if (missing.length > 0 || invalid.length > 0) {
    const problems = [
      missing.length > 0 ? `missing ${missing.join(', ')}` : undefined,
      invalid.length > 0 ? `invalid ${invalid.join(', ')}` : undefined,
    ].filter((problem): problem is string => problem !== undefined);

    throw new ConfigurationError(`Scheduler configuration error: ${problems.join('; ')}`, [...missing, ...invalid]);
  }

  const maxDelayMs = parseIntSafe(env.RETRY_MAX_DELAY_MS, DEFAULT_RETRY_POLICY.maxDelayMs, 10, 60_000);

  return {
    environment: readString(env, 'ENVIRONMENT') ?? 'dev',
    clusterName,
    serviceName,
    databaseInstanceId,
    loadBalancerName,
    targetGroupArn,
    runningDesiredCount: parseIntSafe(env.RUNNING_DESIRED_COUNT, 1, 1, 10),
    idleLookbackMinutes: parseIntSafe(env.IDLE_LOOKBACK_MINUTES, 60, 5, 1440),
    metricNamespace: readString(env, 'METRIC_NAMESPACE'),
    retry: {
      maxAttempts: parseIntSafe(env.RETRY_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.maxAttempts, 1, 10),
      baseDelayMs: Math.min(
        parseIntSafe(env.RETRY_BASE_DELAY_MS, DEFAULT_RETRY_POLICY.baseDelayMs, 10, 10_000),
        maxDelayMs,
      ),
      maxDelayMs,
    },
  };
}
