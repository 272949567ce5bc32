import { DescribeServicesCommand, ECSClient, UpdateServiceCommand } from '@aws-sdk/client-ecs';
import {
  DescribeDBInstancesCommand,
  RDSClient,
  StartDBInstanceCommand,
  StopDBInstanceCommand,
} from '@aws-sdk/client-rds';
import { CloudWatchClient, GetMetricStatisticsCommand, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import {
  DescribeTargetHealthCommand,
  ElasticLoadBalancingV2Client,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { classifyPlatformError } from './errors';
import { ServiceState } from './platform';
import type {
  ActivityPlatform,
  ComputePlatform,
  ControlPlane,
  DatabasePlatform,
  MetricsPlatform,
  ServiceRef,
  ServiceStatus,
  TargetHealthSummary,
  TimeWindow,
} from './platform';

// ALB RequestCount is published at 1-minute resolution; sum it in 5-minute buckets
const REQUEST_COUNT_PERIOD_SECONDS = 300;

export type AwsClients = {
  ecs: ECSClient;
  rds: RDSClient;
  cloudwatch: CloudWatchClient;
  elbv2: ElasticLoadBalancingV2Client;
};

/**
 * Clients are created with a single attempt: `withRetry` owns retries so that
 * every retry is visible in the function logs.
 */
export function createAwsClients(region?: string): AwsClients {
  const config = { region, maxAttempts: 1 };
  return {
    ecs: new ECSClient(config),
    rds: new RDSClient(config),
    cloudwatch: new CloudWatchClient(config),
    elbv2: new ElasticLoadBalancingV2Client(config),
  };
}

export class EcsComputePlatform implements ComputePlatform {
  constructor(private readonly ecs: ECSClient) {}

  async describeService(ref: ServiceRef): Promise<ServiceStatus | undefined> {
    const response = await this.ecs.send(
      new DescribeServicesCommand({
        cluster: ref.clusterName,
        services: [ref.serviceName],
      }),
    );

    const service = response.services?.find(
      (candidate) => candidate.serviceName === ref.serviceName || candidate.serviceArn?.endsWith(`/${ref.serviceName}`),
    );
    if (!service || service.status === ServiceState.INACTIVE) return undefined;

    return {
      desiredCount: service.desiredCount ?? 0,
      runningCount: service.runningCount ?? 0,
      pendingCount: service.pendingCount ?? 0,
      status: service.status ?? 'UNKNOWN',
    };
  }

  async updateDesiredCount(ref: ServiceRef, desiredCount: number): Promise<void> {
    await this.ecs.send(
      new UpdateServiceCommand({
        cluster: ref.clusterName,
        service: ref.serviceName,
        desiredCount,
      }),
    );
  }
}

export class RdsDatabasePlatform implements DatabasePlatform {
  constructor(private readonly rds: RDSClient) {}

  async describeInstance(instanceId: string): Promise<string | undefined> {
    try {
      const response = await this.rds.send(
        new DescribeDBInstancesCommand({ DBInstanceIdentifier: instanceId }),
      );
      return response.DBInstances?.[0]?.DBInstanceStatus;
    } catch (error) {
      if (classifyPlatformError(error) === 'not-found') return undefined;
      throw error;
    }
  }

  async startInstance(instanceId: string): Promise<void> {
    await this.rds.send(new StartDBInstanceCommand({ DBInstanceIdentifier: instanceId }));
  }

  async stopInstance(instanceId: string): Promise<void> {
    await this.rds.send(new StopDBInstanceCommand({ DBInstanceIdentifier: instanceId }));
  }
}

export class LoadBalancerActivityPlatform implements ActivityPlatform {
  constructor(
    private readonly cloudwatch: CloudWatchClient,
    private readonly elbv2: ElasticLoadBalancingV2Client,
  ) {}

  async countRequests(loadBalancerName: string, window: TimeWindow): Promise<number> {
    const response = await this.cloudwatch.send(
      new GetMetricStatisticsCommand({
        Namespace: 'AWS/ApplicationELB',
        MetricName: 'RequestCount',
        Dimensions: [{ Name: 'LoadBalancer', Value: loadBalancerName }],
        StartTime: window.start,
        EndTime: window.end,
        Period: REQUEST_COUNT_PERIOD_SECONDS,
        Statistics: ['Sum'],
      }),
    );

    return (response.Datapoints ?? []).reduce((total, datapoint) => total + (datapoint.Sum ?? 0), 0);
  }

  async describeTargetHealth(targetGroupArn: string): Promise<TargetHealthSummary> {
    const response = await this.elbv2.send(
      new DescribeTargetHealthCommand({ TargetGroupArn: targetGroupArn }),
    );

    const summary: TargetHealthSummary = { total: 0, healthy: 0, unhealthy: 0, other: 0 };
    for (const description of response.TargetHealthDescriptions ?? []) {
      const state = description.TargetHealth?.State;
      summary.total += 1;
      if (state === 'healthy') {
        summary.healthy += 1;
      } else if (state === 'unhealthy') {
        summary.unhealthy += 1;
      } else {
        summary.other += 1;
      }
    }
    return summary;
  }
}

export class CloudWatchMetricsPlatform implements MetricsPlatform {
  constructor(private readonly cloudwatch: CloudWatchClient) {}

  async recordExecution(namespace: string, metricName: string, dimensions: Record<string, string>): Promise<void> {
    await this.cloudwatch.send(
      new PutMetricDataCommand({
        Namespace: namespace,
        MetricData: [
          {
            MetricName: metricName,
            Value: 1,
            Unit: 'Count',
            Timestamp: new Date(),
            Dimensions: Object.entries(dimensions).map(([Name, Value]) => ({ Name, Value })),
          },
        ],
      }),
    );
  }
}

export function createAwsControlPlane(clients: AwsClients = createAwsClients()): ControlPlane {
  return {
    compute: new EcsComputePlatform(clients.ecs),
    database: new RdsDatabasePlatform(clients.rds),
    activity: new LoadBalancerActivityPlatform(clients.cloudwatch, clients.elbv2),
    metrics: new CloudWatchMetricsPlatform(clients.cloudwatch),
  };
}
