import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as rds from 'aws-cdk-lib/aws-rds';
import { Construct } from 'constructs';
import type { AutoSchedulerConfig } from './environments';

export const SCHEDULER_METRIC_NAMESPACE = 'Storefront/AutoScheduler';

export type AutoSchedulerStackProps = {
  environment: string;
  vpc: ec2.IVpc;
  schedulerSecurityGroup: ec2.ISecurityGroup;
  service: ecs.IBaseService;
  database: rds.IDatabaseInstance;
  loadBalancerFullName: string;
  targetGroup: elbv2.IApplicationTargetGroup;
  schedule: AutoSchedulerConfig;
  logRetentionDays: number;
};

export type AutoSchedulerStackOutputs = {
  autoStartFunction: lambda.IFunction;
  autoStopFunction: lambda.IFunction;
  autoStopRule?: events.Rule;
  autoStartRule: events.Rule;
};

export class AutoSchedulerStack extends Construct {
  public readonly outputs: AutoSchedulerStackOutputs;

  constructor(scope: Construct, id: string, props: AutoSchedulerStackProps) {
    super(scope, id);

    const {
      environment,
      vpc,
      schedulerSecurityGroup,
      service,
      database,
      loadBalancerFullName,
      targetGroup,
      schedule,
      logRetentionDays,
    } = props;

    const sharedEnvironment = {
      ENVIRONMENT: environment,
      ECS_CLUSTER: service.cluster.clusterName,
      ECS_SERVICE: service.serviceName,
      RDS_INSTANCE: database.instanceIdentifier,
      ALB_NAME: loadBalancerFullName,
      TARGET_GROUP_ARN: targetGroup.targetGroupArn,
      METRIC_NAMESPACE: SCHEDULER_METRIC_NAMESPACE,
      LOG_LEVEL: environment === 'production' ? 'INFO' : 'DEBUG',
      NODE_OPTIONS: '--enable-source-maps',
    };

    const createFunction = (name: 'auto-start' | 'auto-stop', description: string, extraEnvironment: Record<string, string>) => {
      const logGroup = new logs.LogGroup(this, `${name}-logs`, {
        logGroupName: `/aws/lambda/${environment}-storefront-${name}`,
        retention: logRetentionDays,
        removalPolicy: cdk.RemovalPolicy.DESTROY,
      });

      return new nodejs.NodejsFunction(this, `${name}-function`, {
        functionName: `${environment}-storefront-${name}`,
        description,
        entry: path.join(__dirname, 'functions', name, 'index.ts'),
        handler: 'handler',
        runtime: lambda.Runtime.NODEJS_20_X,
        architecture: lambda.Architecture.ARM_64,
        memorySize: 128,
        timeout: cdk.Duration.seconds(300),
        vpc,
        vpcSubnets: {
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
        },
        securityGroups: [schedulerSecurityGroup],
        environment: { ...sharedEnvironment, ...extraEnvironment },
        logGroup,
        bundling: {
          minify: true,
          sourceMap: true,
          target: 'node20',
        },
      });
    };

    const autoStopFunction = createFunction(
      'auto-stop',
      `Scales the ${environment} API to zero and stops its database when idle`,
      { IDLE_LOOKBACK_MINUTES: String(schedule.idleLookbackMinutes) },
    );

    const autoStartFunction = createFunction(
      'auto-start',
      `Starts the ${environment} database and scales the API up on target changes`,
      { RUNNING_DESIRED_COUNT: String(schedule.runningDesiredCount) },
    );

    // Permissions
    for (const fn of [autoStartFunction, autoStopFunction]) {
      fn.addToRolePolicy(
        new iam.PolicyStatement({
          actions: ['ecs:DescribeServices', 'ecs:UpdateService'],
          resources: [service.serviceArn],
        }),
      );
    }

    autoStartFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['rds:DescribeDBInstances', 'rds:StartDBInstance'],
        resources: [database.instanceArn],
      }),
    );

    autoStopFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['rds:DescribeDBInstances', 'rds:StopDBInstance'],
        resources: [database.instanceArn],
      }),
    );

    // Read-only calls without resource-level permissions
    autoStopFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['cloudwatch:GetMetricStatistics'],
        resources: ['*'],
      }),
    );

    autoStartFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['elasticloadbalancing:DescribeTargetHealth'],
        resources: ['*'],
      }),
    );

    for (const fn of [autoStartFunction, autoStopFunction]) {
      fn.addToRolePolicy(
        new iam.PolicyStatement({
          actions: ['cloudwatch:PutMetricData'],
          resources: ['*'],
          conditions: {
            StringEquals: { 'cloudwatch:namespace': SCHEDULER_METRIC_NAMESPACE },
          },
        }),
      );
    }

    // Auto-stop runs on a fixed schedule, only where the environment allows it
    let autoStopRule: events.Rule | undefined;
    if (schedule.enabled) {
      autoStopRule = new events.Rule(this, 'AutoStopSchedule', {
        ruleName: `${environment}-storefront-auto-stop`,
        description: `Auto-stop check every ${schedule.intervalMinutes} minutes for ${environment} environment`,
        schedule: events.Schedule.rate(cdk.Duration.minutes(schedule.intervalMinutes)),
      });

      // A missed tick is picked up by the next one
      autoStopRule.addTarget(new targets.LambdaFunction(autoStopFunction, { retryAttempts: 0 }));
    }

    // Auto-start reacts to target (de)registration on the API target group.
    // These are CloudTrail management events delivered to the default bus.
    const autoStartRule = new events.Rule(this, 'AutoStartOnTargetChange', {
      ruleName: `${environment}-storefront-auto-start`,
      description: `Auto-start on target registration changes for ${environment} environment`,
      eventPattern: {
        source: ['aws.elasticloadbalancing'],
        detailType: ['AWS API Call via CloudTrail'],
        detail: {
          eventSource: ['elasticloadbalancing.amazonaws.com'],
          eventName: ['RegisterTargets', 'DeregisterTargets'],
          requestParameters: {
            targetGroupArn: [targetGroup.targetGroupArn],
          },
        },
      },
    });

    autoStartRule.addTarget(new targets.LambdaFunction(autoStartFunction, { retryAttempts: 2 }));

    new cdk.CfnOutput(this, 'AutoStartFunctionName', {
      value: autoStartFunction.functionName,
      description: `Auto-start Lambda function name for ${environment} environment`,
      exportName: `${environment}-auto-start-lambda`,
    });

    new cdk.CfnOutput(this, 'AutoStopFunctionName', {
      value: autoStopFunction.functionName,
      description: `Auto-stop Lambda function name for ${environment} environment`,
      exportName: `${environment}-auto-stop-lambda`,
    });

    cdk.Tags.of(autoStartFunction).add('Purpose', 'auto-start');
    cdk.Tags.of(autoStopFunction).add('Purpose', 'auto-stop');
    cdk.Tags.of(this).add('Component', 'Scheduler');

    this.outputs = {
      autoStartFunction,
      autoStopFunction,
      autoStopRule,
      autoStartRule,
    };
  }
}
