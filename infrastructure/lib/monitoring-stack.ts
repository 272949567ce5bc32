import * as cdk from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as subscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import * as actions from 'aws-cdk-lib/aws-cloudwatch-actions';
import { Construct } from 'constructs';
import { SCHEDULER_METRIC_NAMESPACE } from './auto-scheduler-stack';

export type MonitoringStackProps = {
  environment: string;
  databaseInstanceIdentifier: string;
  ecsClusterName: string;
  apiServiceName: string;
  loadBalancerFullName: string;
  targetGroupFullName: string;
  autoStartFunction: lambda.IFunction;
  autoStopFunction: lambda.IFunction;
  /** Zero healthy hosts is the expected idle state when auto-stop is on. */
  autoStopEnabled: boolean;
  alertEmail?: string;
};

export class MonitoringStack extends Construct {
  public readonly dashboard: cloudwatch.Dashboard;
  public readonly alarmTopic?: sns.Topic;

  constructor(scope: Construct, id: string, props: MonitoringStackProps) {
    super(scope, id);

    const {
      environment,
      databaseInstanceIdentifier,
      ecsClusterName,
      apiServiceName,
      loadBalancerFullName,
      targetGroupFullName,
      autoStartFunction,
      autoStopFunction,
      autoStopEnabled,
      alertEmail,
    } = props;

    const region = cdk.Stack.of(this).region;
    const dashboardName = `Storefront-${environment}`;

    if (alertEmail) {
      this.alarmTopic = new sns.Topic(this, 'AlarmTopic', {
        topicName: `${environment}-storefront-alerts`,
        displayName: `Storefront ${environment} Monitoring Alerts`,
      });

      this.alarmTopic.addSubscription(
        new subscriptions.EmailSubscription(alertEmail),
      );
    }

    this.dashboard = new cloudwatch.Dashboard(this, 'Dashboard', {
      dashboardName,
      periodOverride: cloudwatch.PeriodOverride.AUTO,
      defaultInterval: cdk.Duration.hours(6),
    });

    // === HEADER ROW ===
    this.dashboard.addWidgets(
      new cloudwatch.TextWidget({
        markdown: `# Storefront API - ${environment}

**Auto-stop:** ${autoStopEnabled ? 'enabled (API and database stop when idle)' : 'disabled'}

- [ECS Service](https://${region}.console.aws.amazon.com/ecs/v2/clusters/${ecsClusterName}/services)
- [RDS Database](https://${region}.console.aws.amazon.com/rds/home?region=${region}#database:id=${databaseInstanceIdentifier})`,
        width: 24,
        height: 3,
      }),
    );

    // === LOAD BALANCER ROW ===

    const requestCountMetric = new cloudwatch.Metric({
      namespace: 'AWS/ApplicationELB',
      metricName: 'RequestCount',
      dimensionsMap: {
        LoadBalancer: loadBalancerFullName,
      },
      statistic: 'Sum',
      period: cdk.Duration.minutes(5),
    });

    const http5xxMetric = new cloudwatch.Metric({
      namespace: 'AWS/ApplicationELB',
      metricName: 'HTTPCode_Target_5XX_Count',
      dimensionsMap: {
        LoadBalancer: loadBalancerFullName,
      },
      statistic: 'Sum',
      period: cdk.Duration.minutes(5),
    });

    const healthyHostMetric = new cloudwatch.Metric({
      namespace: 'AWS/ApplicationELB',
      metricName: 'HealthyHostCount',
      dimensionsMap: {
        TargetGroup: targetGroupFullName,
        LoadBalancer: loadBalancerFullName,
      },
      statistic: 'Average',
      period: cdk.Duration.minutes(1),
    });

    this.dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'ALB Requests & 5xx',
        left: [requestCountMetric],
        right: [http5xxMetric],
        width: 12,
        height: 6,
      }),
      new cloudwatch.GraphWidget({
        title: 'Healthy Hosts',
        left: [healthyHostMetric],
        width: 12,
        height: 6,
        leftYAxis: {
          min: 0,
        },
      }),
    );

    // === SERVICE & DATABASE ROW ===

    const apiCpuMetric = new cloudwatch.Metric({
      namespace: 'AWS/ECS',
      metricName: 'CPUUtilization',
      dimensionsMap: {
        ServiceName: apiServiceName,
        ClusterName: ecsClusterName,
      },
      statistic: 'Average',
      period: cdk.Duration.minutes(5),
    });

    const apiMemoryMetric = apiCpuMetric.with({ metricName: 'MemoryUtilization' });

    const dbCpuMetric = new cloudwatch.Metric({
      namespace: 'AWS/RDS',
      metricName: 'CPUUtilization',
      dimensionsMap: {
        DBInstanceIdentifier: databaseInstanceIdentifier,
      },
      statistic: 'Average',
      period: cdk.Duration.minutes(5),
    });

    const dbConnectionsMetric = dbCpuMetric.with({ metricName: 'DatabaseConnections' });

    this.dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'API Service - CPU & Memory (%)',
        left: [apiCpuMetric, apiMemoryMetric],
        width: 12,
        height: 6,
        leftYAxis: {
          min: 0,
          max: 100,
        },
      }),
      new cloudwatch.GraphWidget({
        title: 'MySQL CPU & Connections',
        left: [dbCpuMetric],
        right: [dbConnectionsMetric],
        width: 12,
        height: 6,
        leftYAxis: {
          label: 'CPU %',
          min: 0,
          max: 100,
        },
      }),
    );

    // === AUTO SCHEDULER ROW ===

    const executionMetric = (metricName: string) =>
      new cloudwatch.Metric({
        namespace: SCHEDULER_METRIC_NAMESPACE,
        metricName,
        dimensionsMap: {
          Environment: environment,
          Service: apiServiceName,
        },
        statistic: 'Sum',
        period: cdk.Duration.hours(1),
      });

    const autoStopErrors = autoStopFunction.metricErrors({ period: cdk.Duration.hours(1) });
    const autoStartErrors = autoStartFunction.metricErrors({ period: cdk.Duration.minutes(5) });

    this.dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'Auto-Start / Auto-Stop Actions',
        left: [executionMetric('AutoStartExecuted'), executionMetric('AutoStopExecuted')],
        width: 12,
        height: 6,
      }),
      new cloudwatch.GraphWidget({
        title: 'Scheduler Function Invocations & Errors',
        left: [
          autoStartFunction.metricInvocations({ period: cdk.Duration.hours(1) }),
          autoStopFunction.metricInvocations({ period: cdk.Duration.hours(1) }),
        ],
        right: [autoStartErrors, autoStopErrors],
        width: 12,
        height: 6,
      }),
    );

    // === CREATE ALARMS ===

    if (this.alarmTopic) {
      const alarmAction = new actions.SnsAction(this.alarmTopic);

      const alarms: cloudwatch.Alarm[] = [
        new cloudwatch.Alarm(this, 'AutoStopErrorsAlarm', {
          metric: autoStopErrors,
          threshold: 1,
          evaluationPeriods: 1,
          comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
          alarmDescription: 'Auto-stop function failed - check its configuration and logs',
          alarmName: `Storefront-${environment}-AutoStop-Errors`,
          treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
        }),
        new cloudwatch.Alarm(this, 'AutoStartErrorsAlarm', {
          metric: autoStartErrors,
          threshold: 1,
          evaluationPeriods: 1,
          comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
          alarmDescription: 'Auto-start function failed - the API may stay scaled down',
          alarmName: `Storefront-${environment}-AutoStart-Errors`,
          treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
        }),
        new cloudwatch.Alarm(this, 'Http5xxHighAlarm', {
          metric: http5xxMetric,
          threshold: 10,
          evaluationPeriods: 1,
          comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
          alarmDescription: 'More than 10 5xx errors in 5 minutes - check application logs',
          alarmName: `Storefront-${environment}-HTTP-5xx-High`,
          treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
        }),
        new cloudwatch.Alarm(this, 'DatabaseCpuHighAlarm', {
          metric: dbCpuMetric,
          threshold: 90,
          evaluationPeriods: 2,
          datapointsToAlarm: 2,
          comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
          alarmDescription: 'MySQL CPU exceeds 90% - consider a larger instance class',
          alarmName: `Storefront-${environment}-MySQL-CPU-High`,
          treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
        }),
      ];

      if (!autoStopEnabled) {
        alarms.push(
          new cloudwatch.Alarm(this, 'UnhealthyHostAlarm', {
            metric: healthyHostMetric,
            threshold: 1,
            evaluationPeriods: 2,
            datapointsToAlarm: 2,
            comparisonOperator: cloudwatch.ComparisonOperator.LESS_THAN_THRESHOLD,
            alarmDescription: 'No healthy hosts available - service may be down',
            alarmName: `Storefront-${environment}-Unhealthy-Hosts`,
          }),
        );
      }

      for (const alarm of alarms) {
        alarm.addAlarmAction(alarmAction);
      }
    }

    new cdk.CfnOutput(this, 'DashboardURL', {
      value: `https://${region}.console.aws.amazon.com/cloudwatch/home?region=${region}#dashboards:name=${dashboardName}`,
      description: 'CloudWatch Dashboard URL',
    });

    if (this.alarmTopic) {
      new cdk.CfnOutput(this, 'AlarmTopicArn', {
        value: this.alarmTopic.topicArn,
        description: 'SNS Topic ARN for alarms',
        exportName: `${environment}-storefront-alarm-topic-arn`,
      });
    }
  }
}
