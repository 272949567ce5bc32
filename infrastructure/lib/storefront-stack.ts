import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as appreg from '@aws-cdk/aws-servicecatalogappregistry-alpha';
import { NetworkStack } from './network-stack';
import { DatabaseStack } from './database-stack';
import { ComputeStack } from './compute-stack';
import { AutoSchedulerStack } from './auto-scheduler-stack';
import { MonitoringStack } from './monitoring-stack';
import type { StorefrontStackConfig } from './environments';

export type StorefrontStackProps = cdk.StackProps & {
  config: StorefrontStackConfig;
};

export class StorefrontStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: StorefrontStackProps) {
    super(scope, id, props);

    const { config } = props;
    const { environment } = config;

    // 1. Network Infrastructure
    const network = new NetworkStack(this, 'Network', {
      environment,
      maxAzs: config.maxAzs,
      natGateways: config.natGateways,
    });

    // 2. Database Infrastructure
    const database = new DatabaseStack(this, 'Database', {
      environment,
      vpc: network.outputs.vpc,
      rdsSecurityGroup: network.outputs.rdsSecurityGroup,
      instanceClass: config.databaseInstanceClass,
      allocatedStorage: config.databaseAllocatedStorage,
      multiAz: config.databaseMultiAz,
      backupRetentionDays: config.databaseBackupRetentionDays,
      deletionProtection: config.databaseDeletionProtection,
      logRetentionDays: config.logRetentionDays,
    });

    // 3. Compute Infrastructure
    const compute = new ComputeStack(this, 'Compute', {
      environment,
      vpc: network.outputs.vpc,
      albSecurityGroup: network.outputs.albSecurityGroup,
      ecsSecurityGroup: network.outputs.ecsSecurityGroup,
      databaseSecret: database.outputs.secret,
      databaseHost: database.outputs.instance.dbInstanceEndpointAddress,
      databasePort: database.outputs.instance.dbInstanceEndpointPort,
      databaseName: database.outputs.databaseName,
      apiCpu: config.apiCpu,
      apiMemory: config.apiMemory,
      apiDesiredCount: config.apiDesiredCount,
      apiImageTag: config.apiImageTag,
      useFargateSpot: config.useFargateSpot,
      logRetentionDays: config.logRetentionDays,
      domainName: config.domainName,
      hostedZoneId: config.hostedZoneId,
      hostedZoneName: config.hostedZoneName,
      certificateArn: config.certificateArn,
    });

    // 4. Auto-start / auto-stop functions
    const scheduler = new AutoSchedulerStack(this, 'AutoScheduler', {
      environment,
      vpc: network.outputs.vpc,
      schedulerSecurityGroup: network.outputs.schedulerSecurityGroup,
      service: compute.outputs.service,
      database: database.outputs.instance,
      loadBalancerFullName: compute.outputs.loadBalancerFullName,
      targetGroup: compute.outputs.targetGroup,
      schedule: config.autoScheduler,
      logRetentionDays: config.logRetentionDays,
    });

    // 5. Monitoring Infrastructure
    new MonitoringStack(this, 'Monitoring', {
      environment,
      databaseInstanceIdentifier: database.outputs.instanceIdentifier,
      ecsClusterName: compute.outputs.cluster.clusterName,
      apiServiceName: compute.outputs.service.serviceName,
      loadBalancerFullName: compute.outputs.loadBalancerFullName,
      targetGroupFullName: compute.outputs.targetGroupFullName,
      autoStartFunction: scheduler.outputs.autoStartFunction,
      autoStopFunction: scheduler.outputs.autoStopFunction,
      autoStopEnabled: config.autoScheduler.enabled,
      alertEmail: config.alertEmail,
    });

    // 6. Application Registry (myApplications)
    const application = new appreg.Application(this, 'StorefrontApplication', {
      applicationName: `Storefront-${environment}`,
      description: `Storefront API - ${environment} environment`,
    });

    // Tags every resource of this stack for cost tracking
    application.associateApplicationWithStack(this);

    const technicalAttributes = new appreg.AttributeGroup(this, 'TechnicalAttributes', {
      attributeGroupName: `Storefront-${environment}-TechnicalInfo`,
      description: 'Technical architecture metadata for the storefront API',
      attributes: {
        environment,
        components: {
          compute: 'ECS Fargate',
          database: 'RDS MySQL',
          loadBalancer: 'Application Load Balancer',
          costControl: config.autoScheduler.enabled ? 'Lambda auto-start/auto-stop' : 'none',
          monitoring: 'CloudWatch',
        },
        region: cdk.Aws.REGION,
        managedBy: 'AWS CDK',
      },
    });

    technicalAttributes.associateWith(application);

    // Stack Outputs
    const apiUrl = config.domainName
      ? `https://${config.domainName}`
      : `http://${compute.outputs.loadBalancerDns}`;

    new cdk.CfnOutput(this, 'ApiURL', {
      value: apiUrl,
      description: 'Storefront API URL',
      exportName: `${environment}-storefront-api-url`,
    });

    cdk.Tags.of(this).add('Environment', environment);
    cdk.Tags.of(this).add('Project', 'storefront');
    cdk.Tags.of(this).add('ManagedBy', 'cdk');
    cdk.Tags.of(this).add('AutoStop', String(config.autoScheduler.enabled));
  }
}
