import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as route53Targets from 'aws-cdk-lib/aws-route53-targets';
import { Construct } from 'constructs';
import { API_PORT } from './network-stack';

export type ComputeStackProps = {
  environment: string;
  vpc: ec2.IVpc;
  albSecurityGroup: ec2.ISecurityGroup;
  ecsSecurityGroup: ec2.ISecurityGroup;
  databaseSecret: secretsmanager.ISecret;
  databaseHost: string;
  databasePort: string;
  databaseName: string;
  apiCpu: number;
  apiMemory: number;
  apiDesiredCount: number;
  apiImageTag: string;
  useFargateSpot?: boolean;
  logRetentionDays: number;
  domainName?: string;
  hostedZoneId?: string;
  hostedZoneName?: string;
  certificateArn?: string;
};

export type ComputeStackOutputs = {
  cluster: ecs.ICluster;
  service: ecs.FargateService;
  repository: ecr.IRepository;
  loadBalancer: elbv2.IApplicationLoadBalancer;
  loadBalancerDns: string;
  /** `app/<name>/<id>`, the CloudWatch `LoadBalancer` dimension. */
  loadBalancerFullName: string;
  targetGroup: elbv2.IApplicationTargetGroup;
  targetGroupFullName: string;
};

export class ComputeStack extends Construct {
  public readonly outputs: ComputeStackOutputs;

  constructor(scope: Construct, id: string, props: ComputeStackProps) {
    super(scope, id);

    const {
      environment,
      vpc,
      albSecurityGroup,
      ecsSecurityGroup,
      databaseSecret,
      databaseHost,
      databasePort,
      databaseName,
      apiCpu,
      apiMemory,
      apiDesiredCount,
      apiImageTag,
      useFargateSpot = true,
      logRetentionDays,
      domainName,
      hostedZoneId,
      hostedZoneName,
      certificateArn,
    } = props;

    // Image repository for the API container, pushed to by CI
    const repository = new ecr.Repository(this, 'ApiRepository', {
      repositoryName: `${environment}-storefront-api`,
      imageScanOnPush: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
      lifecycleRules: [
        {
          description: 'Keep the 10 most recent images',
          maxImageCount: 10,
        },
      ],
    });

    const cluster = new ecs.Cluster(this, 'StorefrontCluster', {
      vpc,
      clusterName: `${environment}-storefront-cluster`,
      containerInsights: false, // Disable to save costs
      enableFargateCapacityProviders: true,
    });

    const alb = new elbv2.ApplicationLoadBalancer(this, 'LoadBalancer', {
      vpc,
      loadBalancerName: `${environment}-storefront-alb`,
      internetFacing: true,
      securityGroup: albSecurityGroup,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PUBLIC,
      },
    });

    const taskRole = new iam.Role(this, 'TaskRole', {
      assumedBy: new iam.ServicePrincipal('ecs-tasks.amazonaws.com'),
      description: `Role for ${environment} storefront API tasks`,
    });

    // Parameter Store holds the application's provider keys (OAuth, payments)
    taskRole.addToPolicy(
      new iam.PolicyStatement({
        actions: ['ssm:GetParameter', 'ssm:GetParameters', 'ssm:GetParametersByPath'],
        resources: [
          cdk.Arn.format(
            {
              service: 'ssm',
              resource: 'parameter',
              resourceName: `storefront/${environment}/*`,
            },
            cdk.Stack.of(this),
          ),
        ],
      }),
    );

    const executionRole = new iam.Role(this, 'ExecutionRole', {
      assumedBy: new iam.ServicePrincipal('ecs-tasks.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName(
          'service-role/AmazonECSTaskExecutionRolePolicy',
        ),
      ],
    });

    databaseSecret.grantRead(executionRole);
    repository.grantPull(executionRole);

    const apiLogGroup = new logs.LogGroup(this, 'ApiLogGroup', {
      logGroupName: `/ecs/${environment}-storefront-api`,
      retention: logRetentionDays,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    const taskDefinition = new ecs.FargateTaskDefinition(this, 'ApiTaskDef', {
      cpu: apiCpu,
      memoryLimitMiB: apiMemory,
      taskRole,
      executionRole,
    });

    const apiContainer = taskDefinition.addContainer('ApiContainer', {
      containerName: `${environment}-api`,
      image: ecs.ContainerImage.fromEcrRepository(repository, apiImageTag),
      logging: ecs.LogDriver.awsLogs({
        streamPrefix: `${environment}-api`,
        logGroup: apiLogGroup,
      }),
      environment: {
        ENVIRONMENT: environment,
        LOG_LEVEL: environment === 'production' ? 'INFO' : 'DEBUG',
        DATABASE_HOST: databaseHost,
        DATABASE_PORT: databasePort,
        DATABASE_NAME: databaseName,
      },
      secrets: {
        DATABASE_USER: ecs.Secret.fromSecretsManager(databaseSecret, 'username'),
        DATABASE_PASSWORD: ecs.Secret.fromSecretsManager(databaseSecret, 'password'),
      },
      healthCheck: {
        command: ['CMD-SHELL', `curl -f http://localhost:${API_PORT}/health || exit 1`],
        interval: cdk.Duration.seconds(30),
        timeout: cdk.Duration.seconds(5),
        retries: 3,
        // Covers a database that is still starting after an auto-start
        startPeriod: cdk.Duration.seconds(120),
      },
    });

    apiContainer.addPortMappings({
      containerPort: API_PORT,
      protocol: ecs.Protocol.TCP,
    });

    const capacityProviderStrategies: ecs.CapacityProviderStrategy[] = useFargateSpot
      ? [
          {
            capacityProvider: 'FARGATE_SPOT',
            weight: 1,
            base: 0,
          },
        ]
      : [
          {
            capacityProvider: 'FARGATE',
            weight: 1,
            base: 1,
          },
        ];

    const service = new ecs.FargateService(this, 'ApiService', {
      cluster,
      serviceName: `${environment}-storefront-service`,
      taskDefinition,
      desiredCount: apiDesiredCount,
      securityGroups: [ecsSecurityGroup],
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      capacityProviderStrategies,
      enableExecuteCommand: true, // Enable ECS Exec for debugging
      healthCheckGracePeriod: cdk.Duration.seconds(120),
      circuitBreaker: { rollback: true },
    });

    const targetGroup = new elbv2.ApplicationTargetGroup(this, 'TargetGroup', {
      vpc,
      port: API_PORT,
      protocol: elbv2.ApplicationProtocol.HTTP,
      targetType: elbv2.TargetType.IP,
      healthCheck: {
        path: '/health',
        healthyHttpCodes: '200',
        interval: cdk.Duration.seconds(30),
        timeout: cdk.Duration.seconds(5),
        healthyThresholdCount: 2,
        unhealthyThresholdCount: 3,
      },
      deregistrationDelay: cdk.Duration.seconds(30),
    });

    service.attachToApplicationTargetGroup(targetGroup);

    if (certificateArn && domainName) {
      const certificate = acm.Certificate.fromCertificateArn(
        this,
        'Certificate',
        certificateArn,
      );

      alb.addListener('HttpsListener', {
        port: 443,
        protocol: elbv2.ApplicationProtocol.HTTPS,
        certificates: [certificate],
        defaultAction: elbv2.ListenerAction.forward([targetGroup]),
      });

      alb.addListener('HttpListener', {
        port: 80,
        protocol: elbv2.ApplicationProtocol.HTTP,
        defaultAction: elbv2.ListenerAction.redirect({
          protocol: 'HTTPS',
          port: '443',
          permanent: true,
        }),
      });

      if (hostedZoneId && hostedZoneName) {
        const hostedZone = route53.HostedZone.fromHostedZoneAttributes(
          this,
          'HostedZone',
          {
            hostedZoneId,
            zoneName: hostedZoneName,
          },
        );

        new route53.ARecord(this, 'AliasRecord', {
          zone: hostedZone,
          recordName: domainName,
          target: route53.RecordTarget.fromAlias(
            new route53Targets.LoadBalancerTarget(alb),
          ),
          comment: `Storefront API (${environment})`,
        });
      }
    } else {
      // No certificate - just HTTP
      alb.addListener('HttpListener', {
        port: 80,
        protocol: elbv2.ApplicationProtocol.HTTP,
        defaultAction: elbv2.ListenerAction.forward([targetGroup]),
      });
    }

    new cdk.CfnOutput(this, 'LoadBalancerDNS', {
      value: alb.loadBalancerDnsName,
      description: 'Load Balancer DNS name',
      exportName: `${environment}-storefront-alb-dns`,
    });

    new cdk.CfnOutput(this, 'ClusterName', {
      value: cluster.clusterName,
      description: 'ECS cluster name',
      exportName: `${environment}-storefront-cluster-name`,
    });

    new cdk.CfnOutput(this, 'ServiceName', {
      value: service.serviceName,
      description: 'ECS service name',
      exportName: `${environment}-storefront-service-name`,
    });

    new cdk.CfnOutput(this, 'RepositoryUri', {
      value: repository.repositoryUri,
      description: 'ECR repository for the API image',
    });

    cdk.Tags.of(cluster).add('Component', 'Compute');
    cdk.Tags.of(alb).add('Component', 'LoadBalancer');

    this.outputs = {
      cluster,
      service,
      repository,
      loadBalancer: alb,
      loadBalancerDns: alb.loadBalancerDnsName,
      loadBalancerFullName: alb.loadBalancerFullName,
      targetGroup,
      targetGroupFullName: targetGroup.targetGroupFullName,
    };
  }
}
