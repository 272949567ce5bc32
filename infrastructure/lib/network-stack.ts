import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

export type NetworkStackProps = {
  environment: string;
  maxAzs?: number;
  natGateways?: number;
};

export type NetworkStackOutputs = {
  vpc: ec2.IVpc;
  albSecurityGroup: ec2.ISecurityGroup;
  ecsSecurityGroup: ec2.ISecurityGroup;
  rdsSecurityGroup: ec2.ISecurityGroup;
  schedulerSecurityGroup: ec2.ISecurityGroup;
};

export const API_PORT = 8000;
export const MYSQL_PORT = 3306;

export class NetworkStack extends Construct {
  public readonly outputs: NetworkStackOutputs;

  constructor(scope: Construct, id: string, props: NetworkStackProps) {
    super(scope, id);

    const { environment } = props;

    const vpc = new ec2.Vpc(this, 'StorefrontVpc', {
      vpcName: `${environment}-storefront-vpc`,
      ipAddresses: ec2.IpAddresses.cidr('10.0.0.0/16'),
      maxAzs: props.maxAzs || 2,
      natGateways: props.natGateways || 1, // Single NAT Gateway outside production
      subnetConfiguration: [
        {
          name: 'Public',
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: 24,
        },
        {
          name: 'Private',
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
          cidrMask: 24,
        },
      ],
      enableDnsHostnames: true,
      enableDnsSupport: true,
    });

    // Security Group for Application Load Balancer
    const albSecurityGroup = new ec2.SecurityGroup(this, 'AlbSecurityGroup', {
      vpc,
      description: `Security group for ${environment} storefront ALB`,
      allowAllOutbound: true,
    });

    albSecurityGroup.addIngressRule(
      ec2.Peer.anyIpv4(),
      ec2.Port.tcp(80),
      'Allow HTTP from anywhere',
    );
    albSecurityGroup.addIngressRule(
      ec2.Peer.anyIpv4(),
      ec2.Port.tcp(443),
      'Allow HTTPS from anywhere',
    );

    // Security Group for the API tasks
    const ecsSecurityGroup = new ec2.SecurityGroup(this, 'EcsSecurityGroup', {
      vpc,
      description: `Security group for ${environment} storefront API tasks`,
      allowAllOutbound: true,
    });

    ecsSecurityGroup.addIngressRule(
      albSecurityGroup,
      ec2.Port.tcp(API_PORT),
      'Allow traffic from ALB',
    );

    // Scheduler functions only call AWS APIs, through the NAT gateway
    const schedulerSecurityGroup = new ec2.SecurityGroup(this, 'SchedulerSecurityGroup', {
      vpc,
      description: `Security group for ${environment} auto-start/stop functions`,
      allowAllOutbound: true,
    });

    const rdsSecurityGroup = new ec2.SecurityGroup(this, 'RdsSecurityGroup', {
      vpc,
      description: `Security group for ${environment} storefront MySQL database`,
      allowAllOutbound: false,
    });

    rdsSecurityGroup.addIngressRule(
      ecsSecurityGroup,
      ec2.Port.tcp(MYSQL_PORT),
      'Allow MySQL from ECS tasks',
    );
    rdsSecurityGroup.addIngressRule(
      schedulerSecurityGroup,
      ec2.Port.tcp(MYSQL_PORT),
      'Allow MySQL from scheduler functions',
    );

    cdk.Tags.of(vpc).add('Component', 'Network');
    cdk.Tags.of(albSecurityGroup).add('Component', 'LoadBalancer');
    cdk.Tags.of(ecsSecurityGroup).add('Component', 'Compute');
    cdk.Tags.of(rdsSecurityGroup).add('Component', 'Database');
    cdk.Tags.of(schedulerSecurityGroup).add('Component', 'Scheduler');

    this.outputs = {
      vpc,
      albSecurityGroup,
      ecsSecurityGroup,
      rdsSecurityGroup,
      schedulerSecurityGroup,
    };
  }
}
