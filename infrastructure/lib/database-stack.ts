import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';

export type DatabaseStackProps = {
  environment: string;
  vpc: ec2.IVpc;
  rdsSecurityGroup: ec2.ISecurityGroup;
  instanceClass: string;
  allocatedStorage: number;
  multiAz: boolean;
  backupRetentionDays: number;
  deletionProtection: boolean;
  logRetentionDays: number;
};

export type DatabaseStackOutputs = {
  instance: rds.IDatabaseInstance;
  instanceIdentifier: string;
  instanceEndpoint: string;
  databaseName: string;
  secret: secretsmanager.ISecret;
};

export class DatabaseStack extends Construct {
  public readonly outputs: DatabaseStackOutputs;

  constructor(scope: Construct, id: string, props: DatabaseStackProps) {
    super(scope, id);

    const {
      environment,
      vpc,
      rdsSecurityGroup,
      instanceClass,
      allocatedStorage,
      multiAz,
      backupRetentionDays,
      deletionProtection,
      logRetentionDays,
    } = props;

    const databaseName = `storefront_${environment}`;

    // Stoppable single instance: the auto-stop function stops it when idle
    const instance = new rds.DatabaseInstance(this, 'MySqlInstance', {
      engine: rds.DatabaseInstanceEngine.mysql({
        version: rds.MysqlEngineVersion.VER_8_0_39,
      }),
      instanceType: new ec2.InstanceType(instanceClass),
      credentials: rds.Credentials.fromGeneratedSecret('admin', {
        secretName: `${environment}/storefront/database/credentials`,
      }),
      databaseName,
      vpc,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      securityGroups: [rdsSecurityGroup],
      allocatedStorage,
      storageType: rds.StorageType.GP3,
      multiAz,
      publiclyAccessible: false,
      backupRetention: cdk.Duration.days(backupRetentionDays),
      preferredBackupWindow: backupRetentionDays > 0 ? '03:00-04:00' : undefined, // 3 AM UTC
      preferredMaintenanceWindow: 'sun:04:00-sun:05:00', // Sunday 4 AM UTC
      enablePerformanceInsights: false, // Disable to save costs
      cloudwatchLogsExports: ['error', 'slowquery'],
      cloudwatchLogsRetention: logRetentionDays,
      storageEncrypted: true,
      deletionProtection,
      removalPolicy: deletionProtection ? cdk.RemovalPolicy.SNAPSHOT : cdk.RemovalPolicy.DESTROY,
    });

    const secret = instance.secret;
    if (!secret) {
      throw new Error('Database instance was created without a credentials secret');
    }

    const instanceEndpoint = instance.instanceEndpoint.socketAddress;

    new cdk.CfnOutput(this, 'DatabaseEndpoint', {
      value: instanceEndpoint,
      description: 'MySQL instance endpoint',
      exportName: `${environment}-storefront-db-endpoint`,
    });

    new cdk.CfnOutput(this, 'DatabaseInstanceId', {
      value: instance.instanceIdentifier,
      description: 'MySQL instance identifier',
      exportName: `${environment}-storefront-db-instance-id`,
    });

    new cdk.CfnOutput(this, 'DatabaseSecretArn', {
      value: secret.secretArn,
      description: 'Database credentials secret ARN',
      exportName: `${environment}-storefront-db-secret-arn`,
    });

    cdk.Tags.of(instance).add('Component', 'Database');

    this.outputs = {
      instance,
      instanceIdentifier: instance.instanceIdentifier,
      instanceEndpoint,
      databaseName,
      secret,
    };
  }
}
