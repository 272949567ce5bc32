#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { StorefrontStack } from '../lib/storefront-stack';
import { getEnvironmentConfig } from '../lib/environments';

const app = new cdk.App();

// Pick the environment with `cdk deploy -c environment=qa` or DEPLOY_ENVIRONMENT
const environment = String(app.node.tryGetContext('environment') || process.env.DEPLOY_ENVIRONMENT || 'dev');

const context = (key: string): string | undefined => {
  const value = app.node.tryGetContext(key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

const config = getEnvironmentConfig(environment, {
  // Domain configuration (optional; plain HTTP on the ALB without it)
  domainName: context('domainName'),
  hostedZoneId: context('hostedZoneId'),
  hostedZoneName: context('hostedZoneName'),
  certificateArn: context('certificateArn'),
  apiImageTag: context('apiImageTag') || 'latest',

  // Email for CloudWatch alerts
  alertEmail: context('alertEmail'),
});

const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT || process.env.AWS_ACCOUNT_ID,
  region: process.env.CDK_DEFAULT_REGION || process.env.AWS_REGION || 'ap-south-1',
};

new StorefrontStack(app, `${environment}-storefront-stack`, {
  env,
  config,
  description: `Storefront API infrastructure for ${environment} environment`,
});

app.synth();
