export const ENVIRONMENT_NAMES = ['dev', 'qa', 'beta', 'production'] as const;

export type EnvironmentName = (typeof ENVIRONMENT_NAMES)[number];

export type AutoSchedulerConfig = {
  /** Create the auto-stop schedule. The auto-start rule is always deployed. */
  enabled: boolean;
  intervalMinutes: number;
  idleLookbackMinutes: number;
  runningDesiredCount: number;
};

export type StorefrontStackConfig = {
  environment: EnvironmentName;

  // Domain configuration
  domainName?: string;
  hostedZoneId?: string;
  hostedZoneName?: string;
  certificateArn?: string;

  // Network configuration
  maxAzs: number;
  natGateways: number;

  // Database configuration
  databaseInstanceClass: string;
  databaseAllocatedStorage: number;
  databaseMultiAz: boolean;
  databaseBackupRetentionDays: number;
  databaseDeletionProtection: boolean;

  // Compute configuration
  apiCpu: number;
  apiMemory: number;
  apiDesiredCount: number;
  apiImageTag: string;
  useFargateSpot: boolean;

  autoScheduler: AutoSchedulerConfig;

  logRetentionDays: number;

  // Email for CloudWatch alerts
  alertEmail?: string;
};

export function isEnvironmentName(value: string): value is EnvironmentName {
  return ENVIRONMENT_NAMES.some((name) => name === value);
}

export function getEnvironmentConfig(
  environment: string,
  overrides: Partial<Omit<StorefrontStackConfig, 'environment'>> = {},
): StorefrontStackConfig {
  if (!isEnvironmentName(environment)) {
    throw new Error(`Unknown environment: ${environment}. Available: ${ENVIRONMENT_NAMES.join(', ')}`);
  }

  const isProduction = environment === 'production';

  const defaults: StorefrontStackConfig = {
    environment,
    maxAzs: 2, // RDS subnet groups need two AZs
    natGateways: isProduction ? 2 : 1,

    databaseInstanceClass: isProduction ? 't3.small' : 't3.micro',
    databaseAllocatedStorage: isProduction ? 100 : 20,
    databaseMultiAz: isProduction,
    databaseBackupRetentionDays: isProduction ? 7 : 0,
    databaseDeletionProtection: isProduction,

    apiCpu: isProduction ? 512 : 256,
    apiMemory: isProduction ? 1024 : 512,
    apiDesiredCount: isProduction ? 2 : 1,
    apiImageTag: 'latest',
    // Fargate Spot outside production (up to 70% cheaper)
    useFargateSpot: !isProduction,

    autoScheduler: {
      enabled: environment !== 'production',
      intervalMinutes: 60,
      idleLookbackMinutes: 60,
      runningDesiredCount: 1,
    },

    logRetentionDays: isProduction ? 30 : 7,
  };

  return { ...defaults, ...overrides };
}
