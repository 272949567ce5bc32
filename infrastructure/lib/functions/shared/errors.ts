/**
 * Raised when the function environment does not identify the resources to manage.
 * Fatal for the invocation: no platform call is attempted.
 */
export class ConfigurationError extends Error {
  public readonly variables: string[];

  constructor(message: string, variables: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.variables = variables;
  }
}

export type PlatformErrorKind = 'invalid-state' | 'not-found' | 'transient' | 'fatal';

const INVALID_STATE_ERRORS = new Set([
  'InvalidDBInstanceStateFault',
  'InvalidDBInstanceState',
]);

const NOT_FOUND_ERRORS = new Set([
  'DBInstanceNotFoundFault',
  'DBInstanceNotFound',
  'ServiceNotFoundException',
  'ServiceNotActiveException',
  'ClusterNotFoundException',
  'TargetGroupNotFoundException',
  'LoadBalancerNotFoundException',
]);

const TRANSIENT_ERRORS = new Set([
  'ThrottlingException',
  'Throttling',
  'ThrottledException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'RequestThrottledException',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'ServerException',
  'InternalFailure',
  'InternalServerError',
  'RequestTimeout',
  'RequestTimeoutException',
  'TimeoutError',
]);

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN']);

function httpStatusOf(error: Error): number | undefined {
  if (!('$metadata' in error)) return undefined;
  const metadata = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

function isMarkedRetryable(error: Error): boolean {
  return '$retryable' in error && typeof error.$retryable === 'object' && error.$retryable !== null;
}

function networkCodeOf(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function classifyPlatformError(error: unknown): PlatformErrorKind {
  if (!(error instanceof Error)) return 'fatal';

  if (INVALID_STATE_ERRORS.has(error.name)) return 'invalid-state';
  if (NOT_FOUND_ERRORS.has(error.name)) return 'not-found';
  if (TRANSIENT_ERRORS.has(error.name) || isMarkedRetryable(error)) return 'transient';

  const code = networkCodeOf(error);
  if (code && TRANSIENT_NETWORK_CODES.has(code)) return 'transient';

  const status = httpStatusOf(error);
  if (status !== undefined && (status === 429 || status >= 500)) return 'transient';

  return 'fatal';
}

export function isTransientError(error: unknown): boolean {
  return classifyPlatformError(error) === 'transient';
}

export function errorFields(error: unknown): { errorName: string; errorMessage: string } {
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message };
  }
  return { errorName: 'UnknownError', errorMessage: String(error) };
}
