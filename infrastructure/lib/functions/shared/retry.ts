import { setTimeout as delay } from 'timers/promises';
import { errorFields, isTransientError } from './errors';
import type { Logger } from './logger';

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2_000,
};

export type RetryOptions = {
  policy: RetryPolicy;
  /** Name of the platform call, used in retry logs. */
  operation: string;
  logger?: Logger;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

/** Delay before the attempt that follows `attempt` (1-based). */
export function computeBackoffMs(attempt: number, policy: RetryPolicy): number {
  const raw = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(raw, policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, logger } = options;
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const backoffMs = computeBackoffMs(attempt, policy);
      logger?.warn('Transient platform error, retrying', {
        operation: options.operation,
        attempt,
        maxAttempts,
        backoffMs,
        ...errorFields(error),
      });
      await sleep(backoffMs);
    }
  }
}
