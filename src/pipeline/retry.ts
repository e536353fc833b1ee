import { isTransientError } from './errors';
import type { Logger } from './logger';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
};

export interface RetryOptions {
  policy: RetryPolicy;
  operation: string;
  logger?: Logger;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or the policy's
 * attempts are used up. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, operation, logger, shouldRetry = isTransientError, sleep: wait = sleep } = options;
  let attempt = 1;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= policy.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      logger?.warn(
        { operation, attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
        'Transient failure, retrying',
      );
      await wait(delayMs);
      attempt += 1;
    }
  }
}
