import { logger, toErrorMessage } from './logger';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2_000,
};

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

export interface RetryOptions {
  policy: RetryPolicy;
  isRetryable: (error: unknown) => boolean;
  operation: string;
  sleep?: Sleep;
}

export const backoffDelay = (policy: RetryPolicy, attempt: number): number => {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, exponential);
};

/**
 * Runs `task` until it succeeds, throws a non-retryable error, or the policy's
 * attempts are exhausted. The last error is rethrown unchanged.
 */
export const withRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> => {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(options.policy.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task(attempt);
    } catch (error: unknown) {
      if (attempt >= maxAttempts || !options.isRetryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(options.policy, attempt);
      logger.warn('retry_scheduled', {
        operation: options.operation,
        attempt,
        maxAttempts,
        delayMs,
        error: toErrorMessage(error),
      });
      await sleep(delayMs);
    }
  }
};
