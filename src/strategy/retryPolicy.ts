import { EngineConfig } from '../core/types';
import { DeadlineExceededError, ProviderError } from '../core/errors';
import { Logger, silentLogger } from '../core/logger';
import { errorMessage, sleep as defaultSleep } from '../core/utils';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  capDelayMs: number;
}

export const retryPolicyFromConfig = (advisor: EngineConfig['advisor']): RetryPolicy => ({
  maxAttempts: advisor.maxAttempts,
  baseDelayMs: advisor.baseDelayMs,
  capDelayMs: advisor.capDelayMs
});

/** Wait after failed attempt `attempt` (1-based): base, 2x base, 4x base... capped. */
export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.capDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));

export const isRetryableError = (err: unknown): boolean => !(err instanceof ProviderError) || err.retryable;

export interface RetryOptions {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
  label?: string;
}

/**
 * Runs `fn` until it succeeds, fails with a non-retryable error, or the attempts run out.
 * An aborted `signal` ends the loop with DeadlineExceededError, including mid-wait.
 */
export const withRetry = async <T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> => {
  const wait = options.sleep ?? defaultSleep;
  const logger = options.logger ?? silentLogger();
  const label = options.label ?? 'operation';
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new DeadlineExceededError(`${label} abandoned after ${attempt - 1} attempt(s): deadline exceeded`);
    }
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (options.signal?.aborted) {
        throw new DeadlineExceededError(`${label} abandoned during attempt ${attempt}: deadline exceeded`);
      }
      if (!isRetryableError(err) || attempt === policy.maxAttempts) {
        throw err;
      }
      const delay = backoffDelay(policy, attempt);
      logger.warn({ attempt, delayMs: delay, err: errorMessage(err) }, `${label} failed, retrying`);
      try {
        await wait(delay, options.signal);
      } catch {
        throw new DeadlineExceededError(`${label} abandoned while backing off: deadline exceeded`);
      }
    }
  }
  throw lastError;
};
