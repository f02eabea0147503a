/**
 * Retry with exponential backoff.
 *
 * Attempts run 0..maxRetries. A retryable failure with attempts left waits
 * `delay`, then grows it by `exponentialBase` up to `maxDelayMs`. The error
 * that ends the loop is rethrown as-is, never wrapped.
 */

import { ConfigError, RateLimitError, ValidationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { classifyError } from './classify.js';
import { systemClock } from './clock.js';
import type { RetryOptions, RetryPolicy, RetryPredicate, ErrorClass } from './types.js';

/** Retry everything except caller errors. */
const retryUnlessValidation: RetryPredicate = (error) => !(error instanceof ValidationError);

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  exponentialBase: 2,
  retryOn: retryUnlessValidation,
};

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ConfigError when a numeric option is out of range.
 */
export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = {
    maxRetries: overrides.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    initialDelayMs: overrides.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    exponentialBase: overrides.exponentialBase ?? DEFAULT_RETRY_POLICY.exponentialBase,
    retryOn: overrides.retryOn ?? DEFAULT_RETRY_POLICY.retryOn,
  };

  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new ConfigError(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
  }
  if (!Number.isFinite(policy.initialDelayMs) || policy.initialDelayMs < 0) {
    throw new ConfigError(`initialDelayMs must be >= 0, got ${policy.initialDelayMs}`);
  }
  if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < 0) {
    throw new ConfigError(`maxDelayMs must be >= 0, got ${policy.maxDelayMs}`);
  }
  if (!Number.isFinite(policy.exponentialBase) || policy.exponentialBase <= 0) {
    throw new ConfigError(`exponentialBase must be > 0, got ${policy.exponentialBase}`);
  }

  return policy;
}

/** Whether `error` belongs to the policy's retryable set. */
export function isRetryable(error: unknown, retryOn: RetryPolicy['retryOn']): boolean {
  if (typeof retryOn === 'function') {
    return retryOn(error);
  }
  return retryOn.some((errorClass: ErrorClass) => error instanceof errorClass);
}

/**
 * Waits a call would incur if every attempt failed, in order.
 * The sum is the worst-case time spent sleeping.
 */
export function backoffDelays(overrides: Partial<RetryPolicy> = {}): number[] {
  const policy = resolveRetryPolicy(overrides);
  const delays: number[] = [];
  let delay = policy.initialDelayMs;

  for (let i = 0; i < policy.maxRetries; i++) {
    delays.push(Math.min(delay, policy.maxDelayMs));
    delay = Math.min(delay * policy.exponentialBase, policy.maxDelayMs);
  }

  return delays;
}

/**
 * Run `operation`, retrying retryable failures with exponential backoff.
 *
 * @param operation - Receives the zero-based attempt index.
 * @returns The first successful result.
 * @throws The error of the last failed attempt, or the first non-retryable error.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => T | Promise<T>,
  overrides: Partial<RetryPolicy> = {},
  options: RetryOptions = {},
): Promise<T> {
  const policy = resolveRetryPolicy(overrides);
  const clock = options.clock ?? systemClock;
  const name = options.name ?? (operation.name || 'operation');
  const totalAttempts = policy.maxRetries + 1;
  let delayMs = policy.initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error: unknown) {
      if (!isRetryable(error, policy.retryOn)) {
        throw error;
      }

      if (attempt >= policy.maxRetries) {
        logger.error(
          { operation: name, attempts: totalAttempts, err: error },
          `${name} failed after ${policy.maxRetries} retries: ${errorMessage(error)}`,
        );
        throw error;
      }

      const waitMs = Math.min(delayMs, policy.maxDelayMs);
      const progress = `attempt ${attempt + 1}/${totalAttempts}`;

      if (classifyError(error) === 'rate_limit') {
        // The server's hint is logged for operators; the wait follows the policy
        const retryAfterMs = error instanceof RateLimitError ? error.retryAfterMs : undefined;
        logger.warn(
          { operation: name, attempt: attempt + 1, waitMs, ...(retryAfterMs !== undefined && { retryAfterMs }) },
          `${name} hit rate limit (${progress}). Waiting ${waitMs}ms...`,
        );
      } else {
        logger.warn(
          { operation: name, attempt: attempt + 1, waitMs },
          `${name} failed (${progress}): ${errorMessage(error)}. Retrying in ${waitMs}ms...`,
        );
      }

      await clock.sleep(waitMs);
      delayMs = Math.min(delayMs * policy.exponentialBase, policy.maxDelayMs);
    }
  }
}

/**
 * Decorator form of {@link runWithRetry}. Each call of the returned function
 * starts with a fresh attempt counter and delay.
 */
export function withRetry<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => TResult | Promise<TResult>,
  overrides: Partial<RetryPolicy> = {},
  options: RetryOptions = {},
): (...args: TArgs) => Promise<TResult> {
  const resolvedOptions: RetryOptions = { ...options, name: options.name ?? (fn.name || 'operation') };
  resolveRetryPolicy(overrides);
  return (...args: TArgs) => runWithRetry(() => fn(...args), overrides, resolvedOptions);
}
