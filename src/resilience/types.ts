/**
 * Resilience layer types: error taxonomy, retry policy and limiter options.
 */

import type { Clock } from './clock.js';

/** The three failure kinds every outbound call is reduced to. */
export type ErrorKind = 'validation' | 'api' | 'rate_limit';

/** Constructor of an error class, used to list retryable failures. */
export type ErrorClass = abstract new (...args: never[]) => Error;

/** Decides whether a failure is worth another attempt. */
export type RetryPredicate = (error: unknown) => boolean;

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = maxRetries + 1. */
  maxRetries: number;
  /** Wait before the first retry, in milliseconds. */
  initialDelayMs: number;
  /** Cap on any single wait, in milliseconds. */
  maxDelayMs: number;
  /** Multiplier applied to the delay after each failed attempt. */
  exponentialBase: number;
  /** Error classes (or a predicate) that trigger a retry; anything else propagates. */
  retryOn: readonly ErrorClass[] | RetryPredicate;
}

export interface RetryOptions {
  /** Operation name used in log lines. */
  name?: string;
  /** Time source for backoff waits. */
  clock?: Clock;
}

export interface RateLimiterOptions {
  /** Maximum permitted calls per minute; must be a positive integer. */
  requestsPerMinute: number;
}
