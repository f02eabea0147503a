/**
 * Minimum-interval rate limiter.
 * Spaces calls so that no more than `requestsPerMinute` pass through one
 * instance per minute. Shared by every caller holding the same instance.
 */

import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { systemClock, type Clock } from './clock.js';
import type { RateLimiterOptions } from './types.js';

export class RateLimiter {
  public readonly requestsPerMinute: number;
  public readonly minIntervalMs: number;
  private lastRequestAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly clock: Clock;

  constructor(options: RateLimiterOptions, clock: Clock = systemClock) {
    const { requestsPerMinute } = options;
    if (!Number.isInteger(requestsPerMinute) || requestsPerMinute <= 0) {
      throw new ConfigError(
        `requestsPerMinute must be a positive integer, got ${String(requestsPerMinute)}`,
      );
    }

    this.requestsPerMinute = requestsPerMinute;
    this.minIntervalMs = 60_000 / requestsPerMinute;
    this.clock = clock;
  }

  /**
   * Wait until at least `minIntervalMs` has passed since the previous call
   * returned, then record now as the new baseline. The first call never waits.
   *
   * Concurrent callers are queued in arrival order, so the read and update of
   * the baseline never interleave.
   */
  throttle(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    // A failed wait is reported to its own caller; later callers still get a turn.
    this.queue = turn.catch((err: unknown) => {
      logger.debug({ err }, 'Rate limiter wait failed');
    });
    return turn;
  }

  /**
   * Decorator form: every invocation of the returned function is throttled.
   */
  wrap<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => TResult | Promise<TResult>,
  ): (...args: TArgs) => Promise<TResult> {
    return async (...args: TArgs) => {
      await this.throttle();
      return fn(...args);
    };
  }

  /** Forget the baseline; the next call goes through immediately. */
  reset(): void {
    this.lastRequestAt = null;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const elapsed = this.clock.now() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        const waitMs = Math.ceil(this.minIntervalMs - elapsed);
        logger.debug(
          { waitMs, requestsPerMinute: this.requestsPerMinute },
          `Rate limiting: sleeping for ${waitMs}ms`,
        );
        await this.clock.sleep(waitMs);
      }
    }

    this.lastRequestAt = this.clock.now();
  }
}
