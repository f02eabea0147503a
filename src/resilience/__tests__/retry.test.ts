import { describe, it, expect, vi, afterEach } from 'vitest';
import { backoffDelays, resolveRetryPolicy, runWithRetry, withRetry } from '../retry.js';
import { ApiError, ConfigError, RateLimitError, ValidationError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { FakeClock } from '../../__tests__/fakes.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runWithRetry', () => {
  it('retries until the operation succeeds', async () => {
    const clock = new FakeClock();
    const attempts: number[] = [];
    const operation = (attempt: number) => {
      attempts.push(attempt);
      if (attempt < 2) {
        throw new ApiError('upstream unavailable', 'search');
      }
      return 'ok';
    };

    const result = await runWithRetry(
      operation,
      { maxRetries: 2, initialDelayMs: 10, exponentialBase: 2 },
      { clock },
    );

    expect(result).toBe('ok');
    expect(attempts).toEqual([0, 1, 2]);
    expect(clock.sleeps).toEqual([10, 20]);
  });

  it('rethrows the last error unchanged once retries are exhausted', async () => {
    const clock = new FakeClock();
    const failure = new ApiError('upstream unavailable', 'search');
    const operation = vi.fn(() => {
      throw failure;
    });

    await expect(runWithRetry(operation, {}, { clock })).rejects.toBe(failure);

    expect(operation).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
  });

  it('caps each wait at maxDelayMs', async () => {
    const clock = new FakeClock();
    const operation = vi.fn(() => {
      throw new ApiError('down', 'llm');
    });

    await expect(
      runWithRetry(operation, { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 5000, exponentialBase: 10 }, { clock }),
    ).rejects.toBeInstanceOf(ApiError);

    expect(clock.sleeps).toEqual([1000, 5000, 5000]);
  });

  it('never retries a validation error', async () => {
    const clock = new FakeClock();
    const operation = vi.fn(() => {
      throw new ValidationError('Topic cannot be empty');
    });

    await expect(runWithRetry(operation, {}, { clock })).rejects.toBeInstanceOf(ValidationError);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('propagates errors outside the retryOn classes immediately', async () => {
    const clock = new FakeClock();
    const operation = vi.fn(() => {
      throw new TypeError('bad argument');
    });

    await expect(runWithRetry(operation, { retryOn: [ApiError] }, { clock })).rejects.toBeInstanceOf(TypeError);

    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries subclasses of a listed class', async () => {
    const clock = new FakeClock();
    const operation = vi
      .fn<() => string>()
      .mockImplementationOnce(() => {
        throw new RateLimitError('slow down', 'search');
      })
      .mockImplementationOnce(() => 'done');

    await expect(
      runWithRetry(operation, { retryOn: [ApiError], initialDelayMs: 5 }, { clock }),
    ).resolves.toBe('done');
    expect(clock.sleeps).toEqual([5]);
  });

  it('accepts a predicate as retryOn', async () => {
    const clock = new FakeClock();
    const operation = vi.fn(() => {
      throw new Error('transient');
    });

    await expect(
      runWithRetry(operation, { maxRetries: 1, initialDelayMs: 0, retryOn: () => true }, { clock }),
    ).rejects.toThrow('transient');

    expect(operation).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([0]);
  });

  it('makes a single attempt when maxRetries is 0', async () => {
    const clock = new FakeClock();
    const operation = vi.fn(() => {
      throw new ApiError('down', 'llm');
    });

    await expect(runWithRetry(operation, { maxRetries: 0 }, { clock })).rejects.toBeInstanceOf(ApiError);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('logs rate limits and other failures differently', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const clock = new FakeClock();
    const operation = vi
      .fn<() => string>()
      .mockImplementationOnce(() => {
        throw new RateLimitError('slow down', 'search');
      })
      .mockImplementationOnce(() => {
        throw new ApiError('bad gateway', 'search');
      })
      .mockImplementationOnce(() => 'ok');

    await runWithRetry(operation, { maxRetries: 2, initialDelayMs: 10 }, { clock, name: 'fetch' });

    expect(warn).toHaveBeenNthCalledWith(
      1,
      { operation: 'fetch', attempt: 1, waitMs: 10 },
      'fetch hit rate limit (attempt 1/3). Waiting 10ms...',
    );
    expect(warn).toHaveBeenNthCalledWith(
      2,
      { operation: 'fetch', attempt: 2, waitMs: 20 },
      'fetch failed (attempt 2/3): bad gateway. Retrying in 20ms...',
    );
  });
});

describe('runWithRetry rate-limit hints', () => {
  it('logs the server retry hint but waits per the policy', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const clock = new FakeClock();
    const operation = vi
      .fn<() => string>()
      .mockImplementationOnce(() => {
        throw new RateLimitError('slow down', 'search', { retryAfterMs: 1500 });
      })
      .mockImplementationOnce(() => 'ok');

    await expect(runWithRetry(operation, { initialDelayMs: 10 }, { clock, name: 'fetch' })).resolves.toBe('ok');

    expect(clock.sleeps).toEqual([10]);
    expect(warn).toHaveBeenCalledWith(
      { operation: 'fetch', attempt: 1, waitMs: 10, retryAfterMs: 1500 },
      'fetch hit rate limit (attempt 1/4). Waiting 10ms...',
    );
  });
});

describe('withRetry', () => {
  it('retries plain errors under the default policy until the call succeeds', async () => {
    const clock = new FakeClock();
    const fn = vi
      .fn<() => string>()
      .mockImplementationOnce(() => {
        throw new Error('bad value');
      })
      .mockImplementationOnce(() => {
        throw new Error('bad value');
      })
      .mockImplementationOnce(() => 'ok');
    const wrapped = withRetry(fn, { maxRetries: 2, initialDelayMs: 10 }, { clock });

    await expect(wrapped()).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([10, 20]);
  });

  it('retries every error except ValidationError under the default policy', async () => {
    const clock = new FakeClock();
    const configFailure = new ConfigError('config not loaded yet');
    const fn = vi
      .fn<() => string>()
      .mockImplementationOnce(() => {
        throw configFailure;
      })
      .mockImplementationOnce(() => {
        throw new TypeError('transient');
      })
      .mockImplementationOnce(() => 'ok');
    const wrapped = withRetry(fn, { maxRetries: 2, initialDelayMs: 10 }, { clock });

    await expect(wrapped()).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);

    const failing = vi.fn(() => {
      throw configFailure;
    });
    await expect(withRetry(failing, { maxRetries: 1, initialDelayMs: 0 }, { clock })()).rejects.toBe(configFailure);
    expect(failing).toHaveBeenCalledTimes(2);
  });

  it('starts each call with a fresh delay', async () => {
    const clock = new FakeClock();
    let calls = 0;
    const flaky = async (value: string) => {
      calls++;
      if (calls % 2 === 1) {
        throw new ApiError('flaky', 'llm');
      }
      return value.toUpperCase();
    };
    const wrapped = withRetry(flaky, { maxRetries: 2, initialDelayMs: 10 }, { clock });

    await expect(wrapped('a')).resolves.toBe('A');
    await expect(wrapped('b')).resolves.toBe('B');

    expect(calls).toBe(4);
    expect(clock.sleeps).toEqual([10, 10]);
  });

  it('rejects an invalid policy when wrapping', () => {
    expect(() => withRetry(() => 1, { maxRetries: -1 })).toThrow(ConfigError);
  });
});

describe('backoffDelays', () => {
  it('lists the waits of a call that always fails', () => {
    expect(backoffDelays()).toEqual([1000, 2000, 4000]);
    expect(backoffDelays({ maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 5000, exponentialBase: 10 })).toEqual([
      1000, 5000, 5000,
    ]);
  });

  it('is empty without retries', () => {
    expect(backoffDelays({ maxRetries: 0 })).toEqual([]);
  });
});

describe('resolveRetryPolicy', () => {
  it('fills in defaults', () => {
    const policy = resolveRetryPolicy({ maxRetries: 5 });
    expect(policy.maxRetries).toBe(5);
    expect(policy.initialDelayMs).toBe(1000);
    expect(policy.maxDelayMs).toBe(60_000);
    expect(policy.exponentialBase).toBe(2);
  });

  it('allows zero delays', () => {
    expect(resolveRetryPolicy({ initialDelayMs: 0, maxDelayMs: 0 }).maxDelayMs).toBe(0);
  });

  it.each([
    [{ maxRetries: -1 }],
    [{ maxRetries: 1.5 }],
    [{ initialDelayMs: -5 }],
    [{ maxDelayMs: Number.POSITIVE_INFINITY }],
    [{ exponentialBase: 0 }],
  ])('rejects %o', (overrides) => {
    expect(() => resolveRetryPolicy(overrides)).toThrow(ConfigError);
  });
});
