import { describe, it, expect } from 'vitest';
import { classifyError, toTaxonomyError, withApiErrorHandling } from '../classify.js';
import {
  ApiError,
  MalformedResponseError,
  ProviderError,
  ProviderRateLimitError,
  RateLimitError,
  ValidationError,
} from '../../shared/errors.js';

function timeoutError(): Error {
  const err = new Error('The operation was aborted due to timeout');
  err.name = 'TimeoutError';
  return err;
}

function connectionReset(): Error {
  const cause = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
  return new Error('request failed', { cause });
}

describe('classifyError', () => {
  it.each([
    ['ValidationError', new ValidationError('bad'), 'validation'],
    ['RateLimitError', new RateLimitError('slow', 'search'), 'rate_limit'],
    ['ProviderRateLimitError', new ProviderRateLimitError('openai', new Headers()), 'rate_limit'],
    ['ApiError', new ApiError('down', 'llm'), 'api'],
    ['ProviderError', new ProviderError('openai', 500, ''), 'api'],
    ['MalformedResponseError', new MalformedResponseError('openai', 'not json', '<html>'), 'api'],
    ['fetch failure', new TypeError('fetch failed'), 'api'],
    ['connection reset', connectionReset(), 'api'],
    ['timeout', timeoutError(), 'api'],
  ])('classifies %s', (_label, error, kind) => {
    expect(classifyError(error)).toBe(kind);
  });

  it('returns null for failures it does not understand', () => {
    expect(classifyError(new Error('boom'))).toBeNull();
    expect(classifyError(new TypeError('x is not a function'))).toBeNull();
    expect(classifyError('a string')).toBeNull();
  });

  it('gives the same answer on every call', () => {
    const error = new ProviderError('openai', 502, '');
    expect(classifyError(error)).toBe(classifyError(error));
  });
});

describe('toTaxonomyError', () => {
  it('turns a provider 429 into a RateLimitError with the retry-after hint', () => {
    const original = new ProviderRateLimitError('anthropic', new Headers({ 'retry-after': '2' }));
    const converted = toTaxonomyError(original, 'anthropic');

    expect(converted).toBeInstanceOf(RateLimitError);
    if (!(converted instanceof RateLimitError)) return;
    expect(converted.message).toBe('Rate limit exceeded: Provider anthropic returned 429');
    expect(converted.retryAfterMs).toBe(2000);
    expect(converted.service).toBe('anthropic');
    expect(converted.cause).toBe(original);
  });

  it('turns a provider status error into an ApiError with the status code', () => {
    const converted = toTaxonomyError(new ProviderError('openai', 503, 'unavailable'), 'openai');

    expect(converted).toBeInstanceOf(ApiError);
    if (!(converted instanceof ApiError)) return;
    expect(converted.message).toBe('API call failed: Provider openai returned 503');
    expect(converted.statusCode).toBe(503);
  });

  it('labels connection failures', () => {
    const converted = toTaxonomyError(new TypeError('fetch failed'), 'search');

    expect(converted).toBeInstanceOf(ApiError);
    if (!(converted instanceof ApiError)) return;
    expect(converted.message).toBe('Failed to connect to API: fetch failed');
  });

  it('returns taxonomy and unrecognized errors unchanged', () => {
    const validation = new ValidationError('bad');
    const api = new ApiError('down', 'llm');
    const unknown = new Error('boom');

    expect(toTaxonomyError(validation, 'llm')).toBe(validation);
    expect(toTaxonomyError(api, 'llm')).toBe(api);
    expect(toTaxonomyError(unknown, 'llm')).toBe(unknown);
  });

  it('keeps the kind of every recognized failure', () => {
    const failures = [
      new ProviderRateLimitError('openai', new Headers()),
      new ProviderError('openai', 500, ''),
      new MalformedResponseError('openai', 'not json', ''),
      new TypeError('fetch failed'),
      timeoutError(),
    ];

    for (const failure of failures) {
      expect(classifyError(toTaxonomyError(failure, 'openai'))).toBe(classifyError(failure));
    }
  });
});

describe('withApiErrorHandling', () => {
  it('passes results through', async () => {
    const wrapped = withApiErrorHandling(async (n: number) => n * 2, 'search');
    await expect(wrapped(21)).resolves.toBe(42);
  });

  it('rethrows transport failures in taxonomy form', async () => {
    const wrapped = withApiErrorHandling(async () => {
      throw new ProviderError('search', 500, '');
    }, 'search');

    await expect(wrapped()).rejects.toBeInstanceOf(ApiError);
  });

  it('rethrows unrecognized errors untouched', async () => {
    const failure = new Error('boom');
    const wrapped = withApiErrorHandling(async () => {
      throw failure;
    }, 'search');

    await expect(wrapped()).rejects.toBe(failure);
  });
});
