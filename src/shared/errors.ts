/**
 * Error classes for the pipeline.
 *
 * Two layers live here:
 * - the taxonomy every caller reasons about (ValidationError, ApiError, RateLimitError)
 * - transport-level failures raised by the HTTP adapters (ProviderError and friends),
 *   which the classifier in resilience/classify.ts maps onto the taxonomy.
 */

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A caller-supplied precondition was violated. Never retried. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** An upstream call failed for a recoverable reason. */
export class ApiError extends Error {
  public readonly service: string;
  public readonly statusCode?: number;

  constructor(message: string, service: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.service = service;
    this.statusCode = options?.statusCode;
  }
}

/** The upstream service explicitly signalled throttling. */
export class RateLimitError extends ApiError {
  /** Server-suggested wait, when the response carried one. */
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    service: string,
    options?: { retryAfterMs?: number; cause?: unknown },
  ) {
    super(message, service, { statusCode: 429, cause: options?.cause });
    this.name = 'RateLimitError';
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** Non-OK HTTP response from an upstream provider. */
export class ProviderError extends Error {
  public readonly providerId: string;
  public readonly statusCode: number;
  public readonly responseBody: string;

  constructor(providerId: string, statusCode: number, responseBody: string) {
    super(`Provider ${providerId} returned ${statusCode}`);
    this.name = 'ProviderError';
    this.providerId = providerId;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Specifically a 429 rate limit response from a provider. */
export class ProviderRateLimitError extends ProviderError {
  public readonly headers: Headers;

  constructor(providerId: string, headers: Headers, responseBody: string = '') {
    super(providerId, 429, responseBody);
    this.name = 'ProviderRateLimitError';
    this.headers = headers;
  }
}

/** Upstream answered 2xx but the body could not be used. */
export class MalformedResponseError extends Error {
  public readonly providerId: string;
  /** First characters of the offending body, for logs. */
  public readonly snippet: string;

  constructor(providerId: string, reason: string, body: string) {
    super(`Malformed response from ${providerId}: ${reason}`);
    this.name = 'MalformedResponseError';
    this.providerId = providerId;
    this.snippet = body.slice(0, 200);
  }
}

/** Extract a readable message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
