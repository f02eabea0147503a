/**
 * Error classification.
 * Maps heterogeneous upstream failures (HTTP status errors, connection
 * failures, timeouts, unusable bodies) onto the validation / api / rate_limit
 * taxonomy so retry policy can be written once.
 */

import {
  ApiError,
  MalformedResponseError,
  ProviderError,
  ProviderRateLimitError,
  RateLimitError,
  ValidationError,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { parseRetryAfterMs } from '../providers/utils.js';
import type { ErrorKind } from './types.js';

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const { code } = value;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Connection-level failure: undici's `TypeError('fetch failed')`, or any
 * error (or its cause) carrying a socket/DNS error code.
 */
function isConnectionFailure(error: Error): boolean {
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return true;
  }
  const code = errorCode(error) ?? errorCode(error.cause);
  return code !== undefined && NETWORK_ERROR_CODES.has(code);
}

/** Request aborted by `AbortSignal.timeout` or an explicit abort. */
function isTimeout(error: Error): boolean {
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/**
 * Classify a caught failure. Pure: the same error always yields the same kind.
 * @returns The kind, or null when the failure is not one this layer understands.
 */
export function classifyError(error: unknown): ErrorKind | null {
  if (!(error instanceof Error)) {
    return null;
  }

  if (error instanceof ValidationError) {
    return 'validation';
  }

  if (error instanceof RateLimitError || error instanceof ProviderRateLimitError) {
    return 'rate_limit';
  }

  if (
    error instanceof ApiError ||
    error instanceof ProviderError ||
    error instanceof MalformedResponseError ||
    isConnectionFailure(error) ||
    isTimeout(error)
  ) {
    return 'api';
  }

  return null;
}

/**
 * Convert a recognized transport failure into the taxonomy.
 * Taxonomy errors and unrecognized errors are returned unchanged; the original
 * failure is kept as `cause` on converted errors.
 *
 * @param service - Name of the upstream service, recorded on the ApiError.
 */
export function toTaxonomyError(error: unknown, service: string): unknown {
  if (
    error instanceof ValidationError ||
    error instanceof ApiError
  ) {
    return error;
  }

  if (error instanceof ProviderRateLimitError) {
    return new RateLimitError(`Rate limit exceeded: ${error.message}`, service, {
      retryAfterMs: parseRetryAfterMs(error.headers),
      cause: error,
    });
  }

  if (error instanceof ProviderError) {
    return new ApiError(`API call failed: ${error.message}`, service, {
      statusCode: error.statusCode,
      cause: error,
    });
  }

  const kind = classifyError(error);
  if (kind === 'api' && error instanceof Error) {
    const prefix = isConnectionFailure(error) ? 'Failed to connect to API' : 'API call failed';
    return new ApiError(`${prefix}: ${error.message}`, service, { cause: error });
  }

  return error;
}

/**
 * Decorator: run `fn`, logging failures and rethrowing them in taxonomy form.
 * Unrecognized errors are logged and rethrown untouched.
 */
export function withApiErrorHandling<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  service: string,
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs) => {
    try {
      return await fn(...args);
    } catch (error: unknown) {
      const converted = toTaxonomyError(error, service);
      const kind = classifyError(converted);

      if (kind === 'rate_limit') {
        logger.error({ service }, `Rate limit exceeded in ${service}: ${errorMessage(error)}`);
      } else if (kind === 'api') {
        logger.error({ service }, `API error in ${service}: ${errorMessage(error)}`);
      } else if (kind === null) {
        logger.error({ service, err: error }, `Unexpected error in ${service}: ${errorMessage(error)}`);
      }

      throw converted;
    }
  };
}
