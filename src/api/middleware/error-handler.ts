/**
 * Global error handler.
 * Maps the error taxonomy onto HTTP status codes with a uniform JSON body.
 */

import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from '../../shared/logger.js';
import { ApiError, ConfigError, RateLimitError, ValidationError } from '../../shared/errors.js';

/**
 * Error mapping:
 * - ValidationError -> 400 with its message
 * - RateLimitError -> 429, with Retry-After when known
 * - ApiError -> 502 (upstream failure)
 * - HTTPException -> its own status
 * - ConfigError, unknown -> 500 (no internal details exposed)
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof ValidationError) {
    return c.json({ error: { message: err.message, type: 'invalid_request_error', code: 'validation_failed' } }, 400);
  }

  if (err instanceof RateLimitError) {
    logger.warn({ service: err.service }, 'Upstream rate limit surfaced to client');
    if (err.retryAfterMs !== undefined) {
      c.header('Retry-After', String(Math.ceil(err.retryAfterMs / 1000)));
    }
    return c.json(
      { error: { message: `Rate limited by ${err.service}.`, type: 'rate_limit_error', code: 'rate_limit_exceeded' } },
      429,
    );
  }

  if (err instanceof ApiError) {
    logger.warn({ service: err.service, statusCode: err.statusCode }, 'Upstream API failure');
    return c.json(
      { error: { message: `Upstream service ${err.service} failed.`, type: 'upstream_error', code: 'bad_gateway' } },
      502,
    );
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json(
      { error: { message: 'Internal configuration error', type: 'server_error', code: 'config_error' } },
      500,
    );
  }

  // Unknown error -- log full details but return generic message
  logger.error({ err }, 'Unhandled error');
  return c.json({ error: { message: 'Internal server error', type: 'server_error', code: null } }, 500);
};
