/**
 * API key validation middleware for Hono.
 * Validates the Bearer token in the Authorization header against the
 * configured keys.
 */

import { createMiddleware } from 'hono/factory';

function unauthorized(message: string) {
  return {
    error: {
      message,
      type: 'authentication_error',
      code: 'invalid_api_key',
    },
  };
}

/**
 * Create an auth middleware that validates API keys from the Authorization header.
 * @param apiKeys - Valid keys from `settings.apiKeys`.
 */
export function createAuthMiddleware(apiKeys: readonly string[]) {
  const keySet = new Set(apiKeys);

  return createMiddleware(async (c, next) => {
    const authorization = c.req.header('authorization');

    if (!authorization || !authorization.startsWith('Bearer ')) {
      return c.json(
        unauthorized('Missing API key. Send it in the Authorization header as Bearer <key>.'),
        401,
      );
    }

    if (!keySet.has(authorization.slice('Bearer '.length))) {
      return c.json(unauthorized('Invalid API key provided.'), 401);
    }

    await next();
  });
}
