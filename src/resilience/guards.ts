/**
 * Precondition checks and best-effort execution.
 */

import { ValidationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Throw a ValidationError carrying `message` when `condition` is false.
 *
 * @example
 * validateInput(keywords.length > 0, 'At least one keyword is required');
 */
export function validateInput(condition: boolean, message: string): asserts condition {
  if (!condition) {
    logger.error(`Validation failed: ${message}`);
    throw new ValidationError(message);
  }
}

/**
 * Run `fn` and return `fallback` if it throws. Only for side work whose
 * failure must not fail the caller (alerts, optional reports).
 */
export async function safeExecute<T>(
  fn: () => T | Promise<T>,
  fallback: T,
  options: { logError?: boolean; label?: string } = {},
): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    if (options.logError ?? true) {
      logger.error({ err, label: options.label }, `Error in safeExecute: ${errorMessage(err)}`);
    }
    return fallback;
  }
}
