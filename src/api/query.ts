/**
 * Query-string helpers shared by the read routes.
 */

import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';

const MAX_LIMIT = 500;

/**
 * Parse a `limit` query value.
 * @throws ValidationError when present but not an integer in 1..500.
 */
export function parseLimit(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const parsed = z.coerce.number().int().min(1).max(MAX_LIMIT).safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIMIT}`);
  }
  return parsed.data;
}
