/**
 * Outbound API usage routes.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../../shared/errors.js';
import type { UsageLogger } from '../../persistence/usage-logger.js';

const DAY_MS = 86_400_000;
const DaysSchema = z.coerce.number().int().min(1).max(365);

/**
 * @param now - Time source for the window start.
 */
export function createUsageRoutes(usage: UsageLogger, now: () => number = Date.now) {
  const app = new Hono();

  // GET / - Per-service totals over the last ?days=N (default 30)
  app.get('/', (c) => {
    const raw = c.req.query('days');
    let days = 30;
    if (raw !== undefined && raw !== '') {
      const parsed = DaysSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ValidationError('days must be an integer between 1 and 365');
      }
      days = parsed.data;
    }

    return c.json({ days, services: usage.summary(now() - days * DAY_MS) });
  });

  return app;
}
