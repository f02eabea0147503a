/**
 * GET /health handler.
 * Returns service status information. No authentication required.
 */

import { Hono } from 'hono';
import type { LlmAdapter } from '../../providers/types.js';

/**
 * @param version - Reported package version.
 */
export function createHealthRoutes(adapter: Pick<LlmAdapter, 'id'>, version: string) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({
      status: 'ok',
      version,
      uptime: process.uptime(),
      llmProvider: adapter.id,
    });
  });

  return app;
}
