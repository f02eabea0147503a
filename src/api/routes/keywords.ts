/**
 * Researched keyword routes.
 */

import { Hono } from 'hono';
import type { ContentStore } from '../../persistence/content-store.js';
import { parseLimit } from '../query.js';

export function createKeywordRoutes(store: ContentStore) {
  const app = new Hono();

  // GET / - Top keywords by relevance-weighted volume
  app.get('/', (c) => {
    return c.json({ keywords: store.getTopKeywords(parseLimit(c.req.query('limit'), 50)) });
  });

  return app;
}
