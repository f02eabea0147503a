/**
 * Generated content routes.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../../shared/errors.js';
import type { ContentStore } from '../../persistence/content-store.js';
import { parseLimit } from '../query.js';

const ContentTypeSchema = z.enum(['blog_post', 'product_description']);

export function createContentRoutes(store: ContentStore) {
  const app = new Hono();

  // GET / - Newest content, optionally ?type=blog_post|product_description
  app.get('/', (c) => {
    const limit = parseLimit(c.req.query('limit'), 20);
    const typeParam = c.req.query('type');
    let contentType: z.infer<typeof ContentTypeSchema> | undefined;
    if (typeParam !== undefined) {
      const parsed = ContentTypeSchema.safeParse(typeParam);
      if (!parsed.success) {
        throw new ValidationError(`type must be one of: ${ContentTypeSchema.options.join(', ')}`);
      }
      contentType = parsed.data;
    }

    return c.json({ content: store.listRecentContent(limit, contentType) });
  });

  // GET /:id - One content item
  app.get('/:id', (c) => {
    const id = Number(c.req.param('id'));
    if (!Number.isInteger(id) || id < 1) {
      throw new ValidationError('id must be a positive integer');
    }

    const record = store.getContent(id);
    if (record === null) {
      return c.json({ error: { message: `Content ${id} not found`, type: 'not_found', code: null } }, 404);
    }
    return c.json(record);
  });

  return app;
}
