/**
 * Task execution history routes.
 */

import { Hono } from 'hono';
import type { TaskLog } from '../../persistence/task-log.js';
import { parseLimit } from '../query.js';

export function createTaskRoutes(taskLog: TaskLog) {
  const app = new Hono();

  // GET / - Most recent executions first
  app.get('/', (c) => {
    return c.json({ executions: taskLog.recent(parseLimit(c.req.query('limit'), 20)) });
  });

  return app;
}
