/**
 * Hono application factory: health check plus the authenticated read API.
 */

import { Hono } from 'hono';
import { createAuthMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createContentRoutes } from './routes/content.js';
import { createKeywordRoutes } from './routes/keywords.js';
import { createTaskRoutes } from './routes/tasks.js';
import { createUsageRoutes } from './routes/usage.js';
import type { ContentStore } from '../persistence/content-store.js';
import type { TaskLog } from '../persistence/task-log.js';
import type { UsageLogger } from '../persistence/usage-logger.js';
import type { LlmAdapter } from '../providers/types.js';

export interface AppDeps {
  apiKeys: readonly string[];
  adapter: Pick<LlmAdapter, 'id'>;
  contentStore: ContentStore;
  taskLog: TaskLog;
  usageLogger: UsageLogger;
  version: string;
  now?: () => number;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // Global error handler
  app.onError(errorHandler);

  // Health route (no auth required)
  app.route('/health', createHealthRoutes(deps.adapter, deps.version));

  // Auth-protected v1 routes
  const v1 = new Hono();
  v1.use('*', createAuthMiddleware(deps.apiKeys));
  v1.route('/content', createContentRoutes(deps.contentStore));
  v1.route('/keywords', createKeywordRoutes(deps.contentStore));
  v1.route('/tasks', createTaskRoutes(deps.taskLog));
  v1.route('/usage', createUsageRoutes(deps.usageLogger, deps.now));

  app.route('/v1', v1);

  return app;
}
