/**
 * storefront-autopilot HTTP server entry point.
 * Bootstraps configuration and services, creates the Hono application and
 * starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { createServices } from './bootstrap.js';
import { createApp } from './api/app.js';
import { VERSION } from './version.js';

// --- Bootstrap ---

logger.info(`storefront-autopilot v${VERSION} starting...`);

const configPath = resolveConfigPath();
const config = loadConfig(configPath);

// Update logger level from config
logger.level = config.settings.logLevel;

const services = createServices(config);

const app = createApp({
  apiKeys: config.settings.apiKeys,
  adapter: services.adapter,
  contentStore: services.contentStore,
  taskLog: services.taskLog,
  usageLogger: services.usageLogger,
  version: VERSION,
});

// --- Start server ---

const port = Number(process.env['PORT'] ?? config.settings.port);

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info({ port: info.port }, `storefront-autopilot listening on port ${info.port}`);
  logger.info(
    { llm: services.adapter.id, model: config.llm.model, dbPath: config.settings.dbPath },
    'Ready',
  );
});

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  services.close();
  logger.info('Database closed');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// --- Unhandled rejection handler ---

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
