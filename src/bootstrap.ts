/**
 * Service wiring shared by the HTTP server and the CLI task runner.
 * Everything is built from one validated Config; nothing is global.
 */

import { initializeDatabase, type Db } from './persistence/db.js';
import { migrateSchema } from './persistence/schema.js';
import { ContentStore } from './persistence/content-store.js';
import { TaskLog } from './persistence/task-log.js';
import { UsageLogger } from './persistence/usage-logger.js';
import { createLlmAdapter } from './providers/registry.js';
import type { LlmAdapter } from './providers/types.js';
import { RateLimiter } from './resilience/rate-limiter.js';
import { systemClock, type Clock } from './resilience/clock.js';
import { resolveRetryPolicy } from './resilience/retry.js';
import { LlmClient } from './llm/client.js';
import { SearchClient } from './seo/search-client.js';
import { SeoEngine } from './seo/engine.js';
import { ContentGenerator } from './content/generator.js';
import { BatchGenerator } from './content/batch.js';
import { ProductOptimizer } from './optimizer/optimizer.js';
import { TaskRunner } from './tasks/runner.js';
import { AlertLog } from './tasks/alerts.js';
import type { Config } from './config/types.js';

export interface Services {
  db: Db;
  adapter: LlmAdapter;
  llm: LlmClient;
  search: SearchClient;
  generator: ContentGenerator;
  seo: SeoEngine;
  optimizer: ProductOptimizer;
  batch: BatchGenerator;
  contentStore: ContentStore;
  taskLog: TaskLog;
  usageLogger: UsageLogger;
  runner: TaskRunner;
  close(): void;
}

export interface ServiceOverrides {
  adapter?: LlmAdapter;
  clock?: Clock;
  now?: () => Date;
}

export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const { settings } = config;
  const clock = overrides.clock ?? systemClock;

  const db = initializeDatabase(settings.dbPath);
  migrateSchema(db);
  const contentStore = new ContentStore(db);
  const taskLog = new TaskLog(db);
  const usageLogger = new UsageLogger(db);

  // Validates the configured policy once, at startup
  resolveRetryPolicy(config.retry);
  const backoff = config.retry;

  const adapter = overrides.adapter ?? createLlmAdapter(config.llm);
  const llm = new LlmClient(adapter, {
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    timeoutMs: settings.requestTimeoutMs,
    limiter: new RateLimiter({ requestsPerMinute: config.llm.requestsPerMinute }, clock),
    retryPolicy: backoff,
    usageLogger,
    clock,
  });

  const search = new SearchClient(config.search, {
    timeoutMs: settings.requestTimeoutMs,
    limiter: new RateLimiter({ requestsPerMinute: config.search.requestsPerMinute }, clock),
    retryPolicy: backoff,
    usageLogger,
    clock,
  });

  const generator = new ContentGenerator(llm, {
    brand: config.brand,
    content: config.content,
    outputDir: settings.outputDir,
    now: overrides.now,
  });

  const seo = new SeoEngine(search, {
    brand: config.brand,
    seedKeywords: config.content.seedKeywords,
    reportsDir: settings.reportsDir,
    keywordSink: contentStore,
    now: overrides.now,
  });

  const optimizer = new ProductOptimizer(generator, {
    brand: config.brand,
    reportsDir: settings.reportsDir,
    sink: contentStore,
    now: overrides.now,
  });

  const batch = new BatchGenerator(generator, {
    reportsDir: settings.reportsDir,
    sink: contentStore,
    now: overrides.now,
  });

  const runner = new TaskRunner({
    generator,
    seo,
    optimizer,
    batch,
    contentStore,
    taskLog,
    alerts: new AlertLog(settings.alertsLog, overrides.now),
    content: config.content,
    searchConsole: settings.searchConsole,
    reportsDir: settings.reportsDir,
    now: overrides.now,
  });

  return {
    db,
    adapter,
    llm,
    search,
    generator,
    seo,
    optimizer,
    batch,
    contentStore,
    taskLog,
    usageLogger,
    runner,
    close: () => db.close(),
  };
}
