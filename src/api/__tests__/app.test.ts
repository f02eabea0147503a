import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Hono } from 'hono';
import { createApp } from '../app.js';
import { errorHandler } from '../middleware/error-handler.js';
import { parseLimit } from '../query.js';
import { initializeDatabase, type Db } from '../../persistence/db.js';
import { migrateSchema } from '../../persistence/schema.js';
import { ContentStore } from '../../persistence/content-store.js';
import { TaskLog } from '../../persistence/task-log.js';
import { UsageLogger } from '../../persistence/usage-logger.js';
import { ApiError, ConfigError, RateLimitError, ValidationError } from '../../shared/errors.js';

const DAY_MS = 86_400_000;
const NOW = 100 * DAY_MS;
const AUTH = { Authorization: 'Bearer test-secret' };

let db: Db;
let contentStore: ContentStore;
let taskLog: TaskLog;
let usageLogger: UsageLogger;
let app: Hono;

beforeEach(() => {
  db = initializeDatabase(':memory:');
  migrateSchema(db);
  contentStore = new ContentStore(db);
  taskLog = new TaskLog(db);
  usageLogger = new UsageLogger(db);
  app = createApp({
    apiKeys: ['test-secret'],
    adapter: { id: 'anthropic' },
    contentStore,
    taskLog,
    usageLogger,
    version: '0.1.0',
    now: () => NOW,
  });
});

afterEach(() => {
  db.close();
});

function saveBlogPost(title: string, createdAt: number): number {
  return contentStore.saveContent({
    contentType: 'blog_post',
    title,
    content: 'Hone often.',
    metaDescription: 'Knife care.',
    keywords: ['chef knife'],
    wordCount: 2,
    createdAt: new Date(createdAt),
  });
}

describe('GET /health', () => {
  it('needs no auth', async () => {
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', version: '0.1.0', llmProvider: 'anthropic' });
  });
});

describe('auth', () => {
  it('rejects a missing key', async () => {
    const res = await app.request('/v1/content');

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: {
        message: 'Missing API key. Send it in the Authorization header as Bearer <key>.',
        type: 'authentication_error',
        code: 'invalid_api_key',
      },
    });
  });

  it('rejects an unknown key', async () => {
    const res = await app.request('/v1/content', { headers: { Authorization: 'Bearer wrong' } });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Invalid API key provided.' } });
  });
});

describe('GET /v1/content', () => {
  it('lists content newest first', async () => {
    saveBlogPost('Older', 1000);
    saveBlogPost('Newer', 2000);

    const res = await app.request('/v1/content?limit=1', { headers: AUTH });

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ content: [{ title: 'Newer', keywords: ['chef knife'], status: 'draft' }] });
  });

  it('filters by type', async () => {
    saveBlogPost('Knife care', 1000);

    const res = await app.request('/v1/content?type=product_description', { headers: AUTH });

    expect(await res.json()).toEqual({ content: [] });
  });

  it('rejects an unknown type or bad limit', async () => {
    const badType = await app.request('/v1/content?type=video', { headers: AUTH });
    const badLimit = await app.request('/v1/content?limit=0', { headers: AUTH });

    expect(badType.status).toBe(400);
    expect(await badType.json()).toEqual({
      error: {
        message: 'type must be one of: blog_post, product_description',
        type: 'invalid_request_error',
        code: 'validation_failed',
      },
    });
    expect(badLimit.status).toBe(400);
  });

  it('returns one item by id', async () => {
    const id = saveBlogPost('Knife care', 1000);

    const found = await app.request(`/v1/content/${id}`, { headers: AUTH });
    const missing = await app.request('/v1/content/999', { headers: AUTH });
    const invalid = await app.request('/v1/content/abc', { headers: AUTH });

    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ id, title: 'Knife care' });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: { message: 'Content 999 not found', type: 'not_found', code: null } });
    expect(invalid.status).toBe(400);
  });
});

describe('GET /v1/keywords', () => {
  it('returns top keywords', async () => {
    contentStore.saveKeyword(
      { term: 'chef knife', searchVolume: 3000, difficulty: 40, cpc: 0.5, intent: 'informational', relevanceScore: 0.1 },
      1000,
    );

    const res = await app.request('/v1/keywords', { headers: AUTH });

    expect(await res.json()).toMatchObject({ keywords: [{ term: 'chef knife', searchVolume: 3000 }] });
  });
});

describe('GET /v1/tasks', () => {
  it('returns recent executions', async () => {
    const id = taskLog.start('weekly-seo', 'seo', 1000);
    taskLog.complete(id, 'completed', { details: { keywords: 0 }, now: 1200 });

    const res = await app.request('/v1/tasks', { headers: AUTH });

    expect(await res.json()).toMatchObject({
      executions: [{ id, taskName: 'weekly-seo', status: 'completed', durationMs: 200, details: { keywords: 0 } }],
    });
  });
});

describe('GET /v1/usage', () => {
  it('summarizes usage inside the requested window', async () => {
    const base = { service: 'search', endpoint: '/search', inputTokens: 0, outputTokens: 0, latencyMs: 50, attempts: 1 };
    usageLogger.log({ ...base, timestamp: NOW - 2 * DAY_MS, outcome: 'success' });
    usageLogger.log({ ...base, timestamp: NOW - 10 * DAY_MS, outcome: 'error' });

    const week = await app.request('/v1/usage?days=7', { headers: AUTH });
    const month = await app.request('/v1/usage', { headers: AUTH });

    expect(await week.json()).toMatchObject({ days: 7, services: [{ service: 'search', totalCalls: 1, failedCalls: 0 }] });
    expect(await month.json()).toMatchObject({ days: 30, services: [{ service: 'search', totalCalls: 2, failedCalls: 1 }] });
  });

  it('rejects an out-of-range window', async () => {
    const res = await app.request('/v1/usage?days=400', { headers: AUTH });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'days must be an integer between 1 and 365' } });
  });
});

describe('errorHandler', () => {
  function appThrowing(error: Error): Hono {
    const failing = new Hono();
    failing.onError(errorHandler);
    failing.get('/', () => {
      throw error;
    });
    return failing;
  }

  it('maps RateLimitError to 429 with Retry-After', async () => {
    const res = await appThrowing(new RateLimitError('slow down', 'search', { retryAfterMs: 1500 })).request('/');

    expect(res.status).toBe(429);
    expect(res.headers.get('Retry-After')).toBe('2');
    expect(await res.json()).toEqual({
      error: { message: 'Rate limited by search.', type: 'rate_limit_error', code: 'rate_limit_exceeded' },
    });
  });

  it('maps ApiError to 502', async () => {
    const res = await appThrowing(new ApiError('down', 'anthropic', { statusCode: 503 })).request('/');

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ error: { message: 'Upstream service anthropic failed.', code: 'bad_gateway' } });
  });

  it('maps ValidationError to 400', async () => {
    const res = await appThrowing(new ValidationError('bad input')).request('/');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'bad input' } });
  });

  it('hides configuration and unknown errors behind 500', async () => {
    const config = await appThrowing(new ConfigError('secret path')).request('/');
    const unknown = await appThrowing(new Error('stack details')).request('/');

    expect(config.status).toBe(500);
    expect(await config.json()).toMatchObject({ error: { message: 'Internal configuration error', code: 'config_error' } });
    expect(unknown.status).toBe(500);
    expect(await unknown.json()).toEqual({ error: { message: 'Internal server error', type: 'server_error', code: null } });
  });
});

describe('parseLimit', () => {
  it('falls back when absent and validates otherwise', () => {
    expect(parseLimit(undefined, 20)).toBe(20);
    expect(parseLimit('', 20)).toBe(20);
    expect(parseLimit('5', 20)).toBe(5);
    expect(() => parseLimit('501', 20)).toThrow(ValidationError);
    expect(() => parseLimit('2.5', 20)).toThrow('limit must be an integer between 1 and 500');
  });
});
