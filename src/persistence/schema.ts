/**
 * Database schema migration system using PRAGMA user_version.
 * Manages schema evolution with idempotent migrations.
 */

import { logger } from '../shared/logger.js';
import type { Db } from './db.js';

/**
 * Run schema migrations to bring database to current version.
 * @param db - Database instance to migrate
 */
export function migrateSchema(db: Db): void {
  const currentVersion = Number(db.pragma('user_version', { simple: true }));
  logger.debug({ currentVersion }, 'Database schema version check');

  const migrations = [
    // 1: generated content, keyword research, product optimizations
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS content (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          content_type TEXT NOT NULL,
          title TEXT NOT NULL,
          body TEXT NOT NULL,
          meta_description TEXT NOT NULL DEFAULT '',
          keywords TEXT NOT NULL DEFAULT '[]',
          word_count INTEGER NOT NULL DEFAULT 0,
          status TEXT NOT NULL DEFAULT 'draft',
          file_path TEXT,
          created_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS keywords (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          term TEXT NOT NULL UNIQUE,
          search_volume INTEGER NOT NULL,
          difficulty REAL NOT NULL,
          cpc REAL,
          intent TEXT NOT NULL,
          relevance_score REAL NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS product_optimizations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          handle TEXT NOT NULL,
          original_title TEXT NOT NULL,
          optimized_title TEXT NOT NULL,
          meta_description TEXT NOT NULL,
          suggested_tags TEXT NOT NULL DEFAULT '[]',
          score_before REAL NOT NULL,
          score_after REAL NOT NULL,
          created_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_content_created ON content(created_at DESC);
        CREATE INDEX IF NOT EXISTS idx_content_type ON content(content_type);
        CREATE INDEX IF NOT EXISTS idx_optimizations_handle ON product_optimizations(handle);
      `);
    },
    // 2: task execution log and outbound API usage
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS task_executions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          task_name TEXT NOT NULL,
          task_type TEXT NOT NULL,
          status TEXT NOT NULL,
          started_at INTEGER NOT NULL,
          finished_at INTEGER,
          duration_ms INTEGER,
          details TEXT,
          error_message TEXT
        );

        CREATE TABLE IF NOT EXISTS api_usage (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp INTEGER NOT NULL,
          service TEXT NOT NULL,
          endpoint TEXT NOT NULL,
          model TEXT,
          input_tokens INTEGER NOT NULL DEFAULT 0,
          output_tokens INTEGER NOT NULL DEFAULT 0,
          outcome TEXT NOT NULL,
          http_status INTEGER,
          latency_ms INTEGER NOT NULL,
          attempts INTEGER NOT NULL,
          error_message TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_tasks_started ON task_executions(started_at DESC);
        CREATE INDEX IF NOT EXISTS idx_usage_timestamp ON api_usage(timestamp DESC);
        CREATE INDEX IF NOT EXISTS idx_usage_service ON api_usage(service);
      `);
    },
    // 3: provider quota reported with each call
    () => {
      db.exec(`
        ALTER TABLE api_usage ADD COLUMN remaining_requests INTEGER;
        ALTER TABLE api_usage ADD COLUMN remaining_tokens INTEGER;
      `);
    },
  ];

  for (let i = currentVersion; i < migrations.length; i++) {
    const targetVersion = i + 1;
    const migrate = migrations[i];
    if (migrate === undefined) break;
    logger.info({ from: currentVersion, to: targetVersion }, 'Running database migration');
    db.transaction(migrate)();
    db.pragma(`user_version = ${targetVersion}`);
  }

  if (currentVersion < migrations.length) {
    logger.info({ version: migrations.length }, 'Database migrations complete');
  }
}

/** Schema version this build migrates to. */
export const SCHEMA_VERSION = 3;
