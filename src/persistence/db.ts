/**
 * Database initialization for SQLite persistence.
 * Sets up connection with WAL mode and performance pragmas.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

export type Db = Database.Database;

/**
 * Initialize SQLite database with WAL mode and performance pragmas.
 * @param dbPath - Path to SQLite database file, or ':memory:'
 * @returns Database instance ready for use
 */
export function initializeDatabase(dbPath: string): Db {
  const inMemory = dbPath === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('temp_store = MEMORY');

  logger.info({ dbPath, journalMode: inMemory ? 'memory' : 'WAL' }, 'SQLite database initialized');

  return db;
}
