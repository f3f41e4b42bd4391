import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import * as schema from './schema';
import { env } from '../config/environment';
import { logger } from '../config/logger';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Transaction handle passed to `db.transaction` callbacks.
 * better-sqlite3 transactions are synchronous, so queries inside use `.get()`, `.all()` and `.run()`.
 */
export type AppTransaction = Parameters<Parameters<AppDatabase['transaction']>[0]>[0];

/**
 * Open a SQLite connection and wrap it with Drizzle
 */
export function createDatabase(path: string): { db: AppDatabase; sqlite: Database.Database } {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);

  // WAL for concurrent readers, a busy timeout so IMMEDIATE transactions queue instead of failing
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('foreign_keys = ON');

  return { db: drizzle(sqlite, { schema }), sqlite };
}

const connection = createDatabase(env.DATABASE_PATH);

logger.info({ path: env.DATABASE_PATH }, 'Database connection established');

export const db = connection.db;
export const sqlite = connection.sqlite;

// Health check function
export function checkDatabaseHealth(): boolean {
  try {
    connection.sqlite.prepare('SELECT 1').get();
    return true;
  } catch (error) {
    logger.error({ error }, 'Database health check failed');
    return false;
  }
}

// Graceful shutdown
export function closeDatabaseConnection(): void {
  try {
    connection.sqlite.close();
    logger.info('Database connection closed');
  } catch (error) {
    logger.error({ error }, 'Error closing database connection');
  }
}
