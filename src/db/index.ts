import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import * as schema from './schema.js';
import { BOOTSTRAP_STATEMENTS } from './bootstrap.js';
import { config } from '../config.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('database');

export type InkpressDatabase = BetterSQLite3Database<typeof schema>;

let db: InkpressDatabase | null = null;
let sqlite: Database.Database | null = null;

/**
 * Open (or create) the SQLite database and make sure every table exists.
 * Pass ':memory:' for a throwaway database.
 */
export function initializeDatabase(url: string = config.database.url): InkpressDatabase {
  if (db) {
    closeDatabase();
  }

  logger.info('Initializing database', { url });

  sqlite = new Database(url);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  for (const statement of BOOTSTRAP_STATEMENTS) {
    sqlite.exec(statement);
  }

  db = drizzle(sqlite, { schema });

  logger.info('Database initialized');
  return db;
}

export function getDatabase(): InkpressDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return db;
}

export function closeDatabase(): void {
  if (sqlite) {
    logger.info('Closing database connection');
    sqlite.close();
  }
  sqlite = null;
  db = null;
}

export { schema };
export * from './schema.js';
