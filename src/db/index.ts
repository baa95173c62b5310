/**
 * SQLite Database Connection
 *
 * One better-sqlite3 connection per process. Statements run synchronously on
 * the calling thread instead of being offloaded and awaited, so storage calls
 * never interleave with each other and block the event loop while they run.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { SCHEMA } from './schema.js';
import { logger } from '../utils/logger.js';

let db: Database.Database | null = null;

/**
 * Get the open database
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Open the database and create the schema
 */
export function initDatabase(path: string): Database.Database {
  if (db) {
    logger.debug('Database already initialized');
    return db;
  }

  const inMemory = path === ':memory:';
  const location = inMemory ? path : resolve(process.cwd(), path);

  if (!inMemory) {
    mkdirSync(dirname(location), { recursive: true });
  }

  const connection = new Database(location);
  connection.pragma('journal_mode = WAL');
  connection.pragma('foreign_keys = ON');

  try {
    connection.exec(SCHEMA);
  } catch (error) {
    connection.close();
    logger.error({ error }, 'Failed to initialize schema');
    throw error;
  }

  db = connection;
  logger.info({ path: location }, 'Database ready');
  return db;
}

/**
 * Run a function inside one transaction; any throw rolls the whole thing back
 */
export function withTransaction<T>(fn: (database: Database.Database) => T): T {
  const database = getDatabase();
  return database.transaction(() => fn(database))();
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

