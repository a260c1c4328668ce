import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { Logger } from '../utils/logger.js';
import { CATALOG_SCHEMA } from './schema.js';

export type CatalogDatabase = Database.Database;

export interface OpenDatabaseOptions {
  /** File path, or ':memory:' for an in-process database */
  dbPath: string;
  logger?: Logger;
  busyTimeoutMs?: number;
}

/**
 * Opens the catalog database, enables foreign keys and applies the schema.
 */
export function openCatalogDatabase(options: OpenDatabaseOptions): CatalogDatabase {
  const { dbPath, logger } = options;
  const inMemory = dbPath === ':memory:';

  if (!inMemory) {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  logger?.info('Opening catalog database', { dbPath });
  const db = new Database(dbPath);

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  db.pragma('foreign_keys = ON');
  db.exec(CATALOG_SCHEMA);

  return db;
}
