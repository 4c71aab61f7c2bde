// Database connection and initialization
import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { getAppDir, getDatabasePath } from '~/.server/config/paths';
import { StorageError } from '~/.server/errors';
import { runMigrations } from './migrations';

let db: BetterSqlite3.Database | null = null;

/**
 * Ensure database directory exists
 */
function ensureDatabaseDirectory(): void {
  const appDir = getAppDir();

  try {
    if (!existsSync(appDir)) {
      mkdirSync(appDir, { recursive: true });
    }
  } catch (error) {
    throw new StorageError(
      `Failed to create database directory at ${appDir}. Ensure KEEPER_DATA_DIR is writable.`,
      { cause: error }
    );
  }
}

/**
 * Open a database at `dbPath` (or ':memory:'), apply pragmas and run pending migrations
 */
export function openDatabase(dbPath: string): BetterSqlite3.Database {
  let database: BetterSqlite3.Database;
  try {
    database = new Database(dbPath);
  } catch (error) {
    throw new StorageError(`Failed to open database at ${dbPath}`, { cause: error });
  }

  try {
    // Cascade deletes of custody entries and publications rely on this
    database.pragma('foreign_keys = ON');

    if (dbPath !== ':memory:') {
      database.pragma('journal_mode = WAL');
    }

    database.pragma('cache_size = -64000');

    runMigrations(database);
  } catch (error) {
    database.close();
    throw new StorageError(`Failed to initialize database at ${dbPath}`, { cause: error });
  }

  return database;
}

/**
 * Internal: Get or create the process-wide connection.
 * Use db/client helpers instead of calling this directly.
 */
export function getDatabaseInternal(): BetterSqlite3.Database {
  if (!db) {
    ensureDatabaseDirectory();
    db = openDatabase(getDatabasePath());
  }
  return db;
}

/**
 * Internal cleanup helper
 */
export function closeDatabaseInternal(): void {
  if (db) {
    db.close();
    db = null;
  }
}
