// Migration registry
import type BetterSqlite3 from 'better-sqlite3';
import migration001 from './001_initial';
import migration002 from './002_transcripts';
import migration003 from './003_custody_entries';
import migration004 from './004_hash_publications';
import migration005 from './005_storage_locations';
import { getLogger } from '~/.server/log/logger';

const log = getLogger({ module: 'DBMigrations' });

export interface Migration {
  version: number;
  description: string;
  up: (db: BetterSqlite3.Database) => void;
  down: (db: BetterSqlite3.Database) => void;
}

// Export all migrations in order
export const migrations: Migration[] = [
  migration001,
  migration002,
  migration003,
  migration004,
  migration005,
];

/**
 * Run pending migrations
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  // Ensure schema_version table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP,
      description TEXT
    );
  `);

  const currentVersion = getCurrentSchemaVersion(db);
  const pendingMigrations = migrations.filter((m) => m.version > currentVersion);

  if (pendingMigrations.length === 0) {
    log.debug({ currentVersion }, 'migrations up to date');
    return;
  }

  log.info(
    { count: pendingMigrations.length, from: currentVersion, to: migrations[migrations.length - 1].version },
    'running pending migrations'
  );

  // Run each migration in a transaction
  for (const migration of pendingMigrations) {
    const transaction = db.transaction(() => {
      log.info({ version: migration.version, description: migration.description }, 'applying migration');

      migration.up(db);

      db.prepare(
        'INSERT INTO schema_version (version, description) VALUES (?, ?)'
      ).run(migration.version, migration.description);
    });

    transaction();
  }

  log.info({}, 'all migrations completed');
}

/**
 * Get current schema version
 */
export function getCurrentSchemaVersion(db: BetterSqlite3.Database): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get();
  return row?.version ?? 0;
}

/**
 * Rollback last migration (for development only)
 */
export function rollbackLastMigration(db: BetterSqlite3.Database): void {
  const currentVersion = getCurrentSchemaVersion(db);

  if (currentVersion === 0) {
    log.info({}, 'no migrations to rollback');
    return;
  }

  const migration = migrations.find((m) => m.version === currentVersion);

  if (!migration) {
    throw new Error(`Migration v${currentVersion} not found`);
  }

  log.info({ version: migration.version, description: migration.description }, 'rolling back migration');

  const transaction = db.transaction(() => {
    migration.down(db);
    db.prepare('DELETE FROM schema_version WHERE version = ?').run(currentVersion);
  });

  transaction();
}
