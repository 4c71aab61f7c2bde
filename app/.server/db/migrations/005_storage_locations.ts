// Backup destinations (shared configuration)
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 5,
  description: 'Create storage_locations table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS storage_locations (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        type TEXT NOT NULL
          CHECK(type IN ('local', 'icloud-drive', 'dropbox', 'google-drive', 'external-drive', 'optical-disc')),
        path TEXT NOT NULL,
        is_enabled INTEGER NOT NULL DEFAULT 1,
        last_synced_at TEXT,
        sync_status TEXT NOT NULL DEFAULT 'idle'
          CHECK(sync_status IN ('idle', 'syncing', 'synced', 'error')),
        created_at TEXT NOT NULL
      );
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`DROP TABLE IF EXISTS storage_locations;`);
  },
};

export default migration;
