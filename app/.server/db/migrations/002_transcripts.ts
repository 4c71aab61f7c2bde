// Transcripts table: one row per preserved transcript
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 2,
  description: 'Create transcripts table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS transcripts (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        source_url TEXT,
        source_platform TEXT NOT NULL,

        -- ISO 8601 timestamps
        created_at TEXT NOT NULL,
        imported_at TEXT NOT NULL,

        -- Empty until the saved file is hashed
        file_hash TEXT NOT NULL DEFAULT '',

        export_format TEXT NOT NULL
          CHECK(export_format IN ('plaintext', 'pdf', 'markdown')),

        local_file_path TEXT,
        cloud_storage_path TEXT,
        offline_backup_path TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_transcripts_imported
        ON transcripts(imported_at DESC);
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`
      DROP INDEX IF EXISTS idx_transcripts_imported;
      DROP TABLE IF EXISTS transcripts;
    `);
  },
};

export default migration;
