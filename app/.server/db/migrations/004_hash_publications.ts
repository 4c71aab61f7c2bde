// Hash publications: notarization submissions per transcript
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 4,
  description: 'Create hash_publications table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS hash_publications (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        transcript_id TEXT NOT NULL
          REFERENCES transcripts(id) ON DELETE CASCADE,
        service TEXT NOT NULL
          CHECK(service IN ('github-gist', 'email', 'open-timestamps', 'bitcoin-op-return', 'custom-webhook')),
        published_at TEXT NOT NULL,
        public_url TEXT,
        transaction_id TEXT,
        confirmation_status TEXT NOT NULL
          CHECK(confirmation_status IN ('pending', 'confirmed', 'failed')),
        error_message TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_hash_publications_transcript
        ON hash_publications(transcript_id, seq ASC);
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`
      DROP INDEX IF EXISTS idx_hash_publications_transcript;
      DROP TABLE IF EXISTS hash_publications;
    `);
  },
};

export default migration;
