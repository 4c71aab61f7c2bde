// Chain of custody: append-only audit entries per transcript
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 3,
  description: 'Create custody_entries table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS custody_entries (
        -- Insertion order, tie-breaker for equal timestamps
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        transcript_id TEXT NOT NULL
          REFERENCES transcripts(id) ON DELETE CASCADE,
        timestamp TEXT NOT NULL,
        action TEXT NOT NULL
          CHECK(action IN ('imported', 'exported', 'hashed', 'published', 'backed-up', 'verified', 'modified')),
        details TEXT NOT NULL,
        file_hash TEXT NOT NULL,
        storage_location TEXT,
        verification_status TEXT NOT NULL
          CHECK(verification_status IN ('verified', 'unverified', 'tampered'))
      );

      CREATE INDEX IF NOT EXISTS idx_custody_entries_transcript
        ON custody_entries(transcript_id, timestamp ASC, seq ASC);

      CREATE TRIGGER IF NOT EXISTS custody_entries_immutable
      BEFORE UPDATE ON custody_entries
      BEGIN
        SELECT RAISE(ABORT, 'custody entries are immutable');
      END;
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`
      DROP TRIGGER IF EXISTS custody_entries_immutable;
      DROP INDEX IF EXISTS idx_custody_entries_transcript;
      DROP TABLE IF EXISTS custody_entries;
    `);
  },
};

export default migration;
