// Initial migration: Settings table
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 1,
  description: 'Initial schema with settings table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );
    `);

    db.exec(`
      CREATE TRIGGER IF NOT EXISTS settings_updated_at
      AFTER UPDATE ON settings
      BEGIN
        UPDATE settings SET updated_at = CURRENT_TIMESTAMP WHERE key = NEW.key;
      END;
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`DROP TRIGGER IF EXISTS settings_updated_at;`);
    db.exec(`DROP TABLE IF EXISTS settings;`);
  },
};

export default migration;
