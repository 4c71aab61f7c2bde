import type { DbClient } from './client';

/**
 * Read a single setting value by key
 */
export function getSettingValue(db: DbClient, key: string): string | null {
  const row = db.selectOne<{ value: string }>('SELECT value FROM settings WHERE key = ?', [key]);
  return row ? row.value : null;
}

/**
 * Upsert a single setting value by key
 */
export function setSettingValue(db: DbClient, key: string, value: string): void {
  db.run(
    `
      INSERT INTO settings (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `,
    [key, value]
  );
}

export function deleteSettingValue(db: DbClient, key: string): void {
  db.run('DELETE FROM settings WHERE key = ?', [key]);
}
