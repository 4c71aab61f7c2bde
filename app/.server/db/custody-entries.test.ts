import type BetterSqlite3 from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from './connection';
import { DbClient } from './client';
import { CustodyEntryRepository } from './custody-entries';
import { TranscriptRepository } from './transcripts';
import { StorageError } from '~/.server/errors';
import type { CustodyEntry } from '~/types/custody-entry';

function entry(id: string, timestamp: string, overrides: Partial<CustodyEntry> = {}): CustodyEntry {
  return {
    id,
    transcriptId: 't-1',
    timestamp,
    action: 'verified',
    details: 'File integrity verified - hash matches',
    fileHash: 'abc',
    storageLocation: '/data/t-1.txt',
    verificationStatus: 'verified',
    ...overrides,
  };
}

describe('CustodyEntryRepository', () => {
  let raw: BetterSqlite3.Database;
  let db: DbClient;
  let entries: CustodyEntryRepository;

  beforeEach(() => {
    raw = openDatabase(':memory:');
    db = new DbClient(raw);
    entries = new CustodyEntryRepository(db);
    new TranscriptRepository(db).insert({
      id: 't-1',
      title: 'Chat',
      content: 'hello',
      sourceUrl: null,
      sourcePlatform: 'Claude',
      createdAt: '2025-01-01T00:00:00.000Z',
      importedAt: '2025-01-01T00:00:00.000Z',
      fileHash: 'abc',
      exportFormat: 'plaintext',
      localFilePath: '/data/t-1.txt',
      cloudStoragePath: null,
      offlineBackupPath: null,
    });
  });

  afterEach(() => {
    raw.close();
  });

  it('orders by timestamp, then by insertion order', () => {
    entries.insert(entry('late', '2025-01-01T12:00:00.000Z'));
    entries.insert(entry('tie-1', '2025-01-01T09:00:00.000Z'));
    entries.insert(entry('tie-2', '2025-01-01T09:00:00.000Z'));
    entries.insert(entry('early', '2025-01-01T08:00:00.000Z'));

    expect(entries.listForTranscript('t-1').map((e) => e.id)).toEqual(['early', 'tie-1', 'tie-2', 'late']);
  });

  it('maps columns back to the entry shape', () => {
    const stored = entry('e-1', '2025-01-01T09:00:00.000Z', {
      action: 'modified',
      details: 'ALERT: File integrity compromised - hash mismatch',
      storageLocation: null,
    });
    entries.insert(stored);

    expect(entries.listForTranscript('t-1')).toEqual([stored]);
  });

  it('rejects updates to stored entries', () => {
    entries.insert(entry('e-1', '2025-01-01T09:00:00.000Z'));

    expect(() => db.run("UPDATE custody_entries SET details = 'changed' WHERE id = 'e-1'"))
      .toThrow(StorageError);
    expect(entries.listForTranscript('t-1')[0].details).toBe('File integrity verified - hash matches');
  });

  it('rejects entries for unknown transcripts', () => {
    expect(() => entries.insert(entry('e-1', '2025-01-01T09:00:00.000Z', { transcriptId: 'nope' })))
      .toThrow(StorageError);
  });
});
