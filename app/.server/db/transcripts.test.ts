import type BetterSqlite3 from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from './connection';
import { DbClient } from './client';
import { TranscriptRepository } from './transcripts';
import { CustodyEntryRepository } from './custody-entries';
import { HashPublicationRepository } from './hash-publications';
import { StorageError, ValidationError } from '~/.server/errors';
import type { Transcript } from '~/types/transcript';
import type { CustodyEntry } from '~/types/custody-entry';

function makeTranscript(overrides: Partial<Transcript> = {}): Transcript {
  return {
    id: 't-1',
    title: 'First chat',
    content: 'hello',
    sourceUrl: null,
    sourcePlatform: 'ChatGPT',
    createdAt: '2025-01-01T10:00:00.000Z',
    importedAt: '2025-01-01T10:00:00.000Z',
    fileHash: '',
    exportFormat: 'plaintext',
    localFilePath: null,
    cloudStoragePath: null,
    offlineBackupPath: null,
    ...overrides,
  };
}

function makeEntry(overrides: Partial<CustodyEntry> = {}): CustodyEntry {
  return {
    id: 'e-1',
    transcriptId: 't-1',
    timestamp: '2025-01-01T10:00:00.000Z',
    action: 'imported',
    details: 'Transcript imported from ChatGPT',
    fileHash: 'abc',
    storageLocation: null,
    verificationStatus: 'verified',
    ...overrides,
  };
}

describe('TranscriptRepository', () => {
  let raw: BetterSqlite3.Database;
  let repo: TranscriptRepository;
  let entries: CustodyEntryRepository;
  let publications: HashPublicationRepository;

  beforeEach(() => {
    raw = openDatabase(':memory:');
    const db = new DbClient(raw);
    repo = new TranscriptRepository(db);
    entries = new CustodyEntryRepository(db);
    publications = new HashPublicationRepository(db);
  });

  afterEach(() => {
    raw.close();
  });

  it('round-trips a transcript', () => {
    const transcript = makeTranscript({ sourceUrl: 'https://example.com/chat/1', exportFormat: 'markdown' });
    repo.insert(transcript);

    expect(repo.getById('t-1')).toEqual(transcript);
    expect(repo.getById('missing')).toBeNull();
  });

  it('lists newest import first by default', () => {
    repo.insert(makeTranscript({ id: 'a', title: 'Beta', importedAt: '2025-01-01T00:00:00.000Z' }));
    repo.insert(makeTranscript({ id: 'b', title: 'Alpha', importedAt: '2025-03-01T00:00:00.000Z' }));
    repo.insert(makeTranscript({ id: 'c', title: 'Gamma', importedAt: '2025-02-01T00:00:00.000Z' }));

    expect(repo.list().map((t) => t.id)).toEqual(['b', 'c', 'a']);
    expect(repo.list({ sortBy: 'title', order: 'asc' }).map((t) => t.title)).toEqual(['Alpha', 'Beta', 'Gamma']);
    expect(repo.list({ sortBy: 'importedAt', order: 'asc' }).map((t) => t.id)).toEqual(['a', 'c', 'b']);
  });

  it('updates only the given file state fields', () => {
    repo.insert(makeTranscript({ localFilePath: '/data/a.txt' }));

    repo.updateFileState('t-1', { fileHash: 'f00d', cloudStoragePath: '/mirror/a.txt' });

    const updated = repo.getById('t-1');
    expect(updated?.fileHash).toBe('f00d');
    expect(updated?.cloudStoragePath).toBe('/mirror/a.txt');
    expect(updated?.localFilePath).toBe('/data/a.txt');
    expect(updated?.offlineBackupPath).toBeNull();
  });

  it('deletes custody entries and publications with the transcript', () => {
    repo.insert(makeTranscript());
    repo.insert(makeTranscript({ id: 't-2' }));
    entries.insert(makeEntry());
    entries.insert(makeEntry({ id: 'e-2', action: 'hashed' }));
    entries.insert(makeEntry({ id: 'e-3', transcriptId: 't-2' }));
    publications.insert({
      id: 'p-1',
      transcriptId: 't-1',
      service: 'custom-webhook',
      publishedAt: '2025-01-01T11:00:00.000Z',
      publicUrl: 'https://hooks.example.com/in',
      transactionId: null,
      confirmationStatus: 'confirmed',
      errorMessage: null,
    });

    expect(repo.delete('t-1')).toBe(true);

    expect(repo.getById('t-1')).toBeNull();
    expect(entries.listForTranscript('t-1')).toEqual([]);
    expect(publications.listForTranscript('t-1')).toEqual([]);
    expect(entries.listForTranscript('t-2')).toHaveLength(1);
  });

  it('reports false when deleting an unknown id', () => {
    expect(repo.delete('missing')).toBe(false);
  });

  it('raises StorageError when deleting on a closed connection', () => {
    const closed = openDatabase(':memory:');
    closed.close();
    const closedRepo = new TranscriptRepository(new DbClient(closed));

    expect(() => closedRepo.delete('t-1')).toThrow(StorageError);
  });

  it('rolls back and rethrows errors raised inside a transaction unchanged', () => {
    const db = new DbClient(raw);

    expect(() =>
      db.transaction(() => {
        repo.insert(makeTranscript());
        throw new ValidationError('stop');
      })
    ).toThrow(ValidationError);
    expect(repo.getById('t-1')).toBeNull();
  });
});
