import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type BetterSqlite3 from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ChainOfCustodyService } from './chain-of-custody';
import { openDatabase } from '~/.server/db/connection';
import { DbClient } from '~/.server/db/client';
import { CustodyEntryRepository } from '~/.server/db/custody-entries';
import { HashPublicationRepository } from '~/.server/db/hash-publications';
import { TranscriptRepository } from '~/.server/db/transcripts';
import { sha256Hex } from '~/.server/crypto/hash';
import { IOError } from '~/.server/errors';
import type { Transcript } from '~/types/transcript';

const CONTENT = 'User: hi\nAssistant: hello';

describe('ChainOfCustodyService', () => {
  let raw: BetterSqlite3.Database;
  let dir: string;
  let filePath: string;
  let transcript: Transcript;
  let service: ChainOfCustodyService;
  let publications: HashPublicationRepository;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'keeper-custody-'));
    filePath = path.join(dir, 'chat.txt');
    await fs.writeFile(filePath, CONTENT);

    raw = openDatabase(':memory:');
    const db = new DbClient(raw);
    transcript = {
      id: 't-1',
      title: 'Chat',
      content: CONTENT,
      sourceUrl: null,
      sourcePlatform: 'Claude',
      createdAt: '2025-01-01T00:00:00.000Z',
      importedAt: '2025-01-01T00:00:00.000Z',
      fileHash: sha256Hex(CONTENT),
      exportFormat: 'plaintext',
      localFilePath: filePath,
      cloudStoragePath: null,
      offlineBackupPath: null,
    };
    new TranscriptRepository(db).insert(transcript);

    publications = new HashPublicationRepository(db);
    service = new ChainOfCustodyService(new CustodyEntryRepository(db), publications, {
      now: () => new Date('2025-06-01T08:00:00.000Z'),
    });
  });

  afterEach(async () => {
    raw.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends entries with the given status and a fresh id', () => {
    const first = service.append({
      transcriptId: 't-1',
      action: 'imported',
      details: 'Transcript imported from Claude',
      fileHash: transcript.fileHash,
      storageLocation: filePath,
      verificationStatus: 'verified',
    });
    const second = service.append({
      transcriptId: 't-1',
      action: 'hashed',
      details: 'SHA-256 hash computed',
      fileHash: transcript.fileHash,
      verificationStatus: 'verified',
    });

    expect(first.timestamp).toBe('2025-06-01T08:00:00.000Z');
    expect(second.storageLocation).toBeNull();
    expect(first.id).not.toBe(second.id);
    expect(service.listFor('t-1')).toEqual([first, second]);
  });

  it('records a match as verified', async () => {
    const result = await service.verifyIntegrity(transcript, filePath);

    expect(result).toEqual({
      isValid: true,
      storedHash: transcript.fileHash,
      computedHash: transcript.fileHash,
      verifiedAt: '2025-06-01T08:00:00.000Z',
    });

    const entries = service.listFor('t-1');
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      action: 'verified',
      details: 'File integrity verified - hash matches',
      fileHash: transcript.fileHash,
      storageLocation: filePath,
      verificationStatus: 'verified',
    });
  });

  it('records a mismatch after the file is edited without touching earlier entries', async () => {
    await service.verifyIntegrity(transcript, filePath);
    await fs.writeFile(filePath, `${CONTENT}!`);

    const result = await service.verifyIntegrity(transcript, filePath);

    expect(result.isValid).toBe(false);
    expect(result.computedHash).toBe(sha256Hex(`${CONTENT}!`));

    const entries = service.listFor('t-1');
    expect(entries.map((e) => e.action)).toEqual(['verified', 'modified']);
    expect(entries[0].verificationStatus).toBe('verified');
    expect(entries[1]).toMatchObject({
      details: 'ALERT: File integrity compromised - hash mismatch',
      fileHash: sha256Hex(`${CONTENT}!`),
      verificationStatus: 'verified',
    });
  });

  it('compares hashes case-insensitively', async () => {
    const result = await service.verifyIntegrity(
      { ...transcript, fileHash: transcript.fileHash.toUpperCase() },
      filePath
    );

    expect(result.isValid).toBe(true);
  });

  it('appends nothing when the file cannot be read', async () => {
    await expect(service.verifyIntegrity(transcript, path.join(dir, 'gone.txt')))
      .rejects.toBeInstanceOf(IOError);

    expect(service.listFor('t-1')).toEqual([]);
  });

  it('builds the report from stored entries and publications', () => {
    service.append({
      transcriptId: 't-1',
      action: 'imported',
      details: 'Transcript imported from Claude',
      fileHash: transcript.fileHash,
      verificationStatus: 'verified',
    });
    publications.insert({
      id: 'p-1',
      transcriptId: 't-1',
      service: 'custom-webhook',
      publishedAt: '2025-06-01T08:00:00.000Z',
      publicUrl: 'https://hooks.example.com/in',
      transactionId: null,
      confirmationStatus: 'confirmed',
      errorMessage: null,
    });

    const report = service.buildReport(transcript);

    expect(report).toContain('[1] Imported\nTimestamp: Jun 1, 2025, 8:00:00 AM\n');
    expect(report).toContain('[1] Custom Webhook\nPublished: Jun 1, 2025, 8:00:00 AM\nStatus: confirmed\nURL: https://hooks.example.com/in\n');
    expect(report.endsWith('Generated: Jun 1, 2025, 8:00:00 AM\n' + '═'.repeat(59))).toBe(true);
  });
});
