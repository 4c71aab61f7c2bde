/**
 * Chain of Custody Service
 *
 * Records what happened to each transcript as an append-only list of entries
 * and re-checks saved files against their recorded hash.
 *
 * Verification never edits earlier entries: each check appends one new
 * entry, `verified` when the hash matches and `modified` when it does not.
 */

import { randomUUID } from 'crypto';
import type {
  AppendCustodyEntryInput,
  CustodyEntry,
  VerificationResult,
} from '~/types/custody-entry';
import type { HashPublication } from '~/types/hash-publication';
import type { Transcript } from '~/types/transcript';
import { hashFile, verifyHash } from '~/.server/crypto/hash';
import { getLogger } from '~/.server/log/logger';
import { renderCustodyReport } from './report';

const log = getLogger({ module: 'ChainOfCustody' });

// ─── Storage Interfaces ───────────────────────────────────────────────────────

export interface CustodyEntryStore {
  insert(entry: CustodyEntry): void;
  listForTranscript(transcriptId: string): CustodyEntry[];
}

export interface PublicationReader {
  listForTranscript(transcriptId: string): HashPublication[];
}

export interface ChainOfCustodyOptions {
  now?: () => Date;
}

// ─── Service ──────────────────────────────────────────────────────────────────

export class ChainOfCustodyService {
  private readonly now: () => Date;

  constructor(
    private readonly entries: CustodyEntryStore,
    private readonly publications: PublicationReader,
    options: ChainOfCustodyOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create and persist one immutable entry
   */
  append(input: AppendCustodyEntryInput): CustodyEntry {
    const entry: CustodyEntry = {
      id: randomUUID(),
      transcriptId: input.transcriptId,
      timestamp: this.now().toISOString(),
      action: input.action,
      details: input.details,
      fileHash: input.fileHash,
      storageLocation: input.storageLocation ?? null,
      verificationStatus: input.verificationStatus,
    };

    this.entries.insert(entry);
    log.debug({ transcriptId: entry.transcriptId, action: entry.action }, 'custody entry appended');

    return entry;
  }

  /**
   * Entries for a transcript, oldest first
   */
  listFor(transcriptId: string): CustodyEntry[] {
    return this.entries.listForTranscript(transcriptId);
  }

  buildReport(
    transcript: Pick<Transcript, 'id' | 'title' | 'sourcePlatform' | 'createdAt' | 'fileHash'>,
    generatedAt: Date = this.now()
  ): string {
    return renderCustodyReport(
      transcript,
      this.entries.listForTranscript(transcript.id),
      this.publications.listForTranscript(transcript.id),
      generatedAt
    );
  }

  /**
   * Re-hash the file at `currentFilePath` and compare with the transcript's stored hash.
   * An unreadable file throws IOError and appends nothing.
   */
  async verifyIntegrity(
    transcript: Pick<Transcript, 'id' | 'fileHash'>,
    currentFilePath: string
  ): Promise<VerificationResult> {
    const computedHash = await hashFile(currentFilePath);
    const storedHash = transcript.fileHash;
    const isValid = verifyHash(computedHash, storedHash);

    this.append({
      transcriptId: transcript.id,
      action: isValid ? 'verified' : 'modified',
      details: isValid
        ? 'File integrity verified - hash matches'
        : 'ALERT: File integrity compromised - hash mismatch',
      fileHash: computedHash,
      storageLocation: currentFilePath,
      verificationStatus: 'verified',
    });

    if (!isValid) {
      log.warn({ transcriptId: transcript.id, storedHash, computedHash }, 'transcript file hash mismatch');
    }

    return {
      isValid,
      storedHash,
      computedHash,
      verifiedAt: this.now().toISOString(),
    };
  }
}
