/**
 * Chain of custody entries
 *
 * Insert and read only: a trigger rejects UPDATE on this table, and rows go
 * away only with their transcript.
 */

import type { DbClient } from './client';
import { parseEnumColumn } from './row-utils';
import type { CustodyEntry } from '~/types/custody-entry';
import { CUSTODY_ACTIONS, VERIFICATION_STATUSES } from '~/types/custody-entry';

export interface CustodyEntryRow {
  seq: number;
  id: string;
  transcript_id: string;
  timestamp: string;
  action: string;
  details: string;
  file_hash: string;
  storage_location: string | null;
  verification_status: string;
}

export function rowToCustodyEntry(row: CustodyEntryRow): CustodyEntry {
  return {
    id: row.id,
    transcriptId: row.transcript_id,
    timestamp: row.timestamp,
    action: parseEnumColumn(row.action, CUSTODY_ACTIONS, 'custody_entries.action'),
    details: row.details,
    fileHash: row.file_hash,
    storageLocation: row.storage_location,
    verificationStatus: parseEnumColumn(
      row.verification_status,
      VERIFICATION_STATUSES,
      'custody_entries.verification_status'
    ),
  };
}

export class CustodyEntryRepository {
  constructor(private readonly db: DbClient) {}

  insert(entry: CustodyEntry): void {
    this.db.run(
      `
        INSERT INTO custody_entries (
          id, transcript_id, timestamp, action, details,
          file_hash, storage_location, verification_status
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        entry.id,
        entry.transcriptId,
        entry.timestamp,
        entry.action,
        entry.details,
        entry.fileHash,
        entry.storageLocation,
        entry.verificationStatus,
      ]
    );
  }

  /**
   * Entries for one transcript, oldest first; equal timestamps keep insertion order
   */
  listForTranscript(transcriptId: string): CustodyEntry[] {
    const rows = this.db.select<CustodyEntryRow>(
      `
        SELECT * FROM custody_entries
        WHERE transcript_id = ?
        ORDER BY timestamp ASC, seq ASC
      `,
      [transcriptId]
    );
    return rows.map(rowToCustodyEntry);
  }
}
