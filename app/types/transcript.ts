/**
 * Transcript - a preserved AI chat transcript
 *
 * The saved file at `localFilePath` is the evidence; `fileHash` is the SHA-256
 * of that file, empty until the first hash computation.
 */

import type { CustodyEntry } from './custody-entry';
import type { HashPublication } from './hash-publication';

export const EXPORT_FORMATS = ['plaintext', 'pdf', 'markdown'] as const;

/**
 * On-disk format. Only changes the file extension: pdf is written as plain text.
 */
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface Transcript {
  id: string;
  title: string;
  content: string;
  sourceUrl: string | null;

  /** Free text, e.g. "ChatGPT" or "Claude" */
  sourcePlatform: string;

  /** ISO 8601 timestamps */
  createdAt: string;
  importedAt: string;

  /** Lowercase hex SHA-256 of the saved file, '' before hashing */
  fileHash: string;

  exportFormat: ExportFormat;
  localFilePath: string | null;
  cloudStoragePath: string | null;
  offlineBackupPath: string | null;
}

/**
 * Transcript with its owned publications and custody history, both in
 * insertion order.
 */
export interface TranscriptDetail extends Transcript {
  publications: HashPublication[];
  custodyEntries: CustodyEntry[];
}

export type TranscriptSortKey = 'importedAt' | 'createdAt' | 'title';

export interface ListTranscriptsOptions {
  sortBy?: TranscriptSortKey;
  order?: 'asc' | 'desc';
}
