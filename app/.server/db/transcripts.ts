/**
 * Transcript records
 *
 * Deleting a transcript removes its custody entries and publications in the
 * same transaction.
 */

import type { DbClient } from './client';
import { parseEnumColumn } from './row-utils';
import type { ListTranscriptsOptions, Transcript, TranscriptSortKey } from '~/types/transcript';
import { EXPORT_FORMATS } from '~/types/transcript';
import { getLogger } from '~/.server/log/logger';

const log = getLogger({ module: 'DBTranscripts' });

/**
 * Transcript row (snake_case - matches SQLite schema exactly)
 */
export interface TranscriptRow {
  id: string;
  title: string;
  content: string;
  source_url: string | null;
  source_platform: string;
  created_at: string;
  imported_at: string;
  file_hash: string;
  export_format: string;
  local_file_path: string | null;
  cloud_storage_path: string | null;
  offline_backup_path: string | null;
}

export function rowToTranscript(row: TranscriptRow): Transcript {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    sourceUrl: row.source_url,
    sourcePlatform: row.source_platform,
    createdAt: row.created_at,
    importedAt: row.imported_at,
    fileHash: row.file_hash,
    exportFormat: parseEnumColumn(row.export_format, EXPORT_FORMATS, 'transcripts.export_format'),
    localFilePath: row.local_file_path,
    cloudStoragePath: row.cloud_storage_path,
    offlineBackupPath: row.offline_backup_path,
  };
}

const SORT_COLUMNS: Record<TranscriptSortKey, string> = {
  importedAt: 'imported_at',
  createdAt: 'created_at',
  title: 'title',
};

/**
 * Hash and file locations, the only mutable parts of a transcript
 */
export type TranscriptFileState = Partial<
  Pick<Transcript, 'fileHash' | 'localFilePath' | 'cloudStoragePath' | 'offlineBackupPath'>
>;

const FILE_STATE_KEYS = ['fileHash', 'localFilePath', 'cloudStoragePath', 'offlineBackupPath'] as const;

const FILE_STATE_COLUMNS: Record<(typeof FILE_STATE_KEYS)[number], string> = {
  fileHash: 'file_hash',
  localFilePath: 'local_file_path',
  cloudStoragePath: 'cloud_storage_path',
  offlineBackupPath: 'offline_backup_path',
};

export class TranscriptRepository {
  constructor(private readonly db: DbClient) {}

  insert(transcript: Transcript): void {
    this.db.run(
      `
        INSERT INTO transcripts (
          id, title, content, source_url, source_platform,
          created_at, imported_at, file_hash, export_format,
          local_file_path, cloud_storage_path, offline_backup_path
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        transcript.id,
        transcript.title,
        transcript.content,
        transcript.sourceUrl,
        transcript.sourcePlatform,
        transcript.createdAt,
        transcript.importedAt,
        transcript.fileHash,
        transcript.exportFormat,
        transcript.localFilePath,
        transcript.cloudStoragePath,
        transcript.offlineBackupPath,
      ]
    );
  }

  getById(id: string): Transcript | null {
    const row = this.db.selectOne<TranscriptRow>('SELECT * FROM transcripts WHERE id = ?', [id]);
    return row ? rowToTranscript(row) : null;
  }

  /**
   * List transcripts, newest import first by default
   */
  list(options: ListTranscriptsOptions = {}): Transcript[] {
    const column = SORT_COLUMNS[options.sortBy ?? 'importedAt'];
    const direction = (options.order ?? 'desc') === 'asc' ? 'ASC' : 'DESC';

    const rows = this.db.select<TranscriptRow>(
      `SELECT * FROM transcripts ORDER BY ${column} ${direction}, rowid ${direction}`
    );
    return rows.map(rowToTranscript);
  }

  updateFileState(id: string, state: TranscriptFileState): void {
    const assignments: string[] = [];
    const params: (string | null)[] = [];

    for (const key of FILE_STATE_KEYS) {
      const value = state[key];
      if (value !== undefined) {
        assignments.push(`${FILE_STATE_COLUMNS[key]} = ?`);
        params.push(value);
      }
    }

    if (assignments.length === 0) return;

    this.db.run(`UPDATE transcripts SET ${assignments.join(', ')} WHERE id = ?`, [...params, id]);
  }

  /**
   * Delete a transcript with its custody entries and publications.
   * Returns false when no transcript had this id.
   */
  delete(id: string): boolean {
    return this.db.transaction(() => {
      const entries = this.db.run('DELETE FROM custody_entries WHERE transcript_id = ?', [id]);
      const publications = this.db.run('DELETE FROM hash_publications WHERE transcript_id = ?', [id]);
      const result = this.db.run('DELETE FROM transcripts WHERE id = ?', [id]);

      log.debug(
        { id, custodyEntries: entries.changes, publications: publications.changes },
        'deleted transcript dependents'
      );

      return result.changes > 0;
    });
  }
}
