// Hash publication records
import type { DbClient } from './client';
import { parseEnumColumn } from './row-utils';
import type { HashPublication } from '~/types/hash-publication';
import { CONFIRMATION_STATUSES, PUBLICATION_SERVICES } from '~/types/hash-publication';

export interface HashPublicationRow {
  seq: number;
  id: string;
  transcript_id: string;
  service: string;
  published_at: string;
  public_url: string | null;
  transaction_id: string | null;
  confirmation_status: string;
  error_message: string | null;
}

export function rowToHashPublication(row: HashPublicationRow): HashPublication {
  return {
    id: row.id,
    transcriptId: row.transcript_id,
    service: parseEnumColumn(row.service, PUBLICATION_SERVICES, 'hash_publications.service'),
    publishedAt: row.published_at,
    publicUrl: row.public_url,
    transactionId: row.transaction_id,
    confirmationStatus: parseEnumColumn(
      row.confirmation_status,
      CONFIRMATION_STATUSES,
      'hash_publications.confirmation_status'
    ),
    errorMessage: row.error_message,
  };
}

export class HashPublicationRepository {
  constructor(private readonly db: DbClient) {}

  insert(publication: HashPublication): void {
    this.db.run(
      `
        INSERT INTO hash_publications (
          id, transcript_id, service, published_at, public_url,
          transaction_id, confirmation_status, error_message
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        publication.id,
        publication.transcriptId,
        publication.service,
        publication.publishedAt,
        publication.publicUrl,
        publication.transactionId,
        publication.confirmationStatus,
        publication.errorMessage,
      ]
    );
  }

  /**
   * Publications for one transcript in the order they were made
   */
  listForTranscript(transcriptId: string): HashPublication[] {
    const rows = this.db.select<HashPublicationRow>(
      'SELECT * FROM hash_publications WHERE transcript_id = ? ORDER BY seq ASC',
      [transcriptId]
    );
    return rows.map(rowToHashPublication);
  }
}
