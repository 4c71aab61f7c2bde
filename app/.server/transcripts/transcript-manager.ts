/**
 * Transcript Manager
 *
 * Coordinates the record store, the chain of custody and the publication
 * client. Every mutation runs through one serial queue, so two imports or a
 * verify racing a backup never interleave their writes.
 */

import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import { z } from 'zod';
import type {
  ExportFormat,
  ListTranscriptsOptions,
  Transcript,
  TranscriptDetail,
} from '~/types/transcript';
import { EXPORT_FORMATS } from '~/types/transcript';
import type { VerificationResult } from '~/types/custody-entry';
import type { HashPublication, PublicationCredentials } from '~/types/hash-publication';
import { PUBLICATION_SERVICE_LABELS } from '~/types/hash-publication';
import type { DbClient } from '~/.server/db/client';
import { TranscriptRepository } from '~/.server/db/transcripts';
import { CustodyEntryRepository } from '~/.server/db/custody-entries';
import { HashPublicationRepository } from '~/.server/db/hash-publications';
import { StorageLocationRepository } from '~/.server/db/storage-locations';
import { ChainOfCustodyService } from '~/.server/custody/chain-of-custody';
import { PublicationClient } from '~/.server/publish/publication-client';
import { hashFile } from '~/.server/crypto/hash';
import { copyToLocation, saveTranscriptFile } from '~/.server/fs/transcript-files';
import { NotFoundError, ValidationError } from '~/.server/errors';
import { getLogger } from '~/.server/log/logger';

const log = getLogger({ module: 'TranscriptManager' });

export const ImportTranscriptSchema = z.object({
  title: z.string().trim().min(1, 'Title is required'),
  content: z.string(),
  sourcePlatform: z.string().trim().min(1, 'Source platform is required'),
  sourceUrl: z.string().url().optional(),
  exportFormat: z.enum(EXPORT_FORMATS).optional(),
});

export type ImportTranscriptInput = z.input<typeof ImportTranscriptSchema>;

export interface CreateTranscriptInput {
  title: string;
  content: string;
  sourcePlatform: string;
  sourceUrl?: string | null;
  exportFormat: ExportFormat;
}

/**
 * A new, unsaved transcript: fresh id, both timestamps now, no hash yet
 */
export function createTranscript(input: CreateTranscriptInput, now: Date = new Date()): Transcript {
  const timestamp = now.toISOString();
  return {
    id: randomUUID(),
    title: input.title,
    content: input.content,
    sourceUrl: input.sourceUrl ?? null,
    sourcePlatform: input.sourcePlatform,
    createdAt: timestamp,
    importedAt: timestamp,
    fileHash: '',
    exportFormat: input.exportFormat,
    localFilePath: null,
    cloudStoragePath: null,
    offlineBackupPath: null,
  };
}

export interface TranscriptManagerOptions {
  db: DbClient;
  transcriptsDir: string;
  /** Resolved on each backup so a changed setting takes effect */
  getMirrorDir?: () => Promise<string | undefined>;
  getDefaultExportFormat?: () => Promise<ExportFormat>;
  publisher?: PublicationClient;
  now?: () => Date;
}

export class TranscriptManager {
  private readonly db: DbClient;
  private readonly transcripts: TranscriptRepository;
  private readonly publications: HashPublicationRepository;
  private readonly locations: StorageLocationRepository;
  private readonly custody: ChainOfCustodyService;
  private readonly publisher: PublicationClient;
  private readonly transcriptsDir: string;
  private readonly getMirrorDir: () => Promise<string | undefined>;
  private readonly getDefaultExportFormat: () => Promise<ExportFormat>;
  private readonly now: () => Date;

  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: TranscriptManagerOptions) {
    this.db = options.db;
    this.now = options.now ?? (() => new Date());
    this.transcripts = new TranscriptRepository(options.db);
    this.publications = new HashPublicationRepository(options.db);
    this.locations = new StorageLocationRepository(options.db);
    this.custody = new ChainOfCustodyService(
      new CustodyEntryRepository(options.db),
      this.publications,
      { now: this.now }
    );
    this.publisher = options.publisher ?? new PublicationClient({ now: this.now });
    this.transcriptsDir = options.transcriptsDir;
    this.getMirrorDir = options.getMirrorDir ?? (async () => undefined);
    this.getDefaultExportFormat = options.getDefaultExportFormat ?? (async (): Promise<ExportFormat> => 'plaintext');
  }

  /**
   * Run `task` after every previously queued task has settled
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch((error: unknown) => {
      log.debug({ err: error }, 'queued task failed');
    });
    return run;
  }

  private require(id: string): Transcript {
    const transcript = this.transcripts.getById(id);
    if (!transcript) {
      throw new NotFoundError(`Transcript not found: ${id}`);
    }
    return transcript;
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  listTranscripts(options: ListTranscriptsOptions = {}): Transcript[] {
    return this.transcripts.list(options);
  }

  getTranscript(id: string): TranscriptDetail {
    const transcript = this.require(id);
    return {
      ...transcript,
      publications: this.publications.listForTranscript(id),
      custodyEntries: this.custody.listFor(id),
    };
  }

  buildReport(id: string): string {
    return this.custody.buildReport(this.require(id));
  }

  // ─── Mutations ──────────────────────────────────────────────────────────────

  /**
   * Save, hash and record a new transcript with its `imported` and `hashed` entries.
   * If hashing or recording fails the saved file is removed again.
   */
  importTranscript(input: ImportTranscriptInput): Promise<Transcript> {
    return this.enqueue(async () => {
      const parsed = ImportTranscriptSchema.parse(input);
      const exportFormat = parsed.exportFormat ?? (await this.getDefaultExportFormat());
      const draft = createTranscript(
        {
          title: parsed.title,
          content: parsed.content,
          sourcePlatform: parsed.sourcePlatform,
          sourceUrl: parsed.sourceUrl,
          exportFormat,
        },
        this.now()
      );

      const filePath = await saveTranscriptFile(draft, this.transcriptsDir, draft.exportFormat);
      try {
        return await this.recordImport(draft, filePath);
      } catch (error) {
        await fs.rm(filePath, { force: true }).catch((cleanupError: unknown) => {
          log.warn({ filePath, err: cleanupError }, 'could not remove file of failed import');
        });
        throw error;
      }
    });
  }

  private async recordImport(draft: Transcript, filePath: string): Promise<Transcript> {
    const fileHash = await hashFile(filePath);
    const transcript: Transcript = { ...draft, fileHash, localFilePath: filePath };

    this.db.transaction(() => {
      this.transcripts.insert(transcript);
      this.custody.append({
        transcriptId: transcript.id,
        action: 'imported',
        details: `Transcript imported from ${transcript.sourcePlatform}`,
        fileHash,
        storageLocation: filePath,
        verificationStatus: 'verified',
      });
      this.custody.append({
        transcriptId: transcript.id,
        action: 'hashed',
        details: 'SHA-256 hash computed',
        fileHash,
        verificationStatus: 'verified',
      });
    });

    log.info({ id: transcript.id, filePath, fileHash }, 'transcript imported');
    return transcript;
  }

  /**
   * Write a copy into `directory` in the transcript's own format
   */
  exportTranscript(id: string, directory: string): Promise<string> {
    return this.enqueue(async () => {
      const transcript = this.require(id);
      const filePath = await saveTranscriptFile(transcript, directory, transcript.exportFormat);

      this.custody.append({
        transcriptId: id,
        action: 'exported',
        details: `Exported to ${filePath}`,
        fileHash: transcript.fileHash,
        storageLocation: filePath,
        verificationStatus: 'verified',
      });

      return filePath;
    });
  }

  backupToMirror(id: string): Promise<string> {
    return this.enqueue(async () => {
      const transcript = this.require(id);
      const mirrorDir = await this.getMirrorDir();
      if (!mirrorDir) {
        throw new ValidationError('Mirror directory is not configured');
      }

      const filePath = await saveTranscriptFile(transcript, mirrorDir, transcript.exportFormat);

      this.db.transaction(() => {
        this.transcripts.updateFileState(id, { cloudStoragePath: filePath });
        this.custody.append({
          transcriptId: id,
          action: 'backed-up',
          details: 'Backed up to mirror directory',
          fileHash: transcript.fileHash,
          storageLocation: filePath,
          verificationStatus: 'verified',
        });
      });

      log.info({ id, filePath }, 'transcript mirrored');
      return filePath;
    });
  }

  /**
   * Copy the saved file to every enabled storage location, in order.
   * The first failing location is marked `error` and stops the run.
   */
  backupToStorageLocations(id: string): Promise<string[]> {
    return this.enqueue(async () => {
      const transcript = this.require(id);
      const sourcePath = transcript.localFilePath;
      if (!sourcePath) {
        throw new ValidationError('Transcript has no local file to back up');
      }

      const copies: string[] = [];
      for (const location of this.locations.list({ enabledOnly: true })) {
        this.locations.markSync(location.id, 'syncing');

        let destination: string;
        try {
          destination = await copyToLocation(sourcePath, location);
        } catch (error) {
          this.locations.markSync(location.id, 'error');
          log.error({ id, location: location.name, err: error }, 'backup to storage location failed');
          throw error;
        }

        this.db.transaction(() => {
          this.locations.markSync(location.id, 'synced', this.now().toISOString());
          if (copies.length === 0) {
            this.transcripts.updateFileState(id, { offlineBackupPath: destination });
          }
          this.custody.append({
            transcriptId: id,
            action: 'backed-up',
            details: `Backed up to ${location.name}`,
            fileHash: transcript.fileHash,
            storageLocation: destination,
            verificationStatus: 'verified',
          });
        });
        copies.push(destination);
      }

      log.info({ id, copies: copies.length }, 'transcript backed up to storage locations');
      return copies;
    });
  }

  /**
   * Publish the stored hash; on failure nothing is recorded
   */
  publishHash(id: string, credentials: PublicationCredentials): Promise<HashPublication> {
    return this.enqueue(async () => {
      const transcript = this.require(id);
      const draft = await this.publisher.publish(transcript.fileHash, transcript.title, credentials);
      const publication: HashPublication = { ...draft, transcriptId: id };

      this.db.transaction(() => {
        this.publications.insert(publication);
        this.custody.append({
          transcriptId: id,
          action: 'published',
          details: `Hash published to ${PUBLICATION_SERVICE_LABELS[publication.service]}`,
          fileHash: transcript.fileHash,
          storageLocation: publication.publicUrl,
          verificationStatus: 'verified',
        });
      });

      return publication;
    });
  }

  verifyTranscript(id: string): Promise<VerificationResult> {
    return this.enqueue(async () => {
      const transcript = this.require(id);
      if (!transcript.localFilePath) {
        throw new ValidationError('Transcript has no local file to verify');
      }
      return this.custody.verifyIntegrity(transcript, transcript.localFilePath);
    });
  }

  /**
   * Remove the record with its history and publications; saved files stay on disk
   */
  deleteTranscript(id: string): Promise<void> {
    return this.enqueue(async () => {
      if (!this.transcripts.delete(id)) {
        throw new NotFoundError(`Transcript not found: ${id}`);
      }
      log.info({ id }, 'transcript deleted');
    });
  }
}
