/**
 * Transcript files on disk
 *
 * One file per transcript named `<sanitizedTitle>_<id>.<ext>`. Writes go to a
 * temp file in the target directory and are renamed into place, so a reader
 * never sees a partially written transcript.
 */
import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import type { ExportFormat, Transcript } from '~/types/transcript';
import type { StorageLocation } from '~/types/storage-location';
import { IOError } from '~/.server/errors';
import { getLogger } from '~/.server/log/logger';

const log = getLogger({ module: 'TranscriptFiles' });

const INVALID_FILENAME_CHARS = /[:/\\?%*|"<>]/g;

const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  plaintext: 'txt',
  pdf: 'pdf',
  markdown: 'md',
};

export function sanitizeFileName(name: string): string {
  return name.replace(INVALID_FILENAME_CHARS, '_');
}

export function fileExtension(format: ExportFormat): string {
  return FILE_EXTENSIONS[format];
}

export function transcriptFileName(transcript: Pick<Transcript, 'id' | 'title'>, format: ExportFormat): string {
  return `${sanitizeFileName(transcript.title)}_${transcript.id}.${fileExtension(format)}`;
}

/**
 * Write the transcript content as UTF-8 into `directory` and return the file path.
 * pdf is written as plain text.
 */
export async function saveTranscriptFile(
  transcript: Pick<Transcript, 'id' | 'title' | 'content'>,
  directory: string,
  format: ExportFormat
): Promise<string> {
  try {
    await fs.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new IOError(`Cannot create directory ${directory}`, { cause: error });
  }

  const filePath = path.join(directory, transcriptFileName(transcript, format));
  await writeFileAtomic(filePath, transcript.content);

  log.info({ id: transcript.id, filePath, format }, 'saved transcript file');
  return filePath;
}

/**
 * Write via temp file + rename; strings are written as UTF-8
 */
export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`
  );

  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new IOError(`Cannot write file ${filePath}`, { cause: error });
  }
}

/**
 * Copy `sourcePath` into a storage location, replacing any existing copy
 */
export async function copyToLocation(sourcePath: string, location: Pick<StorageLocation, 'path'>): Promise<string> {
  const destination = path.join(location.path, path.basename(sourcePath));

  try {
    await fs.mkdir(location.path, { recursive: true });
    await fs.copyFile(sourcePath, destination);
  } catch (error) {
    throw new IOError(`Cannot copy ${sourcePath} to ${location.path}`, { cause: error });
  }

  return destination;
}
