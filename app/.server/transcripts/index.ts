// Process-wide transcript manager over the default database and data directory
import { getDbClient } from '~/.server/db/client';
import { getTranscriptsDir } from '~/.server/config/paths';
import { loadSettings } from '~/.server/config/storage';
import { TranscriptManager } from './transcript-manager';

export { TranscriptManager, ImportTranscriptSchema, createTranscript } from './transcript-manager';
export type { ImportTranscriptInput, TranscriptManagerOptions } from './transcript-manager';

let manager: TranscriptManager | null = null;

export function getTranscriptManager(): TranscriptManager {
  if (!manager) {
    const db = getDbClient();
    manager = new TranscriptManager({
      db,
      transcriptsDir: getTranscriptsDir(),
      getMirrorDir: async () => (await loadSettings(db)).storage.mirrorPath,
      getDefaultExportFormat: async () => (await loadSettings(db)).preferences.defaultExportFormat,
    });
  }
  return manager;
}

/**
 * Replace the shared manager, or drop it so the next call rebuilds it
 */
export function setTranscriptManager(next: TranscriptManager | null): void {
  manager = next;
}
