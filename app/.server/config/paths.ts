// Filesystem layout, resolved from the environment at call time
import path from 'path';

/**
 * Data root (respects KEEPER_DATA_DIR)
 */
export function getDataRoot(): string {
  return process.env.KEEPER_DATA_DIR || path.join(process.cwd(), 'data');
}

/**
 * Application-owned directory holding the database
 */
export function getAppDir(): string {
  return path.join(getDataRoot(), 'app', 'transcript-keeper');
}

/**
 * Primary directory for saved transcript files
 */
export function getTranscriptsDir(): string {
  return path.join(getDataRoot(), 'transcripts');
}

export function getDatabasePath(): string {
  return path.join(getAppDir(), 'database.sqlite');
}
