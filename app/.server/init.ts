/**
 * Application Initialization
 *
 * Opens and migrates the database, then applies settings that affect the
 * running process. Called from server.ts before the HTTP listener starts.
 */

import { ensureDatabaseReady, closeDbClient } from "~/.server/db/client";
import { loadSettings } from "~/.server/config/storage";
import { setTranscriptManager } from "~/.server/transcripts";
import { getLogger, setLogLevel } from "~/.server/log/logger";

const log = getLogger({ module: "AppInit" });

/**
 * A database that cannot be opened or migrated is fatal: the error propagates.
 */
export async function initializeApp(): Promise<void> {
  log.info({}, "initializing database");
  ensureDatabaseReady();
  log.info({}, "database ready");

  const settings = await loadSettings();
  setLogLevel(settings.preferences.logLevel);
  log.info({ level: settings.preferences.logLevel }, "log level applied from settings");
}

export function shutdownApp(): void {
  log.debug({}, "shutting down application services");
  setTranscriptManager(null);
  closeDbClient();
  log.debug({}, "application shutdown complete");
}
