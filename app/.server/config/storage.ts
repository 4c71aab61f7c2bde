// Settings persistence using SQLite (key-value), with environment fallbacks
import type { UserSettings, SettingsUpdate } from './settings';
import { DEFAULT_SETTINGS } from './settings';
import type { DbClient } from '~/.server/db/client';
import { getDbClient } from '~/.server/db/client';
import { deleteSettingValue, getSettingValue, setSettingValue } from '~/.server/db/settings';
import { EXPORT_FORMATS } from '~/types/transcript';
import { getLogger, isLogLevel } from '~/.server/log/logger';

const log = getLogger({ module: 'SettingsStorage' });

function pickSetting(
  dbValue: string | null,
  envValue?: string,
  fallback?: string
): string | undefined {
  if (dbValue !== null) return dbValue;
  if (envValue) return envValue;
  return fallback;
}

function writeOptional(db: DbClient, key: string, value: string | undefined): void {
  if (value === undefined || value === '') {
    deleteSettingValue(db, key);
  } else {
    setSettingValue(db, key, value);
  }
}

/**
 * Load user settings; stored values win over environment variables
 */
export async function loadSettings(db: DbClient = getDbClient()): Promise<UserSettings> {
  const format = getSettingValue(db, 'preferences_default_export_format');
  const level = getSettingValue(db, 'preferences_log_level') ?? process.env.LOG_LEVEL;

  return {
    preferences: {
      defaultExportFormat: EXPORT_FORMATS.find((f) => f === format) ?? DEFAULT_SETTINGS.preferences.defaultExportFormat,
      logLevel: isLogLevel(level) ? level : DEFAULT_SETTINGS.preferences.logLevel,
    },
    publishing: {
      githubToken: pickSetting(getSettingValue(db, 'publishing_github_token'), process.env.GITHUB_TOKEN),
      webhookUrl: pickSetting(getSettingValue(db, 'publishing_webhook_url'), process.env.KEEPER_WEBHOOK_URL),
    },
    storage: {
      mirrorPath: pickSetting(getSettingValue(db, 'storage_mirror_path'), process.env.KEEPER_MIRROR_DIR),
    },
  };
}

/**
 * Save user settings to database
 */
export async function saveSettings(settings: UserSettings, db: DbClient = getDbClient()): Promise<void> {
  db.transaction(() => {
    setSettingValue(db, 'preferences_default_export_format', settings.preferences.defaultExportFormat);
    setSettingValue(db, 'preferences_log_level', settings.preferences.logLevel);
    writeOptional(db, 'publishing_github_token', settings.publishing.githubToken);
    writeOptional(db, 'publishing_webhook_url', settings.publishing.webhookUrl);
    writeOptional(db, 'storage_mirror_path', settings.storage.mirrorPath);
  });
  log.info({}, 'settings saved');
}

/**
 * Update partial settings (merge with existing)
 */
export async function updateSettings(
  updates: SettingsUpdate,
  db: DbClient = getDbClient()
): Promise<UserSettings> {
  const current = await loadSettings(db);

  // An empty string is kept here so saveSettings clears the stored value
  const updated: UserSettings = {
    preferences: {
      defaultExportFormat: updates.preferences?.defaultExportFormat ?? current.preferences.defaultExportFormat,
      logLevel: updates.preferences?.logLevel ?? current.preferences.logLevel,
    },
    publishing: {
      githubToken: updates.publishing?.githubToken ?? current.publishing.githubToken,
      webhookUrl: updates.publishing?.webhookUrl ?? current.publishing.webhookUrl,
    },
    storage: {
      mirrorPath: updates.storage?.mirrorPath ?? current.storage.mirrorPath,
    },
  };

  await saveSettings(updated, db);
  return loadSettings(db);
}
