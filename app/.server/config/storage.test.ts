import type BetterSqlite3 from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadSettings, saveSettings, updateSettings } from './storage';
import { DEFAULT_SETTINGS, redactSettings, SettingsUpdateSchema } from './settings';
import { openDatabase } from '~/.server/db/connection';
import { DbClient } from '~/.server/db/client';
import { getSettingValue } from '~/.server/db/settings';

describe('settings storage', () => {
  let raw: BetterSqlite3.Database;
  let db: DbClient;

  beforeEach(() => {
    raw = openDatabase(':memory:');
    db = new DbClient(raw);
    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('GITHUB_TOKEN', '');
    vi.stubEnv('KEEPER_WEBHOOK_URL', '');
    vi.stubEnv('KEEPER_MIRROR_DIR', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    raw.close();
  });

  it('returns defaults for an empty database', async () => {
    await expect(loadSettings(db)).resolves.toEqual({
      preferences: { defaultExportFormat: 'plaintext', logLevel: 'info' },
      publishing: { githubToken: undefined, webhookUrl: undefined },
      storage: { mirrorPath: undefined },
    });
  });

  it('falls back to environment variables', async () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.stubEnv('GITHUB_TOKEN', 'test-secret');
    vi.stubEnv('KEEPER_MIRROR_DIR', '/mnt/mirror');

    const settings = await loadSettings(db);

    expect(settings.preferences.logLevel).toBe('warn');
    expect(settings.publishing.githubToken).toBe('test-secret');
    expect(settings.storage.mirrorPath).toBe('/mnt/mirror');
  });

  it('prefers stored values over the environment', async () => {
    vi.stubEnv('GITHUB_TOKEN', 'env-token');

    const updated = await updateSettings({ publishing: { githubToken: 'stored-token' } }, db);

    expect(updated.publishing.githubToken).toBe('stored-token');
    expect(getSettingValue(db, 'publishing_github_token')).toBe('stored-token');
  });

  it('merges partial updates', async () => {
    await updateSettings({ preferences: { defaultExportFormat: 'markdown' } }, db);
    const updated = await updateSettings({ storage: { mirrorPath: '/mnt/mirror' } }, db);

    expect(updated.preferences.defaultExportFormat).toBe('markdown');
    expect(updated.storage.mirrorPath).toBe('/mnt/mirror');
  });

  it('clears a stored value with an empty string', async () => {
    await updateSettings({ publishing: { webhookUrl: 'https://hooks.example.com/in' } }, db);

    const updated = await updateSettings({ publishing: { webhookUrl: '' } }, db);

    expect(updated.publishing.webhookUrl).toBeUndefined();
    expect(getSettingValue(db, 'publishing_webhook_url')).toBeNull();
  });

  it('saves a full settings object in one go', async () => {
    await saveSettings({
      ...DEFAULT_SETTINGS,
      preferences: { defaultExportFormat: 'pdf', logLevel: 'debug' },
    }, db);

    expect(getSettingValue(db, 'preferences_default_export_format')).toBe('pdf');
    expect(getSettingValue(db, 'preferences_log_level')).toBe('debug');
  });
});

describe('settings schema', () => {
  it('rejects unknown export formats', () => {
    expect(SettingsUpdateSchema.safeParse({ preferences: { defaultExportFormat: 'docx' } }).success).toBe(false);
  });

  it('hides the GitHub token', () => {
    const redacted = redactSettings({
      ...DEFAULT_SETTINGS,
      publishing: { githubToken: 'test-secret', webhookUrl: 'https://hooks.example.com/in' },
    });

    expect(redacted.publishing).toEqual({ githubToken: '********', webhookUrl: 'https://hooks.example.com/in' });
  });
});
