// User settings for the transcript keeper
import { z } from 'zod';
import { EXPORT_FORMATS } from '~/types/transcript';
import type { ExportFormat } from '~/types/transcript';
import type { LogLevel } from '~/.server/log/logger';

export interface UserSettings {
  preferences: {
    defaultExportFormat: ExportFormat;
    logLevel: LogLevel;
  };

  // Credentials and targets used when a publish request omits them
  publishing: {
    githubToken?: string;
    webhookUrl?: string;
  };

  storage: {
    // Secondary copy location, e.g. a cloud-sync folder
    mirrorPath?: string;
  };
}

export const DEFAULT_SETTINGS: UserSettings = {
  preferences: {
    defaultExportFormat: 'plaintext',
    logLevel: 'info',
  },
  publishing: {},
  storage: {},
};

const optionalText = z.string().trim().optional();

/**
 * Partial update accepted by updateSettings; an empty string clears a value
 */
export const SettingsUpdateSchema = z.object({
  preferences: z.object({
    defaultExportFormat: z.enum(EXPORT_FORMATS).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  }).optional(),
  publishing: z.object({
    githubToken: optionalText,
    webhookUrl: optionalText,
  }).optional(),
  storage: z.object({
    mirrorPath: optionalText,
  }).optional(),
});

export type SettingsUpdate = z.infer<typeof SettingsUpdateSchema>;

/**
 * Settings safe to return over the API
 */
export function redactSettings(settings: UserSettings): UserSettings {
  return {
    ...settings,
    publishing: {
      ...settings.publishing,
      githubToken: settings.publishing.githubToken ? '********' : undefined,
    },
  };
}
