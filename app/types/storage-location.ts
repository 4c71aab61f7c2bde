/**
 * Storage location - a configured backup destination
 *
 * Shared configuration, not owned by any transcript.
 */

export const STORAGE_TYPES = [
  'local',
  'icloud-drive',
  'dropbox',
  'google-drive',
  'external-drive',
  'optical-disc',
] as const;

export type StorageType = (typeof STORAGE_TYPES)[number];

export const SYNC_STATUSES = ['idle', 'syncing', 'synced', 'error'] as const;

export type SyncStatus = (typeof SYNC_STATUSES)[number];

export interface StorageLocation {
  id: string;
  name: string;
  type: StorageType;
  path: string;
  isEnabled: boolean;
  lastSyncedAt: string | null;
  syncStatus: SyncStatus;
}
