// Storage location (backup destination) records
import { randomUUID } from 'crypto';
import type { DbClient } from './client';
import { parseEnumColumn } from './row-utils';
import type { StorageLocation, StorageType, SyncStatus } from '~/types/storage-location';
import { STORAGE_TYPES, SYNC_STATUSES } from '~/types/storage-location';

export interface StorageLocationRow {
  id: string;
  name: string;
  type: string;
  path: string;
  is_enabled: number;
  last_synced_at: string | null;
  sync_status: string;
  created_at: string;
}

export function rowToStorageLocation(row: StorageLocationRow): StorageLocation {
  return {
    id: row.id,
    name: row.name,
    type: parseEnumColumn(row.type, STORAGE_TYPES, 'storage_locations.type'),
    path: row.path,
    isEnabled: row.is_enabled === 1,
    lastSyncedAt: row.last_synced_at,
    syncStatus: parseEnumColumn(row.sync_status, SYNC_STATUSES, 'storage_locations.sync_status'),
  };
}

export interface CreateStorageLocationInput {
  name: string;
  type: StorageType;
  path: string;
  isEnabled?: boolean;
}

export class StorageLocationRepository {
  constructor(private readonly db: DbClient) {}

  create(input: CreateStorageLocationInput): StorageLocation {
    const location: StorageLocation = {
      id: randomUUID(),
      name: input.name,
      type: input.type,
      path: input.path,
      isEnabled: input.isEnabled ?? true,
      lastSyncedAt: null,
      syncStatus: 'idle',
    };

    this.db.run(
      `
        INSERT INTO storage_locations (id, name, type, path, is_enabled, last_synced_at, sync_status, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        location.id,
        location.name,
        location.type,
        location.path,
        location.isEnabled ? 1 : 0,
        location.lastSyncedAt,
        location.syncStatus,
        new Date().toISOString(),
      ]
    );

    return location;
  }

  getById(id: string): StorageLocation | null {
    const row = this.db.selectOne<StorageLocationRow>('SELECT * FROM storage_locations WHERE id = ?', [id]);
    return row ? rowToStorageLocation(row) : null;
  }

  list(options?: { enabledOnly?: boolean }): StorageLocation[] {
    const where = options?.enabledOnly ? 'WHERE is_enabled = 1' : '';
    const rows = this.db.select<StorageLocationRow>(
      `SELECT * FROM storage_locations ${where} ORDER BY created_at ASC, rowid ASC`
    );
    return rows.map(rowToStorageLocation);
  }

  setEnabled(id: string, isEnabled: boolean): boolean {
    const result = this.db.run('UPDATE storage_locations SET is_enabled = ? WHERE id = ?', [isEnabled ? 1 : 0, id]);
    return result.changes > 0;
  }

  /**
   * Record a sync outcome; `syncedAt` is only written when given
   */
  markSync(id: string, status: SyncStatus, syncedAt?: string): void {
    if (syncedAt) {
      this.db.run(
        'UPDATE storage_locations SET sync_status = ?, last_synced_at = ? WHERE id = ?',
        [status, syncedAt, id]
      );
    } else {
      this.db.run('UPDATE storage_locations SET sync_status = ? WHERE id = ?', [status, id]);
    }
  }

  delete(id: string): boolean {
    const result = this.db.run('DELETE FROM storage_locations WHERE id = ?', [id]);
    return result.changes > 0;
  }
}
