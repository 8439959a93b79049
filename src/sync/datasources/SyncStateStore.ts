/**
 * SyncStateStore
 *
 * Cloud metadata per entity, kept apart from the entity tables so local
 * entities never carry nullable remote fields.
 */

import type { Database, Row } from '@/lib/database';
import { readNullableString, readString } from '@/lib/database';
import type { EntityKind, SyncState } from '../types';

export type SyncStateChanges = Partial<Omit<SyncState, 'entityKind' | 'entityId'>>;

function emptyState(entityKind: EntityKind, entityId: string): SyncState {
  return {
    entityKind,
    entityId,
    remoteRecordId: null,
    remoteAssetRecordId: null,
    remoteAssetModifiedAt: null,
    publicRecordId: null,
    publicAssetModifiedAt: null,
    lastSyncedAt: null,
  };
}

export class SyncStateStore {
  constructor(private readonly db: Database) {}

  /**
   * Sync state for an entity; all fields null when nothing was synced yet.
   */
  async get(entityKind: EntityKind, entityId: string): Promise<SyncState> {
    const rows = await this.db.select(
      'SELECT * FROM sync_state WHERE entity_kind = $1 AND entity_id = $2',
      [entityKind, entityId]
    );
    return rows[0] ? this.mapRow(entityKind, rows[0]) : emptyState(entityKind, entityId);
  }

  /**
   * Merge changes into the stored state and return the result.
   */
  async update(entityKind: EntityKind, entityId: string, changes: SyncStateChanges): Promise<SyncState> {
    const next: SyncState = { ...(await this.get(entityKind, entityId)), ...changes };
    await this.db.execute(
      `INSERT INTO sync_state (
         entity_kind, entity_id, remote_record_id, remote_asset_record_id,
         remote_asset_modified_at, public_record_id, public_asset_modified_at, last_synced_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (entity_kind, entity_id) DO UPDATE SET
         remote_record_id = excluded.remote_record_id,
         remote_asset_record_id = excluded.remote_asset_record_id,
         remote_asset_modified_at = excluded.remote_asset_modified_at,
         public_record_id = excluded.public_record_id,
         public_asset_modified_at = excluded.public_asset_modified_at,
         last_synced_at = excluded.last_synced_at`,
      [
        entityKind,
        entityId,
        next.remoteRecordId,
        next.remoteAssetRecordId,
        next.remoteAssetModifiedAt,
        next.publicRecordId,
        next.publicAssetModifiedAt,
        next.lastSyncedAt,
      ]
    );
    return next;
  }

  /**
   * Drop private asset metadata after the asset was removed.
   */
  async clearAsset(entityKind: EntityKind, entityId: string): Promise<SyncState> {
    return this.update(entityKind, entityId, {
      remoteAssetRecordId: null,
      remoteAssetModifiedAt: null,
    });
  }

  async remove(entityKind: EntityKind, entityId: string): Promise<void> {
    await this.db.execute(
      'DELETE FROM sync_state WHERE entity_kind = $1 AND entity_id = $2',
      [entityKind, entityId]
    );
  }

  private mapRow(entityKind: EntityKind, row: Row): SyncState {
    return {
      entityKind,
      entityId: readString(row, 'entity_id'),
      remoteRecordId: readNullableString(row, 'remote_record_id'),
      remoteAssetRecordId: readNullableString(row, 'remote_asset_record_id'),
      remoteAssetModifiedAt: readNullableString(row, 'remote_asset_modified_at'),
      publicRecordId: readNullableString(row, 'public_record_id'),
      publicAssetModifiedAt: readNullableString(row, 'public_asset_modified_at'),
      lastSyncedAt: readNullableString(row, 'last_synced_at'),
    };
  }
}
