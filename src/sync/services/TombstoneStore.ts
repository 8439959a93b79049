/**
 * TombstoneStore
 *
 * Records which entities were deleted locally so that sync-down never
 * re-inserts them from a stale remote copy.
 */

import { subDays } from 'date-fns';
import type { Database, Row } from '@/lib/database';
import { readNullableString, readString } from '@/lib/database';
import { SYNC_CONFIG } from '../types';
import type { EntityKind, Tombstone } from '../types';

export class TombstoneStore {
  constructor(
    private readonly db: Database,
    private readonly retentionDays: number = SYNC_CONFIG.TOMBSTONE_RETENTION_DAYS
  ) {}

  /**
   * Write a tombstone. An existing tombstone for the id is left untouched.
   */
  async markDeleted(kind: EntityKind, entityId: string, remoteRecordId: string | null): Promise<void> {
    await this.db.execute(
      `INSERT OR IGNORE INTO tombstones (entity_kind, entity_id, deleted_at, remote_record_id)
       VALUES ($1, $2, $3, $4)`,
      [kind, entityId, new Date().toISOString(), remoteRecordId]
    );
  }

  async isDeleted(kind: EntityKind, entityId: string): Promise<boolean> {
    const rows = await this.db.select(
      'SELECT entity_id FROM tombstones WHERE entity_kind = $1 AND entity_id = $2',
      [kind, entityId]
    );
    return rows.length > 0;
  }

  async get(kind: EntityKind, entityId: string): Promise<Tombstone | null> {
    const rows = await this.db.select(
      'SELECT * FROM tombstones WHERE entity_kind = $1 AND entity_id = $2',
      [kind, entityId]
    );
    return rows[0] ? this.mapRow(rows[0]) : null;
  }

  /**
   * Remove a tombstone when the id is knowingly re-created.
   */
  async unmark(kind: EntityKind, entityId: string): Promise<void> {
    await this.db.execute(
      'DELETE FROM tombstones WHERE entity_kind = $1 AND entity_id = $2',
      [kind, entityId]
    );
  }

  /**
   * Purge tombstones older than the retention window. Returns how many were removed.
   */
  async cleanup(now: Date = new Date()): Promise<number> {
    const cutoff = subDays(now, this.retentionDays).toISOString();
    const result = await this.db.execute(
      'DELETE FROM tombstones WHERE deleted_at < $1',
      [cutoff]
    );
    if (result.rowsAffected > 0) {
      console.info(`[TombstoneStore] Cleaned up ${result.rowsAffected} tombstones older than ${cutoff}`);
    }
    return result.rowsAffected;
  }

  async list(kind?: EntityKind): Promise<Tombstone[]> {
    const rows = kind
      ? await this.db.select(
          'SELECT * FROM tombstones WHERE entity_kind = $1 ORDER BY deleted_at DESC',
          [kind]
        )
      : await this.db.select('SELECT * FROM tombstones ORDER BY deleted_at DESC');
    return rows.map((row) => this.mapRow(row));
  }

  private mapRow(row: Row): Tombstone {
    const kind = readString(row, 'entity_kind');
    if (kind !== 'recipe' && kind !== 'collection' && kind !== 'connection' && kind !== 'user') {
      throw new Error(`Unknown entity kind in tombstone: ${kind}`);
    }
    return {
      entityKind: kind,
      entityId: readString(row, 'entity_id'),
      deletedAt: readString(row, 'deleted_at'),
      remoteRecordId: readNullableString(row, 'remote_record_id'),
    };
  }
}
