/**
 * SyncQueue
 *
 * Durable log of propagation operations with support for:
 * - One row per (entity kind, entity id, operation kind); re-enqueueing resets it
 * - queued → inProgress → completed | failed transitions
 * - Resumable rows for restart recovery
 *
 * Rows carry no payload: whoever executes an operation re-reads local state.
 * Failed rows stay queryable; those marked retryable are resumed after a restart.
 */

import { z } from 'zod';
import type { Database, Row } from '@/lib/database';
import { InvalidDataError } from '@/lib/errors';
import type { EventBus } from '@/lib/events';
import { generateId } from '@/lib/types';
import type { EntityKind, OperationStatus, SyncOperation, SyncOperationKind } from '../types';

const operationRowSchema = z.object({
  id: z.string(),
  entity_kind: z.enum(['recipe', 'collection', 'connection', 'user']),
  entity_id: z.string(),
  operation: z.enum(['create', 'update', 'delete']),
  status: z.enum(['queued', 'inProgress', 'completed', 'failed']),
  attempts: z.number().int(),
  last_error: z.string().nullable(),
  retryable: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

function mapRow(row: Row): SyncOperation {
  const result = operationRowSchema.safeParse(row);
  if (!result.success) {
    throw new InvalidDataError(`Malformed sync operation row: ${result.error.message}`, { cause: result.error });
  }
  const item = result.data;
  return {
    id: item.id,
    entityKind: item.entity_kind,
    entityId: item.entity_id,
    operation: item.operation,
    status: item.status,
    attempts: item.attempts,
    lastError: item.last_error,
    retryable: item.retryable === 1,
    createdAt: item.created_at,
    updatedAt: item.updated_at,
  };
}

export interface SyncQueueFilter {
  status?: OperationStatus;
  kind?: EntityKind;
}

export class SyncQueue {
  constructor(
    private readonly db: Database,
    private readonly events?: EventBus
  ) {}

  /**
   * Add an operation to the queue, or reset the existing row for the same
   * entity and operation back to queued.
   */
  async enqueue(kind: EntityKind, entityId: string, operation: SyncOperationKind): Promise<SyncOperation> {
    const now = new Date().toISOString();

    await this.db.execute(
      `INSERT INTO sync_operations (id, entity_kind, entity_id, operation, status, attempts, last_error, created_at, updated_at)
       VALUES ($1, $2, $3, $4, 'queued', 0, NULL, $5, $5)
       ON CONFLICT (entity_kind, entity_id, operation) DO UPDATE SET
         status = 'queued',
         last_error = NULL,
         retryable = 0,
         updated_at = excluded.updated_at`,
      [generateId(), kind, entityId, operation, now]
    );

    this.emit(kind, entityId, operation, 'queued');
    return this.require(kind, entityId, operation);
  }

  /**
   * Mark an operation as started and count the attempt.
   */
  async markInProgress(kind: EntityKind, entityId: string, operation: SyncOperationKind): Promise<void> {
    await this.transition(kind, entityId, operation, 'inProgress', null, true);
  }

  async markCompleted(kind: EntityKind, entityId: string, operation: SyncOperationKind): Promise<void> {
    await this.transition(kind, entityId, operation, 'completed', null, false);
  }

  async markFailed(
    kind: EntityKind,
    entityId: string,
    operation: SyncOperationKind,
    error: string,
    retryable = false
  ): Promise<void> {
    await this.transition(kind, entityId, operation, 'failed', error, false, retryable);
  }

  /**
   * Fail every unfinished operation of an entity for good.
   */
  async abandon(kind: EntityKind, entityId: string, error: string): Promise<void> {
    for (const item of await this.list({ kind })) {
      if (item.entityId === entityId && item.status !== 'completed') {
        await this.markFailed(kind, entityId, item.operation, error, false);
      }
    }
  }

  /**
   * Drop every operation recorded for an entity.
   */
  async removeForEntity(kind: EntityKind, entityId: string): Promise<number> {
    const result = await this.db.execute(
      'DELETE FROM sync_operations WHERE entity_kind = $1 AND entity_id = $2',
      [kind, entityId]
    );
    return result.rowsAffected;
  }

  async get(kind: EntityKind, entityId: string, operation: SyncOperationKind): Promise<SyncOperation | null> {
    const rows = await this.db.select(
      `SELECT * FROM sync_operations
       WHERE entity_kind = $1 AND entity_id = $2 AND operation = $3`,
      [kind, entityId, operation]
    );
    return rows[0] ? mapRow(rows[0]) : null;
  }

  async list(filter: SyncQueueFilter = {}): Promise<SyncOperation[]> {
    const conditions: string[] = [];
    const params: string[] = [];

    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.kind) {
      params.push(filter.kind);
      conditions.push(`entity_kind = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.db.select(
      `SELECT * FROM sync_operations ${where} ORDER BY created_at ASC, id ASC`,
      params
    );
    return rows.map(mapRow);
  }

  /**
   * Operations to resume after a restart: queued or running when the process
   * stopped, or failed with an error a later attempt may get past.
   */
  async getUnfinished(): Promise<SyncOperation[]> {
    const rows = await this.db.select(
      `SELECT * FROM sync_operations
       WHERE status IN ('queued', 'inProgress') OR (status = 'failed' AND retryable = 1)
       ORDER BY created_at ASC, id ASC`
    );
    return rows.map(mapRow);
  }

  /**
   * Count of operations not yet completed (queued, in progress or failed).
   */
  async getPendingCount(): Promise<number> {
    const rows = await this.db.select(
      `SELECT COUNT(*) AS count FROM sync_operations WHERE status != 'completed'`
    );
    const count = rows[0]?.count;
    return typeof count === 'number' ? count : 0;
  }

  async clearCompleted(): Promise<number> {
    const result = await this.db.execute(`DELETE FROM sync_operations WHERE status = 'completed'`);
    return result.rowsAffected;
  }

  private async transition(
    kind: EntityKind,
    entityId: string,
    operation: SyncOperationKind,
    status: OperationStatus,
    error: string | null,
    countAttempt: boolean,
    retryable = false
  ): Promise<void> {
    const result = await this.db.execute(
      `UPDATE sync_operations
       SET status = $1, last_error = $2, attempts = attempts + $3, updated_at = $4, retryable = $5
       WHERE entity_kind = $6 AND entity_id = $7 AND operation = $8`,
      [status, error, countAttempt ? 1 : 0, new Date().toISOString(), retryable ? 1 : 0, kind, entityId, operation]
    );

    // Rows removed by a delete in the meantime are not recreated
    if (result.rowsAffected > 0) {
      this.emit(kind, entityId, operation, status);
    }
  }

  private async require(kind: EntityKind, entityId: string, operation: SyncOperationKind): Promise<SyncOperation> {
    const item = await this.get(kind, entityId, operation);
    if (!item) {
      throw new Error(`Sync operation ${operation} for ${kind} ${entityId} was not stored`);
    }
    return item;
  }

  private emit(kind: EntityKind, id: string, operation: SyncOperationKind, status: OperationStatus): void {
    this.events?.publish({ type: 'sync.operationChanged', kind, id, operation, status });
  }
}
