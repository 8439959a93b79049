/**
 * Sync Types
 *
 * Shared type definitions for the local-first synchronization system.
 */

// Re-export entity types from lib/types for convenience
export type {
    Collection,
    Connection,
    Recipe,
    SyncableEntity,
    User,
    Visibility
} from '@/lib/types';

// Entity kinds that participate in sync
export type EntityKind = 'recipe' | 'collection' | 'connection' | 'user';

// Remote partitions: per-owner backup and shared-for-visibility
export type Partition = 'private' | 'public';

// Sync operation types
export type SyncOperationKind = 'create' | 'update' | 'delete';

// Operation lifecycle: queued → inProgress → completed | failed
export type OperationStatus = 'queued' | 'inProgress' | 'completed' | 'failed';

// Individual queue item (one row per entity kind, entity id and operation kind)
export interface SyncOperation {
  id: string;
  entityKind: EntityKind;
  entityId: string;
  operation: SyncOperationKind;
  status: OperationStatus;
  attempts: number;
  lastError: string | null;
  /** Set on failed operations that a later attempt may still complete. */
  retryable: boolean;
  createdAt: string;
  updatedAt: string;
}

// Marker that an entity was deleted locally
export interface Tombstone {
  entityKind: EntityKind;
  entityId: string;
  deletedAt: string;
  remoteRecordId: string | null;
}

/**
 * Cloud metadata for an entity, joined to the local row by id.
 * Every field is null until the corresponding remote write succeeds.
 */
export interface SyncState {
  entityKind: EntityKind;
  entityId: string;
  remoteRecordId: string | null;
  remoteAssetRecordId: string | null;
  remoteAssetModifiedAt: string | null;
  publicRecordId: string | null;
  publicAssetModifiedAt: string | null;
  lastSyncedAt: string | null;
}

/**
 * Record as stored in either remote partition: the entity payload plus the
 * stable record id and the asset metadata other devices need.
 */
export interface RemoteRecord<T> {
  recordId: string;
  entityId: string;
  ownerId: string;
  updatedAt: string;
  assetRecordId: string | null;
  assetModifiedAt: string | null;
  payload: T;
}

/**
 * Outcome of one retry pass over a pending set.
 * - idle: nothing was pending
 * - success: at least one item went through
 * - failure: items were pending and none went through
 */
export type SweepOutcome = 'idle' | 'success' | 'failure';

export interface RetryParticipant {
  readonly name: string;
  retryPending(isCancelled: () => boolean): Promise<SweepOutcome>;
}

// Result of a sync-down pass
export interface PullResult {
  kind: EntityKind;
  inserted: number;
  updated: number;
  pushed: number;
  skipped: number;
  discardedTombstoned: number;
}

// Sync result for an overall sync operation
export interface SyncResult {
  success: boolean;
  pulled: PullResult[];
  tombstonesCleaned: number;
  errors: string[];
}

// Sync status for UI
export type SyncStatusState = 'idle' | 'syncing' | 'offline' | 'error';

// Listener types for observable pattern
export type DataListener<T> = (data: T[]) => void;
export type SyncStatusListener = (status: SyncStatusState, error?: string) => void;

// Sync configuration
export const SYNC_CONFIG = {
  RETRY_BASE_DELAY_MS: 2 * 60 * 1000,     // First retry sweep after 2 minutes
  RETRY_MAX_DELAY_MS: 60 * 60 * 1000,     // Backoff cap (1 hour)
  MAX_RETRY_ATTEMPTS: 10,                 // Per-id attempts before giving up
  NOT_FOUND_CACHE_MS: 5 * 60 * 1000,      // Negative cache TTL for asset downloads
  TOMBSTONE_RETENTION_DAYS: 30,           // Tombstones older than this are purged
  PUBLIC_ASSET_TOLERANCE_MS: 1000,        // Clock slack when comparing asset mtimes
  MAX_IMAGE_BYTES: 10_000_000,            // Absolute ceiling for an encoded image
} as const;

// Table names for type safety
export const SYNC_TABLES = {
  recipe: 'recipes',
  collection: 'collections',
  connection: 'connections',
  user: 'users',
} as const satisfies Record<EntityKind, string>;

export type SyncTableName = typeof SYNC_TABLES[keyof typeof SYNC_TABLES];

// Pull order: users before the things that reference them
export const SYNC_KIND_ORDER: EntityKind[] = ['user', 'recipe', 'collection', 'connection'];

/**
 * Next retry sweep delay: doubles after an unsuccessful sweep up to the cap,
 * resets to the base interval after a successful or idle one.
 */
export function getNextRetryDelay(currentDelayMs: number, outcome: SweepOutcome): number {
  if (outcome !== 'failure') {
    return SYNC_CONFIG.RETRY_BASE_DELAY_MS;
  }
  return Math.min(currentDelayMs * 2, SYNC_CONFIG.RETRY_MAX_DELAY_MS);
}
