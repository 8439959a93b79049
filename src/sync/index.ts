/**
 * Sync Module Public API
 *
 * This module provides a local-first synchronization system for recipes,
 * collections, connections and user profiles.
 *
 * Architecture:
 * - Local SQLite database is the source of truth for all reads
 * - Writes go to local first, then queue for remote sync
 * - Private partition backs up every entity, public partition mirrors public ones
 * - Last-write-wins conflict resolution
 *
 * Usage:
 * 1. Call createSyncEngine() once per process
 * 2. Use the repositories for data access
 * 3. Use syncService.fullSync() to pull and retry, subscribe for status
 */

// Types
export type {
  DataListener,
  EntityKind,
  OperationStatus,
  Partition,
  PullResult,
  RemoteRecord,
  RetryParticipant,
  SweepOutcome,
  SyncOperation,
  SyncOperationKind,
  SyncResult,
  SyncState,
  SyncStatusListener,
  SyncStatusState,
  SyncTableName,
  Tombstone,
} from './types';

export { getNextRetryDelay, SYNC_CONFIG, SYNC_KIND_ORDER, SYNC_TABLES } from './types';

// Services
export { BackgroundTasks } from './services/BackgroundTasks';
export { SharpImageOptimizer, type ImageOptimizer, type OptimizeOptions } from './services/ImageOptimizer';
export {
  IMAGE_PROFILES,
  ImageSyncManager,
  type ImageKind,
  type ImageRemote,
  type ImageSyncManagerOptions,
  type ImageSyncState,
} from './services/ImageSyncManager';
export { combineOutcomes, RetryScheduler } from './services/RetryScheduler';
export { SyncQueue } from './services/SyncQueue';
export { SyncService, type SyncableRepository, type SyncServiceOptions } from './services/SyncService';
export { TombstoneStore } from './services/TombstoneStore';

// Data Sources
export { LocalDataSource } from './datasources/LocalDataSource';
export { createObjectStoreImageRemote } from './datasources/ObjectStoreImageRemote';
export { OfflineObjectStore } from './datasources/OfflineObjectStore';
export { classifySupabaseError, SupabaseObjectStore } from './datasources/SupabaseObjectStore';
export { SyncStateStore } from './datasources/SyncStateStore';
export type {
  LocalDataSource as ILocalDataSource,
  RemoteObjectStore,
  RemoteRecordQuery,
  RemoteRecordWrite,
  UploadedAsset,
} from './datasources/types';

// Repositories
export * from './repositories';

// Wiring
export {
  createImageManagers,
  createRepositories,
  createSyncEngine,
  type Repositories,
  type SyncEngine,
  type SyncEngineOptions,
} from './engine';
