/**
 * BaseRepository
 *
 * Abstract base class for entity repositories implementing the local-first pattern:
 * - All reads come from LocalDataSource (source of truth)
 * - Writes go to LocalDataSource first, then queue for sync
 * - Propagation runs as background tasks that re-read local state
 * - Private partition always receives the entity, public only while visible
 * - Last-write-wins merge when pulling remote records
 */

import { isAfter, parseISO } from 'date-fns';
import type { z } from 'zod';
import {
  CloudNotConfiguredError,
  NetworkUnavailableError,
  NotFoundError,
  QuotaExceededError,
  errorMessage,
  isRetryableError,
} from '@/lib/errors';
import type { EventBus } from '@/lib/events';
import { nowIso } from '@/lib/types';
import { LocalDataSource } from '../datasources/LocalDataSource';
import type { SyncStateStore } from '../datasources/SyncStateStore';
import type { RemoteObjectStore, RemoteRecordWrite } from '../datasources/types';
import type { BackgroundTasks } from '../services/BackgroundTasks';
import type { ImageSyncManager } from '../services/ImageSyncManager';
import type { SyncableRepository, SyncService } from '../services/SyncService';
import type { SyncQueue } from '../services/SyncQueue';
import type { TombstoneStore } from '../services/TombstoneStore';
import {
  SYNC_CONFIG,
  SYNC_TABLES,
  type DataListener,
  type EntityKind,
  type Partition,
  type PullResult,
  type RemoteRecord,
  type RetryParticipant,
  type SweepOutcome,
  type SyncableEntity,
  type SyncOperationKind,
  type SyncState,
} from '../types';

export interface UpdateOptions {
  /** Keep the entity's own `updatedAt` (sync-origin writes). */
  preserveTimestamp?: boolean;
  /** Leave the image alone during propagation. */
  skipAssetSync?: boolean;
}

interface PushOptions {
  skipAssetSync?: boolean;
  /** Throw asset failures instead of parking them in the pending-upload set. */
  strictAssets?: boolean;
}

export interface RepositoryOptions {
  images?: ImageSyncManager | null;
  maxRetryAttempts?: number;
}

/**
 * Next `updatedAt` for a local edit: now, but never earlier than the previous value.
 */
export function nextTimestamp(previous: string): string {
  const now = new Date();
  const prev = parseISO(previous);
  return isAfter(now, prev) ? now.toISOString() : prev.toISOString();
}

/**
 * The image an entity references, for kinds that carry one.
 */
export function imageFilenameOf(entity: SyncableEntity): string | null {
  return 'imageFilename' in entity && typeof entity.imageFilename === 'string' ? entity.imageFilename : null;
}

/**
 * Whether the public copy of an asset is stale compared to the local file.
 */
export function shouldUploadToPublic(localModified: Date, publicModifiedAt: string | null): boolean {
  if (!publicModifiedAt) return true;
  const drift = Math.abs(localModified.getTime() - parseISO(publicModifiedAt).getTime());
  return drift > SYNC_CONFIG.PUBLIC_ASSET_TOLERANCE_MS;
}

export abstract class BaseRepository<T extends SyncableEntity, TInput = T> implements SyncableRepository {
  protected localDataSource: LocalDataSource<T>;
  protected remote: RemoteObjectStore;
  protected syncQueue: SyncQueue;
  protected tombstones: TombstoneStore;
  protected syncState: SyncStateStore;
  protected events: EventBus;
  protected tasks: BackgroundTasks;
  protected images: ImageSyncManager | null;

  protected listeners: Set<DataListener<T>> = new Set();
  private pendingSync: Set<string> = new Set();
  private retryAttempts: Map<string, number> = new Map();
  private readonly maxRetryAttempts: number;

  constructor(
    readonly kind: EntityKind,
    protected readonly schema: z.ZodType<T, z.ZodTypeDef, TInput>,
    syncService: SyncService,
    options: RepositoryOptions = {}
  ) {
    this.localDataSource = new LocalDataSource<T>(syncService.getDatabase(), SYNC_TABLES[kind], schema);
    this.remote = syncService.getRemote();
    this.syncQueue = syncService.getSyncQueue();
    this.tombstones = syncService.getTombstones();
    this.syncState = syncService.getSyncStateStore();
    this.events = syncService.getEvents();
    this.tasks = syncService.getTasks();
    this.images = options.images ?? null;
    this.maxRetryAttempts = options.maxRetryAttempts ?? SYNC_CONFIG.MAX_RETRY_ATTEMPTS;
  }

  // ============ Observable Pattern ============

  /**
   * Subscribe to data changes.
   * Immediately emits current data, then emits on each change.
   */
  subscribe(listener: DataListener<T>): () => void {
    this.listeners.add(listener);

    // Immediately emit current data
    this.emitCurrentData(listener).catch(console.error);

    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Notify all listeners of data change.
   */
  protected async notifyListeners(): Promise<void> {
    if (this.listeners.size === 0) return;

    const data = await this.fetchAll();
    for (const listener of this.listeners) {
      try {
        listener(data);
      } catch (error) {
        console.error(`[${this.constructor.name}] Error in data listener:`, error);
      }
    }
  }

  private async emitCurrentData(listener: DataListener<T>): Promise<void> {
    try {
      listener(await this.fetchAll());
    } catch (error) {
      console.error(`[${this.constructor.name}] Error emitting current data:`, error);
      listener([]);
    }
  }

  // ============ Read Operations (Always from Local) ============

  async fetch(id: string): Promise<T | null> {
    return this.localDataSource.getById(id);
  }

  /**
   * Like `fetch`, but a miss throws NotFoundError.
   */
  async require(id: string): Promise<T> {
    const entity = await this.localDataSource.getById(id);
    if (!entity) {
      throw new NotFoundError(this.kind, id);
    }
    return entity;
  }

  /**
   * All entities, most recently updated first.
   */
  async fetchAll(): Promise<T[]> {
    return this.localDataSource.getAll();
  }

  async fetchByOwner(ownerId: string): Promise<T[]> {
    return this.localDataSource.getByOwner(ownerId);
  }

  async query(filter: Partial<T>): Promise<T[]> {
    return this.localDataSource.query(filter);
  }

  // ============ Write Operations (Local + Queue) ============

  /**
   * Store a new entity locally and schedule its propagation.
   * Re-creating a previously deleted id clears its tombstone.
   */
  async create(input: TInput): Promise<T> {
    const entity = this.normalize(this.localDataSource.validate(input));

    await this.localDataSource.insert(entity);
    await this.tombstones.unmark(this.kind, entity.id);
    await this.syncQueue.enqueue(this.kind, entity.id, 'create');

    this.events.publish({ type: 'entity.created', kind: this.kind, id: entity.id });
    await this.notifyListeners();

    this.schedulePropagation(entity.id, 'create');
    return entity;
  }

  /**
   * Replace an existing entity. Bumps `updatedAt` unless told to preserve it.
   */
  async update(input: TInput, options: UpdateOptions = {}): Promise<T> {
    const candidate = this.normalize(this.localDataSource.validate(input));
    const previous = await this.localDataSource.getById(candidate.id);
    if (!previous) {
      throw new NotFoundError(this.kind, candidate.id);
    }

    const entity: T = {
      ...candidate,
      createdAt: previous.createdAt,
      updatedAt: options.preserveTimestamp ? candidate.updatedAt : nextTimestamp(previous.updatedAt),
    };
    const visibilityChanged = previous.visibility !== entity.visibility;

    // A public copy may exist even if this device never wrote it
    if (visibilityChanged && previous.visibility === 'public') {
      await this.markPublicCopy(entity.id);
    }

    await this.localDataSource.update(entity);
    await this.syncQueue.enqueue(this.kind, entity.id, 'update');

    this.events.publish({ type: 'entity.updated', kind: this.kind, id: entity.id });
    if (visibilityChanged) {
      this.events.publish({
        type: 'entity.visibilityChanged',
        kind: this.kind,
        id: entity.id,
        oldVisibility: previous.visibility,
        newVisibility: entity.visibility,
      });
    }
    await this.notifyListeners();

    this.schedulePropagation(entity.id, 'update', { skipAssetSync: options.skipAssetSync });
    return entity;
  }

  /**
   * Delete locally, write a tombstone and schedule remote deletion.
   */
  async delete(id: string): Promise<void> {
    const existing = await this.localDataSource.getById(id);
    if (!existing) {
      throw new NotFoundError(this.kind, id);
    }

    const state = await this.syncState.get(this.kind, id);

    await this.localDataSource.delete(id);
    await this.syncQueue.removeForEntity(this.kind, id);
    await this.tombstones.markDeleted(this.kind, id, state.remoteRecordId);
    if (existing.visibility === 'public') {
      await this.markPublicCopy(id);
    }

    if (this.images) {
      await this.images.deleteImage(id);
      this.images.removePendingUpload(id);
    }
    this.retryAttempts.delete(id);

    await this.afterDelete(existing);
    await this.syncQueue.enqueue(this.kind, id, 'delete');

    this.events.publish({ type: 'entity.deleted', kind: this.kind, id });
    await this.notifyListeners();

    this.schedulePropagation(id, 'delete');
  }

  /**
   * Hook for kind-specific cleanup after a local delete.
   */
  protected async afterDelete(_entity: T): Promise<void> {}

  /**
   * Hook to enforce kind-specific invariants on every stored entity.
   */
  protected normalize(entity: T): T {
    return entity;
  }

  protected requireImages(): ImageSyncManager {
    if (!this.images) {
      throw new CloudNotConfiguredError(`No image storage configured for ${this.kind}`);
    }
    return this.images;
  }

  // ============ Sync Operations (Called by SyncService) ============

  /**
   * Fetch this owner's private records and merge them into local.
   */
  async syncDown(ownerId: string, since: string | null = null): Promise<PullResult> {
    const records = await this.remote.fetchRecords('private', this.kind, { ownerId, since });
    return this.pull(records);
  }

  /**
   * Merge remote-origin records into local storage.
   * - tombstoned ids are discarded
   * - unknown ids are inserted without propagating them back
   * - known ids: the newer `updatedAt` wins; equal timestamps only merge metadata
   */
  async pull(records: RemoteRecord<unknown>[], partition: Partition = 'private'): Promise<PullResult> {
    const result: PullResult = {
      kind: this.kind,
      inserted: 0,
      updated: 0,
      pushed: 0,
      skipped: 0,
      discardedTombstoned: 0,
    };

    for (const record of records) {
      if (await this.tombstones.isDeleted(this.kind, record.entityId)) {
        result.discardedTombstoned++;
        continue;
      }

      const parsed = this.schema.safeParse(record.payload);
      if (!parsed.success) {
        console.warn(`[${this.constructor.name}] Skipping malformed remote ${this.kind} ${record.entityId}:`, parsed.error.message);
        result.skipped++;
        continue;
      }

      const remoteEntity = this.normalize(parsed.data);
      const local = await this.localDataSource.getById(remoteEntity.id);

      if (!local) {
        await this.localDataSource.insert(remoteEntity);
        await this.recordRemoteMetadata(record);
        await this.downloadAsset(remoteEntity, record, partition);
        this.events.publish({ type: 'entity.created', kind: this.kind, id: remoteEntity.id });
        result.inserted++;
        continue;
      }

      const remoteUpdated = parseISO(remoteEntity.updatedAt);
      const localUpdated = parseISO(local.updatedAt);

      if (isAfter(remoteUpdated, localUpdated)) {
        await this.localDataSource.update(remoteEntity);
        await this.recordRemoteMetadata(record);
        if (imageFilenameOf(local) && !imageFilenameOf(remoteEntity) && this.images) {
          await this.images.deleteImage(remoteEntity.id);
        } else {
          await this.downloadAsset(remoteEntity, record, partition);
        }
        this.events.publish({ type: 'entity.updated', kind: this.kind, id: remoteEntity.id });
        result.updated++;
      } else if (isAfter(localUpdated, remoteUpdated)) {
        await this.syncQueue.enqueue(this.kind, local.id, 'update');
        this.schedulePropagation(local.id, 'update');
        result.pushed++;
      } else {
        await this.mergeMetadata(record);
        result.skipped++;
      }
    }

    if (result.inserted > 0 || result.updated > 0) {
      await this.notifyListeners();
    }

    return result;
  }

  recoverPending(entityId: string, _operation: SyncOperationKind): void {
    this.pendingSync.add(entityId);
  }

  /**
   * Rebuild the pending-upload set from disk: every local image that is newer
   * than the copy the cloud last acknowledged, or was never uploaded.
   */
  async recoverPendingUploads(): Promise<number> {
    if (!this.images) return 0;

    let recovered = 0;
    for (const entity of await this.localDataSource.getAll()) {
      if (!imageFilenameOf(entity)) continue;

      const localModified = await this.images.getModificationDate(entity.id);
      if (!localModified) continue;

      const state = await this.syncState.get(this.kind, entity.id);
      const remoteModified = state.remoteAssetModifiedAt ? parseISO(state.remoteAssetModifiedAt) : null;
      if (!remoteModified || isAfter(localModified, remoteModified)) {
        this.images.addPendingUpload(entity.id);
        recovered++;
      }
    }
    return recovered;
  }

  retryParticipants(): RetryParticipant[] {
    const participants: RetryParticipant[] = [
      { name: `${this.kind}-records`, retryPending: (isCancelled) => this.retryPendingSyncs(isCancelled) },
    ];
    const images = this.images;
    if (images) {
      participants.push({
        name: `${this.kind}-images`,
        retryPending: (isCancelled) => this.retryPendingUploads(images, isCancelled),
      });
    }
    return participants;
  }

  /**
   * Retry every id in the pending-sync set by re-reading its local state.
   */
  async retryPendingSyncs(isCancelled: () => boolean = () => false): Promise<SweepOutcome> {
    const ids = [...this.pendingSync];
    if (ids.length === 0) {
      return 'idle';
    }

    if (!(await this.remote.isAvailable())) {
      console.info(`[${this.constructor.name}] Remote store still unavailable, ${ids.length} ${this.kind} syncs pending`);
      return 'failure';
    }

    let anySuccess = false;

    for (const id of ids) {
      if (isCancelled()) break;

      try {
        const entity = await this.localDataSource.getById(id);
        if (entity) {
          await this.pushEntity(entity, {});
        } else if (await this.tombstones.isDeleted(this.kind, id)) {
          await this.pushDeletion(id);
        }
        this.pendingSync.delete(id);
        this.retryAttempts.delete(id);
        await this.settleOperations(id);
        anySuccess = true;
      } catch (error) {
        if (!isRetryableError(error)) {
          console.error(`[${this.constructor.name}] Giving up on ${this.kind} ${id}: ${errorMessage(error)}`);
          await this.dropPending(id, errorMessage(error));
          continue;
        }

        const attempts = (this.retryAttempts.get(id) ?? 0) + 1;
        if (attempts >= this.maxRetryAttempts) {
          console.warn(`[${this.constructor.name}] Giving up on ${this.kind} ${id} after ${attempts} attempts`);
          await this.dropPending(id, `Gave up after ${attempts} attempts: ${errorMessage(error)}`);
        } else {
          this.retryAttempts.set(id, attempts);
        }
      }
    }

    return anySuccess ? 'success' : 'failure';
  }

  /**
   * Retry parked image uploads. A sweep while the remote is unreachable
   * counts no attempt.
   */
  private async retryPendingUploads(images: ImageSyncManager, isCancelled: () => boolean): Promise<SweepOutcome> {
    const count = images.pendingUploadIds().length;
    if (count === 0) {
      return 'idle';
    }

    if (!(await this.remote.isAvailable())) {
      console.info(`[${this.constructor.name}] Remote store still unavailable, ${count} ${this.kind} image uploads pending`);
      return 'failure';
    }

    return images.retryPendingUploads((id) => this.retryImageUpload(id), isCancelled);
  }

  getPendingSyncCount(): number {
    return this.pendingSync.size;
  }

  hasPendingSync(id: string): boolean {
    return this.pendingSync.has(id);
  }

  getRetryAttempts(id: string): number {
    return this.retryAttempts.get(id) ?? 0;
  }

  // ============ Propagation ============

  protected schedulePropagation(id: string, operation: SyncOperationKind, options: PushOptions = {}): void {
    const key = options.skipAssetSync ? `${operation}:skipAssetSync` : operation;
    this.tasks.run(`${this.kind}:${id}`, key, () => this.propagate(id, operation, options));
  }

  /**
   * Push the current local state of an entity (or its deletion) and record
   * the outcome on the queue. Never throws.
   */
  private async propagate(id: string, operation: SyncOperationKind, options: PushOptions): Promise<void> {
    await this.syncQueue.markInProgress(this.kind, id, operation);

    try {
      if (!(await this.remote.isAvailable())) {
        throw new NetworkUnavailableError();
      }

      if (operation === 'delete') {
        await this.pushDeletion(id);
      } else {
        const entity = await this.localDataSource.getById(id);
        // Deleted in the meantime; the delete operation takes over
        if (entity) {
          await this.pushEntity(entity, options);
        }
      }

      this.pendingSync.delete(id);
      this.retryAttempts.delete(id);
      await this.syncQueue.markCompleted(this.kind, id, operation);
    } catch (error) {
      const message = errorMessage(error);
      const retryable = isRetryableError(error);
      if (retryable) {
        console.warn(`[${this.constructor.name}] ${operation} ${this.kind} ${id} failed, will retry: ${message}`);
        this.pendingSync.add(id);
      } else {
        console.error(`[${this.constructor.name}] ${operation} ${this.kind} ${id} failed: ${message}`);
      }
      await this.syncQueue.markFailed(this.kind, id, operation, message, retryable);
    }
  }

  /**
   * Save the entity to the private partition (with its image), then mirror
   * it to or remove it from the public partition according to visibility.
   */
  protected async pushEntity(entity: T, options: PushOptions): Promise<void> {
    let state = await this.syncState.get(this.kind, entity.id);

    if (this.images && !options.skipAssetSync) {
      state = await this.syncPrivateAsset(this.images, entity, state, options);
    }

    const saved = await this.remote.saveRecord(
      'private',
      this.kind,
      this.toRemoteRecord(entity, state.remoteAssetRecordId, state.remoteAssetModifiedAt)
    );
    state = await this.syncState.update(this.kind, entity.id, {
      remoteRecordId: saved.recordId,
      lastSyncedAt: nowIso(),
    });

    if (entity.visibility === 'public') {
      await this.pushPublicCopy(entity, options);
    } else if (state.publicRecordId) {
      await this.removePublicCopy(entity.id, state);
    }
  }

  private async syncPrivateAsset(
    images: ImageSyncManager,
    entity: T,
    state: SyncState,
    options: PushOptions
  ): Promise<SyncState> {
    const localModified = imageFilenameOf(entity) ? await images.getModificationDate(entity.id) : null;

    if (!localModified) {
      if (!imageFilenameOf(entity) && state.remoteAssetRecordId) {
        await images.deleteFromCloud(entity.id, 'private');
        images.removePendingUpload(entity.id);
        return this.syncState.clearAsset(this.kind, entity.id);
      }
      // Referenced but not on disk yet: a download may still be pending
      return state;
    }

    const remoteModified = state.remoteAssetModifiedAt ? parseISO(state.remoteAssetModifiedAt) : null;
    if (remoteModified && !isAfter(localModified, remoteModified)) {
      return state;
    }

    try {
      const assetRecordId = await images.uploadToCloud(entity.id, 'private');
      images.removePendingUpload(entity.id);
      const next = await this.syncState.update(this.kind, entity.id, {
        remoteAssetRecordId: assetRecordId,
        remoteAssetModifiedAt: localModified.toISOString(),
      });
      this.events.publish({ type: 'entity.metadataChanged', kind: this.kind, id: entity.id });
      return next;
    } catch (error) {
      if (options.strictAssets) throw error;
      this.handleUploadFailure(images, entity.id, error);
      return state;
    }
  }

  private async pushPublicCopy(entity: T, options: PushOptions): Promise<void> {
    const existing = await this.remote.fetchRecord('public', this.kind, entity.id);
    let assetRecordId = existing?.assetRecordId ?? null;
    let assetModifiedAt = existing?.assetModifiedAt ?? null;

    if (this.images && !options.skipAssetSync) {
      const localModified = imageFilenameOf(entity) ? await this.images.getModificationDate(entity.id) : null;

      if (localModified && shouldUploadToPublic(localModified, assetModifiedAt)) {
        try {
          assetRecordId = await this.images.uploadToCloud(entity.id, 'public');
          assetModifiedAt = localModified.toISOString();
          await this.syncState.update(this.kind, entity.id, { publicAssetModifiedAt: assetModifiedAt });
        } catch (error) {
          if (options.strictAssets) throw error;
          this.handleUploadFailure(this.images, entity.id, error);
        }
      } else if (!imageFilenameOf(entity) && assetRecordId) {
        await this.images.deleteFromCloud(entity.id, 'public');
        assetRecordId = null;
        assetModifiedAt = null;
        await this.syncState.update(this.kind, entity.id, { publicAssetModifiedAt: null });
      }
    }

    const saved = await this.remote.saveRecord(
      'public',
      this.kind,
      this.toRemoteRecord(entity, assetRecordId, assetModifiedAt)
    );
    await this.syncState.update(this.kind, entity.id, { publicRecordId: saved.recordId });
  }

  /**
   * Delete the public record and, when one exists, its asset.
   */
  private async removePublicCopy(id: string, state: SyncState): Promise<void> {
    const existing = await this.remote.fetchRecord('public', this.kind, id);
    await this.remote.deleteRecord('public', this.kind, id);
    if (this.images && (existing?.assetRecordId || state.publicAssetModifiedAt)) {
      await this.images.deleteFromCloud(id, 'public');
    }
    await this.syncState.update(this.kind, id, { publicRecordId: null, publicAssetModifiedAt: null });
  }

  protected async pushDeletion(id: string): Promise<void> {
    // Re-created since the delete was queued
    if (await this.localDataSource.exists(id)) return;

    const state = await this.syncState.get(this.kind, id);

    await this.remote.deleteRecord('private', this.kind, id);
    if (this.images) {
      await this.images.deleteFromCloud(id, 'private');
    }
    if (state.publicRecordId) {
      await this.removePublicCopy(id, state);
    }
    await this.syncState.remove(this.kind, id);
  }

  private async retryImageUpload(id: string): Promise<void> {
    const entity = await this.localDataSource.getById(id);
    // Nothing left to upload
    if (!entity || !imageFilenameOf(entity) || !this.images?.imageExists(id)) return;

    await this.pushEntity(entity, { strictAssets: true });
  }

  private handleUploadFailure(images: ImageSyncManager, id: string, error: unknown): void {
    if (error instanceof QuotaExceededError) {
      console.warn(`[${this.constructor.name}] Storage quota exceeded for ${this.kind} image ${id}, not retrying`);
      images.removePendingUpload(id);
      return;
    }
    if (!isRetryableError(error)) {
      console.error(`[${this.constructor.name}] Image upload for ${this.kind} ${id} failed: ${errorMessage(error)}`);
      return;
    }
    console.warn(`[${this.constructor.name}] Image upload for ${this.kind} ${id} failed, will retry: ${errorMessage(error)}`);
    images.addPendingUpload(id);
  }

  // ============ Merge Helpers ============

  private async recordRemoteMetadata(record: RemoteRecord<unknown>): Promise<void> {
    await this.syncState.update(this.kind, record.entityId, {
      remoteRecordId: record.recordId,
      remoteAssetRecordId: record.assetRecordId,
      remoteAssetModifiedAt: record.assetModifiedAt,
      lastSyncedAt: nowIso(),
    });
  }

  private async mergeMetadata(record: RemoteRecord<unknown>): Promise<void> {
    const state = await this.syncState.get(this.kind, record.entityId);
    await this.syncState.update(this.kind, record.entityId, {
      remoteRecordId: state.remoteRecordId ?? record.recordId,
      remoteAssetRecordId: state.remoteAssetRecordId ?? record.assetRecordId,
      remoteAssetModifiedAt: state.remoteAssetModifiedAt ?? record.assetModifiedAt,
      lastSyncedAt: nowIso(),
    });
    this.events.publish({ type: 'entity.metadataChanged', kind: this.kind, id: record.entityId });
  }

  /**
   * Fetch the image a remote record points at. Failures are logged only.
   */
  private async downloadAsset(entity: T, record: RemoteRecord<unknown>, partition: Partition): Promise<void> {
    if (!this.images || !imageFilenameOf(entity) || !record.assetRecordId) return;

    try {
      const filename = await this.images.downloadFromCloud(entity.id, partition);
      if (!filename) return;

      // The file was just written; record its time so it is not uploaded back
      const localModified = await this.images.getModificationDate(entity.id);
      if (localModified) {
        await this.syncState.update(this.kind, entity.id, {
          remoteAssetModifiedAt: localModified.toISOString(),
        });
      }
    } catch (error) {
      console.warn(`[${this.constructor.name}] Image download for ${this.kind} ${entity.id} failed: ${errorMessage(error)}`);
    }
  }

  private async markPublicCopy(id: string): Promise<void> {
    const state = await this.syncState.get(this.kind, id);
    if (!state.publicRecordId) {
      await this.syncState.update(this.kind, id, { publicRecordId: id });
    }
  }

  private async settleOperations(id: string): Promise<void> {
    for (const operation of ['create', 'update', 'delete'] as const) {
      const item = await this.syncQueue.get(this.kind, id, operation);
      if (item && item.status !== 'completed') {
        await this.syncQueue.markCompleted(this.kind, id, operation);
      }
    }
  }

  private async dropPending(id: string, reason: string): Promise<void> {
    this.pendingSync.delete(id);
    this.retryAttempts.delete(id);
    await this.syncQueue.abandon(this.kind, id, reason);
  }

  protected toRemoteRecord(entity: T, assetRecordId: string | null, assetModifiedAt: string | null): RemoteRecordWrite {
    return {
      entityId: entity.id,
      ownerId: entity.ownerId,
      updatedAt: entity.updatedAt,
      assetRecordId,
      assetModifiedAt,
      payload: entity,
    };
  }
}
