/**
 * SyncService
 *
 * Central orchestrator for all sync operations:
 * - Owns the shared stores (queue, tombstones, sync state) and the task runner
 * - Restart recovery from resumable queue rows and local images
 * - Pull (sync-down) across repositories in dependency order
 * - Retry scheduling through the RetryScheduler
 */

import type { Database } from '@/lib/database';
import { errorMessage } from '@/lib/errors';
import { EventBus } from '@/lib/events';
import type { RemoteObjectStore } from '../datasources/types';
import { SyncStateStore } from '../datasources/SyncStateStore';
import {
  SYNC_KIND_ORDER,
  type EntityKind,
  type PullResult,
  type RetryParticipant,
  type SweepOutcome,
  type SyncOperationKind,
  type SyncResult,
  type SyncStatusListener,
  type SyncStatusState,
} from '../types';
import { BackgroundTasks } from './BackgroundTasks';
import { RetryScheduler } from './RetryScheduler';
import { SyncQueue } from './SyncQueue';
import { TombstoneStore } from './TombstoneStore';

// Interface that repositories must implement to participate in sync
export interface SyncableRepository {
  readonly kind: EntityKind;

  // Pull remote records for an owner and merge them into local
  syncDown(ownerId: string, since: string | null): Promise<PullResult>;

  // Re-add an entity whose operation was interrupted by a restart
  recoverPending(entityId: string, operation: SyncOperationKind): void;

  // Re-park local images the cloud has not acknowledged
  recoverPendingUploads(): Promise<number>;

  // Pending sets the retry scheduler should sweep
  retryParticipants(): RetryParticipant[];
}

export interface SyncServiceOptions {
  db: Database;
  remote: RemoteObjectStore;
  events?: EventBus;
  scheduler?: RetryScheduler;
  tombstoneRetentionDays?: number;
}

export class SyncService {
  private isSyncingInner: boolean = false;
  private lastSyncAtInner: string | null = null;
  private initialized = false;

  private statusListeners: Set<SyncStatusListener> = new Set();
  private repositories: Map<EntityKind, SyncableRepository> = new Map();
  private unregisterParticipants: Map<EntityKind, (() => void)[]> = new Map();

  private readonly db: Database;
  private readonly remote: RemoteObjectStore;
  private readonly events: EventBus;
  private readonly syncQueue: SyncQueue;
  private readonly tombstones: TombstoneStore;
  private readonly syncState: SyncStateStore;
  private readonly tasks: BackgroundTasks;
  private readonly scheduler: RetryScheduler;

  constructor(options: SyncServiceOptions) {
    this.db = options.db;
    this.remote = options.remote;
    this.events = options.events ?? new EventBus();
    this.syncQueue = new SyncQueue(this.db, this.events);
    this.tombstones = new TombstoneStore(this.db, options.tombstoneRetentionDays);
    this.syncState = new SyncStateStore(this.db);
    this.tasks = new BackgroundTasks('SyncTasks');
    this.scheduler = options.scheduler ?? new RetryScheduler();
  }

  /**
   * Recover interrupted work and start the retry scheduler.
   * Call this once when the process starts, after registering repositories.
   */
  async initialize(): Promise<number> {
    if (this.initialized) return 0;
    this.initialized = true;

    const recovered = await this.recoverPendingOperations();
    this.scheduler.start();
    return recovered;
  }

  /**
   * Stop the scheduler and wait for background work to settle.
   */
  async destroy(): Promise<void> {
    this.scheduler.stop();
    await this.tasks.drain();

    for (const unregister of [...this.unregisterParticipants.values()].flat()) {
      unregister();
    }
    this.unregisterParticipants.clear();
    this.statusListeners.clear();
    this.repositories.clear();
    this.initialized = false;
  }

  // ============ Status Getters ============

  get isSyncing(): boolean {
    return this.isSyncingInner;
  }

  get lastSyncAt(): string | null {
    return this.lastSyncAtInner;
  }

  // ============ Repository Registration ============

  /**
   * Register a repository to participate in sync.
   * Must be called for each entity repository.
   */
  registerRepository(repository: SyncableRepository): void {
    this.unregisterRepository(repository.kind);
    this.repositories.set(repository.kind, repository);
    this.unregisterParticipants.set(
      repository.kind,
      repository.retryParticipants().map((participant) => this.scheduler.register(participant))
    );
  }

  unregisterRepository(kind: EntityKind): void {
    for (const unregister of this.unregisterParticipants.get(kind) ?? []) {
      unregister();
    }
    this.unregisterParticipants.delete(kind);
    this.repositories.delete(kind);
  }

  getRepository(kind: EntityKind): SyncableRepository | undefined {
    return this.repositories.get(kind);
  }

  // ============ Shared Collaborators ============

  getDatabase(): Database {
    return this.db;
  }

  getRemote(): RemoteObjectStore {
    return this.remote;
  }

  getEvents(): EventBus {
    return this.events;
  }

  getSyncQueue(): SyncQueue {
    return this.syncQueue;
  }

  getTombstones(): TombstoneStore {
    return this.tombstones;
  }

  getSyncStateStore(): SyncStateStore {
    return this.syncState;
  }

  getTasks(): BackgroundTasks {
    return this.tasks;
  }

  getScheduler(): RetryScheduler {
    return this.scheduler;
  }

  // ============ Sync Triggers ============

  /**
   * Hand resumable operations back to their repositories' pending sets and
   * rebuild their pending image uploads. Returns how many were recovered.
   */
  async recoverPendingOperations(): Promise<number> {
    const unfinished = await this.syncQueue.getUnfinished();
    let recovered = 0;

    for (const operation of unfinished) {
      const repository = this.repositories.get(operation.entityKind);
      if (!repository) {
        console.warn(`[SyncService] No repository registered for ${operation.entityKind}`);
        continue;
      }
      repository.recoverPending(operation.entityId, operation.operation);
      recovered++;
    }

    let uploads = 0;
    for (const repository of this.repositories.values()) {
      uploads += await repository.recoverPendingUploads();
    }

    if (recovered > 0 || uploads > 0) {
      console.info(`[SyncService] Recovered ${recovered} sync operations and ${uploads} image uploads`);
    }
    return recovered + uploads;
  }

  /**
   * Pull remote changes for all registered repositories, in dependency order.
   */
  async pullChanges(ownerId: string, since: string | null = this.lastSyncAtInner): Promise<SyncResult> {
    const result: SyncResult = {
      success: true,
      pulled: [],
      tombstonesCleaned: 0,
      errors: [],
    };

    for (const kind of SYNC_KIND_ORDER) {
      const repository = this.repositories.get(kind);
      if (!repository) continue;

      try {
        result.pulled.push(await repository.syncDown(ownerId, since));
      } catch (error) {
        result.errors.push(`Pull ${kind} failed: ${errorMessage(error)}`);
        // Continue with other kinds
      }
    }

    if (result.errors.length > 0) {
      result.success = false;
    }

    return result;
  }

  /**
   * Perform a full sync: pull, retry pending work, then purge old tombstones.
   */
  async fullSync(ownerId: string): Promise<SyncResult> {
    if (this.isSyncingInner) {
      return {
        success: false,
        pulled: [],
        tombstonesCleaned: 0,
        errors: ['Sync already in progress'],
      };
    }

    this.isSyncingInner = true;

    try {
      if (!(await this.remote.isAvailable())) {
        this.notifyStatusListeners('offline');
        return { success: true, pulled: [], tombstonesCleaned: 0, errors: [] };
      }

      this.notifyStatusListeners('syncing');
      const startedAt = new Date().toISOString();

      const result = await this.pullChanges(ownerId);
      await this.scheduler.runSweep();

      // Only purge once this device has caught up with the remote
      if (result.success) {
        result.tombstonesCleaned = await this.tombstones.cleanup();
        this.lastSyncAtInner = startedAt;
      }

      this.notifyStatusListeners(result.success ? 'idle' : 'error', result.errors[0]);
      return result;
    } catch (error) {
      const message = errorMessage(error);
      this.notifyStatusListeners('error', message);
      return { success: false, pulled: [], tombstonesCleaned: 0, errors: [message] };
    } finally {
      this.isSyncingInner = false;
    }
  }

  /**
   * Run a retry sweep now instead of waiting for the scheduler.
   */
  retryNow(): Promise<SweepOutcome> {
    return this.scheduler.runSweep();
  }

  /**
   * Resolve once every background propagation task has finished.
   */
  waitForIdle(): Promise<void> {
    return this.tasks.drain();
  }

  // ============ Status Subscriptions ============

  onStatusChange(listener: SyncStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  // ============ Utility Methods ============

  /**
   * Operations not yet completed, failed ones included.
   */
  async getPendingCount(): Promise<number> {
    return this.syncQueue.getPendingCount();
  }

  private notifyStatusListeners(status: SyncStatusState, error?: string): void {
    for (const listener of this.statusListeners) {
      try {
        listener(status, error);
      } catch (e) {
        console.error('[SyncService] Error in sync status listener:', e);
      }
    }
  }
}
