/**
 * ImageSyncManager
 *
 * Binary assets for one entity kind: local files named `<entityId>.jpg`,
 * cloud upload/download/delete through injected operations, download
 * coalescing, a short-lived "not found" cache and the pending-upload set.
 */

import { existsSync } from 'node:fs';
import { copyFile, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isAfter } from 'date-fns';
import { CloudNotConfiguredError, NotFoundError, errorMessage, isRetryableError } from '@/lib/errors';
import type { EventBus } from '@/lib/events';
import { imageFilenameFor } from '@/lib/types';
import { SYNC_CONFIG } from '../types';
import type { EntityKind, Partition, SweepOutcome } from '../types';
import type { ImageOptimizer } from './ImageOptimizer';

export interface ImageRemote {
  /** Returns the remote asset id. */
  upload(entityId: string, bytes: Buffer, partition: Partition): Promise<string>;
  /** Resolves null when no asset exists. */
  download(entityId: string, partition: Partition): Promise<Buffer | null>;
  delete(entityId: string, partition: Partition): Promise<void>;
}

export interface ImageProfile {
  directoryName: string;
  maxDimension: number;
  targetSizeBytes: number;
}

export const IMAGE_PROFILES = {
  recipe: { directoryName: 'RecipeImages', maxDimension: 2000, targetSizeBytes: 5_000_000 },
  user: { directoryName: 'ProfileImages', maxDimension: 800, targetSizeBytes: 1_000_000 },
  collection: { directoryName: 'CollectionImages', maxDimension: 1200, targetSizeBytes: 2_000_000 },
} as const satisfies Partial<Record<EntityKind, ImageProfile>>;

export type ImageKind = keyof typeof IMAGE_PROFILES;

export interface ImageSyncManagerOptions {
  kind: EntityKind;
  /** Directory holding the image files. */
  directory: string;
  maxDimension?: number;
  targetSizeBytes?: number;
  optimizer: ImageOptimizer;
  remote?: ImageRemote;
  events?: EventBus;
  maxRetryAttempts?: number;
  notFoundCacheMs?: number;
}

export type ImageSyncState = 'synced' | 'uploadPending' | 'downloadPending' | 'localOnly';

export interface ImageSyncStateInput {
  hasCloudImage: boolean;
  cloudModified: Date | null;
}

function cacheKey(entityId: string, partition: Partition): string {
  return `${entityId}-${partition}`;
}

export class ImageSyncManager {
  readonly kind: EntityKind;
  private readonly directory: string;
  private readonly maxDimension: number;
  private readonly targetSizeBytes: number;
  private readonly maxRetryAttempts: number;
  private readonly notFoundCacheMs: number;

  private inFlightDownloads: Map<string, Promise<string | null>> = new Map();
  private notFoundCache: Map<string, number> = new Map();
  // Bumped per entity on every upload; a miss from an older generation is not cached
  private uploadGenerations: Map<string, number> = new Map();
  private pendingUploads: Map<string, number> = new Map();

  constructor(private readonly options: ImageSyncManagerOptions) {
    this.kind = options.kind;
    this.directory = options.directory;
    this.maxDimension = options.maxDimension ?? 800;
    this.targetSizeBytes = options.targetSizeBytes ?? 1_000_000;
    this.maxRetryAttempts = options.maxRetryAttempts ?? SYNC_CONFIG.MAX_RETRY_ATTEMPTS;
    this.notFoundCacheMs = options.notFoundCacheMs ?? SYNC_CONFIG.NOT_FOUND_CACHE_MS;
  }

  // ============ Local Storage ============

  imagePath(entityId: string): string {
    return join(this.directory, imageFilenameFor(entityId));
  }

  /**
   * Optimize and store an image. Returns the stored filename.
   */
  async saveImage(entityId: string, bytes: Buffer): Promise<string> {
    const optimized = await this.options.optimizer.optimize(bytes, {
      maxDimension: this.maxDimension,
      targetSizeBytes: this.targetSizeBytes,
    });
    return this.writeImage(entityId, optimized);
  }

  async loadImage(entityId: string): Promise<Buffer | null> {
    try {
      return await readFile(this.imagePath(entityId));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async deleteImage(entityId: string): Promise<void> {
    await rm(this.imagePath(entityId), { force: true });
  }

  imageExists(entityId: string): boolean {
    return existsSync(this.imagePath(entityId));
  }

  async getModificationDate(entityId: string): Promise<Date | null> {
    try {
      const stats = await stat(this.imagePath(entityId));
      return stats.mtime;
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  /**
   * Copy one entity's image to another. Returns the target filename, or null
   * when the source has no image.
   */
  async copyImage(sourceId: string, targetId: string): Promise<string | null> {
    if (!this.imageExists(sourceId)) {
      return null;
    }
    await mkdir(this.directory, { recursive: true });
    await copyFile(this.imagePath(sourceId), this.imagePath(targetId));
    return imageFilenameFor(targetId);
  }

  // ============ Cloud Sync ============

  /**
   * Upload the local image. Returns the remote asset id.
   */
  async uploadToCloud(entityId: string, partition: Partition = 'private'): Promise<string> {
    const remote = this.requireRemote();
    const bytes = await this.loadImage(entityId);
    if (!bytes) {
      throw new NotFoundError(`${this.kind} image`, entityId);
    }

    console.info(`[ImageSyncManager] Uploading ${this.kind} image ${entityId} (${partition})`);
    const assetId = await remote.upload(entityId, bytes, partition);
    this.clearNotFoundCache(entityId);
    return assetId;
  }

  /**
   * Download the image and store it locally. Returns the filename, or null
   * when the remote has no image. Concurrent calls for the same id and
   * partition share one request.
   */
  downloadFromCloud(entityId: string, partition: Partition = 'private'): Promise<string | null> {
    const key = cacheKey(entityId, partition);

    const cachedAt = this.notFoundCache.get(key);
    if (cachedAt !== undefined) {
      if (Date.now() - cachedAt < this.notFoundCacheMs) {
        return Promise.resolve(null);
      }
      this.notFoundCache.delete(key);
    }

    const existing = this.inFlightDownloads.get(key);
    if (existing) {
      return existing;
    }

    const task = this.performDownload(entityId, partition, key).finally(() => {
      this.inFlightDownloads.delete(key);
    });
    this.inFlightDownloads.set(key, task);
    return task;
  }

  async deleteFromCloud(entityId: string, partition: Partition = 'private'): Promise<void> {
    const remote = this.requireRemote();
    console.info(`[ImageSyncManager] Deleting ${this.kind} image ${entityId} (${partition})`);
    await remote.delete(entityId, partition);
  }

  clearNotFoundCache(entityId: string): void {
    this.uploadGenerations.set(entityId, this.uploadGeneration(entityId) + 1);
    this.notFoundCache.delete(cacheKey(entityId, 'private'));
    this.notFoundCache.delete(cacheKey(entityId, 'public'));
  }

  clearAllNotFoundCache(): void {
    this.notFoundCache.clear();
  }

  get inFlightCount(): number {
    return this.inFlightDownloads.size;
  }

  // ============ Pending Uploads ============

  addPendingUpload(entityId: string): void {
    if (!this.pendingUploads.has(entityId)) {
      this.pendingUploads.set(entityId, 0);
    }
    this.options.events?.publish({ type: 'image.uploadPending', kind: this.kind, id: entityId });
  }

  removePendingUpload(entityId: string): void {
    this.pendingUploads.delete(entityId);
  }

  pendingUploadIds(): string[] {
    return [...this.pendingUploads.keys()];
  }

  hasPendingUpload(entityId: string): boolean {
    return this.pendingUploads.has(entityId);
  }

  retryCount(entityId: string): number {
    return this.pendingUploads.get(entityId) ?? 0;
  }

  /**
   * Retry every pending upload through `upload`. Ids that fail terminally or
   * reach the attempt cap are dropped from the pending set.
   */
  async retryPendingUploads(
    upload: (entityId: string) => Promise<void>,
    isCancelled: () => boolean = () => false
  ): Promise<SweepOutcome> {
    const ids = this.pendingUploadIds();
    if (ids.length === 0) {
      return 'idle';
    }

    console.info(`[ImageSyncManager] Retrying ${ids.length} pending ${this.kind} image uploads`);
    let anySuccess = false;

    for (const entityId of ids) {
      if (isCancelled()) break;
      if (!this.pendingUploads.has(entityId)) continue;

      try {
        await upload(entityId);
        this.pendingUploads.delete(entityId);
        this.options.events?.publish({ type: 'image.uploadCompleted', kind: this.kind, id: entityId });
        anySuccess = true;
      } catch (error) {
        if (!isRetryableError(error)) {
          console.warn(`[ImageSyncManager] Dropping ${this.kind} image ${entityId}: ${errorMessage(error)}`);
          this.pendingUploads.delete(entityId);
          continue;
        }

        const attempts = (this.pendingUploads.get(entityId) ?? 0) + 1;
        if (attempts >= this.maxRetryAttempts) {
          console.warn(`[ImageSyncManager] Giving up on ${this.kind} image ${entityId} after ${attempts} attempts`);
          this.pendingUploads.delete(entityId);
        } else {
          this.pendingUploads.set(entityId, attempts);
        }
      }
    }

    return anySuccess ? 'success' : 'failure';
  }

  /**
   * Where the local image stands relative to its cloud copy.
   */
  async getSyncState(entityId: string, cloud: ImageSyncStateInput): Promise<ImageSyncState> {
    if (this.pendingUploads.has(entityId)) {
      return 'uploadPending';
    }

    const localModified = await this.getModificationDate(entityId);
    if (!cloud.hasCloudImage) {
      return 'localOnly';
    }
    if (!localModified) {
      return 'downloadPending';
    }
    if (!cloud.cloudModified) {
      return 'synced';
    }
    if (isAfter(localModified, cloud.cloudModified)) {
      return 'uploadPending';
    }
    if (isAfter(cloud.cloudModified, localModified)) {
      return 'downloadPending';
    }
    return 'synced';
  }

  // ============ Private ============

  private async performDownload(entityId: string, partition: Partition, key: string): Promise<string | null> {
    const remote = this.requireRemote();
    const generation = this.uploadGeneration(entityId);
    const bytes = await remote.download(entityId, partition);
    if (!bytes) {
      if (generation === this.uploadGeneration(entityId)) {
        this.notFoundCache.set(key, Date.now());
      }
      return null;
    }
    return this.writeImage(entityId, bytes);
  }

  private uploadGeneration(entityId: string): number {
    return this.uploadGenerations.get(entityId) ?? 0;
  }

  private async writeImage(entityId: string, bytes: Buffer): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.imagePath(entityId), bytes);
    return imageFilenameFor(entityId);
  }

  private requireRemote(): ImageRemote {
    if (!this.options.remote) {
      throw new CloudNotConfiguredError();
    }
    return this.options.remote;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
