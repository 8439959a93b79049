/**
 * Sync engine wiring
 *
 * Creates the database, remote store, image managers and repositories,
 * all sharing a single SyncService.
 */

import { join } from 'node:path';
import { Database } from '@/lib/database';
import type { EventBus } from '@/lib/events';
import { getSupabase } from '@/lib/supabase';
import { readSupabaseConfig, type SupabaseConfig } from '@/lib/supabase-config';
import { createObjectStoreImageRemote } from './datasources/ObjectStoreImageRemote';
import { OfflineObjectStore } from './datasources/OfflineObjectStore';
import { SupabaseObjectStore } from './datasources/SupabaseObjectStore';
import type { RemoteObjectStore } from './datasources/types';
import {
  CollectionsRepository,
  ConnectionsRepository,
  RecipesRepository,
  UsersRepository,
} from './repositories';
import { SharpImageOptimizer, type ImageOptimizer } from './services/ImageOptimizer';
import { IMAGE_PROFILES, ImageSyncManager, type ImageKind } from './services/ImageSyncManager';
import type { RetryScheduler } from './services/RetryScheduler';
import { SyncService } from './services/SyncService';

export interface SyncEngineOptions {
  /** SQLite file to persist to. Omit for an in-memory database. */
  databaseFile?: string;
  /** Root directory for image files; each kind gets its own subdirectory. */
  imageDirectory: string;
  /** Remote store to use instead of the configured Supabase project. */
  remote?: RemoteObjectStore;
  supabase?: SupabaseConfig;
  optimizer?: ImageOptimizer;
  events?: EventBus;
  scheduler?: RetryScheduler;
  tombstoneRetentionDays?: number;
}

export interface Repositories {
  recipes: RecipesRepository;
  collections: CollectionsRepository;
  connections: ConnectionsRepository;
  users: UsersRepository;
}

export interface SyncEngine extends Repositories {
  syncService: SyncService;
  database: Database;
  images: Record<ImageKind, ImageSyncManager>;
  /** Stop background work and persist the database. */
  close(): Promise<void>;
}

function resolveRemote(options: SyncEngineOptions): RemoteObjectStore {
  if (options.remote) {
    return options.remote;
  }
  const supabase = getSupabase(options.supabase ?? readSupabaseConfig());
  return supabase ? new SupabaseObjectStore(supabase) : new OfflineObjectStore();
}

/**
 * Create one image manager per kind that carries images.
 */
export function createImageManagers(
  syncService: SyncService,
  imageDirectory: string,
  optimizer: ImageOptimizer = new SharpImageOptimizer()
): Record<ImageKind, ImageSyncManager> {
  const create = (kind: ImageKind) => {
    const profile = IMAGE_PROFILES[kind];
    return new ImageSyncManager({
      kind,
      directory: join(imageDirectory, profile.directoryName),
      maxDimension: profile.maxDimension,
      targetSizeBytes: profile.targetSizeBytes,
      optimizer,
      remote: createObjectStoreImageRemote(syncService.getRemote(), kind),
      events: syncService.getEvents(),
    });
  };

  return {
    recipe: create('recipe'),
    collection: create('collection'),
    user: create('user'),
  };
}

/**
 * Create all repository instances with a shared SyncService.
 */
export function createRepositories(
  syncService: SyncService,
  images: Partial<Record<ImageKind, ImageSyncManager>> = {}
): Repositories {
  const collections = new CollectionsRepository(syncService, { images: images.collection });
  const recipes = new RecipesRepository(syncService, { images: images.recipe, collections });
  const connections = new ConnectionsRepository(syncService);
  const users = new UsersRepository(syncService, { images: images.user });

  // Register all repositories with the sync service
  syncService.registerRepository(users);
  syncService.registerRepository(recipes);
  syncService.registerRepository(collections);
  syncService.registerRepository(connections);

  return { recipes, collections, connections, users };
}

/**
 * Open the database, build every repository and start the sync service.
 */
export async function createSyncEngine(options: SyncEngineOptions): Promise<SyncEngine> {
  const database = await Database.open({ filename: options.databaseFile });
  const syncService = new SyncService({
    db: database,
    remote: resolveRemote(options),
    events: options.events,
    scheduler: options.scheduler,
    tombstoneRetentionDays: options.tombstoneRetentionDays,
  });

  const images = createImageManagers(syncService, options.imageDirectory, options.optimizer);
  const repositories = createRepositories(syncService, images);

  await syncService.initialize();

  return {
    ...repositories,
    syncService,
    database,
    images,
    async close() {
      await syncService.destroy();
      await database.close();
    },
  };
}
