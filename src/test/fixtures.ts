import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Database } from '@/lib/database';
import { EventBus, type SyncEvent } from '@/lib/events';
import {
  generateId,
  nowIso,
  type CollectionInput,
  type ConnectionInput,
  type RecipeInput,
  type UserInput,
} from '@/lib/types';
import { createImageManagers, createRepositories, type Repositories } from '@/sync/engine';
import type { ImageOptimizer, OptimizeOptions } from '@/sync/services/ImageOptimizer';
import type { ImageKind, ImageSyncManager } from '@/sync/services/ImageSyncManager';
import { SyncService } from '@/sync/services/SyncService';
import { InMemoryObjectStore } from './InMemoryObjectStore';

export const OWNER_ID = '11111111-1111-4111-8111-111111111111';
export const OTHER_USER_ID = '22222222-2222-4222-8222-222222222222';

// ============ Entity Builders ============

export function makeRecipe(overrides: Partial<RecipeInput> = {}): RecipeInput {
  const now = nowIso();
  return {
    id: generateId(),
    ownerId: OWNER_ID,
    visibility: 'private',
    createdAt: now,
    updatedAt: now,
    title: 'Tomato Soup',
    ingredients: [{ name: 'tomatoes', quantity: 6, unit: null }],
    steps: [{ index: 0, text: 'Simmer for twenty minutes.' }],
    ...overrides,
  };
}

export function makeCollection(overrides: Partial<CollectionInput> = {}): CollectionInput {
  const now = nowIso();
  return {
    id: generateId(),
    ownerId: OWNER_ID,
    visibility: 'private',
    createdAt: now,
    updatedAt: now,
    name: 'Weeknights',
    ...overrides,
  };
}

export function makeConnection(overrides: Partial<ConnectionInput> = {}): ConnectionInput {
  const now = nowIso();
  return {
    id: generateId(),
    ownerId: OWNER_ID,
    visibility: 'public',
    createdAt: now,
    updatedAt: now,
    fromUserId: OWNER_ID,
    toUserId: OTHER_USER_ID,
    ...overrides,
  };
}

export function makeUser(overrides: Partial<UserInput> = {}): UserInput {
  const now = nowIso();
  return {
    id: OWNER_ID,
    ownerId: OWNER_ID,
    visibility: 'public',
    createdAt: now,
    updatedAt: now,
    username: 'cook',
    displayName: 'Test Cook',
    ...overrides,
  };
}

// ============ Stubs ============

/**
 * Optimizer that returns its input unchanged and records the options it saw.
 */
export class PassthroughOptimizer implements ImageOptimizer {
  readonly calls: OptimizeOptions[] = [];

  async optimize(input: Buffer, options: OptimizeOptions): Promise<Buffer> {
    this.calls.push(options);
    return input;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'recipe-sync-'));
}

// ============ Test Context ============

export interface TestContext extends Repositories {
  db: Database;
  remote: InMemoryObjectStore;
  events: EventBus;
  published: SyncEvent[];
  syncService: SyncService;
  images: Record<ImageKind, ImageSyncManager>;
  imageDirectory: string;
  cleanup(): Promise<void>;
}

export interface TestContextOptions {
  db?: Database;
  remote?: InMemoryObjectStore;
  /** Reuse image files from an earlier context. */
  imageDirectory?: string;
}

/**
 * Repositories over an in-memory database and an in-memory remote store.
 * The retry scheduler is not started; tests drive sweeps explicitly.
 */
export async function createTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const db = options.db ?? (await Database.open());
  const remote = options.remote ?? new InMemoryObjectStore();
  const events = new EventBus();
  const published: SyncEvent[] = [];
  events.subscribe((event) => published.push(event));

  const syncService = new SyncService({ db, remote, events });
  const imageDirectory = options.imageDirectory ?? (await makeTempDir());
  const images = createImageManagers(syncService, imageDirectory, new PassthroughOptimizer());
  const repositories = createRepositories(syncService, images);

  return {
    ...repositories,
    db,
    remote,
    events,
    published,
    syncService,
    images,
    imageDirectory,
    async cleanup() {
      await syncService.destroy();
      await db.close();
      await rm(imageDirectory, { recursive: true, force: true });
    },
  };
}
