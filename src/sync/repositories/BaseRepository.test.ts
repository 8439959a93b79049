import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { addMinutes } from 'date-fns';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Database } from '@/lib/database';
import {
  InvalidDataError,
  NetworkUnavailableError,
  NotFoundError,
  QuotaExceededError,
} from '@/lib/errors';
import type { Recipe } from '@/lib/types';
import { InMemoryObjectStore } from '@/test/InMemoryObjectStore';
import { createTestContext, makeRecipe, makeTempDir, OWNER_ID, type TestContext } from '@/test/fixtures';
import { nextTimestamp, shouldUploadToPublic } from './BaseRepository';

describe('nextTimestamp', () => {
  it('never moves backwards', () => {
    const future = addMinutes(new Date(), 10).toISOString();
    expect(nextTimestamp(future)).toBe(future);
  });

  it('uses the current time when it is later', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));

    expect(nextTimestamp('2024-04-01T00:00:00.000Z')).toBe('2024-05-01T12:00:00.000Z');
    vi.useRealTimers();
  });
});

describe('shouldUploadToPublic', () => {
  const local = new Date('2024-05-01T12:00:00.000Z');

  it('uploads when the public copy has no asset time', () => {
    expect(shouldUploadToPublic(local, null)).toBe(true);
  });

  it('skips uploads within one second of the public asset time', () => {
    expect(shouldUploadToPublic(local, '2024-05-01T12:00:00.900Z')).toBe(false);
    expect(shouldUploadToPublic(local, '2024-05-01T11:59:59.000Z')).toBe(false);
  });

  it('uploads when the public asset is more than a second apart', () => {
    expect(shouldUploadToPublic(local, '2024-05-01T12:00:01.001Z')).toBe(true);
  });
});

describe('BaseRepository', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    ctx = await createTestContext();
  });

  afterEach(async () => {
    vi.useRealTimers();
    await ctx.cleanup();
  });

  async function createSynced(overrides: Partial<Recipe> = {}): Promise<Recipe> {
    const recipe = await ctx.recipes.create(makeRecipe(overrides));
    await ctx.syncService.waitForIdle();
    return recipe;
  }

  // ============ Local Writes ============

  describe('create', () => {
    it('is readable immediately while the remote is unreachable', async () => {
      ctx.remote.available = false;

      const recipe = await ctx.recipes.create(makeRecipe({ title: 'Offline Soup' }));

      expect(await ctx.recipes.fetch(recipe.id)).toEqual(recipe);
      await ctx.syncService.waitForIdle();
      expect(await ctx.recipes.fetch(recipe.id)).toEqual(recipe);
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)).toBeNull();
    });

    it('records a failed propagation and retries it later', async () => {
      ctx.remote.available = false;
      const recipe = await ctx.recipes.create(makeRecipe());
      await ctx.syncService.waitForIdle();

      const queue = ctx.syncService.getSyncQueue();
      const failed = await queue.get('recipe', recipe.id, 'create');
      expect(failed?.status).toBe('failed');
      expect(failed?.lastError).toBe('Remote store is not reachable');
      expect(ctx.recipes.hasPendingSync(recipe.id)).toBe(true);

      const state = await ctx.syncService.getSyncStateStore().get('recipe', recipe.id);
      expect(state.remoteRecordId).toBeNull();

      ctx.remote.available = true;
      expect(await ctx.recipes.retryPendingSyncs()).toBe('success');

      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(recipe);
      expect((await queue.get('recipe', recipe.id, 'create'))?.status).toBe('completed');
      expect(ctx.recipes.hasPendingSync(recipe.id)).toBe(false);
      expect((await ctx.syncService.getSyncStateStore().get('recipe', recipe.id)).remoteRecordId).toBe(recipe.id);
    });

    it('pushes a private entity to the private partition only', async () => {
      const recipe = await createSynced();

      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(recipe);
      expect(ctx.remote.getRecord('public', 'recipe', recipe.id)).toBeNull();
    });

    it('copies a public entity to both partitions', async () => {
      const recipe = await createSynced({ visibility: 'public' });

      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(recipe);
      expect(ctx.remote.getRecord('public', 'recipe', recipe.id)?.payload).toEqual(recipe);
      expect((await ctx.syncService.getSyncStateStore().get('recipe', recipe.id)).publicRecordId).toBe(recipe.id);
    });

    it('rejects an invalid entity without writing it', async () => {
      await expect(ctx.recipes.create(makeRecipe({ title: '' }))).rejects.toBeInstanceOf(InvalidDataError);
      expect(await ctx.recipes.fetchAll()).toEqual([]);
      expect(await ctx.syncService.getSyncQueue().list()).toEqual([]);
    });

    it('publishes entity.created', async () => {
      const recipe = await ctx.recipes.create(makeRecipe());

      expect(ctx.published).toContainEqual({ type: 'entity.created', kind: 'recipe', id: recipe.id });
    });
  });

  describe('update', () => {
    it('throws for an unknown id', async () => {
      await expect(ctx.recipes.update(makeRecipe())).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps createdAt and never moves updatedAt backwards', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
      const recipe = await ctx.recipes.create(
        makeRecipe({ createdAt: '2024-05-01T12:00:00.000Z', updatedAt: '2024-05-01T12:00:00.000Z' })
      );

      vi.setSystemTime(new Date('2024-05-01T11:00:00.000Z'));
      const edited = await ctx.recipes.update({ ...recipe, title: 'Edited', createdAt: '2020-01-01T00:00:00.000Z' });

      expect(edited.updatedAt).toBe('2024-05-01T12:00:00.000Z');
      expect(edited.createdAt).toBe('2024-05-01T12:00:00.000Z');

      vi.setSystemTime(new Date('2024-05-01T13:00:00.000Z'));
      const later = await ctx.recipes.update({ ...edited, title: 'Edited again' });
      expect(later.updatedAt).toBe('2024-05-01T13:00:00.000Z');
    });

    it('keeps the given timestamp when asked to', async () => {
      const recipe = await ctx.recipes.create(makeRecipe());

      const reconciled = await ctx.recipes.update(
        { ...recipe, updatedAt: '2030-01-01T00:00:00.000Z' },
        { preserveTimestamp: true }
      );

      expect(reconciled.updatedAt).toBe('2030-01-01T00:00:00.000Z');
    });

    it('pushes the latest local state after rapid edits', async () => {
      const recipe = await ctx.recipes.create(makeRecipe({ title: 'A' }));
      await ctx.recipes.update({ ...recipe, title: 'B' });
      const last = await ctx.recipes.update({ ...recipe, title: 'C' });
      await ctx.syncService.waitForIdle();

      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(last);
      expect((await ctx.syncService.getSyncQueue().get('recipe', recipe.id, 'update'))?.status).toBe('completed');
    });

    it('removes the public copy when an entity becomes private', async () => {
      const recipe = await createSynced({ visibility: 'public' });
      await ctx.recipes.setImage(recipe.id, Buffer.from('photo'));
      await ctx.syncService.waitForIdle();

      expect(ctx.remote.getAsset('public', 'recipe', recipe.id)).toEqual(Buffer.from('photo'));
      expect(ctx.remote.getRecord('public', 'recipe', recipe.id)?.assetRecordId).toBe(`recipe/${recipe.id}.jpg`);

      await ctx.recipes.updateVisibility(recipe.id, 'private');
      await ctx.syncService.waitForIdle();

      expect(ctx.remote.getRecord('public', 'recipe', recipe.id)).toBeNull();
      expect(ctx.remote.getAsset('public', 'recipe', recipe.id)).toBeNull();
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toMatchObject({ visibility: 'private' });
      expect(ctx.remote.getAsset('private', 'recipe', recipe.id)).toEqual(Buffer.from('photo'));
      expect(ctx.remote.callsTo('deleteRecord', 'private')).toEqual([]);
      expect(ctx.remote.callsTo('deleteAsset', 'private')).toEqual([]);

      const state = await ctx.syncService.getSyncStateStore().get('recipe', recipe.id);
      expect(state.publicRecordId).toBeNull();
      expect(state.publicAssetModifiedAt).toBeNull();
      expect(ctx.published).toContainEqual({
        type: 'entity.visibilityChanged',
        kind: 'recipe',
        id: recipe.id,
        oldVisibility: 'public',
        newVisibility: 'private',
      });
    });

    it('deletes the remote asset when the image is removed', async () => {
      const recipe = await createSynced();
      await ctx.recipes.setImage(recipe.id, Buffer.from('photo'));
      await ctx.syncService.waitForIdle();
      expect(ctx.remote.getAsset('private', 'recipe', recipe.id)).toEqual(Buffer.from('photo'));

      await ctx.recipes.removeImage(recipe.id);
      await ctx.syncService.waitForIdle();

      expect(ctx.remote.getAsset('private', 'recipe', recipe.id)).toBeNull();
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.assetRecordId).toBeNull();
      const state = await ctx.syncService.getSyncStateStore().get('recipe', recipe.id);
      expect(state.remoteAssetRecordId).toBeNull();
      expect(state.remoteAssetModifiedAt).toBeNull();
    });

    it('does not upload an unchanged image again', async () => {
      const recipe = await createSynced();
      const withImage = await ctx.recipes.setImage(recipe.id, Buffer.from('photo'));
      await ctx.syncService.waitForIdle();

      await ctx.recipes.update({ ...withImage, title: 'Renamed' });
      await ctx.syncService.waitForIdle();

      expect(ctx.remote.callsTo('uploadAsset', 'private')).toHaveLength(1);
    });
  });

  describe('delete', () => {
    it('throws for an unknown id', async () => {
      await expect(ctx.recipes.delete('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('removes both partitions and the local image of a public entity', async () => {
      const recipe = await createSynced({ visibility: 'public' });
      await ctx.recipes.setImage(recipe.id, Buffer.from('photo'));
      await ctx.syncService.waitForIdle();

      await ctx.recipes.delete(recipe.id);
      await ctx.syncService.waitForIdle();

      expect(await ctx.recipes.fetch(recipe.id)).toBeNull();
      expect(ctx.images.recipe.imageExists(recipe.id)).toBe(false);
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)).toBeNull();
      expect(ctx.remote.getRecord('public', 'recipe', recipe.id)).toBeNull();
      expect(ctx.remote.getAsset('private', 'recipe', recipe.id)).toBeNull();
      expect(ctx.remote.getAsset('public', 'recipe', recipe.id)).toBeNull();
      expect((await ctx.syncService.getSyncStateStore().get('recipe', recipe.id)).remoteRecordId).toBeNull();
    });

    it('writes a tombstone carrying the remote record id', async () => {
      const recipe = await createSynced();

      await ctx.recipes.delete(recipe.id);

      const tombstone = await ctx.syncService.getTombstones().get('recipe', recipe.id);
      expect(tombstone?.remoteRecordId).toBe(recipe.id);
    });

    it('drops earlier queued operations for the entity', async () => {
      ctx.remote.available = false;
      const recipe = await ctx.recipes.create(makeRecipe());
      await ctx.syncService.waitForIdle();

      await ctx.recipes.delete(recipe.id);
      await ctx.syncService.waitForIdle();

      const operations = await ctx.syncService.getSyncQueue().list({ kind: 'recipe' });
      expect(operations.map((op) => op.operation)).toEqual(['delete']);
    });

    it('clears the tombstone when the same id is created again', async () => {
      const recipe = await createSynced();
      await ctx.recipes.delete(recipe.id);
      await ctx.syncService.waitForIdle();

      const again = await ctx.recipes.create(makeRecipe({ id: recipe.id, title: 'Second life' }));
      await ctx.syncService.waitForIdle();

      expect(await ctx.syncService.getTombstones().isDeleted('recipe', recipe.id)).toBe(false);
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(again);
    });
  });

  // ============ Pull ============

  describe('syncDown', () => {
    it('never resurrects a deleted entity', async () => {
      const recipe = await createSynced();
      ctx.remote.available = false;
      await ctx.recipes.delete(recipe.id);
      await ctx.syncService.waitForIdle();

      ctx.remote.available = true;
      const result = await ctx.recipes.syncDown(OWNER_ID);

      expect(result).toEqual({
        kind: 'recipe',
        inserted: 0,
        updated: 0,
        pushed: 0,
        skipped: 0,
        discardedTombstoned: 1,
      });
      expect(await ctx.recipes.fetch(recipe.id)).toBeNull();

      expect(await ctx.recipes.retryPendingSyncs()).toBe('success');
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)).toBeNull();
    });

    it('inserts unknown records without pushing them back', async () => {
      const remoteRecipe = makeRecipe({ title: 'From another device' });
      ctx.remote.seedRecord('private', 'recipe', {
        entityId: remoteRecipe.id,
        ownerId: OWNER_ID,
        updatedAt: remoteRecipe.updatedAt,
        assetRecordId: null,
        assetModifiedAt: null,
        payload: remoteRecipe,
      });

      const result = await ctx.recipes.syncDown(OWNER_ID);
      await ctx.syncService.waitForIdle();

      expect(result.inserted).toBe(1);
      expect((await ctx.recipes.fetch(remoteRecipe.id))?.title).toBe('From another device');
      expect(ctx.remote.callsTo('saveRecord')).toEqual([]);
      expect(await ctx.syncService.getSyncQueue().list()).toEqual([]);
      expect((await ctx.syncService.getSyncStateStore().get('recipe', remoteRecipe.id)).remoteRecordId).toBe(
        remoteRecipe.id
      );
    });

    it('takes a newer remote record and keeps its timestamp', async () => {
      const recipe = await createSynced();
      const later = addMinutes(new Date(), 5).toISOString();
      ctx.remote.seedRecord('private', 'recipe', {
        entityId: recipe.id,
        ownerId: OWNER_ID,
        updatedAt: later,
        assetRecordId: null,
        assetModifiedAt: null,
        payload: { ...recipe, title: 'Remote edit', updatedAt: later },
      });

      const result = await ctx.recipes.syncDown(OWNER_ID);

      expect(result.updated).toBe(1);
      const local = await ctx.recipes.fetch(recipe.id);
      expect(local?.title).toBe('Remote edit');
      expect(local?.updatedAt).toBe(later);
      expect(ctx.published).toContainEqual({ type: 'entity.updated', kind: 'recipe', id: recipe.id });
    });

    it('pushes the local entity when it is newer than the remote record', async () => {
      const recipe = await createSynced();
      ctx.remote.seedRecord('private', 'recipe', {
        entityId: recipe.id,
        ownerId: OWNER_ID,
        updatedAt: '2020-01-01T00:00:00.000Z',
        assetRecordId: null,
        assetModifiedAt: null,
        payload: { ...recipe, title: 'Stale', updatedAt: '2020-01-01T00:00:00.000Z' },
      });

      const result = await ctx.recipes.syncDown(OWNER_ID);
      await ctx.syncService.waitForIdle();

      expect(result.pushed).toBe(1);
      expect((await ctx.recipes.fetch(recipe.id))?.title).toBe('Tomato Soup');
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(recipe);
    });

    it('only merges metadata when timestamps are equal', async () => {
      const recipe = await createSynced();
      ctx.remote.seedRecord('private', 'recipe', {
        entityId: recipe.id,
        ownerId: OWNER_ID,
        updatedAt: recipe.updatedAt,
        assetRecordId: null,
        assetModifiedAt: null,
        payload: { ...recipe, title: 'Same instant' },
      });

      const result = await ctx.recipes.syncDown(OWNER_ID);

      expect(result.skipped).toBe(1);
      expect((await ctx.recipes.fetch(recipe.id))?.title).toBe('Tomato Soup');
      expect(ctx.published).toContainEqual({ type: 'entity.metadataChanged', kind: 'recipe', id: recipe.id });
    });

    it('skips malformed remote payloads', async () => {
      ctx.remote.seedRecord('private', 'recipe', {
        entityId: 'broken',
        ownerId: OWNER_ID,
        updatedAt: '2024-01-01T00:00:00.000Z',
        assetRecordId: null,
        assetModifiedAt: null,
        payload: { title: 42 },
      });

      const result = await ctx.recipes.syncDown(OWNER_ID);

      expect(result.skipped).toBe(1);
      expect(await ctx.recipes.fetchAll()).toEqual([]);
    });

    it('downloads the image of a new remote record', async () => {
      const base = makeRecipe();
      const remoteRecipe = { ...base, imageFilename: `${base.id}.jpg` };
      ctx.remote.seedRecord('private', 'recipe', {
        entityId: remoteRecipe.id,
        ownerId: OWNER_ID,
        updatedAt: remoteRecipe.updatedAt,
        assetRecordId: `recipe/${remoteRecipe.id}.jpg`,
        assetModifiedAt: remoteRecipe.updatedAt,
        payload: remoteRecipe,
      });
      ctx.remote.seedAsset('private', 'recipe', remoteRecipe.id, Buffer.from('remote-photo'));

      await ctx.recipes.syncDown(OWNER_ID);

      expect(await ctx.images.recipe.loadImage(remoteRecipe.id)).toEqual(Buffer.from('remote-photo'));
      const state = await ctx.syncService.getSyncStateStore().get('recipe', remoteRecipe.id);
      expect(state.remoteAssetRecordId).toBe(`recipe/${remoteRecipe.id}.jpg`);

      // The downloaded file is not uploaded back
      await ctx.recipes.update({ ...remoteRecipe, title: 'Local edit' });
      await ctx.syncService.waitForIdle();
      expect(ctx.remote.callsTo('uploadAsset')).toEqual([]);
    });
  });

  describe('concurrent edits on two devices', () => {
    it('converges on the later edit and silently drops the earlier one', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      const other = await createTestContext({ remote: ctx.remote });

      try {
        vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
        const recipe = await ctx.recipes.create(
          makeRecipe({ createdAt: '2024-05-01T12:00:00.000Z', updatedAt: '2024-05-01T12:00:00.000Z' })
        );
        await ctx.syncService.waitForIdle();
        await other.recipes.syncDown(OWNER_ID);

        // The second device edits first, while offline
        ctx.remote.available = false;
        vi.setSystemTime(new Date('2024-05-01T12:01:00.000Z'));
        await other.recipes.update({ ...recipe, title: 'Edit on device B' });
        await other.syncService.waitForIdle();

        ctx.remote.available = true;
        vi.setSystemTime(new Date('2024-05-01T12:02:00.000Z'));
        await ctx.recipes.update({ ...recipe, title: 'Edit on device A' });
        await ctx.syncService.waitForIdle();

        // Device B comes back online and pushes its older edit over the newer one
        await other.recipes.retryPendingSyncs();
        expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toMatchObject({
          title: 'Edit on device B',
        });

        // Device A sees an older remote record and pushes its own state back
        expect((await ctx.recipes.syncDown(OWNER_ID)).pushed).toBe(1);
        await ctx.syncService.waitForIdle();

        expect((await other.recipes.syncDown(OWNER_ID)).updated).toBe(1);
        expect((await other.recipes.fetch(recipe.id))?.title).toBe('Edit on device A');
        expect((await ctx.recipes.fetch(recipe.id))?.title).toBe('Edit on device A');
      } finally {
        await other.cleanup();
      }
    });
  });

  // ============ Retry ============

  describe('retryPendingSyncs', () => {
    it('is idle with nothing pending', async () => {
      expect(await ctx.recipes.retryPendingSyncs()).toBe('idle');
    });

    it('fails without counting an attempt while the remote is unreachable', async () => {
      ctx.remote.available = false;
      const recipe = await ctx.recipes.create(makeRecipe());
      await ctx.syncService.waitForIdle();

      expect(await ctx.recipes.retryPendingSyncs()).toBe('failure');
      expect(ctx.recipes.getRetryAttempts(recipe.id)).toBe(0);
    });

    it('gives up on an id after ten failed attempts', async () => {
      ctx.remote.failOn('saveRecord', () => new NetworkUnavailableError());
      const recipe = await ctx.recipes.create(makeRecipe());
      await ctx.syncService.waitForIdle();

      for (let i = 0; i < 9; i++) {
        expect(await ctx.recipes.retryPendingSyncs()).toBe('failure');
      }
      expect(ctx.recipes.getRetryAttempts(recipe.id)).toBe(9);
      expect(ctx.recipes.hasPendingSync(recipe.id)).toBe(true);

      await ctx.recipes.retryPendingSyncs();
      expect(ctx.recipes.hasPendingSync(recipe.id)).toBe(false);
      expect(ctx.recipes.getPendingSyncCount()).toBe(0);

      const operation = await ctx.syncService.getSyncQueue().get('recipe', recipe.id, 'create');
      expect(operation?.status).toBe('failed');
      expect(operation?.retryable).toBe(false);
      expect(operation?.lastError).toBe('Gave up after 10 attempts: Remote store is not reachable');
    });

    it('does not retry a terminal failure', async () => {
      ctx.remote.failOn('saveRecord', () => new InvalidDataError('payload rejected'));
      const recipe = await ctx.recipes.create(makeRecipe());
      await ctx.syncService.waitForIdle();

      expect(ctx.recipes.hasPendingSync(recipe.id)).toBe(false);
      const operation = await ctx.syncService.getSyncQueue().get('recipe', recipe.id, 'create');
      expect(operation?.status).toBe('failed');
      expect(operation?.lastError).toBe('payload rejected');
    });

    it('drops an id whose entity no longer exists', async () => {
      ctx.remote.available = false;
      const recipe = await ctx.recipes.create(makeRecipe());
      await ctx.syncService.waitForIdle();
      await ctx.db.execute('DELETE FROM recipes WHERE id = $1', [recipe.id]);

      ctx.remote.available = true;
      expect(await ctx.recipes.retryPendingSyncs()).toBe('success');
      expect(ctx.recipes.hasPendingSync(recipe.id)).toBe(false);
      expect(ctx.remote.callsTo('saveRecord')).toEqual([]);
    });
  });

  describe('image uploads', () => {
    it('parks a failed upload and retries it on the next sweep', async () => {
      const recipe = await createSynced();
      ctx.remote.failOn('uploadAsset', () => new NetworkUnavailableError());

      await ctx.recipes.setImage(recipe.id, Buffer.from('photo'));
      await ctx.syncService.waitForIdle();

      expect(ctx.images.recipe.hasPendingUpload(recipe.id)).toBe(true);
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.assetRecordId).toBeNull();

      ctx.remote.clearFailures();
      expect(await ctx.syncService.retryNow()).toBe('success');

      expect(ctx.images.recipe.hasPendingUpload(recipe.id)).toBe(false);
      expect(ctx.remote.getAsset('private', 'recipe', recipe.id)).toEqual(Buffer.from('photo'));
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.assetRecordId).toBe(`recipe/${recipe.id}.jpg`);
      expect(ctx.published).toContainEqual({ type: 'image.uploadCompleted', kind: 'recipe', id: recipe.id });
    });

    it('counts no attempt while the remote is unreachable', async () => {
      const recipe = await createSynced();
      ctx.remote.failOn('uploadAsset', () => new NetworkUnavailableError());
      await ctx.recipes.setImage(recipe.id, Buffer.from('photo'));
      await ctx.syncService.waitForIdle();
      ctx.remote.clearFailures();

      ctx.remote.available = false;
      for (let i = 0; i < 10; i++) {
        expect(await ctx.syncService.retryNow()).toBe('failure');
      }
      expect(ctx.images.recipe.hasPendingUpload(recipe.id)).toBe(true);
      expect(ctx.images.recipe.retryCount(recipe.id)).toBe(0);

      ctx.remote.available = true;
      expect(await ctx.syncService.retryNow()).toBe('success');
      expect(ctx.remote.getAsset('private', 'recipe', recipe.id)).toEqual(Buffer.from('photo'));
      expect(ctx.images.recipe.hasPendingUpload(recipe.id)).toBe(false);
    });

    it('does not park an upload that exceeded the quota', async () => {
      const recipe = await createSynced();
      ctx.remote.failOn('uploadAsset', () => new QuotaExceededError());

      await ctx.recipes.setImage(recipe.id, Buffer.from('photo'));
      await ctx.syncService.waitForIdle();

      expect(ctx.images.recipe.hasPendingUpload(recipe.id)).toBe(false);
      expect(ctx.remote.getRecord('private', 'recipe', recipe.id)?.payload).toMatchObject({
        imageFilename: `${recipe.id}.jpg`,
      });
    });
  });

  // ============ Observers ============

  describe('subscribe', () => {
    it('emits the current list and then every local change', async () => {
      const seen: string[][] = [];
      const unsubscribe = ctx.recipes.subscribe((recipes) => seen.push(recipes.map((r) => r.title)));
      await new Promise((resolve) => setImmediate(resolve));

      await ctx.recipes.create(makeRecipe({ title: 'Soup' }));
      unsubscribe();
      await ctx.recipes.create(makeRecipe({ title: 'Salad' }));

      expect(seen).toEqual([[], ['Soup']]);
    });
  });
});

describe('restart recovery', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('resumes operations that were unfinished when the process stopped', async () => {
    const filename = join(dir, 'sync.db');
    const stalled = new InMemoryObjectStore();
    stalled.hang();

    const first = await createTestContext({ db: await Database.open({ filename }), remote: stalled });
    const recipe = await first.recipes.create(makeRecipe());
    // The process stops with the propagation still waiting on the network
    await first.db.close();
    await rm(first.imageDirectory, { recursive: true, force: true });

    const remote = new InMemoryObjectStore();
    const second = await createTestContext({ db: await Database.open({ filename }), remote });
    try {
      expect(await second.syncService.initialize()).toBe(1);
      expect(second.recipes.hasPendingSync(recipe.id)).toBe(true);

      expect(await second.syncService.retryNow()).toBe('success');
      expect(remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(recipe);
      expect((await second.syncService.getSyncQueue().get('recipe', recipe.id, 'create'))?.status).toBe('completed');
    } finally {
      await second.cleanup();
    }
  });

  it('resumes a propagation that failed while the remote was unreachable', async () => {
    const filename = join(dir, 'sync.db');
    const offline = new InMemoryObjectStore();
    offline.available = false;

    const first = await createTestContext({ db: await Database.open({ filename }), remote: offline });
    const recipe = await first.recipes.create(makeRecipe());
    await first.syncService.waitForIdle();
    expect((await first.syncService.getSyncQueue().get('recipe', recipe.id, 'create'))?.retryable).toBe(true);
    await first.cleanup();

    const remote = new InMemoryObjectStore();
    const second = await createTestContext({ db: await Database.open({ filename }), remote });
    try {
      expect(await second.syncService.initialize()).toBe(1);
      expect(await second.syncService.retryNow()).toBe('success');

      expect(remote.getRecord('private', 'recipe', recipe.id)?.payload).toEqual(recipe);
      expect((await second.syncService.getSyncQueue().get('recipe', recipe.id, 'create'))?.status).toBe('completed');
    } finally {
      await second.cleanup();
    }
  });

  it('uploads images left pending when the process stopped', async () => {
    const filename = join(dir, 'sync.db');
    const imageDirectory = join(dir, 'images');
    const remote = new InMemoryObjectStore();

    const first = await createTestContext({ db: await Database.open({ filename }), remote, imageDirectory });
    const recipe = await first.recipes.create(makeRecipe());
    await first.syncService.waitForIdle();
    remote.failOn('uploadAsset', () => new NetworkUnavailableError());
    await first.recipes.setImage(recipe.id, Buffer.from('photo'));
    await first.syncService.waitForIdle();
    expect(first.images.recipe.hasPendingUpload(recipe.id)).toBe(true);
    await first.syncService.destroy();
    await first.db.close();

    remote.clearFailures();
    const second = await createTestContext({ db: await Database.open({ filename }), remote, imageDirectory });
    try {
      expect(await second.syncService.initialize()).toBe(1);
      expect(second.images.recipe.hasPendingUpload(recipe.id)).toBe(true);

      expect(await second.syncService.retryNow()).toBe('success');
      expect(remote.getAsset('private', 'recipe', recipe.id)).toEqual(Buffer.from('photo'));
      expect(remote.getRecord('private', 'recipe', recipe.id)?.assetRecordId).toBe(`recipe/${recipe.id}.jpg`);
      expect(second.images.recipe.hasPendingUpload(recipe.id)).toBe(false);
    } finally {
      await second.cleanup();
    }
  });
});
