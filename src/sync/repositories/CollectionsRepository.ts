/**
 * CollectionsRepository
 *
 * Repository for recipe collections with offline-first sync.
 */

import { collectionSchema, type Collection, type CollectionInput } from '@/lib/types';
import type { SyncService } from '../services/SyncService';
import { BaseRepository, type RepositoryOptions } from './BaseRepository';

export class CollectionsRepository extends BaseRepository<Collection, CollectionInput> {
  constructor(syncService: SyncService, options: RepositoryOptions = {}) {
    super('collection', collectionSchema, syncService, options);
  }

  // ============ Entity-Specific Queries ============

  /**
   * Collections that list the given recipe.
   */
  async fetchContainingRecipe(recipeId: string): Promise<Collection[]> {
    const collections = await this.fetchAll();
    return collections.filter((collection) => collection.recipeIds.includes(recipeId));
  }

  // ============ Membership ============

  /**
   * Append a recipe to a collection. Adding a recipe twice is a no-op.
   */
  async addRecipe(collectionId: string, recipeId: string): Promise<Collection> {
    const collection = await this.require(collectionId);
    if (collection.recipeIds.includes(recipeId)) {
      return collection;
    }
    return this.update({ ...collection, recipeIds: [...collection.recipeIds, recipeId] }, { skipAssetSync: true });
  }

  async removeRecipe(collectionId: string, recipeId: string): Promise<Collection> {
    const collection = await this.require(collectionId);
    if (!collection.recipeIds.includes(recipeId)) {
      return collection;
    }
    return this.update(
      { ...collection, recipeIds: collection.recipeIds.filter((id) => id !== recipeId) },
      { skipAssetSync: true }
    );
  }

  /**
   * Drop a deleted recipe from every collection that lists it.
   * Returns the number of collections changed.
   */
  async removeRecipeFromAll(recipeId: string): Promise<number> {
    const collections = await this.fetchContainingRecipe(recipeId);
    for (const collection of collections) {
      await this.removeRecipe(collection.id, recipeId);
    }
    return collections.length;
  }

  // ============ Cover Image ============

  async setCoverImage(id: string, bytes: Buffer): Promise<Collection> {
    const collection = await this.require(id);
    const imageFilename = await this.requireImages().saveImage(id, bytes);
    return this.update({ ...collection, imageFilename, coverImageType: 'customImage' });
  }

  async removeCoverImage(id: string): Promise<Collection> {
    const collection = await this.require(id);
    await this.requireImages().deleteImage(id);
    return this.update({ ...collection, imageFilename: null, coverImageType: 'recipeGrid' });
  }
}
