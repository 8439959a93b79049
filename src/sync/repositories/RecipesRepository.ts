/**
 * RecipesRepository
 *
 * Repository for recipes with offline-first sync. Deleting a recipe also
 * removes it from every collection.
 */

import { generateId, nowIso, recipeSchema, type Recipe, type RecipeInput, type Visibility } from '@/lib/types';
import type { SyncService } from '../services/SyncService';
import { BaseRepository, type RepositoryOptions } from './BaseRepository';
import type { CollectionsRepository } from './CollectionsRepository';

export interface RecipesRepositoryOptions extends RepositoryOptions {
  collections?: CollectionsRepository | null;
}

export interface SaveCopyOptions {
  ownerId: string;
  creatorName?: string | null;
}

export class RecipesRepository extends BaseRepository<Recipe, RecipeInput> {
  private readonly collections: CollectionsRepository | null;

  constructor(syncService: SyncService, options: RecipesRepositoryOptions = {}) {
    super('recipe', recipeSchema, syncService, options);
    this.collections = options.collections ?? null;
  }

  // ============ Entity-Specific Queries ============

  /**
   * Case-insensitive title search.
   */
  async search(title: string): Promise<Recipe[]> {
    const needle = title.trim().toLowerCase();
    const recipes = await this.fetchAll();
    if (!needle) return recipes;
    return recipes.filter((recipe) => recipe.title.toLowerCase().includes(needle));
  }

  async fetchFavorites(): Promise<Recipe[]> {
    return this.query({ isFavorite: true });
  }

  async fetchPublic(): Promise<Recipe[]> {
    return this.query({ visibility: 'public' });
  }

  // ============ Entity-Specific Writes ============

  async toggleFavorite(id: string): Promise<Recipe> {
    const recipe = await this.require(id);
    return this.update({ ...recipe, isFavorite: !recipe.isFavorite }, { skipAssetSync: true });
  }

  async updateVisibility(id: string, visibility: Visibility): Promise<Recipe> {
    const recipe = await this.require(id);
    if (recipe.visibility === visibility) {
      return recipe;
    }
    return this.update({ ...recipe, visibility });
  }

  async setImage(id: string, bytes: Buffer): Promise<Recipe> {
    const recipe = await this.require(id);
    const imageFilename = await this.requireImages().saveImage(id, bytes);
    return this.update({ ...recipe, imageFilename });
  }

  async removeImage(id: string): Promise<Recipe> {
    const recipe = await this.require(id);
    await this.requireImages().deleteImage(id);
    return this.update({ ...recipe, imageFilename: null });
  }

  /**
   * Save a private copy of someone else's recipe, keeping attribution.
   */
  async saveCopy(source: Recipe, options: SaveCopyOptions): Promise<Recipe> {
    const id = generateId();
    const now = nowIso();
    const imageFilename =
      source.imageFilename && this.images ? await this.images.copyImage(source.id, id) : null;

    return this.create({
      ...source,
      id,
      ownerId: options.ownerId,
      visibility: 'private',
      isFavorite: false,
      imageFilename,
      originalRecipeId: source.originalRecipeId ?? source.id,
      originalCreatorId: source.originalCreatorId ?? source.ownerId,
      originalCreatorName: source.originalCreatorName ?? options.creatorName ?? null,
      savedAt: now,
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Delete every recipe an owner has. Returns the number deleted.
   */
  async deleteAllForOwner(ownerId: string): Promise<number> {
    const recipes = await this.fetchByOwner(ownerId);
    for (const recipe of recipes) {
      await this.delete(recipe.id);
    }
    return recipes.length;
  }

  protected async afterDelete(recipe: Recipe): Promise<void> {
    if (this.collections) {
      await this.collections.removeRecipeFromAll(recipe.id);
    }
  }
}
