import { randomUUID } from 'node:crypto';
import { z } from 'zod';

// ============ Shared ============

export const visibilitySchema = z.enum(['private', 'public']);
export type Visibility = z.infer<typeof visibilitySchema>;

const isoTimestamp = z.string().datetime({ offset: true });

/**
 * Fields every syncable entity carries. Cloud metadata is kept apart in the
 * sync state table (see `SyncState`), so these are all required.
 */
export const syncableEntitySchema = z.object({
  id: z.string().uuid(),
  ownerId: z.string().uuid(),
  visibility: visibilitySchema,
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
});

export type SyncableEntity = z.infer<typeof syncableEntitySchema>;

// ============ Recipes ============

export const ingredientSchema = z.object({
  name: z.string(),
  quantity: z.number().nullable().default(null),
  unit: z.string().nullable().default(null),
  note: z.string().nullable().default(null),
  section: z.string().nullable().default(null),
});

export const cookStepSchema = z.object({
  index: z.number().int().nonnegative(),
  text: z.string(),
  timerSeconds: z.number().int().positive().nullable().default(null),
  section: z.string().nullable().default(null),
});

export const tagSchema = z.object({
  name: z.string(),
});

export const recipeSchema = syncableEntitySchema.extend({
  title: z.string().min(1),
  ingredients: z.array(ingredientSchema),
  steps: z.array(cookStepSchema),
  tags: z.array(tagSchema).default([]),
  yields: z.string().default('4 servings'),
  totalMinutes: z.number().int().nonnegative().nullable().default(null),
  notes: z.string().nullable().default(null),
  sourceUrl: z.string().url().nullable().default(null),
  sourceTitle: z.string().nullable().default(null),
  imageFilename: z.string().nullable().default(null),
  isFavorite: z.boolean().default(false),
  originalRecipeId: z.string().uuid().nullable().default(null),
  originalCreatorId: z.string().uuid().nullable().default(null),
  originalCreatorName: z.string().nullable().default(null),
  savedAt: isoTimestamp.nullable().default(null),
});

export type Ingredient = z.infer<typeof ingredientSchema>;
export type CookStep = z.infer<typeof cookStepSchema>;
export type Tag = z.infer<typeof tagSchema>;
export type Recipe = z.infer<typeof recipeSchema>;
export type RecipeInput = z.input<typeof recipeSchema>;

// ============ Collections ============

export const coverImageTypeSchema = z.enum(['recipeGrid', 'customImage', 'emoji', 'color']);
export type CoverImageType = z.infer<typeof coverImageTypeSchema>;

export const collectionSchema = syncableEntitySchema.extend({
  name: z.string().min(1),
  description: z.string().nullable().default(null),
  recipeIds: z.array(z.string().uuid()).default([]),
  emoji: z.string().nullable().default(null),
  color: z.string().nullable().default(null),
  coverImageType: coverImageTypeSchema.default('recipeGrid'),
  imageFilename: z.string().nullable().default(null),
});

export type Collection = z.infer<typeof collectionSchema>;
export type CollectionInput = z.input<typeof collectionSchema>;

// ============ Connections ============

export const connectionStatusSchema = z.enum(['pending', 'accepted']);
export type ConnectionStatus = z.infer<typeof connectionStatusSchema>;

export const connectionSchema = syncableEntitySchema.extend({
  fromUserId: z.string().uuid(),
  toUserId: z.string().uuid(),
  status: connectionStatusSchema.default('pending'),
  fromUsername: z.string().nullable().default(null),
  fromDisplayName: z.string().nullable().default(null),
  toUsername: z.string().nullable().default(null),
  toDisplayName: z.string().nullable().default(null),
});

export type Connection = z.infer<typeof connectionSchema>;
export type ConnectionInput = z.input<typeof connectionSchema>;

// ============ Users ============

export const userSchema = syncableEntitySchema.extend({
  username: z.string().min(1),
  displayName: z.string().min(1),
  email: z.string().email().nullable().default(null),
  profileEmoji: z.string().nullable().default(null),
  profileColor: z.string().nullable().default(null),
  imageFilename: z.string().nullable().default(null),
});

export type User = z.infer<typeof userSchema>;
export type UserInput = z.input<typeof userSchema>;

// ============ Helper Functions ============

export function generateId(): string {
  return randomUUID();
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function imageFilenameFor(id: string): string {
  return `${id}.jpg`;
}
