/**
 * Repository exports
 */

export {
  BaseRepository,
  imageFilenameOf,
  nextTimestamp,
  shouldUploadToPublic,
  type RepositoryOptions,
  type UpdateOptions,
} from './BaseRepository';
export { CollectionsRepository } from './CollectionsRepository';
export { ConnectionsRepository } from './ConnectionsRepository';
export { RecipesRepository, type RecipesRepositoryOptions, type SaveCopyOptions } from './RecipesRepository';
export { UsersRepository } from './UsersRepository';
