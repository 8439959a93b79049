/**
 * UsersRepository
 *
 * Repository for user profiles. A profile owns itself and is public, so
 * connected users can read it from the public partition.
 */

import { userSchema, type User, type UserInput } from '@/lib/types';
import type { SyncService } from '../services/SyncService';
import type { PullResult, RemoteRecord } from '../types';
import { BaseRepository, type RepositoryOptions } from './BaseRepository';

export class UsersRepository extends BaseRepository<User, UserInput> {
  constructor(syncService: SyncService, options: RepositoryOptions = {}) {
    super('user', userSchema, syncService, options);
  }

  protected normalize(user: User): User {
    return { ...user, ownerId: user.id, visibility: 'public' };
  }

  /**
   * Case-insensitive username lookup.
   */
  async fetchByUsername(username: string): Promise<User | null> {
    const needle = username.trim().toLowerCase();
    const users = await this.fetchAll();
    return users.find((user) => user.username.toLowerCase() === needle) ?? null;
  }

  async setProfileImage(id: string, bytes: Buffer): Promise<User> {
    const user = await this.require(id);
    const imageFilename = await this.requireImages().saveImage(id, bytes);
    return this.update({ ...user, imageFilename });
  }

  async removeProfileImage(id: string): Promise<User> {
    const user = await this.require(id);
    await this.requireImages().deleteImage(id);
    return this.update({ ...user, imageFilename: null });
  }

  /**
   * Refresh other users' public profiles, e.g. for the user's connections.
   */
  async syncProfiles(userIds: string[]): Promise<PullResult> {
    const records: RemoteRecord<unknown>[] = [];
    for (const id of userIds) {
      const record = await this.remote.fetchRecord('public', this.kind, id);
      if (record) records.push(record);
    }
    return this.pull(records, 'public');
  }
}
