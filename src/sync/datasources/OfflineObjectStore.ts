import { CloudNotConfiguredError } from '@/lib/errors';
import type { RemoteRecord } from '../types';
import type { RemoteObjectStore, UploadedAsset } from './types';

/**
 * Remote store used when no cloud backend is configured: never available,
 * every operation fails with CloudNotConfiguredError.
 */
export class OfflineObjectStore implements RemoteObjectStore {
  async isAvailable(): Promise<boolean> {
    return false;
  }

  async saveRecord(): Promise<RemoteRecord<unknown>> {
    throw new CloudNotConfiguredError();
  }

  async fetchRecord(): Promise<RemoteRecord<unknown> | null> {
    throw new CloudNotConfiguredError();
  }

  async fetchRecords(): Promise<RemoteRecord<unknown>[]> {
    throw new CloudNotConfiguredError();
  }

  async deleteRecord(): Promise<void> {
    throw new CloudNotConfiguredError();
  }

  async uploadAsset(): Promise<UploadedAsset> {
    throw new CloudNotConfiguredError();
  }

  async downloadAsset(): Promise<Buffer | null> {
    throw new CloudNotConfiguredError();
  }

  async deleteAsset(): Promise<void> {
    throw new CloudNotConfiguredError();
  }
}
