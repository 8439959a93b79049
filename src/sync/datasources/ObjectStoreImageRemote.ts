import type { ImageRemote } from '../services/ImageSyncManager';
import type { EntityKind } from '../types';
import type { RemoteObjectStore } from './types';

/**
 * Image operations for one entity kind, backed by the remote object store's assets.
 */
export function createObjectStoreImageRemote(remote: RemoteObjectStore, kind: EntityKind): ImageRemote {
  return {
    async upload(entityId, bytes, partition) {
      const { assetRecordId } = await remote.uploadAsset(partition, kind, entityId, bytes);
      return assetRecordId;
    },
    download: (entityId, partition) => remote.downloadAsset(partition, kind, entityId),
    delete: (entityId, partition) => remote.deleteAsset(partition, kind, entityId),
  };
}
