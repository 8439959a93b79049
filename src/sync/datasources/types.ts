/**
 * DataSource Types
 *
 * Interfaces for local and remote data sources.
 * These abstractions allow repositories to work with different storage backends.
 */

import type { EntityKind, Partition, RemoteRecord, SyncableEntity } from '../types';

/**
 * Interface for local data source operations (SQLite).
 * All reads in the app come from here.
 */
export interface LocalDataSource<T extends SyncableEntity> {
  /**
   * Get a single item by ID.
   */
  getById(id: string): Promise<T | null>;

  /**
   * Get all items, most recently updated first.
   */
  getAll(): Promise<T[]>;

  /**
   * Get all items owned by a user, most recently updated first.
   */
  getByOwner(ownerId: string): Promise<T[]>;

  /**
   * Insert a new item.
   */
  insert(item: T): Promise<void>;

  /**
   * Replace an existing item. Returns false when no row matched.
   */
  update(item: T): Promise<boolean>;

  /**
   * Remove an item. Returns false when no row matched.
   */
  delete(id: string): Promise<boolean>;

  /**
   * Insert or update an item based on ID.
   */
  upsert(item: T): Promise<void>;

  /**
   * Query items whose fields equal every value in the filter.
   */
  query(filter: Partial<T>): Promise<T[]>;
}

/**
 * Record fields a client writes; the store assigns the record id.
 */
export interface RemoteRecordWrite {
  entityId: string;
  ownerId: string;
  updatedAt: string;
  assetRecordId: string | null;
  assetModifiedAt: string | null;
  payload: unknown;
}

export interface RemoteRecordQuery {
  ownerId?: string;
  /** Only records updated strictly after this timestamp. */
  since?: string | null;
  /** Top-level payload fields that must equal the given strings. */
  payloadEquals?: Record<string, string>;
}

export interface UploadedAsset {
  assetRecordId: string;
}

/**
 * Two-partition remote object store.
 *
 * Deleting a record or asset that does not exist is not an error.
 * Payloads come back untyped; callers validate them.
 */
export interface RemoteObjectStore {
  /**
   * Network and account reachability.
   */
  isAvailable(): Promise<boolean>;

  saveRecord(partition: Partition, kind: EntityKind, record: RemoteRecordWrite): Promise<RemoteRecord<unknown>>;
  fetchRecord(partition: Partition, kind: EntityKind, entityId: string): Promise<RemoteRecord<unknown> | null>;
  fetchRecords(partition: Partition, kind: EntityKind, query?: RemoteRecordQuery): Promise<RemoteRecord<unknown>[]>;
  deleteRecord(partition: Partition, kind: EntityKind, entityId: string): Promise<void>;

  uploadAsset(partition: Partition, kind: EntityKind, entityId: string, bytes: Buffer): Promise<UploadedAsset>;
  /** Resolves null when no asset exists for the entity. */
  downloadAsset(partition: Partition, kind: EntityKind, entityId: string): Promise<Buffer | null>;
  deleteAsset(partition: Partition, kind: EntityKind, entityId: string): Promise<void>;
}
