/**
 * SupabaseObjectStore
 *
 * Remote object store over Supabase. Records live in Postgres tables
 * (`recipes` for the private partition, `public_recipes` for the public one,
 * and so on per kind); assets live in the `private-images` and `public-images`
 * storage buckets under `<kind>/<entityId>.jpg`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  InvalidDataError,
  NetworkUnavailableError,
  PermissionDeniedError,
  QuotaExceededError,
  SyncConflictError,
} from '@/lib/errors';
import { SYNC_TABLES } from '../types';
import type { EntityKind, Partition, RemoteRecord } from '../types';
import type { RemoteObjectStore, RemoteRecordQuery, RemoteRecordWrite, UploadedAsset } from './types';

const remoteRowSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  payload: z.unknown(),
  updated_at: z.string(),
  asset_record_id: z.string().nullable(),
  asset_modified_at: z.string().nullable(),
});

type RemoteRow = z.infer<typeof remoteRowSchema>;

interface SupabaseFailure {
  message: string;
  code?: string;
  status?: number;
  statusCode?: string;
}

const BUCKETS: Record<Partition, string> = {
  private: 'private-images',
  public: 'public-images',
};

export function tableFor(partition: Partition, kind: EntityKind): string {
  const table = SYNC_TABLES[kind];
  return partition === 'public' ? `public_${table}` : table;
}

export function assetPath(kind: EntityKind, entityId: string): string {
  return `${kind}/${entityId}.jpg`;
}

/**
 * Map a Supabase error onto the sync error taxonomy.
 */
export function classifySupabaseError(error: SupabaseFailure): Error {
  const status = error.status ?? (error.statusCode ? Number(error.statusCode) : undefined);
  const message = error.message.toLowerCase();

  if (status === 413 || message.includes('quota') || message.includes('maximum allowed size')) {
    return new QuotaExceededError(error.message, { cause: error });
  }
  if (status === 409 || error.code === '40001' || error.code === '23505') {
    return new SyncConflictError(error.message, { cause: error });
  }
  if (status === 401 || status === 403 || error.code === '42501') {
    return new PermissionDeniedError(error.message, { cause: error });
  }
  if (message.includes('fetch failed') || message.includes('network')) {
    return new NetworkUnavailableError(error.message, { cause: error });
  }
  return new Error(error.message);
}

function isNotFound(error: SupabaseFailure): boolean {
  const status = error.status ?? (error.statusCode ? Number(error.statusCode) : undefined);
  return status === 404 || error.message.toLowerCase().includes('not found');
}

export class SupabaseObjectStore implements RemoteObjectStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly probeTable: string = SYNC_TABLES.user
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      const { error } = await this.supabase.from(this.probeTable).select('id').limit(1);
      if (error) {
        console.warn('[SupabaseObjectStore] Availability probe failed:', error.message);
        return false;
      }
      return true;
    } catch (error) {
      console.warn('[SupabaseObjectStore] Remote store unreachable:', error);
      return false;
    }
  }

  // ============ Records ============

  async saveRecord(partition: Partition, kind: EntityKind, record: RemoteRecordWrite): Promise<RemoteRecord<unknown>> {
    const row: RemoteRow = {
      id: record.entityId,
      owner_id: record.ownerId,
      payload: record.payload,
      updated_at: record.updatedAt,
      asset_record_id: record.assetRecordId,
      asset_modified_at: record.assetModifiedAt,
    };

    const { error } = await this.supabase
      .from(tableFor(partition, kind))
      .upsert(row, { onConflict: 'id' });

    if (error) {
      throw classifySupabaseError(error);
    }

    return this.mapRow(row);
  }

  async fetchRecord(partition: Partition, kind: EntityKind, entityId: string): Promise<RemoteRecord<unknown> | null> {
    const { data, error } = await this.supabase
      .from(tableFor(partition, kind))
      .select('*')
      .eq('id', entityId)
      .maybeSingle();

    if (error) {
      throw classifySupabaseError(error);
    }

    return data ? this.mapRow(this.parseRow(data)) : null;
  }

  async fetchRecords(
    partition: Partition,
    kind: EntityKind,
    query: RemoteRecordQuery = {}
  ): Promise<RemoteRecord<unknown>[]> {
    let request = this.supabase.from(tableFor(partition, kind)).select('*');

    if (query.ownerId) {
      request = request.eq('owner_id', query.ownerId);
    }
    if (query.since) {
      request = request.gt('updated_at', query.since);
    }
    for (const [field, value] of Object.entries(query.payloadEquals ?? {})) {
      request = request.eq(`payload->>${field}`, value);
    }

    const { data, error } = await request.order('updated_at', { ascending: true });

    if (error) {
      throw classifySupabaseError(error);
    }

    return (data ?? []).map((row: unknown) => this.mapRow(this.parseRow(row)));
  }

  async deleteRecord(partition: Partition, kind: EntityKind, entityId: string): Promise<void> {
    const { error } = await this.supabase
      .from(tableFor(partition, kind))
      .delete()
      .eq('id', entityId);

    if (error) {
      throw classifySupabaseError(error);
    }
  }

  // ============ Assets ============

  async uploadAsset(partition: Partition, kind: EntityKind, entityId: string, bytes: Buffer): Promise<UploadedAsset> {
    const { data, error } = await this.supabase.storage
      .from(BUCKETS[partition])
      .upload(assetPath(kind, entityId), bytes, { contentType: 'image/jpeg', upsert: true });

    if (error) {
      throw classifySupabaseError(error);
    }

    return { assetRecordId: data.path };
  }

  async downloadAsset(partition: Partition, kind: EntityKind, entityId: string): Promise<Buffer | null> {
    const { data, error } = await this.supabase.storage
      .from(BUCKETS[partition])
      .download(assetPath(kind, entityId));

    if (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw classifySupabaseError(error);
    }

    return Buffer.from(await data.arrayBuffer());
  }

  async deleteAsset(partition: Partition, kind: EntityKind, entityId: string): Promise<void> {
    const { error } = await this.supabase.storage
      .from(BUCKETS[partition])
      .remove([assetPath(kind, entityId)]);

    if (error) {
      throw classifySupabaseError(error);
    }
  }

  private parseRow(row: unknown): RemoteRow {
    const result = remoteRowSchema.safeParse(row);
    if (!result.success) {
      throw new InvalidDataError(`Malformed remote record: ${result.error.message}`, { cause: result.error });
    }
    return result.data;
  }

  private mapRow(row: RemoteRow): RemoteRecord<unknown> {
    return {
      recordId: row.id,
      entityId: row.id,
      ownerId: row.owner_id,
      updatedAt: row.updated_at,
      assetRecordId: row.asset_record_id,
      assetModifiedAt: row.asset_modified_at,
      payload: row.payload,
    };
  }
}
