/**
 * LocalDataSource
 *
 * Generic SQLite data source implementation.
 * Each entity repository creates an instance with its table and schema.
 * Indexed columns are mirrored from the entity; the full entity is stored as JSON.
 */

import type { z } from 'zod';
import type { Database, Row } from '@/lib/database';
import { readString } from '@/lib/database';
import { InvalidDataError } from '@/lib/errors';
import type { SyncableEntity, SyncTableName } from '../types';
import type { LocalDataSource as ILocalDataSource } from './types';

export type EntitySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class LocalDataSource<T extends SyncableEntity> implements ILocalDataSource<T> {
  constructor(
    private readonly db: Database,
    private readonly tableName: SyncTableName,
    private readonly schema: EntitySchema<T>
  ) {}

  async getById(id: string): Promise<T | null> {
    const results = await this.db.select(
      `SELECT data FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    return results[0] ? this.parseRow(results[0]) : null;
  }

  async getAll(): Promise<T[]> {
    const rows = await this.db.select(
      `SELECT data FROM ${this.tableName} ORDER BY updated_at DESC, id ASC`
    );
    return rows.map((row) => this.parseRow(row));
  }

  async getByOwner(ownerId: string): Promise<T[]> {
    const rows = await this.db.select(
      `SELECT data FROM ${this.tableName} WHERE owner_id = $1 ORDER BY updated_at DESC, id ASC`,
      [ownerId]
    );
    return rows.map((row) => this.parseRow(row));
  }

  async insert(item: T): Promise<void> {
    const valid = this.validate(item);
    await this.db.execute(
      `INSERT INTO ${this.tableName} (id, owner_id, visibility, data, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [valid.id, valid.ownerId, valid.visibility, JSON.stringify(valid), valid.createdAt, valid.updatedAt]
    );
  }

  async update(item: T): Promise<boolean> {
    const valid = this.validate(item);
    const { rowsAffected } = await this.db.execute(
      `UPDATE ${this.tableName}
       SET owner_id = $1, visibility = $2, data = $3, created_at = $4, updated_at = $5
       WHERE id = $6`,
      [valid.ownerId, valid.visibility, JSON.stringify(valid), valid.createdAt, valid.updatedAt, valid.id]
    );
    return rowsAffected > 0;
  }

  async delete(id: string): Promise<boolean> {
    const { rowsAffected } = await this.db.execute(
      `DELETE FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    return rowsAffected > 0;
  }

  async upsert(item: T): Promise<void> {
    const updated = await this.update(item);
    if (!updated) {
      await this.insert(item);
    }
  }

  async query(filter: Partial<T>): Promise<T[]> {
    const entries = Object.entries(filter);
    const all = await this.getAll();
    if (entries.length === 0) {
      return all;
    }
    return all.filter((item) =>
      entries.every(([key, value]) => Object.entries(item).some(([k, v]) => k === key && v === value))
    );
  }

  // ============ Additional Utility Methods ============

  async count(): Promise<number> {
    const rows = await this.db.select(`SELECT id FROM ${this.tableName}`);
    return rows.length;
  }

  async exists(id: string): Promise<boolean> {
    const rows = await this.db.select(`SELECT id FROM ${this.tableName} WHERE id = $1`, [id]);
    return rows.length > 0;
  }

  /**
   * Validate an entity against the table's schema.
   */
  validate(item: unknown): T {
    const result = this.schema.safeParse(item);
    if (!result.success) {
      throw new InvalidDataError(`Invalid ${this.tableName} entity: ${result.error.message}`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  private parseRow(row: Row): T {
    let raw: unknown;
    try {
      raw = JSON.parse(readString(row, 'data'));
    } catch (error) {
      throw new InvalidDataError(`Malformed ${this.tableName} row`, { cause: error });
    }
    return this.validate(raw);
  }
}
