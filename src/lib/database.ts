/**
 * Local SQLite database backed by sql.js (SQLite compiled to WASM).
 *
 * The whole database lives in memory. When a filename is given, the binary
 * image is loaded from disk on open and written back after writes (debounced)
 * and on `flush()`/`close()`.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import initSqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlJsStatic, SqlValue } from 'sql.js';
import { runMigrations } from './migrations';

export type { SqlValue };
export type Row = Record<string, SqlValue>;

export interface DatabaseOptions {
  /** File to load from and persist to. Omit for a purely in-memory database. */
  filename?: string;
  /** Debounce for persisting after writes. */
  saveDelayMs?: number;
  /** Skip schema migrations (used by the migration tests). */
  skipMigrations?: boolean;
}

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs();
  }
  return sqlJsPromise;
}

/**
 * Convert PostgreSQL-style parameters ($1, $2) to SQLite-style (?)
 * and reorder params array accordingly.
 */
export function convertParams(query: string, params: SqlValue[]): { query: string; params: SqlValue[] } {
  const paramRefs: number[] = [];
  const regex = /\$(\d+)/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(query)) !== null) {
    paramRefs.push(parseInt(match[1], 10));
  }

  if (paramRefs.length === 0) {
    return { query, params };
  }

  const newParams = paramRefs.map((paramNum) => {
    const value = params[paramNum - 1];
    if (value === undefined) {
      throw new Error(`Missing SQL parameter $${paramNum}`);
    }
    return value;
  });

  return { query: query.replace(/\$\d+/g, '?'), params: newParams };
}

/**
 * Transform sql.js results to array of objects.
 * sql.js returns: [{ columns: ['id', 'name'], values: [[1, 'foo'], [2, 'bar']] }]
 */
function transformResults(results: { columns: string[]; values: SqlValue[][] }[]): Row[] {
  if (results.length === 0) return [];

  const { columns, values } = results[0];
  return values.map((row) => {
    const obj: Row = {};
    columns.forEach((col, i) => {
      obj[col] = row[i];
    });
    return obj;
  });
}

export class Database {
  private saveTimeout: ReturnType<typeof setTimeout> | null = null;
  private closed = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly filename: string | null,
    private readonly saveDelayMs: number
  ) {}

  static async open(options: DatabaseOptions = {}): Promise<Database> {
    const SQL = await loadSqlJs();
    const filename = options.filename ?? null;

    let sqlJsDb: SqlJsDatabase;
    if (filename && existsSync(filename)) {
      const data = await readFile(filename);
      sqlJsDb = new SQL.Database(new Uint8Array(data));
    } else {
      sqlJsDb = new SQL.Database();
    }
    sqlJsDb.run('PRAGMA foreign_keys = ON');

    const database = new Database(sqlJsDb, filename, options.saveDelayMs ?? 100);
    if (!options.skipMigrations) {
      const { errors } = await runMigrations(database);
      if (errors.length > 0) {
        database.db.close();
        throw new Error(errors.join('; '));
      }
    }
    return database;
  }

  /**
   * Execute a SQL statement (INSERT, UPDATE, DELETE, CREATE TABLE, etc.).
   */
  async execute(query: string, params: SqlValue[] = []): Promise<{ rowsAffected: number }> {
    this.assertOpen();
    const converted = convertParams(query, params);

    try {
      this.db.run(converted.query, converted.params);
      const rowsAffected = this.db.getRowsModified();
      this.scheduleSave();
      return { rowsAffected };
    } catch (error) {
      console.error('[Database] SQL execute error:', error, { query });
      throw error;
    }
  }

  /**
   * Select rows from the database.
   */
  async select(query: string, params: SqlValue[] = []): Promise<Row[]> {
    this.assertOpen();
    const converted = convertParams(query, params);

    try {
      return transformResults(this.db.exec(converted.query, converted.params));
    } catch (error) {
      console.error('[Database] SQL select error:', error, { query });
      throw error;
    }
  }

  /**
   * Run a multi-statement script (migrations).
   */
  async executeScript(sql: string): Promise<void> {
    this.assertOpen();
    this.db.exec(sql);
    this.scheduleSave();
  }

  /**
   * Run `work` inside a transaction; rolls back if it throws.
   */
  async transaction<R>(work: () => Promise<R>): Promise<R> {
    this.assertOpen();
    this.db.run('BEGIN');
    try {
      const result = await work();
      this.db.run('COMMIT');
      this.scheduleSave();
      return result;
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    }
  }

  /**
   * Persist the database image now.
   */
  async flush(): Promise<void> {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    if (!this.filename || this.closed) return;

    await mkdir(dirname(this.filename), { recursive: true });
    await writeFile(this.filename, this.db.export());
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
    this.db.close();
  }

  private scheduleSave(): void {
    if (!this.filename) return;

    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.flush().catch((error: unknown) => {
        console.error('[Database] Failed to persist database:', error);
      });
    }, this.saveDelayMs);
    this.saveTimeout.unref();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Database is closed');
    }
  }
}

// ============ Row Readers ============

export function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not a string`);
  }
  return value;
}

export function readNullableString(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not a string`);
  }
  return value;
}

export function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`Column ${column} is not a number`);
  }
  return value;
}
