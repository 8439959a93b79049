/**
 * Migration runner for the local SQLite database.
 *
 * Migrations are applied in order and tracked by name in `_migrations`, so
 * reopening a persisted database only applies the ones it has not seen.
 */

import type { Database } from './database';
import { readString } from './database';

interface Migration {
  name: string;
  sql: string;
}

function entityTable(table: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${table} (
  id TEXT PRIMARY KEY,
  owner_id TEXT NOT NULL,
  visibility TEXT NOT NULL CHECK (visibility IN ('private', 'public')),
  data TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_${table}_owner ON ${table}(owner_id);
CREATE INDEX IF NOT EXISTS idx_${table}_updated ON ${table}(updated_at);
`;
}

export const MIGRATIONS: Migration[] = [
  {
    name: '00001_entities',
    sql: ['recipes', 'collections', 'connections', 'users'].map(entityTable).join('\n'),
  },
  {
    name: '00002_sync_tables',
    sql: `
-- ============================================
-- Cloud metadata per entity
-- ============================================
CREATE TABLE IF NOT EXISTS sync_state (
  entity_kind TEXT NOT NULL,
  entity_id TEXT NOT NULL,
  remote_record_id TEXT,
  remote_asset_record_id TEXT,
  remote_asset_modified_at TEXT,
  public_record_id TEXT,
  public_asset_modified_at TEXT,
  last_synced_at TEXT,
  PRIMARY KEY (entity_kind, entity_id)
);

-- ============================================
-- Deletion markers
-- ============================================
CREATE TABLE IF NOT EXISTS tombstones (
  entity_kind TEXT NOT NULL,
  entity_id TEXT NOT NULL,
  deleted_at TEXT NOT NULL,
  remote_record_id TEXT,
  PRIMARY KEY (entity_kind, entity_id)
);

CREATE INDEX IF NOT EXISTS idx_tombstones_deleted_at ON tombstones(deleted_at);

-- ============================================
-- Sync operation log
-- ============================================
CREATE TABLE IF NOT EXISTS sync_operations (
  id TEXT PRIMARY KEY,
  entity_kind TEXT NOT NULL,
  entity_id TEXT NOT NULL,
  operation TEXT NOT NULL CHECK (operation IN ('create', 'update', 'delete')),
  status TEXT NOT NULL CHECK (status IN ('queued', 'inProgress', 'completed', 'failed')),
  attempts INTEGER NOT NULL DEFAULT 0,
  last_error TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (entity_kind, entity_id, operation)
);

CREATE INDEX IF NOT EXISTS idx_sync_operations_status ON sync_operations(status);
`,
  },
  {
    // Failed rows that may still succeed are resumed after a restart
    name: '00003_sync_operation_retryable',
    sql: `ALTER TABLE sync_operations ADD COLUMN retryable INTEGER NOT NULL DEFAULT 0;`,
  },
];

async function getAppliedMigrations(db: Database): Promise<Set<string>> {
  const rows = await db.select('SELECT name FROM _migrations');
  return new Set(rows.map((row) => readString(row, 'name')));
}

async function markMigrationApplied(db: Database, name: string): Promise<void> {
  await db.execute('INSERT INTO _migrations (name, applied_at) VALUES ($1, $2)', [
    name,
    new Date().toISOString(),
  ]);
}

/**
 * Run pending migrations. Stops at the first failing migration.
 */
export async function runMigrations(
  db: Database,
  migrations: Migration[] = MIGRATIONS
): Promise<{ applied: string[]; errors: string[] }> {
  const result = { applied: [] as string[], errors: [] as string[] };

  await db.execute(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    )
  `);

  const appliedMigrations = await getAppliedMigrations(db);

  for (const migration of migrations) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    console.info(`[Migrations] Applying: ${migration.name}`);

    try {
      await db.transaction(async () => {
        await db.executeScript(migration.sql);
        await markMigrationApplied(db, migration.name);
      });
      result.applied.push(migration.name);
    } catch (error) {
      const errorMsg = `Failed to apply ${migration.name}: ${String(error)}`;
      console.error(`[Migrations] ${errorMsg}`);
      result.errors.push(errorMsg);
      break;
    }
  }

  return result;
}
