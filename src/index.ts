export * from './sync';
export { Database, type DatabaseOptions } from './lib/database';
export * from './lib/errors';
export { EventBus, type SyncEvent, type SyncEventListener, type SyncEventType } from './lib/events';
export { MIGRATIONS, runMigrations } from './lib/migrations';
export { readSupabaseConfig, type SupabaseConfig } from './lib/supabase-config';
export * from './lib/types';
