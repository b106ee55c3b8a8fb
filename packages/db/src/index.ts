export { createDatabase } from './client';
export type { Database, DatabaseClient, CreateDatabaseOptions } from './client';
export { isConnectionFailure } from './connection-errors';
export { loadMigrations, applyMigrations, MIGRATIONS_TABLE } from './migrations';
export type { SqlMigration, MigrationClient } from './migrations';
export * from './schema';
