import type { Logger } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

export type Database = PostgresJsDatabase;

export interface DatabaseClient {
  db: Database;
  /** Closes the pool; pending queries finish first. */
  close(): Promise<void>;
}

export interface CreateDatabaseOptions {
  poolMax?: number;
  connectTimeoutSeconds?: number;
  onNotice?: (message: string) => void;
  /** Drizzle query logger. */
  logger?: Logger;
}

/**
 * Opens a postgres.js pool wrapped in drizzle.
 *
 * Keep the pool small: every request-handling worker gets its own process,
 * and ticket writes are single-statement round trips.
 */
export function createDatabase(
  connectionString: string,
  options: CreateDatabaseOptions = {},
): DatabaseClient {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  const client = postgres(connectionString, {
    max: options.poolMax ?? 2,
    prepare: false,
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: options.connectTimeoutSeconds ?? 10,
    onnotice: (notice) => {
      options.onNotice?.(`${notice.severity}: ${notice.message}`);
    },
  });
  return {
    db: drizzle(client, { logger: options.logger }),
    close: () => client.end({ timeout: 5 }),
  };
}
