import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

export interface SqlMigration {
  name: string;
  sql: string;
}

const MIGRATIONS_DIR = fileURLToPath(new URL('../migrations/', import.meta.url));

/** Reads every `.sql` file in the migrations folder, ordered by file name. */
export async function loadMigrations(dir: string = MIGRATIONS_DIR): Promise<SqlMigration[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
  return Promise.all(
    files.map(async (name) => ({
      name,
      sql: await readFile(path.join(dir, name), 'utf8'),
    })),
  );
}

/** What the runner needs from a Postgres connection. */
export interface MigrationClient {
  /** Runs multi-statement SQL as one simple query. */
  exec(sql: string): Promise<unknown>;
  /** Runs one statement and resolves with its rows. */
  query(sql: string): Promise<readonly Record<string, unknown>[]>;
}

export const MIGRATIONS_TABLE = 'schema_migrations';

function quoteLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

async function appliedNames(client: MigrationClient): Promise<Set<string>> {
  await client.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      name text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    );
  `);
  const rows = await client.query(`SELECT name FROM ${MIGRATIONS_TABLE}`);
  const names = new Set<string>();
  for (const row of rows) {
    if (typeof row.name === 'string') names.add(row.name);
  }
  return names;
}

/**
 * Applies the migrations not yet recorded in `schema_migrations`, in order,
 * and returns the names it ran. Each migration is sent together with the
 * insert that records it, so Postgres commits both or neither.
 */
export async function applyMigrations(
  client: MigrationClient,
  migrations?: SqlMigration[],
): Promise<string[]> {
  const all = migrations ?? (await loadMigrations());
  const done = await appliedNames(client);
  const applied: string[] = [];
  for (const migration of all) {
    if (done.has(migration.name)) continue;
    await client.exec(
      `${migration.sql.trimEnd()}\nINSERT INTO ${MIGRATIONS_TABLE} (name) VALUES (${quoteLiteral(migration.name)});`,
    );
    applied.push(migration.name);
  }
  return applied;
}
