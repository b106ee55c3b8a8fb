import { describe, it, expect } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { applyMigrations, loadMigrations } from '../migrations';
import type { MigrationClient } from '../migrations';

/** Records every statement sent; reports `applied` as already recorded. */
function fakeClient(applied: string[] = [], failOn?: string) {
  const executed: string[] = [];
  const client: MigrationClient = {
    async exec(text) {
      if (failOn && text.startsWith(failOn)) throw new Error('syntax error');
      executed.push(text);
    },
    async query() {
      return applied.map((name) => ({ name }));
    },
  };
  // The first exec always creates the bookkeeping table.
  const migrationsRun = () => executed.slice(1);
  return { client, migrationsRun };
}

function pgliteClient(pg: PGlite): MigrationClient {
  return {
    exec: (text) => pg.exec(text),
    query: async (text) => (await pg.query<Record<string, unknown>>(text)).rows,
  };
}

describe('loadMigrations', () => {
  it('loads the bundled SQL files in name order', async () => {
    const migrations = await loadMigrations();
    expect(migrations.map((m) => m.name)).toEqual([
      '0000_queue_records.sql',
      '0001_queue_records_version_bigint.sql',
    ]);
    expect(migrations[0]?.sql).toContain('CREATE TABLE IF NOT EXISTS queue_records');
  });
});

describe('applyMigrations', () => {
  it('runs each migration in the given order together with its record', async () => {
    const { client, migrationsRun } = fakeClient();
    const applied = await applyMigrations(client, [
      { name: '0001_b.sql', sql: 'SELECT 2;\n' },
      { name: '0000_a.sql', sql: 'SELECT 1;' },
    ]);
    expect(migrationsRun()).toEqual([
      "SELECT 2;\nINSERT INTO schema_migrations (name) VALUES ('0001_b.sql');",
      "SELECT 1;\nINSERT INTO schema_migrations (name) VALUES ('0000_a.sql');",
    ]);
    expect(applied).toEqual(['0001_b.sql', '0000_a.sql']);
  });

  it('skips migrations already recorded', async () => {
    const { client, migrationsRun } = fakeClient(['0000_a.sql']);
    const applied = await applyMigrations(client, [
      { name: '0000_a.sql', sql: 'SELECT 1;' },
      { name: '0001_b.sql', sql: 'SELECT 2;' },
    ]);
    expect(applied).toEqual(['0001_b.sql']);
    expect(migrationsRun()).toEqual([
      "SELECT 2;\nINSERT INTO schema_migrations (name) VALUES ('0001_b.sql');",
    ]);
  });

  it('escapes quotes in migration names', async () => {
    const { client, migrationsRun } = fakeClient();
    await applyMigrations(client, [{ name: "o'brien.sql", sql: 'SELECT 1;' }]);
    expect(migrationsRun()).toEqual([
      "SELECT 1;\nINSERT INTO schema_migrations (name) VALUES ('o''brien.sql');",
    ]);
  });

  it('stops at the first failing migration', async () => {
    const { client, migrationsRun } = fakeClient([], 'BAD');
    await expect(
      applyMigrations(client, [
        { name: 'a', sql: 'OK;' },
        { name: 'b', sql: 'BAD;' },
        { name: 'c', sql: 'NEVER;' },
      ]),
    ).rejects.toThrow('syntax error');
    expect(migrationsRun()).toEqual(["OK;\nINSERT INTO schema_migrations (name) VALUES ('a');"]);
  });

  describe('against Postgres (PGlite)', () => {
    it('applies the bundled migrations once', async () => {
      const pg = new PGlite();
      try {
        const client = pgliteClient(pg);
        expect(await applyMigrations(client)).toEqual([
          '0000_queue_records.sql',
          '0001_queue_records_version_bigint.sql',
        ]);
        expect(await applyMigrations(client)).toEqual([]);

        const recorded = await pg.query<{ name: string }>(
          'SELECT name FROM schema_migrations ORDER BY name',
        );
        expect(recorded.rows.map((r) => r.name)).toEqual([
          '0000_queue_records.sql',
          '0001_queue_records_version_bigint.sql',
        ]);
      } finally {
        await pg.close();
      }
    });

    it('leaves a failed migration unrecorded', async () => {
      const pg = new PGlite();
      try {
        const client = pgliteClient(pg);
        await expect(
          applyMigrations(client, [{ name: '0000_broken.sql', sql: 'CREATE TABLE broken (;' }]),
        ).rejects.toThrow();
        const recorded = await pg.query('SELECT name FROM schema_migrations');
        expect(recorded.rows).toEqual([]);
      } finally {
        await pg.close();
      }
    });

    it('stores versions beyond the 32-bit range', async () => {
      const pg = new PGlite();
      try {
        await applyMigrations(pgliteClient(pg));
        await pg.exec(
          "INSERT INTO queue_records (key, data, version) VALUES ('location#L', '{}', 2147483648)",
        );
        const row = await pg.query<{ version: string }>(
          "SELECT version::text AS version FROM queue_records WHERE key = 'location#L'",
        );
        expect(row.rows[0]?.version).toBe('2147483648');
      } finally {
        await pg.close();
      }
    });
  });
});
