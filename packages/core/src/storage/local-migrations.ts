import type Database from 'better-sqlite3';

export interface LocalMigration {
  version: number;
  name: string;
  sql: string;
}

/** Schema of the local store's SQLite file, applied in version order. */
export const LOCAL_MIGRATIONS: LocalMigration[] = [
  {
    version: 1,
    name: 'queue_records',
    sql: `
      CREATE TABLE IF NOT EXISTS queue_records (
        key TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        version INTEGER NOT NULL CHECK (version >= 1),
        updated_at TEXT NOT NULL
      ) WITHOUT ROWID;
    `,
  },
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS local_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);
}

/**
 * Applies the migrations not yet recorded in `local_migrations` and returns
 * the versions it ran. Each migration and its bookkeeping row commit together
 * under a write lock, so two processes opening the same file apply it once.
 */
export function applyLocalMigrations(
  db: Database.Database,
  migrations: LocalMigration[] = LOCAL_MIGRATIONS,
): number[] {
  ensureMigrationsTable(db);
  const isApplied = db.prepare<[number], { version: number }>(
    'SELECT version FROM local_migrations WHERE version = ?',
  );
  const record = db.prepare<{ version: number; name: string; applied_at: string }>(`
    INSERT INTO local_migrations (version, name, applied_at)
    VALUES (@version, @name, @applied_at)
  `);

  const ran: number[] = [];
  const ordered = [...migrations].sort((a, b) => a.version - b.version);
  for (const migration of ordered) {
    const apply = db.transaction(() => {
      if (isApplied.get(migration.version)) return;
      db.exec(migration.sql);
      record.run({
        version: migration.version,
        name: migration.name,
        applied_at: new Date().toISOString(),
      });
      ran.push(migration.version);
    });
    apply.immediate();
  }
  return ran;
}
