import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import Database from 'better-sqlite3';
import { errorFields, logger } from '../observability/logger';
import { RecordConflictError, RecordNotFoundError, StorageUnavailableError } from './errors';
import { applyLocalMigrations } from './local-migrations';
import type {
  ListOptions,
  RecordOperation,
  RecordStore,
  StorageDriver,
  StoredRecord,
  WriteCondition,
} from './types';
import { assertValidOperations } from './validate';

const DEFAULT_PAGE_SIZE = 200;
const DEFAULT_BUSY_TIMEOUT_MS = 5_000;

// Result codes (and their extended forms) meaning the file cannot be used now.
const UNAVAILABLE_CODES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_IOERR',
  'SQLITE_CANTOPEN',
  'SQLITE_FULL',
  'SQLITE_READONLY',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
];

export interface SqliteRecordStoreOptions {
  /** How long a write waits on another connection's lock before giving up. */
  busyTimeoutMs?: number;
  pageSize?: number;
}

type PutOperation = Extract<RecordOperation, { type: 'put' }>;
type DeleteOperation = Extract<RecordOperation, { type: 'delete' }>;

interface WriteParams {
  key: string;
  data: string;
  now: string;
}

function sqliteCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

function isSqliteUnavailable(err: unknown): boolean {
  const code = sqliteCode(err);
  if (!code) return false;
  return UNAVAILABLE_CODES.some((base) => code === base || code.startsWith(`${base}_`));
}

function prepareStatements(db: Database.Database) {
  return {
    select: db.prepare<[string], StoredRecord>(
      'SELECT key, data, version FROM queue_records WHERE key = ?',
    ),
    page: db.prepare<{ prefix: string; after: string | null; limit: number }, StoredRecord>(`
      SELECT key, data, version FROM queue_records
      WHERE substr(key, 1, length(@prefix)) = @prefix
        AND (@after IS NULL OR key > @after)
      ORDER BY key
      LIMIT @limit
    `),
    insert: db.prepare<WriteParams, { version: number }>(`
      INSERT INTO queue_records (key, data, version, updated_at)
      VALUES (@key, @data, 1, @now)
      ON CONFLICT (key) DO NOTHING
      RETURNING version
    `),
    upsert: db.prepare<WriteParams, { version: number }>(`
      INSERT INTO queue_records (key, data, version, updated_at)
      VALUES (@key, @data, 1, @now)
      ON CONFLICT (key) DO UPDATE SET
        data = excluded.data,
        version = queue_records.version + 1,
        updated_at = excluded.updated_at
      RETURNING version
    `),
    update: db.prepare<WriteParams & { version: number }, { version: number }>(`
      UPDATE queue_records
      SET data = @data, version = version + 1, updated_at = @now
      WHERE key = @key AND version = @version
      RETURNING version
    `),
    remove: db.prepare<{ key: string }>('DELETE FROM queue_records WHERE key = @key'),
    removeVersion: db.prepare<{ key: string; version: number }>(
      'DELETE FROM queue_records WHERE key = @key AND version = @version',
    ),
    ping: db.prepare('SELECT 1'),
  };
}

/**
 * Local fallback store: one SQLite file in WAL mode, shared by every worker
 * on the host.
 *
 * Conditional writes are row predicates evaluated by SQLite itself:
 *   absent  → INSERT … ON CONFLICT DO NOTHING RETURNING
 *   version → UPDATE … WHERE key = @key AND version = @version RETURNING
 * `commit` runs as an IMMEDIATE transaction, so it holds the file's write
 * lock from its first read to its last write. Another connection's lock is
 * waited on for `busyTimeoutMs`; past that the store reports itself
 * unavailable.
 */
export class SqliteRecordStore implements RecordStore {
  readonly driver: StorageDriver = 'local';
  private readonly statements: ReturnType<typeof prepareStatements>;
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    private readonly filePath: string,
    private readonly pageSize: number,
  ) {
    this.statements = prepareStatements(db);
  }

  static async open(filePath: string, options: SqliteRecordStoreOptions = {}): Promise<SqliteRecordStore> {
    const resolved = path.resolve(filePath);
    let db: Database.Database | undefined;
    try {
      await mkdir(path.dirname(resolved), { recursive: true });
      db = new Database(resolved, { timeout: options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS });
      db.pragma('journal_mode = WAL');
      const migrated = applyLocalMigrations(db);
      if (migrated.length > 0) {
        logger.info('Local record store migrated', { file: resolved, versions: migrated });
      }
      return new SqliteRecordStore(db, resolved, options.pageSize ?? DEFAULT_PAGE_SIZE);
    } catch (err) {
      db?.close();
      logger.error('Local record store failed to open', { file: resolved, error: errorFields(err) });
      throw new StorageUnavailableError('local', err);
    }
  }

  get location(): string {
    return this.filePath;
  }

  async get(key: string): Promise<StoredRecord | null> {
    return this.guard('get', () => this.statements.select.get(key) ?? null);
  }

  async put(key: string, data: string, condition?: WriteCondition): Promise<StoredRecord> {
    const written = await this.commit([{ type: 'put', key, data, condition }]);
    const record = written[0];
    if (!record) throw new Error(`put of ${key} produced no record`);
    return record;
  }

  async delete(key: string, condition?: WriteCondition): Promise<void> {
    await this.commit([{ type: 'delete', key, condition }]);
  }

  async *listByPrefix(prefix: string, options?: ListOptions): AsyncIterable<StoredRecord> {
    const limit = options?.pageSize ?? this.pageSize;
    let after: string | null = null;

    for (;;) {
      const cursor: string | null = after;
      const rows: StoredRecord[] = this.guard('listByPrefix', () =>
        this.statements.page.all({ prefix, after: cursor, limit }),
      );
      for (const row of rows) yield row;

      const last = rows[rows.length - 1];
      if (!last || rows.length < limit) return;
      after = last.key;
    }
  }

  async commit(operations: RecordOperation[]): Promise<StoredRecord[]> {
    this.assertOpen();
    assertValidOperations(operations);
    const now = new Date().toISOString();
    const batch = this.db.transaction(() => {
      const written: StoredRecord[] = [];
      for (const op of operations) {
        if (op.type === 'put') written.push(this.applyPut(op, now));
        else this.applyDelete(op);
      }
      return written;
    });
    return this.guard('commit', () => batch.immediate());
  }

  async ping(): Promise<void> {
    this.guard('ping', () => this.statements.ping.get());
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  private applyPut(op: PutOperation, now: string): StoredRecord {
    const { key, data, condition } = op;
    const params = { key, data, now };
    const row = !condition
      ? this.statements.upsert.get(params)
      : condition.type === 'absent'
        ? this.statements.insert.get(params)
        : this.statements.update.get({ ...params, version: condition.version });
    if (!row) throw new RecordConflictError(key);
    return { key, data, version: row.version };
  }

  private applyDelete(op: DeleteOperation): void {
    const { key, condition } = op;
    if (condition?.type !== 'absent') {
      const result =
        condition?.type === 'version'
          ? this.statements.removeVersion.run({ key, version: condition.version })
          : this.statements.remove.run({ key });
      if (result.changes > 0) return;
    }

    // Nothing deleted (or an "absent" precondition): tell missing from stale.
    if (!this.statements.select.get(key)) throw new RecordNotFoundError(key);
    throw new RecordConflictError(key);
  }

  private guard<T>(operation: string, fn: () => T): T {
    this.assertOpen();
    try {
      return fn();
    } catch (err) {
      if (isSqliteUnavailable(err)) {
        logger.error('Local record store unavailable', {
          driver: this.driver,
          file: this.filePath,
          operation,
          error: errorFields(err),
        });
        throw new StorageUnavailableError(this.driver, err);
      }
      throw err;
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new StorageUnavailableError(this.driver, new Error('store is closed'));
  }
}
