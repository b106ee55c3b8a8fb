import { and, asc, eq, gt, sql } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { isConnectionFailure, queueRecords } from '@queueline/db';
import { errorFields, logger } from '../observability/logger';
import { RecordConflictError, RecordNotFoundError, StorageUnavailableError } from './errors';
import type {
  ListOptions,
  RecordOperation,
  RecordStore,
  StorageDriver,
  StoredRecord,
} from './types';
import { assertValidOperations } from './validate';

const DEFAULT_PAGE_SIZE = 200;

const recordColumns = {
  key: queueRecords.key,
  data: queueRecords.data,
  version: queueRecords.version,
};

export interface PostgresRecordStoreOptions {
  pageSize?: number;
  /** Releases the underlying connection pool. */
  onClose?: () => Promise<void>;
}

type PutOperation = Extract<RecordOperation, { type: 'put' }>;
type DeleteOperation = Extract<RecordOperation, { type: 'delete' }>;

/**
 * Remote record store on a single `queue_records` table.
 *
 * Conditional writes map onto row-level predicates:
 *   absent  → INSERT … ON CONFLICT DO NOTHING RETURNING
 *   version → UPDATE … WHERE key = $1 AND version = $2 RETURNING
 * An empty RETURNING means the precondition failed. `commit` runs its
 * operations in one transaction and rolls back on the first failure.
 *
 * Works with any drizzle Postgres driver (postgres.js in production,
 * PGlite in tests).
 */
export class PostgresRecordStore<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT>
  implements RecordStore
{
  readonly driver: StorageDriver = 'remote';
  private readonly pageSize: number;

  constructor(
    private readonly db: PgDatabase<TQueryResult>,
    private readonly options: PostgresRecordStoreOptions = {},
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async get(key: string): Promise<StoredRecord | null> {
    return this.guard('get', async () => {
      const [row] = await this.db
        .select(recordColumns)
        .from(queueRecords)
        .where(eq(queueRecords.key, key))
        .limit(1);
      return row ?? null;
    });
  }

  async put(key: string, data: string, condition?: PutOperation['condition']): Promise<StoredRecord> {
    const op: PutOperation = { type: 'put', key, data, condition };
    assertValidOperations([op]);
    return this.guard('put', () => this.applyPut(this.db, op));
  }

  async delete(key: string, condition?: DeleteOperation['condition']): Promise<void> {
    await this.guard('delete', () => this.applyDelete(this.db, { type: 'delete', key, condition }));
  }

  async *listByPrefix(prefix: string, options?: ListOptions): AsyncIterable<StoredRecord> {
    const pageSize = options?.pageSize ?? this.pageSize;
    const matchesPrefix = sql`starts_with(${queueRecords.key}, ${prefix})`;
    let after: string | null = null;

    for (;;) {
      const cursor: string | null = after;
      const rows: StoredRecord[] = await this.guard('listByPrefix', () =>
        this.db
          .select(recordColumns)
          .from(queueRecords)
          .where(cursor === null ? matchesPrefix : and(matchesPrefix, gt(queueRecords.key, cursor)))
          .orderBy(asc(queueRecords.key))
          .limit(pageSize),
      );
      for (const row of rows) yield row;

      const last = rows[rows.length - 1];
      if (!last || rows.length < pageSize) return;
      after = last.key;
    }
  }

  async commit(operations: RecordOperation[]): Promise<StoredRecord[]> {
    assertValidOperations(operations);
    return this.guard('commit', () =>
      this.db.transaction(async (tx) => {
        const written: StoredRecord[] = [];
        for (const op of operations) {
          if (op.type === 'put') written.push(await this.applyPut(tx, op));
          else await this.applyDelete(tx, op);
        }
        return written;
      }),
    );
  }

  async ping(): Promise<void> {
    await this.guard('ping', () => this.db.execute(sql`select 1`));
  }

  async close(): Promise<void> {
    await this.options.onClose?.();
  }

  private async applyPut(executor: PgDatabase<TQueryResult>, op: PutOperation): Promise<StoredRecord> {
    const now = new Date();
    const { condition } = op;

    if (!condition) {
      const [row] = await executor
        .insert(queueRecords)
        .values({ key: op.key, data: op.data, version: 1 })
        .onConflictDoUpdate({
          target: queueRecords.key,
          set: { data: op.data, version: sql`${queueRecords.version} + 1`, updatedAt: now },
        })
        .returning(recordColumns);
      if (!row) throw new RecordConflictError(op.key);
      return row;
    }

    if (condition.type === 'absent') {
      const [row] = await executor
        .insert(queueRecords)
        .values({ key: op.key, data: op.data, version: 1 })
        .onConflictDoNothing()
        .returning(recordColumns);
      if (!row) throw new RecordConflictError(op.key);
      return row;
    }

    const [row] = await executor
      .update(queueRecords)
      .set({ data: op.data, version: condition.version + 1, updatedAt: now })
      .where(and(eq(queueRecords.key, op.key), eq(queueRecords.version, condition.version)))
      .returning(recordColumns);
    if (!row) throw new RecordConflictError(op.key);
    return row;
  }

  private async applyDelete(executor: PgDatabase<TQueryResult>, op: DeleteOperation): Promise<void> {
    const { condition } = op;
    const predicate =
      condition?.type === 'version'
        ? and(eq(queueRecords.key, op.key), eq(queueRecords.version, condition.version))
        : eq(queueRecords.key, op.key);

    if (condition?.type !== 'absent') {
      const deleted = await executor
        .delete(queueRecords)
        .where(predicate)
        .returning({ key: queueRecords.key });
      if (deleted.length > 0) return;
    }

    // Nothing deleted (or an "absent" precondition): tell missing from stale.
    const [existing] = await executor
      .select({ key: queueRecords.key })
      .from(queueRecords)
      .where(eq(queueRecords.key, op.key))
      .limit(1);
    if (!existing) throw new RecordNotFoundError(op.key);
    throw new RecordConflictError(op.key);
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isConnectionFailure(err)) {
        logger.error('Remote record store unreachable', {
          driver: this.driver,
          operation,
          error: errorFields(err),
        });
        throw new StorageUnavailableError(this.driver, err);
      }
      throw err;
    }
  }
}
