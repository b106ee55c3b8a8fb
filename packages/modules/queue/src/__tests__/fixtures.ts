import type { PGlite } from '@electric-sql/pglite';
import { applyMigrations } from '@queueline/db';
import { MemoryRecordStore } from '@queueline/core';
import type { RecordOperation, RecordStore, StoredRecord } from '@queueline/core';
import type { QueueContext } from '../context';

export const FIXED_NOW = '2026-03-01T09:00:00.000Z';

export function makeContext(store: RecordStore, overrides: Partial<QueueContext> = {}): QueueContext {
  return {
    store,
    retry: { attempts: 5, baseDelayMs: 0 },
    minutesPerVisitor: 5,
    now: () => FIXED_NOW,
    ...overrides,
  };
}

/** Applies the production SQL migrations to an in-process Postgres. */
export async function migratePglite(pg: PGlite): Promise<void> {
  await applyMigrations({
    exec: (text) => pg.exec(text),
    query: async (text) => (await pg.query<Record<string, unknown>>(text)).rows,
  });
}

/**
 * Memory store that runs `before` once, ahead of the next commit, to stage a
 * competing write between an operation's read and its conditional write.
 */
export class InterferingStore extends MemoryRecordStore {
  before: (() => Promise<unknown>) | undefined;
  commits = 0;

  override async commit(operations: RecordOperation[]): Promise<StoredRecord[]> {
    const hook = this.before;
    this.before = undefined;
    if (hook) await hook();
    this.commits += 1;
    return super.commit(operations);
  }
}
