import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { applyMigrations } from '@queueline/db';
import { MemoryRecordStore } from '../memory-record-store';
import { PostgresRecordStore } from '../postgres-record-store';
import { SqliteRecordStore } from '../sqlite-record-store';
import type { RecordStore } from '../types';
import { describeRecordStoreContract } from './record-store-contract';

describeRecordStoreContract('memory', async () => {
  let store: RecordStore = new MemoryRecordStore();
  return {
    get store() {
      return store;
    },
    async reset() {
      store = new MemoryRecordStore();
    },
    async dispose() {
      await store.close();
    },
  };
});

describeRecordStoreContract('sqlite file', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'queueline-contract-'));
  let counter = 0;
  let store: RecordStore = await SqliteRecordStore.open(path.join(dir, 'initial.db'), { pageSize: 2 });
  return {
    get store() {
      return store;
    },
    async reset() {
      await store.close();
      counter += 1;
      store = await SqliteRecordStore.open(path.join(dir, `store-${counter}.db`), { pageSize: 2 });
    },
    async dispose() {
      await store.close();
      await rm(dir, { recursive: true, force: true });
    },
  };
});

describeRecordStoreContract('postgres (PGlite)', async () => {
  const client = new PGlite();
  await applyMigrations({
    exec: (text) => client.exec(text),
    query: async (text) => (await client.query<Record<string, unknown>>(text)).rows,
  });
  // A small page size makes every listing cross page boundaries.
  const store = new PostgresRecordStore(drizzle(client), { pageSize: 2 });
  return {
    store,
    async reset() {
      await client.exec('TRUNCATE queue_records');
    },
    async dispose() {
      await client.close();
    },
  };
});
