import { RecordConflictError, RecordNotFoundError, StorageUnavailableError } from './errors';
import type {
  ListOptions,
  RecordOperation,
  RecordStore,
  StorageDriver,
  StoredRecord,
  WriteCondition,
} from './types';
import { assertValidOperations } from './validate';

interface RecordEntry {
  data: string;
  version: number;
}

/** Pending change for one key: the new entry, or null for a delete. */
type RecordChange = [key: string, entry: RecordEntry | null];

function satisfies(existing: RecordEntry | undefined, condition: WriteCondition | undefined): boolean {
  if (!condition) return true;
  if (condition.type === 'absent') return existing === undefined;
  return existing !== undefined && existing.version === condition.version;
}

/**
 * In-process record store. A commit is planned against the current map and
 * applied in the same synchronous step, so no other commit can interleave.
 * State lives only as long as the instance.
 */
export class MemoryRecordStore implements RecordStore {
  readonly driver: StorageDriver = 'local';
  private readonly records = new Map<string, RecordEntry>();
  private closed = false;

  async get(key: string): Promise<StoredRecord | null> {
    this.assertOpen();
    const entry = this.records.get(key);
    return entry ? { key, data: entry.data, version: entry.version } : null;
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

  async *listByPrefix(prefix: string, _options?: ListOptions): AsyncIterable<StoredRecord> {
    this.assertOpen();
    const keys = [...this.records.keys()].filter((k) => k.startsWith(prefix)).sort();
    for (const key of keys) {
      const entry = this.records.get(key);
      if (entry) yield { key, data: entry.data, version: entry.version };
    }
  }

  async commit(operations: RecordOperation[]): Promise<StoredRecord[]> {
    this.assertOpen();
    assertValidOperations(operations);
    const changes = this.plan(operations);
    for (const [key, entry] of changes) {
      if (entry) this.records.set(key, entry);
      else this.records.delete(key);
    }
    return changes.flatMap(([key, entry]) =>
      entry ? [{ key, data: entry.data, version: entry.version }] : [],
    );
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private plan(operations: RecordOperation[]): RecordChange[] {
    return operations.map((op): RecordChange => {
      const existing = this.records.get(op.key);
      if (op.type === 'delete') {
        if (!existing) throw new RecordNotFoundError(op.key);
        if (!satisfies(existing, op.condition)) throw new RecordConflictError(op.key);
        return [op.key, null];
      }
      if (!satisfies(existing, op.condition)) throw new RecordConflictError(op.key);
      return [op.key, { data: op.data, version: existing ? existing.version + 1 : 1 }];
    });
  }

  private assertOpen(): void {
    if (this.closed) throw new StorageUnavailableError(this.driver, new Error('store is closed'));
  }
}
