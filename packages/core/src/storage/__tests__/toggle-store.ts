import { StorageUnavailableError } from '../errors';
import { MemoryRecordStore } from '../memory-record-store';
import type { ListOptions, RecordOperation, StoredRecord, WriteCondition } from '../types';

/** Memory store that can be switched "offline" to simulate an unreachable remote. */
export class ToggleStore extends MemoryRecordStore {
  override readonly driver = 'remote' as const;
  down = false;
  wasClosed = false;
  calls = 0;

  private check(): void {
    this.calls += 1;
    if (this.down) throw new StorageUnavailableError(this.driver, new Error('connection refused'));
  }

  override async get(key: string): Promise<StoredRecord | null> {
    this.check();
    return super.get(key);
  }

  override async put(key: string, data: string, condition?: WriteCondition): Promise<StoredRecord> {
    this.check();
    return super.put(key, data, condition);
  }

  override async commit(operations: RecordOperation[]): Promise<StoredRecord[]> {
    this.check();
    return super.commit(operations);
  }

  override async *listByPrefix(prefix: string, options?: ListOptions): AsyncIterable<StoredRecord> {
    this.check();
    yield* super.listByPrefix(prefix, options);
  }

  override async ping(): Promise<void> {
    this.check();
  }

  override async close(): Promise<void> {
    this.wasClosed = true;
    await super.close();
  }
}
