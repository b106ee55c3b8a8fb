import { errorFields, logger } from '../observability/logger';
import { StorageUnavailableError } from './errors';
import type {
  ListOptions,
  RecordOperation,
  RecordStore,
  StorageDriver,
  StoredRecord,
  WriteCondition,
} from './types';

/**
 * What to do when the remote store becomes unreachable mid-operation.
 *
 * - `fail`: surface StorageUnavailableError to the caller.
 * - `fallback`: switch every later call to the local store for the rest of
 *   the process. The switch is one-way, so a process never interleaves
 *   writes between two stores.
 *
 * Only reads are replayed on the local store after a switch. A failed write
 * still surfaces StorageUnavailableError: its preconditions were read from
 * the remote store, and the remote may have applied it before the connection
 * dropped. The caller retries and re-reads from the local store.
 */
export type FallbackPolicy = 'fail' | 'fallback';

export class FallbackRecordStore implements RecordStore {
  private active: RecordStore;

  constructor(
    private readonly primary: RecordStore,
    private readonly secondary: RecordStore,
    private readonly policy: FallbackPolicy,
  ) {
    this.active = primary;
  }

  get driver(): StorageDriver {
    return this.active.driver;
  }

  /** True once the store has switched to the local fallback. */
  get degraded(): boolean {
    return this.active !== this.primary;
  }

  get(key: string): Promise<StoredRecord | null> {
    return this.route((store) => store.get(key), 'read');
  }

  put(key: string, data: string, condition?: WriteCondition): Promise<StoredRecord> {
    return this.route((store) => store.put(key, data, condition), 'write');
  }

  delete(key: string, condition?: WriteCondition): Promise<void> {
    return this.route((store) => store.delete(key, condition), 'write');
  }

  async *listByPrefix(prefix: string, options?: ListOptions): AsyncIterable<StoredRecord> {
    const store = this.active;
    let yielded = false;
    try {
      for await (const record of store.listByPrefix(prefix, options)) {
        yielded = true;
        yield record;
      }
    } catch (err) {
      // A half-read listing cannot be resumed on another store.
      if (yielded || !this.shouldSwitch(store, err)) throw err;
      this.switchToSecondary(err);
      yield* this.secondary.listByPrefix(prefix, options);
    }
  }

  commit(operations: RecordOperation[]): Promise<StoredRecord[]> {
    return this.route((store) => store.commit(operations), 'write');
  }

  ping(): Promise<void> {
    return this.route((store) => store.ping(), 'read');
  }

  async close(): Promise<void> {
    await Promise.all([this.primary.close(), this.secondary.close()]);
  }

  private async route<T>(call: (store: RecordStore) => Promise<T>, kind: 'read' | 'write'): Promise<T> {
    const store = this.active;
    try {
      return await call(store);
    } catch (err) {
      if (!this.shouldSwitch(store, err)) throw err;
      this.switchToSecondary(err);
      if (kind === 'write') throw err;
      return call(this.secondary);
    }
  }

  private shouldSwitch(store: RecordStore, err: unknown): boolean {
    return (
      this.policy === 'fallback' &&
      store === this.primary &&
      err instanceof StorageUnavailableError
    );
  }

  private switchToSecondary(err: unknown): void {
    if (this.active === this.secondary) return;
    this.active = this.secondary;
    logger.warn('Remote record store unavailable, switching to local fallback', {
      from: this.primary.driver,
      to: this.secondary.driver,
      error: errorFields(err),
    });
  }
}
