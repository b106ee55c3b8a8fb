/**
 * Storage Port: the only surface the queue engine uses to persist state.
 *
 * Records are opaque text keyed by string. Every record carries a `version`
 * that starts at 1 and increases by one on each write; conditional writes
 * compare against it. Implementations must behave identically: the same
 * contract suite runs against each of them.
 */

export type StorageDriver = 'remote' | 'local';

export interface StoredRecord {
  key: string;
  data: string;
  version: number;
}

/** Precondition for a write. A failed precondition raises RecordConflictError. */
export type WriteCondition =
  | { type: 'absent' }
  | { type: 'version'; version: number };

export type RecordOperation =
  | { type: 'put'; key: string; data: string; condition?: WriteCondition }
  | { type: 'delete'; key: string; condition?: WriteCondition };

export interface ListOptions {
  /** Records fetched per round trip. Implementations may ignore it. */
  pageSize?: number;
}

export interface RecordStore {
  readonly driver: StorageDriver;

  /** Returns null when no record exists under `key`. */
  get(key: string): Promise<StoredRecord | null>;

  put(key: string, data: string, condition?: WriteCondition): Promise<StoredRecord>;

  /** Throws RecordNotFoundError when `key` is absent. */
  delete(key: string, condition?: WriteCondition): Promise<void>;

  /**
   * Records whose key starts with `prefix`, ascending by key. Lazy and finite;
   * call again to restart from the beginning.
   */
  listByPrefix(prefix: string, options?: ListOptions): AsyncIterable<StoredRecord>;

  /**
   * Applies every operation or none. Returns the written records of the
   * `put` operations in order.
   */
  commit(operations: RecordOperation[]): Promise<StoredRecord[]>;

  /** Cheap reachability probe. Throws StorageUnavailableError when unreachable. */
  ping(): Promise<void>;

  close(): Promise<void>;
}

export const ifAbsent: WriteCondition = { type: 'absent' };

export function ifVersion(version: number): WriteCondition {
  return { type: 'version', version };
}

/** Drains an async iterable into an array. */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}
