export type {
  StorageDriver,
  StoredRecord,
  WriteCondition,
  RecordOperation,
  ListOptions,
  RecordStore,
} from './types';
export { ifAbsent, ifVersion, collect } from './types';
export {
  RecordConflictError,
  RecordNotFoundError,
  StorageUnavailableError,
  ConcurrencyConflictError,
} from './errors';
export { MemoryRecordStore } from './memory-record-store';
export { SqliteRecordStore } from './sqlite-record-store';
export type { SqliteRecordStoreOptions } from './sqlite-record-store';
export { PostgresRecordStore } from './postgres-record-store';
export type { PostgresRecordStoreOptions } from './postgres-record-store';
export { FallbackRecordStore } from './fallback-record-store';
export type { FallbackPolicy } from './fallback-record-store';
export {
  openRecordStore,
  getRecordStore,
  setRecordStore,
  createPostgresRecordStore,
  storageOptionsFromConfig,
} from './get-record-store';
export type { OpenRecordStoreOptions } from './get-record-store';
