import { createDatabase } from '@queueline/db';
import { getDeploymentConfig } from '../config/deployment';
import type { DeploymentConfig } from '../config/deployment';
import { RecordStoreQueryLogger } from '../observability/drizzle-logger';
import { errorFields, logger } from '../observability/logger';
import { FallbackRecordStore } from './fallback-record-store';
import type { FallbackPolicy } from './fallback-record-store';
import { PostgresRecordStore } from './postgres-record-store';
import { SqliteRecordStore } from './sqlite-record-store';
import type { RecordStore, StorageDriver } from './types';

export interface OpenRecordStoreOptions {
  driver: StorageDriver;
  fallbackPolicy: FallbackPolicy;
  localDataFile: string;
  databaseUrl?: string;
  poolSize?: number;
  /** Builds the remote store. Defaults to postgres.js on `databaseUrl`. */
  createRemote?: (options: OpenRecordStoreOptions) => RecordStore;
}

export function storageOptionsFromConfig(config: DeploymentConfig): OpenRecordStoreOptions {
  return {
    driver: config.storage.driver,
    fallbackPolicy: config.storage.fallbackPolicy,
    localDataFile: config.storage.localDataFile,
    databaseUrl: config.database.url,
    poolSize: config.database.poolSize,
  };
}

export function createPostgresRecordStore(options: OpenRecordStoreOptions): RecordStore {
  if (!options.databaseUrl) {
    throw new Error('The remote record store requires DATABASE_URL');
  }
  const { db, close } = createDatabase(options.databaseUrl, {
    poolMax: options.poolSize,
    logger: new RecordStoreQueryLogger(),
    onNotice: (message) => logger.warn('Postgres notice', { driver: 'remote', notice: message }),
  });
  return new PostgresRecordStore(db, { onClose: close });
}

/**
 * Opens the record store selected by configuration.
 *
 * - `local`: the SQLite file store.
 * - `remote` + `fail`: the Postgres store; an unreachable database fails startup.
 * - `remote` + `fallback`: the Postgres store wrapped so that an unreachable
 *   database (now or later) switches the process to the local store.
 */
export async function openRecordStore(
  options: OpenRecordStoreOptions = storageOptionsFromConfig(getDeploymentConfig()),
): Promise<RecordStore> {
  if (options.driver === 'local') {
    const local = await SqliteRecordStore.open(options.localDataFile);
    logger.info('Record store ready', { driver: local.driver, file: local.location });
    return local;
  }

  const remote = (options.createRemote ?? createPostgresRecordStore)(options);

  if (options.fallbackPolicy === 'fail') {
    try {
      await remote.ping();
    } catch (err) {
      logger.error('Remote record store failed its startup probe', { error: errorFields(err) });
      await remote.close();
      throw err;
    }
    logger.info('Record store ready', { driver: remote.driver });
    return remote;
  }

  const local = await SqliteRecordStore.open(options.localDataFile);
  const store = new FallbackRecordStore(remote, local, 'fallback');
  await store.ping();
  logger.info('Record store ready', { driver: store.driver, degraded: store.degraded });
  return store;
}

let storePromise: Promise<RecordStore> | null = null;

export function getRecordStore(): Promise<RecordStore> {
  if (!storePromise) {
    storePromise = openRecordStore();
  }
  return storePromise;
}

export function setRecordStore(store: RecordStore | null): void {
  storePromise = store ? Promise.resolve(store) : null;
}
