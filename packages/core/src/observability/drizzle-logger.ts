/**
 * Drizzle ORM logger hook: record-store SQL at debug level.
 */

import type { Logger } from 'drizzle-orm';
import { logger } from './logger';

const MAX_QUERY_LENGTH = 200;

export class RecordStoreQueryLogger implements Logger {
  logQuery(query: string, params: unknown[]): void {
    logger.debug('db:query', {
      driver: 'remote',
      query: query.length > MAX_QUERY_LENGTH ? query.slice(0, MAX_QUERY_LENGTH) + '...' : query,
      // Parameters carry visitor details; only their count is logged.
      paramCount: params.length,
    });
  }
}
