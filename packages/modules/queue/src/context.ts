import type { RecordStore, RetryOptions } from '@queueline/core';

/**
 * Everything a queue command or query needs from its environment. The
 * request layer builds one per process (see `createQueueService`).
 */
export interface QueueContext {
  store: RecordStore;
  /** Backoff settings for contended writes; the deadline comes per call. */
  retry: Omit<RetryOptions, 'signal'>;
  minutesPerVisitor: number;
  /** ISO-8601 timestamp for "now". */
  now: () => string;
}

export interface OperationOptions {
  /** Caller deadline. Aborting ends contention retries with ConcurrencyConflictError. */
  signal?: AbortSignal;
}
