import { setTimeout as sleep } from 'node:timers/promises';
import { logger } from '../observability/logger';
import { ConcurrencyConflictError, RecordConflictError } from '../storage/errors';

export interface RetryOptions {
  /** Total attempts, including the first. */
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Caller deadline; an aborted signal ends the retries like exhaustion does. */
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_ATTEMPTS = 5;
const DEFAULT_BASE_DELAY_MS = 10;
const DEFAULT_MAX_DELAY_MS = 250;

/** Adds ±`ratio` random jitter so contending callers spread out. */
export function jitterMs(baseMs: number, ratio = 0.5): number {
  const factor = 1 + (Math.random() * 2 - 1) * ratio;
  return Math.max(0, Math.round(baseMs * factor));
}

/** Exponential backoff for the retry after `attempt` (1-based), capped. */
export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, jitterMs(baseDelayMs * 2 ** (attempt - 1)));
}

/**
 * Runs `attempt` until it stops losing conditional-write races.
 *
 * Each call to `attempt` must re-read what it depends on: it is a complete
 * read-compute-write cycle that either commits atomically or throws
 * RecordConflictError without side effects. Any other error propagates at
 * once. When attempts run out or `signal` aborts, the caller gets a
 * ConcurrencyConflictError it may retry as a whole.
 */
export async function withContentionRetry<T>(
  entityId: string,
  attempt: (attemptNumber: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_RETRY_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const { signal } = options;

  for (let n = 1; n <= attempts; n++) {
    if (signal?.aborted) break;
    try {
      return await attempt(n);
    } catch (err) {
      if (!(err instanceof RecordConflictError)) throw err;
      logger.debug('Conditional write lost a race', { operation: entityId, attempt: n, key: err.key });
      if (n === attempts) break;
      const delay = backoffDelayMs(n, baseDelayMs, maxDelayMs);
      if (!(await pause(delay, signal))) break;
    }
  }

  logger.warn('Contention retries exhausted', {
    operation: entityId,
    attempts,
    aborted: signal?.aborted ?? false,
  });
  throw new ConcurrencyConflictError(entityId);
}

/** Resolves false when `signal` aborts during the wait. */
async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}
