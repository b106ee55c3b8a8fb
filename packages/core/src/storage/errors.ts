import { ConflictError, NotFoundError, ServiceUnavailableError } from '@queueline/shared';

/**
 * Storage error codes:
 *
 * | Code                  | HTTP | When                                          |
 * |-----------------------|------|-----------------------------------------------|
 * | RECORD_CONFLICT       | 409  | Conditional write precondition failed          |
 * | RECORD_NOT_FOUND      | 404  | Delete of an absent key                        |
 * | STORAGE_UNAVAILABLE   | 503  | Backing store unreachable                      |
 * | CONCURRENCY_CONFLICT  | 409  | Contention retries exhausted or deadline hit   |
 */

export class RecordConflictError extends ConflictError {
  constructor(public readonly key: string) {
    super(`Record ${key} was modified concurrently`);
    this.code = 'RECORD_CONFLICT';
    this.name = 'RecordConflictError';
  }
}

export class RecordNotFoundError extends NotFoundError {
  constructor(public readonly key: string) {
    super('Record', key);
    this.code = 'RECORD_NOT_FOUND';
    this.name = 'RecordNotFoundError';
  }
}

export class StorageUnavailableError extends ServiceUnavailableError {
  constructor(driver: string, cause?: unknown) {
    super(`The ${driver} record store is unavailable`);
    this.code = 'STORAGE_UNAVAILABLE';
    this.name = 'StorageUnavailableError';
    if (cause !== undefined) this.cause = cause;
  }
}

export class ConcurrencyConflictError extends ConflictError {
  constructor(entityId: string) {
    super(`${entityId} is being modified by another request. Please try again.`);
    this.code = 'CONCURRENCY_CONFLICT';
    this.name = 'ConcurrencyConflictError';
  }

  override get retryable(): boolean {
    return true;
  }
}
