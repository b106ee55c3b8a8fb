export { withContentionRetry, jitterMs, backoffDelayMs, DEFAULT_RETRY_ATTEMPTS } from './retry';
export type { RetryOptions } from './retry';
