import { decodeTime, monotonicFactory } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

const ulid = monotonicFactory();

/**
 * Monotonic ULID. Pass `seedTime` (epoch ms) to stamp the id with a
 * caller-controlled clock instead of `Date.now()`. Ids never sort backwards:
 * a seed earlier than the previous id keeps that id's timestamp.
 */
export function generateUlid(seedTime?: number): string {
  return ulid(seedTime);
}

export function isValidUlid(value: string): boolean {
  if (typeof value !== 'string' || value.length !== 26) {
    return false;
  }
  return CROCKFORD_BASE32.test(value);
}

/** Epoch milliseconds encoded in the first 10 characters of a ULID. */
export function ulidTimestamp(value: string): number | null {
  if (!isValidUlid(value)) return null;
  return decodeTime(value);
}
