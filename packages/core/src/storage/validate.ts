import { ValidationError } from '@queueline/shared';
import type { RecordOperation } from './types';

// A surrogate half without its partner. Such strings have no UTF-8 encoding.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Returns why `text` cannot be stored as-is, or null when it can. Every store
 * keeps text as UTF-8 without NUL bytes, so both cases are refused up front
 * rather than mangled by one backend and kept by another.
 */
function unstorableReason(text: string): string | null {
  if (text.includes('\u0000')) return 'contains a NUL character';
  if (LONE_SURROGATE.test(text)) return 'contains an unpaired surrogate';
  return null;
}

/** Rejects a batch that names a key twice or carries text no store can keep. */
export function assertValidOperations(operations: RecordOperation[]): void {
  const seen = new Set<string>();
  for (const op of operations) {
    if (seen.has(op.key)) {
      throw new ValidationError(`Key ${op.key} appears more than once in one commit`);
    }
    seen.add(op.key);

    const keyProblem = unstorableReason(op.key);
    if (keyProblem) {
      throw new ValidationError(`Record key ${keyProblem}`, [{ field: 'key', message: keyProblem }]);
    }
    if (op.type === 'put') {
      const dataProblem = unstorableReason(op.data);
      if (dataProblem) {
        throw new ValidationError(`Record data for ${op.key} ${dataProblem}`, [
          { field: 'data', message: dataProblem },
        ]);
      }
    }
  }
}
