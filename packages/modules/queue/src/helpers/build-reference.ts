/**
 * Code references: the URLs a scannable code encodes.
 * Pure functions of the public base address and a location id.
 */
import { z } from 'zod';
import { parseInput } from '@queueline/shared';

const baseUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((v) => /^https?:\/\//i.test(v), 'Base URL must use http or https')
  .transform((v) => v.replace(/\/+$/, ''));

export interface ReferenceBuilder {
  /** Join URL: `{base}/queue/{locationId}` */
  buildReference(locationId: string): string;
  /** Status URL: `{base}/status_check/{locationId}` */
  buildStatusReference(locationId: string): string;
}

/**
 * @example
 * createReferenceBuilder('https://queue.example.com/').buildReference('01J0000000000000000000000A')
 * // → 'https://queue.example.com/queue/01J0000000000000000000000A'
 */
export function createReferenceBuilder(baseUrl: string): ReferenceBuilder {
  const base = parseInput(baseUrlSchema, baseUrl, 'Invalid public base URL');
  return {
    buildReference: (locationId) => `${base}/queue/${encodeURIComponent(locationId)}`,
    buildStatusReference: (locationId) => `${base}/status_check/${encodeURIComponent(locationId)}`,
  };
}
