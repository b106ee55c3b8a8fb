import { generateUlid, parseInput } from '@queueline/shared';
import { ifAbsent, logger } from '@queueline/core';
import type { QueueContext } from '../context';
import { createLocationSchema } from '../validation';
import type { CreateLocationInput } from '../validation';
import { decodeLocation, encodeLocation, locationKey } from '../helpers/records';
import type { Location } from '../types';

/** Creates a location with an empty queue. A bare string is taken as the name. */
export async function createLocation(
  ctx: QueueContext,
  input: CreateLocationInput | string,
): Promise<Location> {
  const parsed = parseInput(createLocationSchema, typeof input === 'string' ? { name: input } : input);
  const now = ctx.now();
  const id = generateUlid(Date.parse(now));

  const record = await ctx.store.put(
    locationKey(id),
    encodeLocation({
      id,
      name: parsed.name,
      description: parsed.description,
      capacity: parsed.capacity,
      createdBy: parsed.createdBy,
      nextTicketNumber: 1,
      currentServingNumber: 0,
      servedCount: 0,
      createdAt: now,
      updatedAt: now,
    }),
    ifAbsent,
  );

  logger.info('Location created', { locationId: id, operation: 'createLocation' });
  return decodeLocation(record);
}
