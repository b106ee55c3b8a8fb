import type { QueueContext } from '../context';
import { LOCATION_PREFIX, decodeLocation } from '../helpers/records';
import type { Location } from '../types';

/** All locations, oldest first (ULID order). */
export async function listLocations(ctx: QueueContext): Promise<Location[]> {
  const locations: Location[] = [];
  for await (const record of ctx.store.listByPrefix(LOCATION_PREFIX)) {
    locations.push(decodeLocation(record));
  }
  return locations;
}
