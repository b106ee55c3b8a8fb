import type { QueueContext } from '../context';
import { loadLocation } from '../helpers/load';
import type { Location } from '../types';

export function getLocation(ctx: QueueContext, locationId: string): Promise<Location> {
  return loadLocation(ctx.store, locationId);
}
