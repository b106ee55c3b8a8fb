import type { QueueContext } from '../context';
import { listWaiting, loadLocation } from '../helpers/load';
import type { Ticket } from '../types';

/** Waiting tickets of a location in the order they will be called. */
export async function listWaitingTickets(ctx: QueueContext, locationId: string): Promise<Ticket[]> {
  await loadLocation(ctx.store, locationId);
  return listWaiting(ctx.store, locationId);
}
