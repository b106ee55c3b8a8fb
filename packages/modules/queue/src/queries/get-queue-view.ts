import type { QueueContext } from '../context';
import { loadLocation, scanTickets } from '../helpers/load';
import { estimateWaitMinutes, toTicketView } from '../helpers/views';
import type { QueueViewDTO, Ticket } from '../types';

/**
 * Current queue of a location, derived from the stored tickets on every
 * call. `calledTicket` is the most recently numbered ticket still in the
 * called state.
 */
export async function getQueueView(ctx: QueueContext, locationId: string): Promise<QueueViewDTO> {
  const location = await loadLocation(ctx.store, locationId);

  let waitingCount = 0;
  let calledTicket: Ticket | null = null;
  for await (const ticket of scanTickets(ctx.store, locationId)) {
    if (ticket.status === 'waiting') waitingCount++;
    else if (ticket.status === 'called') calledTicket = ticket;
  }

  return {
    locationId: location.id,
    locationName: location.name,
    capacity: location.capacity,
    waitingCount,
    currentServingNumber: location.currentServingNumber,
    calledTicket: calledTicket ? toTicketView(calledTicket) : null,
    servedCount: location.servedCount,
    estimatedWaitMinutes: estimateWaitMinutes(waitingCount, ctx.minutesPerVisitor),
  };
}
