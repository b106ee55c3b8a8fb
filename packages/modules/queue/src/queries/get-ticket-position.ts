import type { QueueContext } from '../context';
import { listWaiting, loadTicket } from '../helpers/load';
import { estimateWaitMinutes } from '../helpers/views';
import type { TicketPosition } from '../types';

/**
 * Where a waiting ticket stands in its queue. Null once the ticket has been
 * called, served or cancelled.
 */
export async function getTicketPosition(
  ctx: QueueContext,
  ticketId: string,
): Promise<TicketPosition | null> {
  const ticket = await loadTicket(ctx.store, ticketId);
  if (ticket.status !== 'waiting') return null;

  const waiting = await listWaiting(ctx.store, ticket.locationId);
  const index = waiting.findIndex((t) => t.ticketNumber === ticket.ticketNumber);
  // Called or cancelled between the two reads.
  if (index < 0) return null;

  const position = index + 1;
  return {
    ticketId: ticket.id,
    position,
    totalWaiting: waiting.length,
    estimatedWaitMinutes: estimateWaitMinutes(position, ctx.minutesPerVisitor),
  };
}
