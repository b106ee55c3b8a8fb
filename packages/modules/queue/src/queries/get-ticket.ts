import type { QueueContext } from '../context';
import { loadTicket } from '../helpers/load';
import type { Ticket } from '../types';

export function getTicket(ctx: QueueContext, ticketId: string): Promise<Ticket> {
  return loadTicket(ctx.store, ticketId);
}
