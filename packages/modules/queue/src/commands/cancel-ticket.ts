import { ifVersion, logger, withContentionRetry } from '@queueline/core';
import type { OperationOptions, QueueContext } from '../context';
import { loadTicket } from '../helpers/load';
import { encodeTicket, ticketKey } from '../helpers/records';
import { assertTicketTransition } from '../state-machines';
import type { Ticket } from '../types';

/** waiting | called → cancelled. A cancelled called ticket is a no-show. */
export async function cancelTicket(
  ctx: QueueContext,
  ticketId: string,
  options: OperationOptions = {},
): Promise<Ticket> {
  const cancelled = await withContentionRetry(
    `ticket ${ticketId}`,
    async (): Promise<Ticket> => {
      const ticket = await loadTicket(ctx.store, ticketId);
      assertTicketTransition(ticket.status, 'cancelled');

      const now = ctx.now();
      const updated: Ticket = { ...ticket, status: 'cancelled', statusChangedAt: now, cancelledAt: now };
      const written = await ctx.store.put(
        ticketKey(ticket.locationId, ticket.ticketNumber),
        encodeTicket(updated),
        ifVersion(ticket.version),
      );
      return { ...updated, version: written.version };
    },
    { ...ctx.retry, signal: options.signal },
  );

  logger.info('Ticket cancelled', {
    locationId: cancelled.locationId,
    ticketId: cancelled.id,
    ticketNumber: cancelled.ticketNumber,
    operation: 'cancelTicket',
  });
  return cancelled;
}
