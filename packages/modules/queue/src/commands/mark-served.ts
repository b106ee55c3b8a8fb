import { ifVersion, logger, withContentionRetry } from '@queueline/core';
import type { OperationOptions, QueueContext } from '../context';
import { loadLocation, loadTicket } from '../helpers/load';
import { encodeLocation, encodeTicket, locationKey, ticketKey } from '../helpers/records';
import { assertTicketTransition } from '../state-machines';
import type { Ticket } from '../types';

/** called → served. Counts the visit on the location in the same commit. */
export async function markServed(
  ctx: QueueContext,
  ticketId: string,
  options: OperationOptions = {},
): Promise<Ticket> {
  const served = await withContentionRetry(
    `ticket ${ticketId}`,
    async (): Promise<Ticket> => {
      const ticket = await loadTicket(ctx.store, ticketId);
      assertTicketTransition(ticket.status, 'served');
      const location = await loadLocation(ctx.store, ticket.locationId);

      const now = ctx.now();
      const updated: Ticket = { ...ticket, status: 'served', statusChangedAt: now, servedAt: now };

      const [, written] = await ctx.store.commit([
        {
          type: 'put',
          key: locationKey(ticket.locationId),
          data: encodeLocation({ ...location, servedCount: location.servedCount + 1, updatedAt: now }),
          condition: ifVersion(location.version),
        },
        {
          type: 'put',
          key: ticketKey(ticket.locationId, ticket.ticketNumber),
          data: encodeTicket(updated),
          condition: ifVersion(ticket.version),
        },
      ]);
      return { ...updated, version: written?.version ?? ticket.version + 1 };
    },
    { ...ctx.retry, signal: options.signal },
  );

  logger.info('Ticket served', {
    locationId: served.locationId,
    ticketId: served.id,
    ticketNumber: served.ticketNumber,
    operation: 'markServed',
  });
  return served;
}
