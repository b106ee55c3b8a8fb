import { ifVersion, logger, withContentionRetry } from '@queueline/core';
import type { OperationOptions, QueueContext } from '../context';
import { loadLocation, scanTickets } from '../helpers/load';
import { encodeLocation, encodeTicket, locationKey, ticketKey } from '../helpers/records';
import { assertTicketTransition } from '../state-machines';
import type { Ticket } from '../types';

/**
 * Calls the waiting ticket with the smallest number and makes it the
 * location's current serving number. Resolves to null when nobody is
 * waiting; nothing is written in that case.
 */
export async function callNext(
  ctx: QueueContext,
  locationId: string,
  options: OperationOptions = {},
): Promise<Ticket | null> {
  const called = await withContentionRetry(
    `location ${locationId}`,
    async (): Promise<Ticket | null> => {
      const location = await loadLocation(ctx.store, locationId);

      let next: Ticket | null = null;
      for await (const ticket of scanTickets(ctx.store, locationId)) {
        if (ticket.status === 'waiting') {
          next = ticket;
          break;
        }
      }
      if (!next) return null;

      assertTicketTransition(next.status, 'called');
      const now = ctx.now();
      const updated: Ticket = { ...next, status: 'called', statusChangedAt: now, calledAt: now };

      const [, written] = await ctx.store.commit([
        {
          type: 'put',
          key: locationKey(locationId),
          data: encodeLocation({ ...location, currentServingNumber: next.ticketNumber, updatedAt: now }),
          condition: ifVersion(location.version),
        },
        {
          type: 'put',
          key: ticketKey(locationId, next.ticketNumber),
          data: encodeTicket(updated),
          condition: ifVersion(next.version),
        },
      ]);
      return { ...updated, version: written?.version ?? next.version + 1 };
    },
    { ...ctx.retry, signal: options.signal },
  );

  if (called) {
    logger.info('Ticket called', {
      locationId,
      ticketId: called.id,
      ticketNumber: called.ticketNumber,
      operation: 'callNext',
    });
  }
  return called;
}
