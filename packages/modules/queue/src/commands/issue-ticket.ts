import { parseInput } from '@queueline/shared';
import { ifAbsent, ifVersion, logger, withContentionRetry } from '@queueline/core';
import type { OperationOptions, QueueContext } from '../context';
import { QueueFullError, TicketNumberExhaustedError } from '../errors';
import { listWaiting, loadLocation } from '../helpers/load';
import {
  MAX_TICKET_NUMBER,
  encodeLocation,
  encodeTicket,
  formatTicketId,
  locationKey,
  ticketKey,
} from '../helpers/records';
import { issueTicketSchema } from '../validation';
import type { IssueTicketInput } from '../validation';
import type { Ticket } from '../types';

/**
 * Issues the next ticket number of a location.
 *
 * Each attempt reads the location, then commits the new ticket and the
 * advanced counter together, conditioned on the location being unchanged.
 * A lost race commits nothing, so retries never skip or reuse a number.
 */
export async function issueTicket(
  ctx: QueueContext,
  locationId: string,
  input: IssueTicketInput = {},
  options: OperationOptions = {},
): Promise<Ticket> {
  const visitor = parseInput(issueTicketSchema, input);

  const ticket = await withContentionRetry(
    `location ${locationId}`,
    async (): Promise<Ticket> => {
      const location = await loadLocation(ctx.store, locationId);
      const ticketNumber = location.nextTicketNumber;
      if (ticketNumber > MAX_TICKET_NUMBER) throw new TicketNumberExhaustedError(locationId);

      if (location.capacity > 0) {
        const waiting = await listWaiting(ctx.store, locationId);
        if (waiting.length >= location.capacity) {
          throw new QueueFullError(locationId, location.capacity);
        }
      }

      const now = ctx.now();
      const draft: Omit<Ticket, 'version'> = {
        id: formatTicketId(locationId, ticketNumber),
        locationId,
        ticketNumber,
        status: 'waiting',
        visitorName: visitor.visitorName,
        phone: visitor.phone,
        notes: visitor.notes,
        createdAt: now,
        statusChangedAt: now,
        calledAt: null,
        servedAt: null,
        cancelledAt: null,
      };

      const [, written] = await ctx.store.commit([
        {
          type: 'put',
          key: locationKey(locationId),
          data: encodeLocation({ ...location, nextTicketNumber: ticketNumber + 1, updatedAt: now }),
          condition: ifVersion(location.version),
        },
        {
          type: 'put',
          key: ticketKey(locationId, ticketNumber),
          data: encodeTicket(draft),
          condition: ifAbsent,
        },
      ]);
      return { ...draft, version: written?.version ?? 1 };
    },
    { ...ctx.retry, signal: options.signal },
  );

  logger.info('Ticket issued', {
    locationId,
    ticketId: ticket.id,
    ticketNumber: ticket.ticketNumber,
    operation: 'issueTicket',
  });
  return ticket;
}
