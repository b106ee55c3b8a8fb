import { ifVersion, logger, RecordNotFoundError, withContentionRetry } from '@queueline/core';
import type { OperationOptions, QueueContext } from '../context';
import { LocationHasOpenTicketsError, LocationNotFoundError } from '../errors';
import { loadLocation, scanTickets } from '../helpers/load';
import { locationKey } from '../helpers/records';
import { OPEN_TICKET_STATUSES } from '../types';

/**
 * Removes a location that has no waiting or called tickets. Its served and
 * cancelled tickets stay in storage as history.
 *
 * The delete is conditioned on the location version read before the ticket
 * scan; every ticket issue bumps that version, so a ticket issued during the
 * scan turns the delete into a retry.
 */
export async function deleteLocation(
  ctx: QueueContext,
  locationId: string,
  options: OperationOptions = {},
): Promise<void> {
  await withContentionRetry(
    `location ${locationId}`,
    async () => {
      const location = await loadLocation(ctx.store, locationId);

      let openCount = 0;
      for await (const ticket of scanTickets(ctx.store, locationId)) {
        if (OPEN_TICKET_STATUSES.includes(ticket.status)) openCount++;
      }
      if (openCount > 0) throw new LocationHasOpenTicketsError(locationId, openCount);

      try {
        await ctx.store.delete(locationKey(locationId), ifVersion(location.version));
      } catch (err) {
        if (err instanceof RecordNotFoundError) throw new LocationNotFoundError(locationId);
        throw err;
      }
    },
    { ...ctx.retry, signal: options.signal },
  );

  logger.info('Location deleted', { locationId, operation: 'deleteLocation' });
}
