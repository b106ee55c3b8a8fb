import type { RecordStore } from '@queueline/core';
import { LocationNotFoundError, TicketNotFoundError } from '../errors';
import type { Location, Ticket } from '../types';
import {
  decodeLocation,
  decodeTicket,
  locationKey,
  parseTicketId,
  ticketKey,
  ticketPrefix,
} from './records';

export async function loadLocation(store: RecordStore, locationId: string): Promise<Location> {
  const record = await store.get(locationKey(locationId));
  if (!record) throw new LocationNotFoundError(locationId);
  return decodeLocation(record);
}

export async function loadTicket(store: RecordStore, ticketId: string): Promise<Ticket> {
  const { locationId, ticketNumber } = parseTicketId(ticketId);
  const record = await store.get(ticketKey(locationId, ticketNumber));
  if (!record) throw new TicketNotFoundError(ticketId);
  return decodeTicket(record);
}

/** Every ticket of a location, ascending by ticket number. */
export async function* scanTickets(store: RecordStore, locationId: string): AsyncIterable<Ticket> {
  for await (const record of store.listByPrefix(ticketPrefix(locationId))) {
    yield decodeTicket(record);
  }
}

export async function listWaiting(store: RecordStore, locationId: string): Promise<Ticket[]> {
  const waiting: Ticket[] = [];
  for await (const ticket of scanTickets(store, locationId)) {
    if (ticket.status === 'waiting') waiting.push(ticket);
  }
  return waiting;
}
