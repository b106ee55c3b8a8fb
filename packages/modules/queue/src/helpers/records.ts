import { z } from 'zod';
import { ValidationError, isValidUlid } from '@queueline/shared';
import type { StoredRecord } from '@queueline/core';
import { TICKET_STATUSES } from '../types';
import type { Location, Ticket } from '../types';

/**
 * Persisted record layout:
 *
 *   location#{locationId}                    → location document
 *   ticket#{locationId}#{000000000042}       → ticket document
 *
 * Ticket numbers are zero-padded so key order equals issuance order. The
 * padded width is also the counter's upper bound.
 */

export const TICKET_NUMBER_WIDTH = 12;
export const MAX_TICKET_NUMBER = 10 ** TICKET_NUMBER_WIDTH - 1;

export const LOCATION_PREFIX = 'location#';

export function locationKey(locationId: string): string {
  return `${LOCATION_PREFIX}${locationId}`;
}

export function ticketPrefix(locationId: string): string {
  return `ticket#${locationId}#`;
}

export function ticketKey(locationId: string, ticketNumber: number): string {
  return `${ticketPrefix(locationId)}${String(ticketNumber).padStart(TICKET_NUMBER_WIDTH, '0')}`;
}

// ── Ticket ids ───────────────────────────────────────────────────

export function formatTicketId(locationId: string, ticketNumber: number): string {
  return `${locationId}-${ticketNumber}`;
}

export interface TicketRef {
  locationId: string;
  ticketNumber: number;
}

export function parseTicketId(ticketId: string): TicketRef {
  const dash = ticketId.lastIndexOf('-');
  const locationId = ticketId.slice(0, dash);
  const digits = ticketId.slice(dash + 1);
  const ticketNumber = Number(digits);
  if (
    dash < 0 ||
    !isValidUlid(locationId) ||
    !/^[1-9][0-9]*$/.test(digits) ||
    ticketNumber > MAX_TICKET_NUMBER
  ) {
    throw new ValidationError('Invalid ticket id', [
      { field: 'ticketId', message: `Expected {locationId}-{ticketNumber}, got "${ticketId}"` },
    ]);
  }
  return { locationId, ticketNumber };
}

// ── Documents ────────────────────────────────────────────────────

const timestamp = z.string().datetime();

const locationDocumentSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().default(''),
  capacity: z.number().int().min(0).default(0),
  createdBy: z.string().nullable().default(null),
  nextTicketNumber: z.number().int().min(1),
  currentServingNumber: z.number().int().min(0),
  servedCount: z.number().int().min(0).default(0),
  createdAt: timestamp,
  updatedAt: timestamp,
});

const ticketDocumentSchema = z.object({
  locationId: z.string().min(1),
  ticketNumber: z.number().int().min(1),
  status: z.enum(TICKET_STATUSES),
  visitorName: z.string().nullable().default(null),
  phone: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
  createdAt: timestamp,
  statusChangedAt: timestamp,
  calledAt: timestamp.nullable().default(null),
  servedAt: timestamp.nullable().default(null),
  cancelledAt: timestamp.nullable().default(null),
});

/** A stored record that does not match its document shape. */
export class CorruptRecordError extends Error {
  constructor(
    public readonly key: string,
    cause: unknown,
  ) {
    super(`Record ${key} does not hold a valid document`);
    this.name = 'CorruptRecordError';
    this.cause = cause;
  }
}

function decodeJson<S extends z.ZodTypeAny>(schema: S, record: StoredRecord): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(record.data);
  } catch (err) {
    throw new CorruptRecordError(record.key, err);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new CorruptRecordError(record.key, parsed.error);
  return parsed.data;
}

export function decodeLocation(record: StoredRecord): Location {
  return { ...decodeJson(locationDocumentSchema, record), version: record.version };
}

export function encodeLocation(location: Omit<Location, 'version'>): string {
  return JSON.stringify({
    id: location.id,
    name: location.name,
    description: location.description,
    capacity: location.capacity,
    createdBy: location.createdBy,
    nextTicketNumber: location.nextTicketNumber,
    currentServingNumber: location.currentServingNumber,
    servedCount: location.servedCount,
    createdAt: location.createdAt,
    updatedAt: location.updatedAt,
  });
}

export function decodeTicket(record: StoredRecord): Ticket {
  const doc = decodeJson(ticketDocumentSchema, record);
  return { ...doc, id: formatTicketId(doc.locationId, doc.ticketNumber), version: record.version };
}

export function encodeTicket(ticket: Omit<Ticket, 'version' | 'id'>): string {
  return JSON.stringify({
    locationId: ticket.locationId,
    ticketNumber: ticket.ticketNumber,
    status: ticket.status,
    visitorName: ticket.visitorName,
    phone: ticket.phone,
    notes: ticket.notes,
    createdAt: ticket.createdAt,
    statusChangedAt: ticket.statusChangedAt,
    calledAt: ticket.calledAt,
    servedAt: ticket.servedAt,
    cancelledAt: ticket.cancelledAt,
  });
}
