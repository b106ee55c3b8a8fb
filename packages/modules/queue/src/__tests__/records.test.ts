import { describe, it, expect } from 'vitest';
import { ValidationError } from '@queueline/shared';
import {
  CorruptRecordError,
  MAX_TICKET_NUMBER,
  decodeLocation,
  decodeTicket,
  formatTicketId,
  locationKey,
  parseTicketId,
  ticketKey,
} from '../helpers/records';

const LOCATION_ID = '01HZY8J6Q6V2M3T4W5X6Y7Z8AB';

describe('record keys', () => {
  it('prefixes locations', () => {
    expect(locationKey(LOCATION_ID)).toBe(`location#${LOCATION_ID}`);
  });

  it('pads ticket numbers to twelve digits', () => {
    expect(ticketKey(LOCATION_ID, 42)).toBe(`ticket#${LOCATION_ID}#000000000042`);
  });

  it('sorts ticket keys in issuance order', () => {
    const keys = [10, 9, 100, 1].map((n) => ticketKey(LOCATION_ID, n)).sort();
    expect(keys).toEqual([1, 9, 10, 100].map((n) => ticketKey(LOCATION_ID, n)));
  });

  it('bounds the counter by the padded width', () => {
    expect(MAX_TICKET_NUMBER).toBe(999_999_999_999);
    expect(ticketKey(LOCATION_ID, MAX_TICKET_NUMBER)).toBe(`ticket#${LOCATION_ID}#999999999999`);
  });
});

describe('ticket ids', () => {
  it('formats and parses', () => {
    const id = formatTicketId(LOCATION_ID, 7);
    expect(id).toBe(`${LOCATION_ID}-7`);
    expect(parseTicketId(id)).toEqual({ locationId: LOCATION_ID, ticketNumber: 7 });
  });

  it.each([
    ['missing number', LOCATION_ID],
    ['zero', `${LOCATION_ID}-0`],
    ['leading zero', `${LOCATION_ID}-07`],
    ['not a ulid', 'front-desk-3'],
    ['above the bound', `${LOCATION_ID}-1000000000000`],
  ])('rejects %s', (_label, value) => {
    expect(() => parseTicketId(value)).toThrow(ValidationError);
  });
});

describe('documents', () => {
  it('decodes a location and attaches the record version', () => {
    const location = decodeLocation({
      key: locationKey(LOCATION_ID),
      version: 3,
      data: JSON.stringify({
        id: LOCATION_ID,
        name: 'Front desk',
        nextTicketNumber: 4,
        currentServingNumber: 1,
        createdAt: '2026-03-01T09:00:00.000Z',
        updatedAt: '2026-03-01T09:05:00.000Z',
      }),
    });
    expect(location).toEqual({
      id: LOCATION_ID,
      name: 'Front desk',
      description: '',
      capacity: 0,
      createdBy: null,
      nextTicketNumber: 4,
      currentServingNumber: 1,
      servedCount: 0,
      createdAt: '2026-03-01T09:00:00.000Z',
      updatedAt: '2026-03-01T09:05:00.000Z',
      version: 3,
    });
  });

  it('derives the ticket id from its document', () => {
    const ticket = decodeTicket({
      key: ticketKey(LOCATION_ID, 2),
      version: 1,
      data: JSON.stringify({
        locationId: LOCATION_ID,
        ticketNumber: 2,
        status: 'waiting',
        createdAt: '2026-03-01T09:00:00.000Z',
        statusChangedAt: '2026-03-01T09:00:00.000Z',
      }),
    });
    expect(ticket.id).toBe(`${LOCATION_ID}-2`);
    expect(ticket.calledAt).toBeNull();
  });

  it('rejects malformed JSON', () => {
    expect(() => decodeLocation({ key: 'location#x', version: 1, data: '{oops' })).toThrow(
      CorruptRecordError,
    );
  });

  it('rejects an unknown ticket status', () => {
    const data = JSON.stringify({
      locationId: LOCATION_ID,
      ticketNumber: 1,
      status: 'lost',
      createdAt: '2026-03-01T09:00:00.000Z',
      statusChangedAt: '2026-03-01T09:00:00.000Z',
    });
    expect(() => decodeTicket({ key: ticketKey(LOCATION_ID, 1), version: 1, data })).toThrow(
      'does not hold a valid document',
    );
  });
});
