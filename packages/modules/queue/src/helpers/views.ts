import type { Location, LocationView, Ticket, TicketView } from '../types';
import type { ReferenceBuilder } from './build-reference';

export function toLocationView(location: Location, references: ReferenceBuilder): LocationView {
  const { version: _version, ...fields } = location;
  return {
    ...fields,
    joinUrl: references.buildReference(location.id),
    statusUrl: references.buildStatusReference(location.id),
  };
}

export function toTicketView(ticket: Ticket): TicketView {
  const { version: _version, ...fields } = ticket;
  return fields;
}

/** Minutes until `ahead` visitors have been seen, rounded up. */
export function estimateWaitMinutes(ahead: number, minutesPerVisitor: number): number {
  return Math.ceil(ahead * minutesPerVisitor);
}
