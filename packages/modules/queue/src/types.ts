// ── Ticket lifecycle ──────────────────────────────────────────────

export const TICKET_STATUSES = ['waiting', 'called', 'served', 'cancelled'] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

/** Statuses that still block deletion of their location. */
export const OPEN_TICKET_STATUSES: readonly TicketStatus[] = ['waiting', 'called'];

// ── Entities ──────────────────────────────────────────────────────

export interface Location {
  id: string;
  name: string;
  description: string;
  /** Maximum waiting tickets; 0 means unlimited. */
  capacity: number;
  createdBy: string | null;
  /** Number the next issued ticket receives. Starts at 1. */
  nextTicketNumber: number;
  currentServingNumber: number;
  servedCount: number;
  createdAt: string;
  updatedAt: string;
  /** Storage version of the location record, used for conditional writes. */
  version: number;
}

export interface Ticket {
  /** `{locationId}-{ticketNumber}` */
  id: string;
  locationId: string;
  ticketNumber: number;
  status: TicketStatus;
  visitorName: string | null;
  phone: string | null;
  notes: string | null;
  createdAt: string;
  statusChangedAt: string;
  calledAt: string | null;
  servedAt: string | null;
  cancelledAt: string | null;
  version: number;
}

// ── Views returned to the request layer ───────────────────────────

export interface LocationView extends Omit<Location, 'version'> {
  joinUrl: string;
  statusUrl: string;
}

export type TicketView = Omit<Ticket, 'version'>;

export interface QueueViewDTO {
  locationId: string;
  locationName: string;
  /** 0 means unlimited. */
  capacity: number;
  waitingCount: number;
  currentServingNumber: number;
  calledTicket: TicketView | null;
  servedCount: number;
  estimatedWaitMinutes: number;
}

export interface TicketPosition {
  ticketId: string;
  /** 1 = next to be called. */
  position: number;
  totalWaiting: number;
  estimatedWaitMinutes: number;
}
