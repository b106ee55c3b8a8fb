import type { TicketStatus } from './types';
import { InvalidStatusTransitionError } from './errors';

// ══════════════════════════════════════════════════════════════════
// Ticket State Machine
// ══════════════════════════════════════════════════════════════════
//
// waiting → called, cancelled
// called → served, cancelled (no-show)
// served → (terminal)
// cancelled → (terminal)

export const TICKET_TRANSITIONS: Record<TicketStatus, readonly TicketStatus[]> = {
  waiting: ['called', 'cancelled'],
  called: ['served', 'cancelled'],
  served: [],
  cancelled: [],
};

export function canTransitionTicket(from: TicketStatus, to: TicketStatus): boolean {
  return TICKET_TRANSITIONS[from].includes(to);
}

export function assertTicketTransition(from: TicketStatus, to: TicketStatus): void {
  if (!canTransitionTicket(from, to)) {
    throw new InvalidStatusTransitionError('ticket', from, to);
  }
}

export function isTerminalStatus(status: TicketStatus): boolean {
  return TICKET_TRANSITIONS[status].length === 0;
}
