import { describe, it, expect } from 'vitest';
import {
  TICKET_TRANSITIONS,
  assertTicketTransition,
  canTransitionTicket,
  isTerminalStatus,
} from '../state-machines';
import { InvalidStatusTransitionError } from '../errors';
import { TICKET_STATUSES } from '../types';

describe('Ticket State Machine', () => {
  it('waiting allows transition to called', () => {
    expect(canTransitionTicket('waiting', 'called')).toBe(true);
  });

  it('waiting allows transition to cancelled', () => {
    expect(canTransitionTicket('waiting', 'cancelled')).toBe(true);
  });

  it('waiting cannot be served without being called', () => {
    expect(canTransitionTicket('waiting', 'served')).toBe(false);
  });

  it('called allows transition to served', () => {
    expect(canTransitionTicket('called', 'served')).toBe(true);
  });

  it('called allows transition to cancelled (no-show)', () => {
    expect(canTransitionTicket('called', 'cancelled')).toBe(true);
  });

  it('called cannot go back to waiting', () => {
    expect(canTransitionTicket('called', 'waiting')).toBe(false);
  });

  it('served is a terminal state', () => {
    for (const status of TICKET_STATUSES) {
      expect(canTransitionTicket('served', status)).toBe(false);
    }
    expect(isTerminalStatus('served')).toBe(true);
  });

  it('cancelled is a terminal state', () => {
    for (const status of TICKET_STATUSES) {
      expect(canTransitionTicket('cancelled', status)).toBe(false);
    }
    expect(isTerminalStatus('cancelled')).toBe(true);
  });

  it('has no self transitions', () => {
    for (const status of TICKET_STATUSES) {
      expect(TICKET_TRANSITIONS[status]).not.toContain(status);
    }
  });

  it('assertTicketTransition throws INVALID_STATUS_TRANSITION', () => {
    expect(() => assertTicketTransition('waiting', 'served')).toThrow(InvalidStatusTransitionError);
    expect(() => assertTicketTransition('served', 'cancelled')).toThrow(
      'Cannot transition ticket from served to cancelled',
    );
  });

  it('assertTicketTransition passes allowed transitions', () => {
    expect(() => assertTicketTransition('called', 'served')).not.toThrow();
  });
});
