import { ConflictError, NotFoundError } from '@queueline/shared';

/**
 * Queue Error Codes (used in API error responses):
 *
 * | Code                        | HTTP | When                                        |
 * |-----------------------------|------|---------------------------------------------|
 * | LOCATION_NOT_FOUND          | 404  | Location id unknown                         |
 * | TICKET_NOT_FOUND            | 404  | Ticket id unknown                           |
 * | INVALID_STATUS_TRANSITION   | 409  | Status change not allowed                   |
 * | LOCATION_HAS_OPEN_TICKETS   | 409  | Delete while tickets are waiting or called  |
 * | QUEUE_FULL                  | 409  | Waiting count reached location capacity     |
 * | TICKET_NUMBER_EXHAUSTED     | 409  | Ticket counter reached its upper bound      |
 * | CONCURRENCY_CONFLICT        | 409  | Contention retries exhausted (retryable)    |
 * | VALIDATION_ERROR            | 400  | Input validation failure                    |
 */

export class LocationNotFoundError extends NotFoundError {
  constructor(locationId: string) {
    super('Location', locationId);
    this.code = 'LOCATION_NOT_FOUND';
  }
}

export class TicketNotFoundError extends NotFoundError {
  constructor(ticketId: string) {
    super('Ticket', ticketId);
    this.code = 'TICKET_NOT_FOUND';
  }
}

export class InvalidStatusTransitionError extends ConflictError {
  constructor(entity: string, from: string, to: string) {
    super(`Cannot transition ${entity} from ${from} to ${to}`);
    this.code = 'INVALID_STATUS_TRANSITION';
  }
}

export class LocationHasOpenTicketsError extends ConflictError {
  constructor(locationId: string, openCount: number) {
    super(`Location ${locationId} still has ${openCount} open ticket(s)`);
    this.code = 'LOCATION_HAS_OPEN_TICKETS';
  }
}

export class QueueFullError extends ConflictError {
  constructor(locationId: string, capacity: number) {
    super(`Queue at location ${locationId} is full (${capacity} waiting)`);
    this.code = 'QUEUE_FULL';
  }
}

export class TicketNumberExhaustedError extends ConflictError {
  constructor(locationId: string) {
    super(`Location ${locationId} has issued every available ticket number`);
    this.code = 'TICKET_NUMBER_EXHAUSTED';
  }
}
