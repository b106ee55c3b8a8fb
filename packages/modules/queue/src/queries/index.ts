export { getLocation } from './get-location';
export { listLocations } from './list-locations';
export { getTicket } from './get-ticket';
export { listWaitingTickets } from './list-waiting-tickets';
export { getTicketPosition } from './get-ticket-position';
export { getQueueView } from './get-queue-view';
