export { createLocation } from './create-location';
export { deleteLocation } from './delete-location';
export { issueTicket } from './issue-ticket';
export { callNext } from './call-next';
export { markServed } from './mark-served';
export { cancelTicket } from './cancel-ticket';
