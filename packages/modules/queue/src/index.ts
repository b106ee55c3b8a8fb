export * from './types';
export * from './errors';
export * from './validation';
export * from './state-machines';
export * from './commands';
export * from './queries';
export type { QueueContext, OperationOptions } from './context';
export { createReferenceBuilder } from './helpers/build-reference';
export type { ReferenceBuilder } from './helpers/build-reference';
export {
  MAX_TICKET_NUMBER,
  CorruptRecordError,
  formatTicketId,
  parseTicketId,
  locationKey,
  ticketKey,
} from './helpers/records';
export { createQueueService, queueServiceOptionsFromConfig, openQueueService } from './service';
export type { QueueService, QueueServiceOptions } from './service';
