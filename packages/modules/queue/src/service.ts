import { nowUTC } from '@queueline/shared';
import { DEFAULT_RETRY_ATTEMPTS, getDeploymentConfig, getRecordStore } from '@queueline/core';
import type { DeploymentConfig, RecordStore, RetryOptions } from '@queueline/core';
import type { OperationOptions, QueueContext } from './context';
import {
  callNext,
  cancelTicket,
  createLocation,
  deleteLocation,
  issueTicket,
  markServed,
} from './commands';
import {
  getLocation,
  getQueueView,
  getTicket,
  getTicketPosition,
  listLocations,
  listWaitingTickets,
} from './queries';
import { createReferenceBuilder } from './helpers/build-reference';
import { toLocationView, toTicketView } from './helpers/views';
import type { CreateLocationInput, IssueTicketInput } from './validation';
import type { LocationView, QueueViewDTO, TicketPosition, TicketView } from './types';

export interface QueueServiceOptions {
  store: RecordStore;
  /** Public address the code references point at. */
  baseUrl: string;
  retry?: Omit<RetryOptions, 'signal'>;
  /** Factor of the wait estimates. Defaults to 5. */
  minutesPerVisitor?: number;
  clock?: () => Date;
}

/** The operations the request layer calls. */
export interface QueueService {
  createLocation(input: CreateLocationInput | string): Promise<LocationView>;
  getLocation(locationId: string): Promise<LocationView>;
  listLocations(): Promise<LocationView[]>;
  deleteLocation(locationId: string, options?: OperationOptions): Promise<void>;
  issueTicket(locationId: string, input?: IssueTicketInput, options?: OperationOptions): Promise<TicketView>;
  /** Null when nobody is waiting. */
  callNext(locationId: string, options?: OperationOptions): Promise<TicketView | null>;
  markServed(ticketId: string, options?: OperationOptions): Promise<TicketView>;
  cancel(ticketId: string, options?: OperationOptions): Promise<TicketView>;
  getTicket(ticketId: string): Promise<TicketView>;
  listWaitingTickets(locationId: string): Promise<TicketView[]>;
  getTicketPosition(ticketId: string): Promise<TicketPosition | null>;
  queueView(locationId: string): Promise<QueueViewDTO>;
  buildReference(locationId: string): string;
  buildStatusReference(locationId: string): string;
}

const DEFAULT_MINUTES_PER_VISITOR = 5;

export function createQueueService(options: QueueServiceOptions): QueueService {
  const references = createReferenceBuilder(options.baseUrl);
  const clock = options.clock;
  const ctx: QueueContext = {
    store: options.store,
    retry: options.retry ?? { attempts: DEFAULT_RETRY_ATTEMPTS },
    minutesPerVisitor: options.minutesPerVisitor ?? DEFAULT_MINUTES_PER_VISITOR,
    now: clock ? () => clock().toISOString() : nowUTC,
  };

  return {
    createLocation: async (input) => toLocationView(await createLocation(ctx, input), references),
    getLocation: async (locationId) => toLocationView(await getLocation(ctx, locationId), references),
    listLocations: async () =>
      (await listLocations(ctx)).map((location) => toLocationView(location, references)),
    deleteLocation: (locationId, opts) => deleteLocation(ctx, locationId, opts),
    issueTicket: async (locationId, input, opts) =>
      toTicketView(await issueTicket(ctx, locationId, input, opts)),
    callNext: async (locationId, opts) => {
      const ticket = await callNext(ctx, locationId, opts);
      return ticket ? toTicketView(ticket) : null;
    },
    markServed: async (ticketId, opts) => toTicketView(await markServed(ctx, ticketId, opts)),
    cancel: async (ticketId, opts) => toTicketView(await cancelTicket(ctx, ticketId, opts)),
    getTicket: async (ticketId) => toTicketView(await getTicket(ctx, ticketId)),
    listWaitingTickets: async (locationId) =>
      (await listWaitingTickets(ctx, locationId)).map(toTicketView),
    getTicketPosition: (ticketId) => getTicketPosition(ctx, ticketId),
    queueView: (locationId) => getQueueView(ctx, locationId),
    buildReference: (locationId) => references.buildReference(locationId),
    buildStatusReference: (locationId) => references.buildStatusReference(locationId),
  };
}

/** Service options taken from the deployment config, for the given store. */
export function queueServiceOptionsFromConfig(
  store: RecordStore,
  config: DeploymentConfig = getDeploymentConfig(),
): QueueServiceOptions {
  return {
    store,
    baseUrl: config.queue.publicBaseUrl,
    retry: { attempts: config.queue.retryAttempts, baseDelayMs: config.queue.retryBaseDelayMs },
    minutesPerVisitor: config.queue.minutesPerVisitor,
  };
}

/** Process entry point: the configured record store and a service over it. */
export async function openQueueService(
  config: DeploymentConfig = getDeploymentConfig(),
): Promise<{ service: QueueService; store: RecordStore }> {
  const store = await getRecordStore();
  return { service: createQueueService(queueServiceOptionsFromConfig(store, config)), store };
}
