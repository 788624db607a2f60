/**
 * Clients Module
 *
 * Exports the collaborator service clients.
 */

export type {
  CustomerLookup,
  NumberInformation,
  NotificationDispatcher,
  NotificationRequest,
  NotificationResult,
} from './IServiceClients.js';
export { CustomerClient } from './CustomerClient.js';
export type { CustomerClientConfig } from './CustomerClient.js';
export { NumberInformationClient } from './NumberInformationClient.js';
export type { NumberInformationConfig } from './NumberInformationClient.js';
export { NotificationClient, NotificationDispatchError } from './NotificationClient.js';
export type { NotificationClientConfig } from './NotificationClient.js';
export { HttpStatusError } from './http.js';
