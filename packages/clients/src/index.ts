export { BackendClient, abortableSleep } from './backend-client.js';
export type { BackendClientOptions, SendTokenOptions } from './backend-client.js';
