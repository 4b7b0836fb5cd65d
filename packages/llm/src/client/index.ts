export { Client, type ModelClient } from './client.js';
export type { ClientConfig } from './config.js';
export { executeMiddlewareChain } from './middleware.js';
