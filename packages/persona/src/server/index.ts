/**
 * Server shell and client
 */

export type { ServerOptions, ServerEvents, Exchange } from './server.js';
export { Server, LOCAL_HOST } from './server.js';

export type { ParseOutcome, RequestHandler } from './handler.js';
export {
  helloHandler,
  HELLO_PAGE,
  SERVER_NAME,
  SERVER_VERSION,
} from './handler.js';

export type { SendOptions } from './client.js';
export { sendRequest } from './client.js';
