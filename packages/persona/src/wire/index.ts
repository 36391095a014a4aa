/**
 * Wire format: HTTP/1.1 parsing and serialization
 */

export { parseMessage } from './parser.js';
export { serializeMessage } from './serializer.js';
