/**
 * Message builders
 */

export { MessageBuilder } from './message-builder.js';
export { RequestBuilder } from './request-builder.js';
