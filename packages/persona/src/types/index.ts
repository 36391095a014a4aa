/**
 * Type definitions for the HTTP message model
 */

export type { Locator } from './locator.js';
export {
  parseLocator,
  formatLocator,
  createLocator,
} from './locator.js';

export {
  ErrorCode,
  getErrorMessage,
  PersonaError,
  mapListenError,
} from './errors.js';

export type { Version } from './version.js';
export {
  createVersion,
  formatVersion,
  versionsEqual,
  HTTP_1_1,
} from './version.js';

export { Method, parseMethod } from './method.js';

export { StatusCode, statusValue, statusReason } from './status.js';

export type { Header } from './header.js';
export { createHeader, CONTENT_LENGTH } from './header.js';

export { FrameType, headersFrame, dataFrame } from './frame.js';
export type { HeadersFrame, DataFrame, Frame } from './frame.js';

export {
  MessageKind,
  getHeaders,
  getPayload,
  findHeader,
} from './message.js';
export type {
  RequestMessage,
  ResponseMessage,
  Message,
} from './message.js';
