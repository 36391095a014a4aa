/**
 * HTTP messages: a start line plus an ordered sequence of frames.
 */

import type { Header } from './header.js';
import type { Method } from './method.js';
import type { StatusCode } from './status.js';
import type { Version } from './version.js';
import { FrameType, type Frame } from './frame.js';

export enum MessageKind {
  REQUEST = 'request',
  RESPONSE = 'response',
}

/**
 * Request message, as produced by the parser
 */
export interface RequestMessage {
  readonly kind: MessageKind.REQUEST;
  readonly method: Method;
  /** Request-line resource identifier, kept verbatim */
  readonly target: string;
  readonly version: Version;
  readonly frames: readonly Frame[];
}

/**
 * Response message, as produced by MessageBuilder
 */
export interface ResponseMessage {
  readonly kind: MessageKind.RESPONSE;
  readonly version: Version;
  readonly status: StatusCode;
  readonly frames: readonly Frame[];
}

export type Message = RequestMessage | ResponseMessage;

/**
 * All headers of a message, across its Headers frames, in order
 */
export function getHeaders(message: Message): Header[] {
  const headers: Header[] = [];
  for (const frame of message.frames) {
    if (frame.type === FrameType.HEADERS) {
      headers.push(...frame.headers);
    }
  }
  return headers;
}

/**
 * Payload of a message: every Data frame concatenated in order
 */
export function getPayload(message: Message): Uint8Array {
  const parts: Uint8Array[] = [];
  let length = 0;
  for (const frame of message.frames) {
    if (frame.type === FrameType.DATA) {
      parts.push(frame.payload);
      length += frame.payload.length;
    }
  }

  const payload = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    payload.set(part, offset);
    offset += part.length;
  }
  return payload;
}

/**
 * First header whose name matches exactly (case-sensitive).
 * Duplicates are never merged; later ones are ignored here.
 */
export function findHeader(message: Message, name: string): Header | undefined {
  return getHeaders(message).find((header) => header.name === name);
}
