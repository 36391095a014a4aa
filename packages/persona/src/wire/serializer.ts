/**
 * HTTP/1.1 message serializer.
 *
 * Output layout: start line, one `<name>: <value>` line per header, a blank line,
 * then the payload of every Data frame in order.
 */

import { FrameType } from '../types/frame.js';
import { MessageKind, type Message } from '../types/message.js';
import { statusReason, statusValue } from '../types/status.js';
import { formatVersion } from '../types/version.js';

const CRLF = '\r\n';

const encoder = new TextEncoder();

/**
 * Render the request line or status line, terminator included
 */
function startLine(message: Message): string {
  switch (message.kind) {
    case MessageKind.REQUEST:
      return `${message.method} ${message.target} HTTP/${formatVersion(message.version)}${CRLF}`;

    case MessageKind.RESPONSE:
      return `HTTP/${formatVersion(message.version)} ${statusValue(message.status)} ${statusReason(message.status)}${CRLF}`;
  }
}

/**
 * Serialize a message to wire bytes
 */
export function serializeMessage(message: Message): Uint8Array {
  let head = startLine(message);
  const payloads: Uint8Array[] = [];
  let payloadLength = 0;

  for (const frame of message.frames) {
    switch (frame.type) {
      case FrameType.HEADERS:
        for (const header of frame.headers) {
          head += `${header.name}: ${header.value}${CRLF}`;
        }
        break;

      case FrameType.DATA:
        payloads.push(frame.payload);
        payloadLength += frame.payload.length;
        break;
    }
  }

  head += CRLF;

  const headBytes = encoder.encode(head);
  const wire = new Uint8Array(headBytes.length + payloadLength);
  wire.set(headBytes, 0);

  let offset = headBytes.length;
  for (const payload of payloads) {
    wire.set(payload, offset);
    offset += payload.length;
  }

  return wire;
}
