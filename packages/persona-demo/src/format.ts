/**
 * Text rendering of messages and exchanges for the terminal
 */

import {
  type Exchange,
  type Message,
  FrameType,
  MessageKind,
  formatLocator,
  formatVersion,
  getPayload,
  statusValue,
} from 'persona';

const decoder = new TextDecoder();

/**
 * One-line summary of a handled connection
 */
export function formatExchange(exchange: Exchange): string {
  const remote = formatLocator(exchange.remote);
  const status = statusValue(exchange.response.status);
  const request = exchange.outcome.ok
    ? `${exchange.outcome.request.method} ${exchange.outcome.request.target}`
    : `malformed (${exchange.outcome.error.message})`;

  return `${remote} ${request} -> ${status} (${exchange.bytesReceived}B in, ${exchange.bytesSent}B out)`;
}

/**
 * Multi-line description of a message: start line fields, frames, payload preview
 */
export function describeMessage(message: Message, previewLength = 64): string[] {
  const lines: string[] = [];

  switch (message.kind) {
    case MessageKind.REQUEST:
      lines.push(`Request ${message.method} ${message.target} HTTP/${formatVersion(message.version)}`);
      break;

    case MessageKind.RESPONSE:
      lines.push(`Response HTTP/${formatVersion(message.version)} ${statusValue(message.status)}`);
      break;
  }

  for (const frame of message.frames) {
    switch (frame.type) {
      case FrameType.HEADERS:
        lines.push(`  Headers (${frame.headers.length})`);
        for (const header of frame.headers) {
          lines.push(`    ${header.name}: ${header.value}`);
        }
        break;

      case FrameType.DATA:
        lines.push(`  Data (${frame.payload.length}B)`);
        break;
    }
  }

  const payload = getPayload(message);
  if (payload.length > 0) {
    const text = decoder.decode(payload);
    const preview = text.length > previewLength ? `${text.slice(0, previewLength)}...` : text;
    lines.push(`  Payload: ${JSON.stringify(preview)}`);
  }

  return lines;
}
