/**
 * Immutable builder for response messages.
 *
 * Every call returns a new builder; the receiver is never modified, so a
 * partially configured builder can be shared and extended independently.
 */

import { createHeader, type Header } from '../types/header.js';
import { StatusCode } from '../types/status.js';
import { HTTP_1_1, type Version } from '../types/version.js';
import { dataFrame, headersFrame } from '../types/frame.js';
import { MessageKind, type ResponseMessage } from '../types/message.js';
import { concatBytes, toBytes } from './bytes.js';

interface ResponseState {
  readonly version: Version;
  readonly status: StatusCode;
  readonly headers: readonly Header[];
  readonly payload: Uint8Array;
}

export class MessageBuilder {
  private readonly state: ResponseState;

  private constructor(state?: ResponseState) {
    this.state = state ?? {
      version: HTTP_1_1,
      status: StatusCode.SUCCESS,
      headers: [],
      payload: new Uint8Array(0),
    };
  }

  /**
   * Start a builder: HTTP/1.1, Success, no headers, empty payload
   */
  static create(): MessageBuilder {
    return new MessageBuilder();
  }

  version(version: Version): MessageBuilder {
    return new MessageBuilder({ ...this.state, version });
  }

  code(status: StatusCode): MessageBuilder {
    return new MessageBuilder({ ...this.state, status });
  }

  /**
   * Append a header. Duplicates are kept in append order.
   */
  header(header: Header): MessageBuilder;
  header(name: string, value: string): MessageBuilder;
  header(headerOrName: Header | string, value?: string): MessageBuilder {
    const header = typeof headerOrName === 'string'
      ? createHeader(headerOrName, value ?? '')
      : createHeader(headerOrName.name, headerOrName.value);
    return new MessageBuilder({ ...this.state, headers: [...this.state.headers, header] });
  }

  /**
   * Append to the payload; text is UTF-8 encoded
   */
  body(body: Uint8Array | string): MessageBuilder {
    return new MessageBuilder({
      ...this.state,
      payload: concatBytes(this.state.payload, toBytes(body)),
    });
  }

  /**
   * Produce the response. The Data frame is present even when the payload is empty.
   */
  build(): ResponseMessage {
    return {
      kind: MessageKind.RESPONSE,
      version: this.state.version,
      status: this.state.status,
      frames: [headersFrame(this.state.headers), dataFrame(this.state.payload)],
    };
  }
}
