/**
 * Immutable builder for request messages, the client-side counterpart of MessageBuilder.
 */

import { CONTENT_LENGTH, createHeader, type Header } from '../types/header.js';
import { Method } from '../types/method.js';
import { HTTP_1_1, type Version } from '../types/version.js';
import { dataFrame, headersFrame, type Frame } from '../types/frame.js';
import { MessageKind, type RequestMessage } from '../types/message.js';
import { concatBytes, countCharacters, toBytes } from './bytes.js';

interface RequestState {
  readonly method: Method;
  readonly target: string;
  readonly version: Version;
  readonly headers: readonly Header[];
  readonly payload: Uint8Array;
}

export class RequestBuilder {
  private readonly state: RequestState;

  private constructor(state?: RequestState) {
    this.state = state ?? {
      method: Method.GET,
      target: '/',
      version: HTTP_1_1,
      headers: [],
      payload: new Uint8Array(0),
    };
  }

  /**
   * Start a builder: GET / HTTP/1.1, no headers, empty payload
   */
  static create(): RequestBuilder {
    return new RequestBuilder();
  }

  method(method: Method): RequestBuilder {
    return new RequestBuilder({ ...this.state, method });
  }

  target(target: string): RequestBuilder {
    return new RequestBuilder({ ...this.state, target });
  }

  version(version: Version): RequestBuilder {
    return new RequestBuilder({ ...this.state, version });
  }

  header(header: Header): RequestBuilder;
  header(name: string, value: string): RequestBuilder;
  header(headerOrName: Header | string, value?: string): RequestBuilder {
    const header = typeof headerOrName === 'string'
      ? createHeader(headerOrName, value ?? '')
      : createHeader(headerOrName.name, headerOrName.value);
    return new RequestBuilder({ ...this.state, headers: [...this.state.headers, header] });
  }

  body(body: Uint8Array | string): RequestBuilder {
    return new RequestBuilder({
      ...this.state,
      payload: concatBytes(this.state.payload, toBytes(body)),
    });
  }

  /**
   * Append a Content-Length header matching the current payload.
   * The parser counts the body in characters, so that is what is declared here.
   */
  contentLength(): RequestBuilder {
    return this.header(CONTENT_LENGTH, String(countCharacters(this.state.payload)));
  }

  /**
   * Produce the request. A Data frame is only added when there is a payload.
   */
  build(): RequestMessage {
    const frames: Frame[] = [headersFrame(this.state.headers)];
    if (this.state.payload.length > 0) {
      frames.push(dataFrame(this.state.payload));
    }

    return {
      kind: MessageKind.REQUEST,
      method: this.state.method,
      target: this.state.target,
      version: this.state.version,
      frames,
    };
  }
}
