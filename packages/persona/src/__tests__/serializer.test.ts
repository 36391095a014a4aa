/**
 * Serialization of requests and responses into wire bytes.
 */

import { describe, it, expect } from 'vitest';
import { serializeMessage } from '../wire/serializer.js';
import { dataFrame, headersFrame } from '../types/frame.js';
import { Method } from '../types/method.js';
import { MessageKind, type RequestMessage, type ResponseMessage } from '../types/message.js';
import { StatusCode } from '../types/status.js';
import { createVersion, HTTP_1_1 } from '../types/version.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function text(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

describe('serializeMessage', () => {
  it('should write the request line, headers, blank line and payload', () => {
    const request: RequestMessage = {
      kind: MessageKind.REQUEST,
      method: Method.POST,
      target: '/submit',
      version: HTTP_1_1,
      frames: [
        headersFrame([
          { name: 'Host', value: 'example.test' },
          { name: 'Content-Length', value: '2' },
        ]),
        dataFrame(encoder.encode('ok')),
      ],
    };

    expect(text(serializeMessage(request))).toBe(
      'POST /submit HTTP/1.1\r\nHost: example.test\r\nContent-Length: 2\r\n\r\nok'
    );
  });

  it('should write the status line with numeric code and reason', () => {
    const response: ResponseMessage = {
      kind: MessageKind.RESPONSE,
      version: createVersion(1, 0),
      status: StatusCode.SUCCESS,
      frames: [headersFrame([{ name: 'Server', value: 'test' }]), dataFrame(new Uint8Array(0))],
    };

    expect(text(serializeMessage(response))).toBe('HTTP/1.0 200 Success\r\nServer: test\r\n\r\n');
  });

  it('should keep a single blank line when there are no headers', () => {
    const response: ResponseMessage = {
      kind: MessageKind.RESPONSE,
      version: HTTP_1_1,
      status: StatusCode.SUCCESS,
      frames: [headersFrame([]), dataFrame(encoder.encode('body'))],
    };

    expect(text(serializeMessage(response))).toBe('HTTP/1.1 200 Success\r\n\r\nbody');
  });

  it('should write the blank line even without any frames', () => {
    const request: RequestMessage = {
      kind: MessageKind.REQUEST,
      method: Method.OPTIONS,
      target: '*',
      version: HTTP_1_1,
      frames: [],
    };

    expect(text(serializeMessage(request))).toBe('OPTIONS * HTTP/1.1\r\n\r\n');
  });

  it('should append Data frames after all header lines, in frame order', () => {
    const request: RequestMessage = {
      kind: MessageKind.REQUEST,
      method: Method.PUT,
      target: '/doc',
      version: HTTP_1_1,
      frames: [
        dataFrame(encoder.encode('first-')),
        headersFrame([{ name: 'A', value: '1' }]),
        dataFrame(encoder.encode('second')),
        headersFrame([{ name: 'B', value: '2' }]),
      ],
    };

    expect(text(serializeMessage(request))).toBe('PUT /doc HTTP/1.1\r\nA: 1\r\nB: 2\r\n\r\nfirst-second');
  });

  it('should copy binary payloads unchanged', () => {
    const payload = new Uint8Array([0x00, 0xff, 0x10, 0x80]);
    const response: ResponseMessage = {
      kind: MessageKind.RESPONSE,
      version: HTTP_1_1,
      status: StatusCode.SUCCESS,
      frames: [headersFrame([]), dataFrame(payload)],
    };

    const wire = serializeMessage(response);
    const head = encoder.encode('HTTP/1.1 200 Success\r\n\r\n');

    expect(wire.subarray(0, head.length)).toEqual(head);
    expect(wire.subarray(head.length)).toEqual(payload);
  });
});
