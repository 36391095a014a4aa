/**
 * Requests built with RequestBuilder survive serialize-then-parse unchanged.
 */

import { describe, it, expect } from 'vitest';
import { RequestBuilder } from '../builder/request-builder.js';
import { parseMessage } from '../wire/parser.js';
import { serializeMessage } from '../wire/serializer.js';
import { Method } from '../types/method.js';
import { getHeaders, getPayload } from '../types/message.js';
import { createVersion } from '../types/version.js';

describe('request round-trip', () => {
  it('should preserve method, target, version, headers and payload', () => {
    const request = RequestBuilder.create()
      .method(Method.PUT)
      .target('/files/report.txt?draft=1')
      .version(createVersion(1, 0))
      .header('Host', 'files.example.test')
      .header('X-Trace', 'abc:123')
      .body('line one\r\nline two\r\n\r\nafter a blank line')
      .contentLength()
      .build();

    const parsed = parseMessage(serializeMessage(request));

    expect(parsed.method).toBe(Method.PUT);
    expect(parsed.target).toBe('/files/report.txt?draft=1');
    expect(parsed.version).toEqual({ major: 1, minor: 0 });
    expect(getHeaders(parsed)).toEqual(getHeaders(request));
    expect(getPayload(parsed)).toEqual(getPayload(request));
  });

  it('should preserve multi-byte payloads', () => {
    const request = RequestBuilder.create()
      .method(Method.POST)
      .body('café ☕ 😀')
      .contentLength()
      .build();

    const parsed = parseMessage(serializeMessage(request));

    expect(getPayload(parsed)).toEqual(getPayload(request));
  });

  it('should round-trip a request without a body', () => {
    const request = RequestBuilder.create().method(Method.HEAD).header('Accept', '*/*').build();

    const parsed = parseMessage(serializeMessage(request));

    expect(parsed.method).toBe(Method.HEAD);
    expect(parsed.frames).toEqual(request.frames);
  });
});
