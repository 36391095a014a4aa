/**
 * Message model: methods, status table, versions, headers, locators and errors.
 */

import { describe, it, expect } from 'vitest';
import { Method, parseMethod } from '../types/method.js';
import { StatusCode, statusReason, statusValue } from '../types/status.js';
import { createVersion, formatVersion, versionsEqual, HTTP_1_1 } from '../types/version.js';
import { createHeader } from '../types/header.js';
import { createLocator, formatLocator, parseLocator } from '../types/locator.js';
import { ErrorCode, PersonaError, getErrorMessage, mapListenError } from '../types/errors.js';
import { dataFrame, headersFrame } from '../types/frame.js';
import { MessageKind, findHeader, type RequestMessage } from '../types/message.js';

describe('parseMethod', () => {
  it('should recognise every method in any letter case', () => {
    for (const method of Object.values(Method)) {
      expect(parseMethod(method)).toBe(method);
      expect(parseMethod(method.toLowerCase())).toBe(method);
    }
  });

  it('should return null outside the closed set', () => {
    expect(parseMethod('BADVERB')).toBeNull();
    expect(parseMethod('')).toBeNull();
    expect(parseMethod('GET ')).toBeNull();
  });

  it('should only fold ASCII letters', () => {
    // U+0131 (dotless i) upper-cases to "I" with full Unicode folding
    expect(parseMethod('optıons')).toBeNull();
  });
});

describe('status table', () => {
  it('should map Success to 200 and its reason phrase', () => {
    expect(statusValue(StatusCode.SUCCESS)).toBe(200);
    expect(statusReason(StatusCode.SUCCESS)).toBe('Success');
  });
});

describe('Version', () => {
  it('should format as major.minor', () => {
    expect(formatVersion(HTTP_1_1)).toBe('1.1');
    expect(formatVersion(createVersion(0, 9))).toBe('0.9');
  });

  it('should compare by value', () => {
    expect(versionsEqual(createVersion(1, 1), HTTP_1_1)).toBe(true);
    expect(versionsEqual(createVersion(1, 0), HTTP_1_1)).toBe(false);
  });

  it('should reject components outside an unsigned byte', () => {
    expect(() => createVersion(256, 0)).toThrow(PersonaError);
    expect(() => createVersion(1, -1)).toThrow(PersonaError);
    expect(() => createVersion(1.5, 0)).toThrow('Invalid version component: 1.5');
  });
});

describe('createHeader', () => {
  it('should keep name and value as given', () => {
    expect(createHeader('X-Name', ' padded')).toEqual({ name: 'X-Name', value: ' padded' });
  });

  it('should reject blank parts', () => {
    expect(() => createHeader('  ', 'v')).toThrow(PersonaError);
  });
});

describe('findHeader', () => {
  it('should return the first exact-name match', () => {
    const message: RequestMessage = {
      kind: MessageKind.REQUEST,
      method: Method.GET,
      target: '/',
      version: HTTP_1_1,
      frames: [
        headersFrame([{ name: 'X-Tag', value: 'one' }]),
        dataFrame(new Uint8Array(0)),
        headersFrame([{ name: 'X-Tag', value: 'two' }]),
      ],
    };

    expect(findHeader(message, 'X-Tag')).toEqual({ name: 'X-Tag', value: 'one' });
    expect(findHeader(message, 'x-tag')).toBeUndefined();
  });
});

describe('Locator', () => {
  it('should parse and format host:port', () => {
    const locator = parseLocator('127.0.0.1:8080');
    expect(locator).toEqual({ host: '127.0.0.1', port: 8080 });
    expect(formatLocator(locator)).toBe('127.0.0.1:8080');
  });

  it('should reject bad input', () => {
    expect(() => parseLocator('localhost')).toThrow('Invalid locator format: localhost');
    expect(() => createLocator('localhost', 0)).toThrow('Invalid port number: 0');
  });
});

describe('errors', () => {
  it('should default the message from the code', () => {
    const error = new PersonaError(ErrorCode.ERR_MALFORMED);
    expect(error.message).toBe('Malformed request');
    expect(error.name).toBe('PersonaError');
    expect(getErrorMessage(ErrorCode.ERR_ADDR_IN_USE)).toBe('Address already in use');
  });

  it('should map EADDRINUSE and pass other errors through', () => {
    const inUse = Object.assign(new Error('listen EADDRINUSE: address already in use'), {
      code: 'EADDRINUSE',
    });
    const denied = Object.assign(new Error('listen EACCES'), { code: 'EACCES' });

    expect(mapListenError(inUse)).toHaveProperty('code', ErrorCode.ERR_ADDR_IN_USE);
    expect(mapListenError(denied)).toBe(denied);
  });
});
