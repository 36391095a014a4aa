/**
 * HTTP/1.1 request parser.
 *
 * Turns the bytes read from one connection into a RequestMessage:
 * | request line | header lines | blank line | body (Content-Length characters) |
 *
 * Any violation aborts the whole parse with ERR_MALFORMED; no partial message is returned.
 */

import { malformed } from '../types/errors.js';
import { CONTENT_LENGTH, type Header } from '../types/header.js';
import { type Method, parseMethod } from '../types/method.js';
import { createVersion, type Version } from '../types/version.js';
import { dataFrame, headersFrame, type Frame } from '../types/frame.js';
import { MessageKind, type RequestMessage } from '../types/message.js';

const VERSION_MARKER = 'HTTP/';

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const encoder = new TextEncoder();

/**
 * A line of text and the offset where the following line starts
 */
interface Line {
  text: string;
  next: number;
}

/**
 * Read the line starting at `start`. Lines end at `\n`; a `\r` right before it is dropped.
 * Returns null once the input is exhausted.
 */
function readLine(text: string, start: number): Line | null {
  if (start >= text.length) {
    return null;
  }

  const newline = text.indexOf('\n', start);
  if (newline === -1) {
    return { text: text.slice(start), next: text.length };
  }

  const end = newline > start && text[newline - 1] === '\r' ? newline - 1 : newline;
  return { text: text.slice(start, end), next: newline + 1 };
}

/**
 * Parse one version component: a decimal digit sequence that fits in a byte
 */
function parseVersionComponent(text: string): number {
  if (!/^\d+$/.test(text)) {
    throw malformed(`invalid version component "${text}"`);
  }
  const value = parseInt(text, 10);
  if (value > 0xff) {
    throw malformed(`version component out of range "${text}"`);
  }
  return value;
}

/**
 * Parse the `HTTP/<major>.<minor>` token of the request line
 */
function parseVersion(token: string): Version {
  const marker = token.indexOf(VERSION_MARKER);
  if (marker === -1) {
    throw malformed(`missing ${VERSION_MARKER} in version "${token}"`);
  }

  const numbers = token.slice(marker + VERSION_MARKER.length).split(VERSION_MARKER)[0].split('.');
  if (numbers.length < 2) {
    throw malformed(`incomplete version "${token}"`);
  }

  return createVersion(parseVersionComponent(numbers[0]), parseVersionComponent(numbers[1]));
}

/**
 * Parse the request line into method, target and version.
 * Tokens past the third are ignored.
 */
function parseRequestLine(line: string): { method: Method; target: string; version: Version } {
  const tokens = line.split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length < 3) {
    throw malformed(`request line needs method, target and version: "${line}"`);
  }

  const [methodToken, target, versionToken] = tokens;
  const method = parseMethod(methodToken);
  if (method === null) {
    throw malformed(`unknown method "${methodToken}"`);
  }

  return { method, target, version: parseVersion(versionToken) };
}

/**
 * Split a header line at its first colon
 */
function parseHeaderLine(line: string): Header {
  const colon = line.indexOf(':');
  const name = colon === -1 ? line : line.slice(0, colon);
  const value = colon === -1 ? '' : line.slice(colon + 1).trimStart();

  if (name.trim().length === 0 || value.trim().length === 0) {
    throw malformed(`invalid header line "${line}"`);
  }

  return { name, value };
}

/**
 * Declared body length from the first Content-Length header, or null without one
 */
function declaredLength(headers: readonly Header[]): number | null {
  const header = headers.find((h) => h.name === CONTENT_LENGTH);
  if (!header) {
    return null;
  }
  if (!/^\d+$/.test(header.value)) {
    throw malformed(`invalid ${CONTENT_LENGTH} "${header.value}"`);
  }
  return parseInt(header.value, 10);
}

/**
 * Leading `count` characters (code points) of `text`, or all of it when shorter
 */
function takeCharacters(text: string, count: number): string {
  let taken = 0;
  let end = 0;
  for (const ch of text) {
    if (taken === count) {
      break;
    }
    end += ch.length;
    taken++;
  }
  return text.slice(0, end);
}

/**
 * Parse the raw bytes of a single request
 */
export function parseMessage(bytes: Uint8Array): RequestMessage {
  if (bytes.length === 0) {
    throw malformed('empty input');
  }

  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch {
    throw malformed('input is not valid UTF-8');
  }

  const requestLine = readLine(text, 0);
  if (requestLine === null) {
    throw malformed('missing request line');
  }
  const { method, target, version } = parseRequestLine(requestLine.text);

  const headers: Header[] = [];
  let cursor = requestLine.next;
  for (let line = readLine(text, cursor); line !== null; line = readLine(text, cursor)) {
    cursor = line.next;
    if (line.text.length === 0) {
      break;
    }
    headers.push(parseHeaderLine(line.text));
  }

  const frames: Frame[] = [headersFrame(headers)];

  const length = declaredLength(headers);
  if (length !== null) {
    // Short bodies are accepted as they are; the payload is simply shorter than declared.
    const body = takeCharacters(text.slice(cursor), length);
    frames.push(dataFrame(encoder.encode(body)));
  }

  return {
    kind: MessageKind.REQUEST,
    method,
    target,
    version,
    frames,
  };
}
