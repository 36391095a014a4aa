/**
 * Client side of the exchange: send one request, read the reply until the server closes
 */

import * as net from 'node:net';
import { ErrorCode, PersonaError } from '../types/errors.js';
import { type Locator, parseLocator } from '../types/locator.js';
import type { RequestMessage } from '../types/message.js';
import { serializeMessage } from '../wire/serializer.js';

export interface SendOptions {
  /** Connection and response timeout in milliseconds */
  timeout?: number;
}

const DEFAULT_TIMEOUT = 10000; // 10 seconds

/**
 * Connect, write the serialized request, half-close, and collect the response bytes
 */
export function sendRequest(
  target: string | Locator,
  request: RequestMessage,
  options: SendOptions = {}
): Promise<Uint8Array> {
  const locator = typeof target === 'string' ? parseLocator(target) : target;
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  return new Promise((resolve, reject) => {
    const socket = new net.Socket();
    const chunks: Buffer[] = [];
    let connected = false;

    const timeoutId = setTimeout(() => {
      socket.destroy();
      reject(new PersonaError(
        ErrorCode.ERR_TIMEOUT,
        connected ? `No response after ${timeout}ms` : `Connection timeout after ${timeout}ms`
      ));
    }, timeout);

    socket.on('connect', () => {
      connected = true;
      socket.end(serializeMessage(request));
    });

    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    socket.on('end', () => {
      clearTimeout(timeoutId);
      resolve(new Uint8Array(Buffer.concat(chunks)));
    });

    socket.on('error', (err) => {
      clearTimeout(timeoutId);
      reject(new PersonaError(ErrorCode.ERR_CONNECTION_CLOSED, `Connection failed: ${err.message}`));
    });

    socket.connect(locator.port, locator.host);
  });
}
