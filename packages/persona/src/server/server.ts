/**
 * Single-connection HTTP server shell around the codec.
 *
 * Connections are handled strictly one at a time: read until the peer ends its
 * side (or goes idle), parse, hand the outcome to the handler, write the
 * serialized response, half-close and drop the connection.
 */

import * as net from 'node:net';
import { EventEmitter } from 'node:events';
import { ErrorCode, PersonaError, mapListenError } from '../types/errors.js';
import type { Locator } from '../types/locator.js';
import type { ResponseMessage } from '../types/message.js';
import { parseMessage } from '../wire/parser.js';
import { serializeMessage } from '../wire/serializer.js';
import { helloHandler, type ParseOutcome, type RequestHandler } from './handler.js';

export const LOCAL_HOST = '127.0.0.1';

const DEFAULT_IDLE_TIMEOUT = 1000; // 1 second

export interface ServerOptions {
  /** Host to bind to (default: '127.0.0.1') */
  host?: string;
  /** Port to bind to; 0 picks a free port */
  port: number;
  /** Maximum pending connections */
  backlog?: number;
  /** Stop reading a request after this long without data (ms) */
  idleTimeoutMs?: number;
  /** Builds the response for each connection (default: helloHandler) */
  handler?: RequestHandler;
}

/**
 * One handled connection
 */
export interface Exchange {
  remote: Locator;
  outcome: ParseOutcome;
  response: ResponseMessage;
  bytesReceived: number;
  bytesSent: number;
}

export interface ServerEvents {
  listening: [locator: Locator];
  exchange: [exchange: Exchange];
  error: [error: Error];
  close: [];
}

type SocketWaiter = (socket: net.Socket | null) => void;

/** Removes the listeners a socket carries while it waits in the queue */
type Detach = () => void;

export class Server extends EventEmitter<ServerEvents> {
  private server: net.Server;
  private localLocator: Locator | null = null;
  private closed = false;
  private pending = new Map<net.Socket, Detach>();
  private waiters: SocketWaiter[] = [];
  private idleTimeoutMs: number;
  private handler: RequestHandler;

  private constructor(options: ServerOptions) {
    super();

    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT;
    this.handler = options.handler ?? helloHandler;

    // Sockets wait paused until respond() takes them; half-open so the peer's FIN
    // does not close our side before the response is written.
    this.server = net.createServer({ allowHalfOpen: true, pauseOnConnect: true }, (socket) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(socket);
      } else {
        this.enqueue(socket);
      }
    });

    this.server.on('close', () => {
      this.emit('close');
    });
  }

  /**
   * Bind a server. Rejects with ERR_ADDR_IN_USE when the address is taken.
   */
  static bind(options: ServerOptions): Promise<Server> {
    const instance = new Server(options);
    const host = options.host ?? LOCAL_HOST;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        reject(mapListenError(err));
      };

      instance.server.once('error', onError);
      instance.server.listen({ host, port: options.port, backlog: options.backlog }, () => {
        instance.server.off('error', onError);
        instance.server.on('error', (err) => {
          instance.emit('error', err);
        });

        const addr = instance.server.address();
        if (addr && typeof addr === 'object') {
          instance.localLocator = { host: addr.address, port: addr.port };
          instance.emit('listening', instance.localLocator);
        }
        resolve(instance);
      });
    });
  }

  /**
   * Get the local address the server is bound to
   */
  get address(): Locator | null {
    return this.localLocator;
  }

  /**
   * Check if the server is accepting connections
   */
  get listening(): boolean {
    return this.server.listening && !this.closed;
  }

  /**
   * Number of connections the underlying listener still holds open
   */
  connectionCount(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.getConnections((err, count) => {
        if (err) {
          reject(err);
        } else {
          resolve(count);
        }
      });
    });
  }

  /**
   * Handle the next connection.
   * Resolves null if the server closes while waiting for one.
   */
  async respond(): Promise<Exchange | null> {
    if (this.closed) {
      throw new PersonaError(ErrorCode.ERR_SERVER_CLOSED);
    }

    const socket = await this.accept();
    if (socket === null) {
      return null;
    }

    try {
      const exchange = await this.handleSocket(socket);
      this.emit('exchange', exchange);
      return exchange;
    } catch (err) {
      socket.destroy();
      throw err;
    }
  }

  /**
   * Handle connections one after another until the server is closed.
   * Failures of individual connections are reported as 'error' events.
   */
  async serve(): Promise<void> {
    while (!this.closed) {
      try {
        const exchange = await this.respond();
        if (exchange === null) {
          return;
        }
      } catch (err) {
        if (err instanceof PersonaError && err.code === ErrorCode.ERR_SERVER_CLOSED) {
          return;
        }
        this.emit('error', err instanceof Error ? err : new Error(String(err)));
      }
    }
  }

  /**
   * Stop accepting connections and drop the ones still queued
   */
  close(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    for (const [socket, detach] of this.pending) {
      detach();
      socket.destroy();
    }
    this.pending.clear();

    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Queue a connection until respond() takes it.
   * A queued connection that fails or closes leaves the queue for good.
   */
  private enqueue(socket: net.Socket): void {
    const onError = () => {
      drop();
      socket.destroy();
    };
    const drop = () => {
      this.pending.delete(socket);
      socket.off('error', onError);
      socket.off('close', drop);
    };

    socket.once('error', onError);
    socket.once('close', drop);
    this.pending.set(socket, drop);
  }

  private accept(): Promise<net.Socket | null> {
    const next = this.pending.entries().next();
    if (!next.done) {
      const [socket, detach] = next.value;
      detach();
      return Promise.resolve(socket);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private async handleSocket(socket: net.Socket): Promise<Exchange> {
    const remote: Locator = {
      host: socket.remoteAddress ?? 'unknown',
      port: socket.remotePort ?? 0,
    };

    const raw = await readRequest(socket, this.idleTimeoutMs);

    let outcome: ParseOutcome;
    try {
      outcome = { ok: true, request: parseMessage(raw) };
    } catch (err) {
      if (!(err instanceof PersonaError)) {
        throw err;
      }
      outcome = { ok: false, error: err };
    }

    const response = this.handler(outcome);
    const wire = serializeMessage(response);
    await writeResponse(socket, wire);

    // Our side is shut down and the response flushed; nothing more is read.
    socket.destroy();

    return {
      remote,
      outcome,
      response,
      bytesReceived: raw.length,
      bytesSent: wire.length,
    };
  }
}

/**
 * Collect bytes until the peer half-closes or stays idle for `idleTimeoutMs`
 */
function readRequest(socket: net.Socket, idleTimeoutMs: number): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed) {
      reject(new PersonaError(ErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed before the request was read'));
      return;
    }

    const chunks: Buffer[] = [];

    const cleanup = () => {
      socket.setTimeout(0);
      socket.off('data', onData);
      socket.off('end', onDone);
      socket.off('timeout', onDone);
      socket.off('error', onError);
      socket.off('close', onClose);
    };

    const onData = (chunk: Buffer) => {
      chunks.push(chunk);
    };

    const onDone = () => {
      cleanup();
      socket.pause();
      resolve(new Uint8Array(Buffer.concat(chunks)));
    };

    const onError = (err: Error) => {
      cleanup();
      reject(new PersonaError(ErrorCode.ERR_CONNECTION_CLOSED, `Connection failed while reading the request: ${err.message}`));
    };

    const onClose = () => {
      cleanup();
      reject(new PersonaError(ErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed before the request was read'));
    };

    socket.on('data', onData);
    socket.once('end', onDone);
    socket.once('timeout', onDone);
    socket.once('error', onError);
    socket.once('close', onClose);
    socket.setTimeout(idleTimeoutMs);
    socket.resume();
  });
}

/**
 * Write the response and half-close the socket for writing.
 * Resolves once the bytes are flushed to the connection.
 */
function writeResponse(socket: net.Socket, wire: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const fail = (detail: string) => {
      if (settled) {
        return;
      }
      settled = true;
      socket.off('error', onError);
      socket.off('close', onClose);
      reject(new PersonaError(ErrorCode.ERR_CONNECTION_CLOSED, detail));
    };

    const onError = (err: Error) => {
      fail(`Connection failed while writing the response: ${err.message}`);
    };

    const onClose = () => {
      fail('Connection closed before the response was written');
    };

    socket.once('error', onError);
    socket.once('close', onClose);
    socket.end(wire, (err?: Error | null) => {
      if (err) {
        onError(err);
        return;
      }
      if (settled) {
        return;
      }
      settled = true;
      socket.off('error', onError);
      socket.off('close', onClose);
      resolve();
    });
  });
}
