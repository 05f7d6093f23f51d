import { randomUUID } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import { WebSocket, type RawData } from 'ws';

import {
  AuthError,
  CancelledError,
  ConnectionError,
  ProtocolError,
  silentLogger,
  type Logger,
} from '@deepdub/shared';

import type {
  Connection,
  Credentials,
  InboundData,
  ReceiveResult,
  TransportChannel,
} from './transport';

export interface WsTransportOptions {
  connectTimeoutMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  logger?: Logger;
}

const CLEAN_CLOSE_CODES = new Set([1000, 1005]);

type Terminal =
  | { kind: 'end'; code: number; reason: string }
  | { kind: 'error'; error: ConnectionError }
  | { kind: 'closed' };

type Waiter = {
  resolve: (result: ReceiveResult) => void;
  reject: (error: ConnectionError) => void;
};

function rawDataToBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    const joined = Buffer.concat(data);
    return new Uint8Array(joined.buffer, joined.byteOffset, joined.byteLength);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

export class WsConnection implements Connection {
  readonly id = randomUUID();
  readonly endpoint: string;

  private readonly socket: WebSocket;
  private readonly logger: Logger;
  private readonly heartbeatTimeoutMs: number;
  private readonly queue: InboundData[] = [];
  private readonly waiters: Waiter[] = [];
  private terminal: Terminal | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private pongTimeout: NodeJS.Timeout | null = null;

  constructor(options: {
    socket: WebSocket;
    endpoint: string;
    logger: Logger;
    heartbeatIntervalMs: number;
    heartbeatTimeoutMs: number;
  }) {
    this.socket = options.socket;
    this.endpoint = options.endpoint;
    this.logger = options.logger;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs;

    this.socket.on('message', (data: RawData, isBinary: boolean) => {
      const bytes = rawDataToBytes(data);
      this.push(
        isBinary
          ? bytes
          : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8'),
      );
    });

    this.socket.on('pong', () => {
      this.clearPongTimeout();
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      const reasonText = reason.toString('utf8');
      this.logger.debug?.('connection closed', { connectionId: this.id, code, reason: reasonText });
      if (CLEAN_CLOSE_CODES.has(code)) {
        this.settle({ kind: 'end', code, reason: reasonText });
      } else {
        this.settle({
          kind: 'error',
          error: new ConnectionError(`Connection closed abnormally (code ${code})`, {
            details: { code, reason: reasonText },
          }),
        });
      }
    });

    this.socket.on('error', (err: Error) => {
      this.logger.debug?.('socket error', { connectionId: this.id, error: err.message });
      this.settle({ kind: 'error', error: new ConnectionError(err.message, { cause: err }) });
    });

    if (options.heartbeatIntervalMs > 0) {
      this.heartbeatInterval = setInterval(() => this.ping(), options.heartbeatIntervalMs);
      this.heartbeatInterval.unref();
    }
  }

  isOpen(): boolean {
    return this.terminal === null && this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new ConnectionError('Connection is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, (err?: Error) => {
        if (err) {
          reject(new ConnectionError(`Write failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  receive(signal?: AbortSignal): Promise<ReceiveResult> {
    const next = this.queue.shift();
    if (next !== undefined) {
      return Promise.resolve({ kind: 'message', data: next });
    }
    if (this.terminal) {
      return this.resultForTerminal(this.terminal);
    }
    if (signal?.aborted) {
      return Promise.resolve({ kind: 'cancelled' });
    }

    return new Promise<ReceiveResult>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        resolve({ kind: 'cancelled' });
      };
      const waiter: Waiter = {
        resolve: (result) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    if (this.terminal?.kind === 'closed') {
      return;
    }
    const wasTerminal = this.terminal !== null;
    this.settle({ kind: 'closed' }, true);
    if (wasTerminal) {
      return;
    }
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(1000, 'client closing');
    }
  }

  private ping(): void {
    if (!this.isOpen() || this.pongTimeout) {
      return;
    }
    this.pongTimeout = setTimeout(() => {
      this.pongTimeout = null;
      this.logger.warn('heartbeat timeout', { connectionId: this.id });
      this.settle({ kind: 'error', error: new ConnectionError('Heartbeat timeout') });
      this.socket.terminate();
    }, this.heartbeatTimeoutMs);
    this.pongTimeout.unref();
    this.socket.ping();
  }

  private clearPongTimeout(): void {
    if (this.pongTimeout) {
      clearTimeout(this.pongTimeout);
      this.pongTimeout = null;
    }
  }

  private push(data: InboundData): void {
    if (this.terminal) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ kind: 'message', data });
      return;
    }
    this.queue.push(data);
  }

  /**
   * Records the first terminal condition. A local close overrides an earlier
   * one so pending and later receives resolve `cancelled`.
   */
  private settle(terminal: Terminal, force = false): void {
    if (this.terminal && !force) {
      return;
    }
    this.terminal = terminal;
    if (terminal.kind === 'closed') {
      this.queue.length = 0;
    }
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
    this.clearPongTimeout();

    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      if (terminal.kind === 'error') {
        waiter.reject(terminal.error);
      } else if (terminal.kind === 'end') {
        waiter.resolve({ kind: 'end', code: terminal.code, reason: terminal.reason });
      } else {
        waiter.resolve({ kind: 'cancelled' });
      }
    }
  }

  private resultForTerminal(terminal: Terminal): Promise<ReceiveResult> {
    if (terminal.kind === 'error') {
      return Promise.reject(terminal.error);
    }
    if (terminal.kind === 'end') {
      return Promise.resolve({ kind: 'end', code: terminal.code, reason: terminal.reason });
    }
    return Promise.resolve({ kind: 'cancelled' });
  }
}

function asWsConnection(connection: Connection): WsConnection {
  if (!(connection instanceof WsConnection)) {
    throw new ProtocolError('Connection was not opened by WsTransportChannel');
  }
  return connection;
}

/**
 * Transport channel over `ws`. Each `open` creates an independent socket; no
 * connection is shared between sessions.
 */
export class WsTransportChannel implements TransportChannel {
  private readonly options: WsTransportOptions;
  private readonly logger: Logger;

  constructor(options: WsTransportOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  open(endpoint: string, credentials: Credentials, signal?: AbortSignal): Promise<Connection> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Connect cancelled'));
    }

    return new Promise<Connection>((resolve, reject) => {
      this.logger.debug?.('connecting', { endpoint });

      const socket = new WebSocket(endpoint, {
        headers: { 'x-api-key': credentials.apiKey },
        handshakeTimeout: this.options.connectTimeoutMs,
      });

      let settled = false;
      const finish = (error: Error | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal?.removeEventListener('abort', handleAbort);
        socket.removeListener('open', handleOpen);
        socket.removeListener('unexpected-response', handleUnexpectedResponse);
        if (error) {
          socket.removeListener('error', handleError);
          // Keep a listener so a late handshake error is not thrown.
          socket.on('error', () => {});
          if (
            socket.readyState === WebSocket.OPEN ||
            socket.readyState === WebSocket.CONNECTING
          ) {
            socket.terminate();
          }
          reject(error);
          return;
        }
        socket.removeListener('error', handleError);
        resolve(
          new WsConnection({
            socket,
            endpoint,
            logger: this.logger,
            heartbeatIntervalMs: this.options.heartbeatIntervalMs,
            heartbeatTimeoutMs: this.options.heartbeatTimeoutMs,
          }),
        );
      };

      const handleOpen = (): void => {
        this.logger.debug?.('connected', { endpoint });
        finish(null);
      };

      const handleError = (err: Error): void => {
        finish(new ConnectionError(`Failed to connect to ${endpoint}: ${err.message}`, { cause: err }));
      };

      const handleUnexpectedResponse = (_request: unknown, response: IncomingMessage): void => {
        const status = response.statusCode ?? 0;
        response.resume();
        if (status === 401 || status === 403) {
          finish(new AuthError(`Credentials rejected during handshake (HTTP ${status})`, status));
          return;
        }
        finish(new ConnectionError(`Unexpected handshake response (HTTP ${status})`));
      };

      const handleAbort = (): void => {
        finish(new CancelledError('Connect cancelled'));
      };

      socket.once('open', handleOpen);
      socket.on('error', handleError);
      socket.on('unexpected-response', handleUnexpectedResponse);
      signal?.addEventListener('abort', handleAbort, { once: true });
    });
  }

  send(connection: Connection, data: string): Promise<void> {
    return asWsConnection(connection).send(data);
  }

  receive(connection: Connection, signal?: AbortSignal): Promise<ReceiveResult> {
    return asWsConnection(connection).receive(signal);
  }

  close(connection: Connection): void {
    asWsConnection(connection).close();
  }
}
