export interface Credentials {
  apiKey: string;
}

export type InboundData = string | Uint8Array;

export type ReceiveResult =
  | { kind: 'message'; data: InboundData }
  | { kind: 'end'; code: number; reason: string }
  | { kind: 'cancelled' };

export interface Connection {
  readonly id: string;
  readonly endpoint: string;
  isOpen(): boolean;
}

/**
 * A bidirectional message channel to the service. `send` and `receive` are the
 * only operations that suspend.
 *
 * - `open` rejects with AuthError when the credentials are refused during the
 *   handshake and ConnectionError for any other failure.
 * - `receive` resolves `end` on a clean peer close, `cancelled` after a local
 *   `close` or an aborted signal, and rejects with ConnectionError when the
 *   connection drops.
 * - `close` is idempotent.
 */
export interface TransportChannel {
  open(endpoint: string, credentials: Credentials, signal?: AbortSignal): Promise<Connection>;
  send(connection: Connection, data: string): Promise<void>;
  receive(connection: Connection, signal?: AbortSignal): Promise<ReceiveResult>;
  close(connection: Connection): void;
}
