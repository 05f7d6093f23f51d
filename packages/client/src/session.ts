import { randomUUID } from 'node:crypto';

import {
  AuthError,
  CancelledError,
  ConnectionError,
  ProtocolError,
  UnrecoverableError,
  childLogger,
  concatBytes,
  describeError,
  isTransientError,
  silentLogger,
  type Logger,
  type ResolvedStreamingTtsOptions,
  type ResolvedTextStreamOptions,
} from '@deepdub/shared';

import { initialBackoff, nextBackoff, sleep as defaultSleep, type BackoffState, type SleepFn } from './backoff';
import { MessageCodec, type AudioChunkFrame, type ErrorFrame, type InboundFrame } from './codec';
import type { RetryPolicy } from './config';
import { AudioReassembler } from './reassembler';
import type { Connection, Credentials, TransportChannel } from './transport';

export type SessionState = 'idle' | 'connecting' | 'streaming' | 'draining' | 'closed' | 'errored';

export type SessionRequest =
  | { kind: 'tts'; generationId: string; options: ResolvedStreamingTtsOptions }
  | { kind: 'text-stream'; options: ResolvedTextStreamOptions };

export interface SessionSnapshot {
  id: string;
  kind: SessionRequest['kind'];
  state: SessionState;
  generationId?: string;
  model: string;
  locale: string;
  voicePromptId?: string;
  bytesReceived: number;
  chunksReceived: number;
  lastActivityAt: number;
  retries: number;
  error?: unknown;
}

export type SessionStateListener = (state: SessionState, previous: SessionState) => void;

export interface SynthesisSessionOptions {
  id?: string;
  request: SessionRequest;
  transport: TransportChannel;
  endpoint: string;
  credentials: Credentials;
  retry: RetryPolicy;
  highWaterMarkBytes?: number;
  logger?: Logger;
  sleep?: SleepFn;
  now?: () => number;
  onStateChange?: SessionStateListener;
}

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ['connecting', 'closed'],
  connecting: ['streaming', 'errored', 'closed'],
  streaming: ['draining', 'errored', 'closed'],
  draining: ['closed', 'errored'],
  closed: [],
  errored: [],
};

const AUTH_ERROR_CODE = /auth|unauthori[sz]ed|forbidden|api[-_ ]?key/i;

type Deferred = {
  promise: Promise<void>;
  resolve: () => void;
  reject: (error: unknown) => void;
  settled: boolean;
};

function createDeferred(): Deferred {
  let resolve: () => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  const deferred: Deferred = {
    promise,
    settled: false,
    resolve: () => {
      if (!deferred.settled) {
        deferred.settled = true;
        resolve();
      }
    },
    reject: (error) => {
      if (!deferred.settled) {
        deferred.settled = true;
        reject(error);
      }
    },
  };
  return deferred;
}

export function errorFromServerFrame(frame: ErrorFrame): Error {
  if (AUTH_ERROR_CODE.test(frame.code) || AUTH_ERROR_CODE.test(frame.message)) {
    return new AuthError(`Server rejected credentials: ${frame.message}`);
  }
  return new UnrecoverableError(`Server error [${frame.code}]: ${frame.message}`, {
    details: { code: frame.code },
  });
}

/**
 * One synthesis request's streaming lifetime:
 * idle -> connecting -> streaming -> draining -> closed, with `errored`
 * reachable from any non-terminal state and `closed` on cancel.
 *
 * A single pump task reads frames from the session's own connection into an
 * AudioReassembler; callers consume audio through `audio()`. Transient
 * connection faults reconnect with bounded exponential backoff and re-send
 * only control state.
 */
export class SynthesisSession {
  readonly id: string;

  private readonly request: SessionRequest;
  private readonly transport: TransportChannel;
  private readonly endpoint: string;
  private readonly credentials: Credentials;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly codec: MessageCodec;
  private readonly reassembler: AudioReassembler;
  private readonly abortController = new AbortController();
  private readonly listeners = new Set<SessionStateListener>();

  private state: SessionState = 'idle';
  private error: unknown = undefined;
  private ready: Deferred | null = null;
  private connection: Connection | null = null;
  private connectionAbort: AbortController | null = null;
  private acknowledged = false;
  private backoff: BackoffState;
  private lastActivityAt: number;
  private verifyResume = false;

  // Text-streaming input bookkeeping. `pendingTexts` holds text not yet
  // covered by a `finished` event; the first `sentTexts` of them went out on
  // the current connection.
  private pendingTexts: string[] = [];
  private sentTexts = 0;
  private audioSinceFinished = 0;
  private inputEnded = false;
  private inputDrained = false;

  constructor(options: SynthesisSessionOptions) {
    this.id = options.id ?? randomUUID();
    this.request = options.request;
    this.transport = options.transport;
    this.endpoint = options.endpoint;
    this.credentials = options.credentials;
    this.retry = options.retry;
    this.logger = childLogger(options.logger ?? silentLogger, `session ${this.id}`);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.backoff = initialBackoff(options.retry);
    this.lastActivityAt = this.now();
    this.codec = new MessageCodec({
      stripWavHeader: options.request.options.format === 'headerless-wav',
      // Text streams restart chunk numbering per text; order is arrival order.
      useServerIndex: options.request.kind === 'tts',
    });
    this.reassembler = new AudioReassembler({
      ...(options.highWaterMarkBytes !== undefined
        ? { highWaterMarkBytes: options.highWaterMarkBytes }
        : {}),
    });
    if (options.onStateChange) {
      this.listeners.add(options.onStateChange);
    }
  }

  get currentState(): SessionState {
    return this.state;
  }

  get failure(): unknown {
    return this.error;
  }

  addStateListener(listener: SessionStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): SessionSnapshot {
    const { options } = this.request;
    return {
      id: this.id,
      kind: this.request.kind,
      state: this.state,
      ...(this.request.kind === 'tts' ? { generationId: this.request.generationId } : {}),
      model: options.model,
      locale: options.locale,
      ...(options.voicePromptId !== undefined ? { voicePromptId: options.voicePromptId } : {}),
      bytesReceived: this.reassembler.totalBytes,
      chunksReceived: this.reassembler.chunkCount,
      lastActivityAt: this.lastActivityAt,
      retries: this.backoff.attempt,
      ...(this.error !== undefined ? { error: this.error } : {}),
    };
  }

  /**
   * Opens the connection and resolves once the service acknowledged the
   * request. Rejects with the terminal error if the session fails first.
   */
  start(): Promise<void> {
    if (this.ready) {
      return this.ready.promise;
    }
    this.ready = createDeferred();
    if (this.state !== 'idle') {
      this.ready.reject(this.error ?? new CancelledError('Session already closed'));
      return this.ready.promise;
    }
    this.transition('connecting');
    this.run().catch((err: unknown) => this.fail(err));
    return this.ready.promise;
  }

  /**
   * The session's audio, in order, each chunk once. Throws the terminal
   * error if the session fails, and CancelledError after `cancel()`.
   */
  async *audio(): AsyncGenerator<Uint8Array, void, undefined> {
    for await (const chunk of this.reassembler.drain()) {
      yield chunk;
    }
    if (this.state === 'draining') {
      this.transition('closed');
    }
  }

  async collect(): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    for await (const chunk of this.audio()) {
      chunks.push(chunk);
    }
    return concatBytes(chunks);
  }

  /**
   * Queues text for a text-streaming session. Text not yet covered by a
   * `finished` event is re-sent after a reconnect.
   */
  async sendText(text: string): Promise<void> {
    if (this.request.kind !== 'text-stream') {
      throw new ProtocolError('sendText is only available on text-streaming sessions');
    }
    if (this.inputEnded) {
      throw new ProtocolError('Input already ended');
    }
    if (this.state !== 'connecting' && this.state !== 'streaming') {
      throw new ProtocolError(`Cannot send text while session is ${this.state}`);
    }
    if (!text) {
      return;
    }
    this.pendingTexts.push(text);
    const connection = this.connection;
    if (!connection || !this.acknowledged) {
      // Flushed in order once the stream config is acknowledged.
      return;
    }
    this.sentTexts += 1;
    try {
      await this.sendFrame(connection, this.codec.encodeRequest({ kind: 'stream-text', text }));
    } catch (err) {
      if (!isTransientError(err)) {
        throw err;
      }
      // The pump sees the same fault and re-sends pending text on reconnect.
      this.logger.warn('text send failed; will retry after reconnect', { error: err.message });
    }
  }

  /**
   * Marks the end of text input. The session completes with the next
   * `finished` event, or immediately when nothing is outstanding.
   */
  endInput(): void {
    if (this.request.kind !== 'text-stream' || this.inputEnded) {
      return;
    }
    this.inputEnded = true;
    if (this.pendingTexts.length === 0 && this.state === 'streaming') {
      this.inputDrained = true;
      this.connectionAbort?.abort();
    }
  }

  cancel(): void {
    if (this.state === 'closed' || this.state === 'errored') {
      return;
    }
    this.logger.info('cancelled');
    const error = new CancelledError('Session cancelled');
    this.abortController.abort();
    this.closeConnection();
    this.reassembler.fail(error);
    this.transition('closed');
    this.ready?.reject(error);
  }

  private async run(): Promise<void> {
    while (!this.isTerminal()) {
      try {
        await this.serveConnection();
        this.closeConnection();
        if (this.isTerminal()) {
          return;
        }
        this.transition('draining');
        this.reassembler.finalize();
        this.logger.info('synthesis complete', {
          chunks: this.reassembler.chunkCount,
          bytes: this.reassembler.totalBytes,
        });
        return;
      } catch (err) {
        this.closeConnection();
        if (this.isTerminal()) {
          return;
        }
        if (!isTransientError(err)) {
          this.fail(err);
          return;
        }
        const step = nextBackoff(this.backoff, this.retry);
        if (!step) {
          this.fail(
            new UnrecoverableError(
              `Retry budget exhausted after ${this.backoff.attempt} reconnect attempts: ${err.message}`,
              { cause: err },
            ),
          );
          return;
        }
        this.backoff = step.state;
        try {
          this.prepareReconnect();
        } catch (resumeError) {
          this.fail(resumeError);
          return;
        }
        this.logger.warn('connection lost; reconnecting', {
          attempt: step.state.attempt,
          delayMs: step.delayMs,
          error: err.message,
        });
        try {
          await this.sleep(step.delayMs, this.abortController.signal);
        } catch (sleepError) {
          if (this.isTerminal()) {
            return;
          }
          this.fail(sleepError);
          return;
        }
      }
    }
  }

  /**
   * Opens one connection, sends control state, and pumps frames until the
   * request completes. Throws on any fault.
   */
  private async serveConnection(): Promise<void> {
    const signal = this.abortController.signal;
    const connection = await this.transport.open(this.endpoint, this.credentials, signal);
    if (this.isTerminal()) {
      this.transport.close(connection);
      throw new CancelledError();
    }
    this.connection = connection;
    const connectionAbort = new AbortController();
    this.connectionAbort = connectionAbort;
    this.acknowledged = false;
    this.sentTexts = 0;
    const receiveSignal = connectionAbort.signal;
    const onSessionAbort = (): void => connectionAbort.abort();
    signal.addEventListener('abort', onSessionAbort, { once: true });
    try {
      await this.pump(connection, signal, receiveSignal);
    } finally {
      signal.removeEventListener('abort', onSessionAbort);
    }
  }

  private async pump(
    connection: Connection,
    signal: AbortSignal,
    receiveSignal: AbortSignal,
  ): Promise<void> {
    await this.sendFrame(connection, this.codec.encodeRequest(this.initRequest()));

    while (true) {
      await this.reassembler.waitForCapacity(signal);
      const result = await this.transport.receive(connection, receiveSignal);
      if (result.kind === 'cancelled') {
        if (this.inputDrained && !signal.aborted) {
          return;
        }
        throw new CancelledError();
      }
      if (result.kind === 'end') {
        throw new ConnectionError(
          `Connection closed by server before completion (code ${result.code})`,
          { details: { code: result.code, reason: result.reason } },
        );
      }

      const frame = this.codec.decode(result.data);
      this.lastActivityAt = this.now();

      if (
        this.request.kind === 'tts' &&
        frame.generationId !== undefined &&
        frame.generationId !== this.request.generationId
      ) {
        this.logger.debug?.('ignoring frame for another generation', {
          generationId: frame.generationId,
        });
        continue;
      }

      if (!this.acknowledged) {
        if (frame.tag === 'error') {
          throw errorFromServerFrame(frame);
        }
        await this.acknowledge(connection);
        if (this.request.kind === 'text-stream' && frame.tag === 'control-event') {
          if (this.inputDrained) {
            return;
          }
          continue;
        }
      }

      if (this.handleFrame(frame)) {
        return;
      }
    }
  }

  private async acknowledge(connection: Connection): Promise<void> {
    if (this.state === 'connecting') {
      this.transition('streaming');
      this.ready?.resolve();
    }
    this.logger.debug?.('acknowledged', { connectionId: connection.id });

    if (this.request.kind === 'text-stream') {
      // Text queued while flushing is picked up by the same loop.
      while (this.sentTexts < this.pendingTexts.length) {
        const text = this.pendingTexts[this.sentTexts] ?? '';
        this.sentTexts += 1;
        await this.sendFrame(connection, this.codec.encodeRequest({ kind: 'stream-text', text }));
      }
      if (this.inputEnded && this.pendingTexts.length === 0) {
        this.inputDrained = true;
      }
    }
    this.acknowledged = true;
  }

  /**
   * Applies one acknowledged frame. Returns true when the request is complete.
   */
  private handleFrame(frame: InboundFrame): boolean {
    switch (frame.tag) {
      case 'error':
        throw errorFromServerFrame(frame);
      case 'audio-chunk':
        this.acceptAudio(frame);
        return frame.final ? this.handleFinished() : false;
      case 'control-event':
        if (frame.event === 'finished') {
          return this.handleFinished();
        }
        this.logger.debug?.('control event', { event: frame.event });
        return false;
    }
  }

  private acceptAudio(frame: AudioChunkFrame): void {
    if (this.verifyResume) {
      if (!frame.indexed) {
        throw new UnrecoverableError(
          'Cannot verify that the server resumed synthesis: audio chunks carry no index',
        );
      }
      if (frame.seq < this.reassembler.expectedSeq) {
        throw new UnrecoverableError(
          `Server restarted synthesis at chunk ${frame.seq} after ${this.reassembler.chunkCount} chunks were delivered`,
        );
      }
      this.verifyResume = false;
    }
    this.reassembler.accept(frame);
    this.audioSinceFinished += 1;
  }

  private handleFinished(): boolean {
    if (this.request.kind === 'tts') {
      return true;
    }
    // Each finished event covers the oldest text sent on this connection.
    if (this.sentTexts > 0) {
      this.pendingTexts.shift();
      this.sentTexts -= 1;
    }
    this.audioSinceFinished = 0;
    return this.inputEnded && this.pendingTexts.length === 0;
  }

  private prepareReconnect(): void {
    if (this.request.kind === 'tts') {
      this.verifyResume = this.reassembler.chunkCount > 0;
      return;
    }
    if (this.audioSinceFinished > 0) {
      throw new UnrecoverableError(
        'Connection lost while text was partially synthesized; restart the session',
      );
    }
  }

  private initRequest():
    | { kind: 'text-to-speech'; generationId: string; options: ResolvedStreamingTtsOptions }
    | { kind: 'stream-config'; options: ResolvedTextStreamOptions } {
    if (this.request.kind === 'tts') {
      return {
        kind: 'text-to-speech',
        generationId: this.request.generationId,
        options: this.request.options,
      };
    }
    return { kind: 'stream-config', options: this.request.options };
  }

  private async sendFrame(
    connection: Connection,
    frame: { seq: number; action: string; payload: string },
  ): Promise<void> {
    this.logger.debug?.('send', { seq: frame.seq, action: frame.action });
    await this.transport.send(connection, frame.payload);
    this.lastActivityAt = this.now();
  }

  private closeConnection(): void {
    const connection = this.connection;
    this.connection = null;
    this.connectionAbort = null;
    this.acknowledged = false;
    if (connection) {
      this.transport.close(connection);
    }
  }

  private fail(error: unknown): void {
    if (this.isTerminal()) {
      return;
    }
    this.logger.error('session failed', { error: describeError(error) });
    this.error = error;
    this.closeConnection();
    this.reassembler.fail(error);
    this.transition('errored');
    this.ready?.reject(error);
  }

  private isTerminal(): boolean {
    return this.state === 'closed' || this.state === 'errored';
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new ProtocolError(`Invalid session transition ${previous} -> ${next}`);
    }
    this.state = next;
    this.logger.debug?.('state', { from: previous, to: next });
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
