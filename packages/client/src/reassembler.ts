import { CancelledError, OrderingError, ProtocolError } from '@deepdub/shared';

import type { AudioChunkFrame } from './codec';

export interface AudioReassemblerOptions {
  /**
   * Sequence number the first chunk must carry.
   */
  firstSeq?: number;
  /**
   * Undrained bytes above which `waitForCapacity` suspends. Non-positive
   * values disable backpressure.
   */
  highWaterMarkBytes?: number;
}

type State = { kind: 'open' } | { kind: 'finalized' } | { kind: 'failed'; error: unknown };

/**
 * Ordered audio buffer between the session pump and the caller. Chunks are
 * accepted only in strictly increasing sequence order and handed out once,
 * in that order, through `drain()`.
 */
export class AudioReassembler {
  private readonly firstSeq: number;
  private readonly highWaterMarkBytes: number;
  private readonly pending: Uint8Array[] = [];
  private state: State = { kind: 'open' };
  private lastAcceptedSeq: number | null = null;
  private pendingBytes = 0;
  private acceptedBytes = 0;
  private acceptedChunks = 0;
  private readers: Array<() => void> = [];
  private capacityWaiters: Array<() => void> = [];

  constructor(options: AudioReassemblerOptions = {}) {
    this.firstSeq = options.firstSeq ?? 0;
    this.highWaterMarkBytes = options.highWaterMarkBytes ?? 0;
  }

  get lastSeq(): number | null {
    return this.lastAcceptedSeq;
  }

  get expectedSeq(): number {
    return this.lastAcceptedSeq === null ? this.firstSeq : this.lastAcceptedSeq + 1;
  }

  get totalBytes(): number {
    return this.acceptedBytes;
  }

  get chunkCount(): number {
    return this.acceptedChunks;
  }

  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  get isTerminal(): boolean {
    return this.state.kind !== 'open';
  }

  accept(frame: AudioChunkFrame): void {
    if (this.state.kind !== 'open') {
      throw new ProtocolError(`Audio chunk ${frame.seq} received after the buffer was ${this.state.kind}`);
    }
    const expected = this.expectedSeq;
    if (frame.seq !== expected) {
      throw new OrderingError(expected, frame.seq);
    }

    this.lastAcceptedSeq = frame.seq;
    this.acceptedChunks += 1;
    this.acceptedBytes += frame.data.byteLength;
    if (frame.data.byteLength === 0) {
      return;
    }
    this.pending.push(frame.data);
    this.pendingBytes += frame.data.byteLength;
    this.wakeReaders();
  }

  finalize(): void {
    if (this.state.kind !== 'open') {
      return;
    }
    this.state = { kind: 'finalized' };
    this.wakeReaders();
    this.wakeCapacityWaiters();
  }

  /**
   * Terminates the buffer with an error. Consumers receive the chunks already
   * buffered and then the error, so a partial stream never ends normally.
   */
  fail(error: unknown): void {
    if (this.state.kind !== 'open') {
      return;
    }
    this.state = { kind: 'failed', error };
    this.wakeReaders();
    this.wakeCapacityWaiters();
  }

  /**
   * Forward-only sequence of chunks. Iterators share one cursor: every chunk
   * is yielded exactly once across all of them.
   */
  async *drain(): AsyncGenerator<Uint8Array, void, undefined> {
    while (true) {
      const chunk = this.pending.shift();
      if (chunk !== undefined) {
        this.pendingBytes -= chunk.byteLength;
        this.wakeCapacityWaiters();
        yield chunk;
        continue;
      }
      if (this.state.kind === 'finalized') {
        return;
      }
      if (this.state.kind === 'failed') {
        throw this.state.error;
      }
      await new Promise<void>((resolve) => {
        this.readers.push(resolve);
      });
    }
  }

  /**
   * Resolves once undrained bytes drop below the high-water mark or the
   * buffer is terminal.
   */
  waitForCapacity(signal?: AbortSignal): Promise<void> {
    if (!this.isOverHighWaterMark() || this.state.kind !== 'open') {
      return Promise.resolve();
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.capacityWaiters = this.capacityWaiters.filter((waiter) => waiter !== check);
        reject(new CancelledError());
      };
      const check = (): void => {
        if (this.isOverHighWaterMark() && this.state.kind === 'open') {
          return;
        }
        this.capacityWaiters = this.capacityWaiters.filter((waiter) => waiter !== check);
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.capacityWaiters.push(check);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private isOverHighWaterMark(): boolean {
    return this.highWaterMarkBytes > 0 && this.pendingBytes >= this.highWaterMarkBytes;
  }

  private wakeReaders(): void {
    const readers = this.readers;
    this.readers = [];
    for (const resolve of readers) {
      resolve();
    }
  }

  private wakeCapacityWaiters(): void {
    for (const check of [...this.capacityWaiters]) {
      check();
    }
  }
}
