import { CancelledError } from '@deepdub/shared';

export interface SessionSlotsOptions {
  /**
   * Sessions allowed to hold a connection at the same time.
   */
  limit: number;
}

/**
 * Counting limiter for concurrent sessions. Waiters are served in arrival
 * order; a release hands its slot straight to the oldest waiter.
 */
export class SessionSlots {
  private readonly limit: number;
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(options: SessionSlotsOptions) {
    this.limit = Math.max(1, Math.floor(options.limit));
  }

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Resolves with a release function once a slot is free. The release
   * function is idempotent.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Waiting for a session slot was cancelled'));
    }
    if (this.active < this.limit) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<() => void>((resolve, reject) => {
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(this.createRelease());
      };
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((waiter) => waiter !== grant);
        reject(new CancelledError('Waiting for a session slot was cancelled'));
      };
      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Slot passes to the waiter; the active count is unchanged.
        next();
        return;
      }
      this.active -= 1;
    };
  }
}
