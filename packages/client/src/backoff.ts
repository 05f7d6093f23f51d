import { CancelledError } from '@deepdub/shared';

import type { RetryPolicy } from './config';

export interface BackoffState {
  /**
   * Retries already scheduled (0 before the first retry).
   */
  attempt: number;
  nextDelayMs: number;
}

export function initialBackoff(policy: RetryPolicy): BackoffState {
  return {
    attempt: 0,
    nextDelayMs: Math.min(policy.initialDelayMs, policy.maxDelayMs),
  };
}

/**
 * Consumes one retry. Returns the delay to wait before that retry together
 * with the following state, or null once the policy's attempts are spent.
 */
export function nextBackoff(
  state: BackoffState,
  policy: RetryPolicy,
): { delayMs: number; state: BackoffState } | null {
  if (state.attempt >= policy.maxAttempts) {
    return null;
  }
  const delayMs = state.nextDelayMs;
  const grown = Math.min(delayMs * policy.multiplier, policy.maxDelayMs);
  return {
    delayMs,
    state: {
      attempt: state.attempt + 1,
      nextDelayMs: grown,
    },
  };
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
