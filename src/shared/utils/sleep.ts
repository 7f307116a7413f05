import { setTimeout } from 'timers/promises';

/**
 * Suspend for `ms` milliseconds. Rejects with an AbortError when `signal` fires.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await setTimeout(ms, undefined, { signal });
};
