import { setTimeout as delay } from 'timers/promises';

/** Time source used for pacing and backoff; tests swap in a manual one. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    signal?.throwIfAborted();
    if (ms <= 0) {
      return;
    }
    await delay(ms, undefined, { signal });
  }
};
