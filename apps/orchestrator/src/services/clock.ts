import { setTimeout as delay } from "node:timers/promises";

/** Longest single sleep, so a shutdown request is noticed within this bound. */
export const MAX_SLEEP_SLICE_MS = 10_000;

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: async (ms) => {
    await delay(ms);
  }
};

export const napFor = async (clock: Clock, ms: number, signal?: AbortSignal): Promise<void> => {
  const target = clock.now().getTime() + Math.max(0, ms);
  await napUntil(clock, new Date(target), signal);
};

/**
 * Sleeps until `target` in slices of at most {@link MAX_SLEEP_SLICE_MS},
 * throwing the signal's reason as soon as it is aborted between slices.
 */
export const napUntil = async (clock: Clock, target: Date, signal?: AbortSignal): Promise<void> => {
  signal?.throwIfAborted();

  for (;;) {
    const remaining = target.getTime() - clock.now().getTime();
    if (remaining <= 0) {
      return;
    }

    await clock.sleep(Math.min(remaining, MAX_SLEEP_SLICE_MS));
    signal?.throwIfAborted();
  }
};
