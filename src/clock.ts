export type TimerHandle = NodeJS.Timeout | number;

export interface Clock {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeout: handle => clearTimeout(handle)
};

// Node fires anything above this immediately.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface Deadline {
  readonly at: number;
  cancel(): void;
}

/**
 * Arms `callback` for the absolute instant `at`. Deadlines beyond the host
 * timer limit are re-armed in slices until the remaining delay fits.
 */
export function scheduleAt(clock: Clock, at: number, callback: () => void): Deadline {
  let handle: TimerHandle | undefined;
  let cancelled = false;

  const arm = () => {
    const delay = Math.max(at - clock.now(), 0);
    if (delay > MAX_TIMEOUT_MS) {
      handle = clock.setTimeout(arm, MAX_TIMEOUT_MS);
      return;
    }
    handle = clock.setTimeout(() => {
      handle = undefined;
      if (!cancelled) {
        callback();
      }
    }, delay);
  };

  arm();

  return {
    at,
    cancel() {
      cancelled = true;
      if (handle !== undefined) {
        clock.clearTimeout(handle);
        handle = undefined;
      }
    }
  };
}
