/**
 * Clock
 *
 * The engine never reads wall time or schedules timers directly.
 * Everything that waits goes through a Clock so runs can be driven
 * on simulated time.
 */

export interface Clock {
  /** Milliseconds since epoch. */
  now(): number;

  /**
   * Resolve after `ms`. Rejects with RunCancelledError if the signal
   * is (or becomes) aborted.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class RunCancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'RunCancelledError';
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

// =============================================================================
// SYSTEM CLOCK
// =============================================================================

export const systemClock: Clock = {
  now: () => Date.now(),

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new RunCancelledError());
    }
    if (ms <= 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new RunCancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};
