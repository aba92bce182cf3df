/**
 * Keyed Lock
 *
 * Strict FIFO ordering of async critical sections per key.
 * Distinct keys never wait on each other.
 */

interface KeyLock {
  held: boolean;
  queue: Array<() => void>;
}

export class KeyedLock {
  private locks: Map<string, KeyLock> = new Map();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  // For testing: check if key is held
  isLocked(key: string): boolean {
    return this.locks.get(key)?.held ?? false;
  }

  // For testing: get queue length for key
  queueLength(key: string): number {
    return this.locks.get(key)?.queue.length ?? 0;
  }

  private acquire(key: string): Promise<void> {
    const lock = this.locks.get(key);

    if (!lock) {
      // No lock exists, create and acquire immediately
      this.locks.set(key, { held: true, queue: [] });
      return Promise.resolve();
    }

    if (!lock.held) {
      lock.held = true;
      return Promise.resolve();
    }

    // Held by someone else, queue up and wait
    return new Promise<void>((resolve) => {
      lock.queue.push(resolve);
    });
  }

  private release(key: string): void {
    const lock = this.locks.get(key);
    if (!lock) return;

    // Hand over to next in queue, or drop the entry
    const next = lock.queue.shift();
    if (next) {
      next();
    } else {
      this.locks.delete(key);
    }
  }
}
