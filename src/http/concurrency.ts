import pLimit, { type LimitFunction } from "p-limit";

export type ConcurrencyLimiter = LimitFunction;

export function createConcurrencyLimiter(limit: number): ConcurrencyLimiter {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new TypeError("Concurrency limit must be an integer greater than or equal to 1");
  }

  return pLimit(limit);
}

interface KeyedLockEntry {
  limiter: ConcurrencyLimiter;
  users: number;
}

/**
 * Serializes work per key while letting different keys run in parallel.
 * Idle keys are dropped so the map does not grow with every target ever seen.
 */
export class KeyedLock {
  private readonly entries = new Map<string, KeyedLockEntry>();

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { limiter: pLimit(1), users: 0 };
      this.entries.set(key, entry);
    }

    const owner = entry;
    owner.users += 1;
    try {
      return await owner.limiter(task);
    } finally {
      owner.users -= 1;
      if (owner.users === 0) {
        this.entries.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.entries.size;
  }
}
