/**
 * Shared utility functions.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Sleep for a specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep with early wakeup capability.
 * Returns a promise that resolves after the timeout, and a function to resolve early.
 */
export function interruptibleSleep(ms: number): {
  promise: Promise<void>;
  wake: () => void;
} {
  let wakeFn: (() => void) | null = null;
  const promise = new Promise<void>((resolve) => {
    const t = setTimeout(() => {
      wakeFn = null;
      resolve();
    }, ms);
    wakeFn = () => {
      clearTimeout(t);
      wakeFn = null;
      resolve();
    };
  });
  return {
    promise,
    wake: () => wakeFn?.()
  };
}

/**
 * Reject with `onTimeout()` if `promise` has not settled within `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Clamp a value between min and max.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * In-memory map with per-entry TTL. Expired entries are dropped on read and by `evictExpired`.
 */
export class TTLCache<K, V> {
  private cache = new Map<K, { value: V; expiresAt: number }>();

  constructor(
    private defaultTtlMs: number = 30000,
    private now: Clock = systemClock
  ) {}

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /** Read and remove in one step. */
  take(key: K): V | undefined {
    const value = this.get(key);
    if (value !== undefined) this.cache.delete(key);
    return value;
  }

  set(key: K, value: V, ttlMs?: number): void {
    const expiresAt = this.now() + (ttlMs ?? this.defaultTtlMs);
    this.cache.set(key, { value, expiresAt });
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  evictExpired(): number {
    const t = this.now();
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (t > entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}

/**
 * Serializes async work per key: calls for the same key run one at a time,
 * in arrival order; different keys run concurrently.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    this.tails.set(key, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
