/** TTL'd integer counters addressed by string key. */
export interface CounterStore {
  increment(key: string, by: number, ttlSeconds: number): Promise<number>;
  get(key: string): Promise<number>;
  /** Keys matching a glob pattern where `*` matches any run of characters. */
  scan(pattern: string): Promise<string[]>;
  delete(...keys: string[]): Promise<void>;
}

/**
 * Rolling-window logs. Each entry is a unique member stamped with the time it
 * was added; entries older than the window stop counting.
 */
export interface SlidingWindowStore {
  count(key: string, windowMs: number, now: number): Promise<number>;
  /**
   * Atomically drops expired entries and adds `member` only if fewer than
   * `limit` remain. Returns whether the member was added.
   */
  tryAcquire(key: string, windowMs: number, limit: number, now: number, member: string): Promise<boolean>;
  release(key: string, member: string): Promise<void>;
  /** Timestamp of the oldest live entry, or null for an empty window. */
  oldest(key: string): Promise<number | null>;
  delete(...keys: string[]): Promise<void>;
}

export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}
