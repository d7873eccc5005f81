import { CounterStore, SlidingWindowStore, globToRegExp } from './counterStore';

interface Counter {
  value: number;
  expiresAt: number;
}

interface WindowEntry {
  member: string;
  at: number;
}

/**
 * Single-process store for tests and local runs. Operations complete
 * synchronously inside each call, which makes `tryAcquire` atomic with
 * respect to other callers on the same event loop.
 */
export class MemoryStore implements CounterStore, SlidingWindowStore {
  private counters = new Map<string, Counter>();
  private windows = new Map<string, WindowEntry[]>();
  private clock: () => number;

  constructor(clock: () => number = Date.now) {
    this.clock = clock;
  }

  async increment(key: string, by: number, ttlSeconds: number): Promise<number> {
    const current = this.liveCounter(key);
    const value = (current ? current.value : 0) + by;
    this.counters.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
    return value;
  }

  async get(key: string): Promise<number> {
    const counter = this.liveCounter(key);
    return counter ? counter.value : 0;
  }

  async scan(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    const keys: string[] = [];

    for (const key of [...this.counters.keys(), ...this.windows.keys()]) {
      if (matcher.test(key) && (this.windows.has(key) || this.liveCounter(key))) {
        keys.push(key);
      }
    }
    return keys;
  }

  async delete(...keys: string[]): Promise<void> {
    keys.forEach((key) => {
      this.counters.delete(key);
      this.windows.delete(key);
    });
  }

  async count(key: string, windowMs: number, now: number): Promise<number> {
    const entries = this.windows.get(key) || [];
    return entries.filter((entry) => entry.at > now - windowMs).length;
  }

  async tryAcquire(key: string, windowMs: number, limit: number, now: number, member: string): Promise<boolean> {
    const live = (this.windows.get(key) || []).filter((entry) => entry.at > now - windowMs);
    if (live.length >= limit) {
      this.windows.set(key, live);
      return false;
    }

    live.push({ member, at: now });
    this.windows.set(key, live);
    return true;
  }

  async release(key: string, member: string): Promise<void> {
    const entries = this.windows.get(key);
    if (entries) {
      this.windows.set(
        key,
        entries.filter((entry) => entry.member !== member)
      );
    }
  }

  async oldest(key: string): Promise<number | null> {
    const entries = this.windows.get(key);
    if (!entries || entries.length === 0) {
      return null;
    }
    return Math.min(...entries.map((entry) => entry.at));
  }

  clear(): void {
    this.counters.clear();
    this.windows.clear();
  }

  private liveCounter(key: string): Counter | undefined {
    const counter = this.counters.get(key);
    if (counter && counter.expiresAt <= this.clock()) {
      this.counters.delete(key);
      return undefined;
    }
    return counter;
  }
}
