type ScriptHandler = (redis: FakeRedis, keys: string[], args: string[]) => number;

function parseBound(bound: string | number): { value: number; exclusive: boolean } {
  if (typeof bound === 'number') {
    return { value: bound, exclusive: false };
  }
  if (bound === '-inf') {
    return { value: -Infinity, exclusive: false };
  }
  if (bound === '+inf') {
    return { value: Infinity, exclusive: false };
  }
  if (bound.startsWith('(')) {
    return { value: Number(bound.slice(1)), exclusive: true };
  }
  return { value: Number(bound), exclusive: false };
}

/**
 * In-process stand-in for the ioredis commands the repositories use.
 * Lua scripts run through handlers registered with `defineScript`.
 */
export class FakeRedis {
  strings = new Map<string, string>();
  sortedSets = new Map<string, Map<string, number>>();
  private scripts = new Map<string, ScriptHandler>();

  defineScript(script: string, handler: ScriptHandler): void {
    this.scripts.set(script, handler);
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async mget(...keys: string[]): Promise<(string | null)[]> {
    return keys.map((key) => this.strings.get(key) ?? null);
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.strings.set(key, value);
    return 'OK';
  }

  async zadd(key: string, score: number | string, member: string): Promise<number> {
    return this.zaddSync(key, Number(score), member);
  }

  async zrem(key: string, member: string): Promise<number> {
    return this.zremSync(key, member);
  }

  async zrange(key: string, start: number, stop: number): Promise<string[]> {
    const members = this.ordered(key).map(([member]) => member);
    return members.slice(start, stop === -1 ? undefined : stop + 1);
  }

  async zrangebyscore(
    key: string,
    min: string | number,
    max: string | number,
    ...limit: (string | number)[]
  ): Promise<string[]> {
    const low = parseBound(min);
    const high = parseBound(max);
    const matches = this.ordered(key)
      .filter(([, score]) => (low.exclusive ? score > low.value : score >= low.value))
      .filter(([, score]) => (high.exclusive ? score < high.value : score <= high.value))
      .map(([member]) => member);

    if (limit[0] === 'LIMIT') {
      const offset = Number(limit[1]);
      return matches.slice(offset, offset + Number(limit[2]));
    }
    return matches;
  }

  async eval(script: string, numKeys: number, ...rest: string[]): Promise<number> {
    const handler = this.scripts.get(script);
    if (!handler) {
      throw new Error('Unknown script');
    }
    return handler(this, rest.slice(0, numKeys), rest.slice(numKeys));
  }

  multi() {
    const queued: (() => unknown)[] = [];
    const transaction = {
      set: (key: string, value: string) => {
        queued.push(() => this.strings.set(key, value));
        return transaction;
      },
      zadd: (key: string, score: number, member: string) => {
        queued.push(() => this.zaddSync(key, score, member));
        return transaction;
      },
      zrem: (key: string, member: string) => {
        queued.push(() => this.zremSync(key, member));
        return transaction;
      },
      exec: async (): Promise<[Error | null, unknown][]> => queued.map((command) => [null, command()]),
    };
    return transaction;
  }

  members(key: string): string[] {
    return this.ordered(key).map(([member]) => member);
  }

  zaddSync(key: string, score: number, member: string): number {
    const set = this.sortedSets.get(key) || new Map<string, number>();
    const added = set.has(member) ? 0 : 1;
    set.set(member, score);
    this.sortedSets.set(key, set);
    return added;
  }

  zremSync(key: string, member: string): number {
    return this.sortedSets.get(key)?.delete(member) ? 1 : 0;
  }

  private ordered(key: string): [string, number][] {
    return [...(this.sortedSets.get(key) || new Map<string, number>()).entries()].sort(
      (a, b) => a[1] - b[1] || a[0].localeCompare(b[0])
    );
  }
}
