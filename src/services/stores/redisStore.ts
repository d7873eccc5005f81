import { Redis } from 'ioredis';
import { CounterStore, SlidingWindowStore } from './counterStore';

// Drop expired entries, then admit the member only while under the limit.
const ACQUIRE_SCRIPT = `
redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
local count = redis.call('ZCARD', KEYS[1])
if count >= tonumber(ARGV[2]) then
  return 0
end
redis.call('ZADD', KEYS[1], ARGV[3], ARGV[4])
redis.call('PEXPIRE', KEYS[1], ARGV[5])
return 1
`;

export class RedisStore implements CounterStore, SlidingWindowStore {
  private redis: Redis;
  private scanCount: number;

  constructor(redis: Redis, scanCount = 100) {
    this.redis = redis;
    this.scanCount = scanCount;
  }

  async increment(key: string, by: number, ttlSeconds: number): Promise<number> {
    const results = await this.redis.multi().incrby(key, by).expire(key, ttlSeconds).exec();
    if (!results) {
      throw new Error(`Transaction aborted while incrementing ${key}`);
    }

    const [incrError, value] = results[0];
    if (incrError) {
      throw incrError;
    }
    return Number(value);
  }

  async get(key: string): Promise<number> {
    const value = await this.redis.get(key);
    return value ? parseInt(value, 10) : 0;
  }

  async scan(pattern: string): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = '0';

    do {
      const [next, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', this.scanCount);
      batch.forEach((key) => keys.add(key));
      cursor = next;
    } while (cursor !== '0');

    return [...keys];
  }

  async delete(...keys: string[]): Promise<void> {
    if (keys.length > 0) {
      await this.redis.del(...keys);
    }
  }

  async count(key: string, windowMs: number, now: number): Promise<number> {
    return this.redis.zcount(key, `(${now - windowMs}`, '+inf');
  }

  async tryAcquire(key: string, windowMs: number, limit: number, now: number, member: string): Promise<boolean> {
    const admitted = await this.redis.eval(
      ACQUIRE_SCRIPT,
      1,
      key,
      String(now - windowMs),
      String(limit),
      String(now),
      member,
      String(windowMs)
    );
    return Number(admitted) === 1;
  }

  async release(key: string, member: string): Promise<void> {
    await this.redis.zrem(key, member);
  }

  async oldest(key: string): Promise<number | null> {
    const entry = await this.redis.zrange(key, 0, 0, 'WITHSCORES');
    return entry.length >= 2 ? Number(entry[1]) : null;
  }
}
