import Redis from 'ioredis';
import { globToRegExp } from '../services/stores/counterStore';
import { MemoryStore } from '../services/stores/memoryStore';
import { RedisStore } from '../services/stores/redisStore';
import { createClock } from './helpers/fixtures';

describe('globToRegExp', () => {
  it('should match star across any characters and escape the rest', () => {
    const matcher = globToRegExp('metrics:delivery_success:email:*:2024-03-05-14');

    expect(matcher.test('metrics:delivery_success:email:order_shipped:2024-03-05-14')).toBe(true);
    expect(matcher.test('metrics:delivery_success:email:order_shipped:2024-03-05-15')).toBe(false);
    expect(matcher.test('metrics:delivery_success:sms:order_shipped:2024-03-05-14')).toBe(false);
    expect(globToRegExp('a.b').test('axb')).toBe(false);
  });
});

describe('MemoryStore', () => {
  it('should increment counters and expire them after the ttl', async () => {
    const clock = createClock(0);
    const store = new MemoryStore(clock.now);

    expect(await store.increment('hits', 1, 10)).toBe(1);
    expect(await store.increment('hits', 4, 10)).toBe(5);
    expect(await store.get('hits')).toBe(5);

    clock.advance(10000);
    expect(await store.get('hits')).toBe(0);
  });

  it('should scan live keys by pattern and delete them', async () => {
    const store = new MemoryStore(() => 0);
    await store.increment('metrics:a:email:x:h1', 1, 60);
    await store.increment('metrics:a:email:y:h1', 1, 60);
    await store.increment('metrics:a:sms:x:h1', 1, 60);

    expect((await store.scan('metrics:a:email:*:h1')).sort()).toEqual([
      'metrics:a:email:x:h1',
      'metrics:a:email:y:h1',
    ]);

    await store.delete('metrics:a:email:x:h1');
    expect(await store.scan('metrics:a:email:*:h1')).toEqual(['metrics:a:email:y:h1']);
  });

  it('should admit up to the limit within a rolling window', async () => {
    const store = new MemoryStore(() => 0);

    expect(await store.tryAcquire('w', 1000, 2, 0, 'a')).toBe(true);
    expect(await store.tryAcquire('w', 1000, 2, 500, 'b')).toBe(true);
    expect(await store.tryAcquire('w', 1000, 2, 999, 'c')).toBe(false);
    expect(await store.count('w', 1000, 999)).toBe(2);

    // 'a' leaves the window at t=1000
    expect(await store.count('w', 1000, 1000)).toBe(1);
    expect(await store.tryAcquire('w', 1000, 2, 1000, 'd')).toBe(true);
    expect(await store.tryAcquire('w', 1000, 2, 1000, 'e')).toBe(false);
  });

  it('should release a reserved member and report the oldest entry', async () => {
    const store = new MemoryStore(() => 0);
    await store.tryAcquire('w', 1000, 2, 100, 'a');
    await store.tryAcquire('w', 1000, 2, 200, 'b');

    expect(await store.oldest('w')).toBe(100);
    await store.release('w', 'a');
    expect(await store.oldest('w')).toBe(200);
    expect(await store.count('w', 1000, 300)).toBe(1);
    expect(await store.oldest('empty')).toBeNull();
  });
});

describe('RedisStore', () => {
  let redis: {
    multi: jest.Mock;
    get: jest.Mock;
    scan: jest.Mock;
    del: jest.Mock;
    zcount: jest.Mock;
    eval: jest.Mock;
    zrem: jest.Mock;
    zrange: jest.Mock;
  };
  let pipeline: { incrby: jest.Mock; expire: jest.Mock; exec: jest.Mock };
  let store: RedisStore;

  beforeEach(() => {
    pipeline = {
      incrby: jest.fn(),
      expire: jest.fn(),
      exec: jest.fn().mockResolvedValue([
        [null, 3],
        [null, 1],
      ]),
    };
    pipeline.incrby.mockReturnValue(pipeline);
    pipeline.expire.mockReturnValue(pipeline);

    redis = {
      multi: jest.fn().mockReturnValue(pipeline),
      get: jest.fn(),
      scan: jest.fn(),
      del: jest.fn().mockResolvedValue(1),
      zcount: jest.fn().mockResolvedValue(4),
      eval: jest.fn().mockResolvedValue(1),
      zrem: jest.fn().mockResolvedValue(1),
      zrange: jest.fn(),
    };
    store = new RedisStore(redis as unknown as Redis);
  });

  it('should increment and refresh the ttl in one transaction', async () => {
    expect(await store.increment('metrics:x', 2, 604800)).toBe(3);
    expect(pipeline.incrby).toHaveBeenCalledWith('metrics:x', 2);
    expect(pipeline.expire).toHaveBeenCalledWith('metrics:x', 604800);
  });

  it('should throw when the transaction is aborted', async () => {
    pipeline.exec.mockResolvedValueOnce(null);
    await expect(store.increment('metrics:x', 1, 60)).rejects.toThrow('Transaction aborted while incrementing metrics:x');
  });

  it('should read missing counters as zero', async () => {
    redis.get.mockResolvedValueOnce(null).mockResolvedValueOnce('12');
    expect(await store.get('a')).toBe(0);
    expect(await store.get('b')).toBe(12);
  });

  it('should follow scan cursors until they wrap', async () => {
    redis.scan.mockResolvedValueOnce(['5', ['a', 'b']]).mockResolvedValueOnce(['0', ['b', 'c']]);

    expect(await store.scan('metrics:*')).toEqual(['a', 'b', 'c']);
    expect(redis.scan).toHaveBeenNthCalledWith(1, '0', 'MATCH', 'metrics:*', 'COUNT', 100);
    expect(redis.scan).toHaveBeenNthCalledWith(2, '5', 'MATCH', 'metrics:*', 'COUNT', 100);
  });

  it('should skip DEL for an empty key list', async () => {
    await store.delete();
    expect(redis.del).not.toHaveBeenCalled();

    await store.delete('a', 'b');
    expect(redis.del).toHaveBeenCalledWith('a', 'b');
  });

  it('should count entries newer than the window start', async () => {
    expect(await store.count('w', 1000, 10000)).toBe(4);
    expect(redis.zcount).toHaveBeenCalledWith('w', '(9000', '+inf');
  });

  it('should acquire through the atomic script', async () => {
    expect(await store.tryAcquire('w', 1000, 5, 10000, 'm1')).toBe(true);
    expect(redis.eval).toHaveBeenCalledWith(expect.any(String), 1, 'w', '9000', '5', '10000', 'm1', '1000');

    redis.eval.mockResolvedValueOnce(0);
    expect(await store.tryAcquire('w', 1000, 5, 10000, 'm2')).toBe(false);
  });

  it('should read the oldest score', async () => {
    redis.zrange.mockResolvedValueOnce(['m1', '1234']).mockResolvedValueOnce([]);

    expect(await store.oldest('w')).toBe(1234);
    expect(await store.oldest('w')).toBeNull();
    expect(redis.zrange).toHaveBeenCalledWith('w', 0, 0, 'WITHSCORES');
  });

  it('should release a member', async () => {
    await store.release('w', 'm1');
    expect(redis.zrem).toHaveBeenCalledWith('w', 'm1');
  });
});
