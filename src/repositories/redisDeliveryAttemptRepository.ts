import { Redis } from 'ioredis';
import { DeliveryAttempt, DeliveryStatus, TimeRange } from '../types/notification';
import { logger } from '../utils/logger';
import { execTransaction } from '../utils/redis';
import { DeliveryAttemptRepository } from './deliveryAttemptRepository';
import { decodeDeliveryAttempt, encodeRecord } from './records';
import { RedisRepositoryOptions } from './redisNotificationRepository';

export class RedisDeliveryAttemptRepository implements DeliveryAttemptRepository {
  private redis: Redis;
  private prefix: string;
  private logger = logger.child({ repository: 'deliveryAttempts' });

  constructor(redis: Redis, options: RedisRepositoryOptions = {}) {
    this.redis = redis;
    this.prefix = options.prefix || 'notif';
  }

  async save(attempt: DeliveryAttempt): Promise<DeliveryAttempt> {
    const previous = await this.findById(attempt.id);
    const transaction = this.redis.multi().set(this.recordKey(attempt.id), encodeRecord(attempt));

    if (previous && previous.status !== attempt.status) {
      transaction.zrem(this.statusKey(previous.status), attempt.id);
    }
    transaction
      .zadd(this.statusKey(attempt.status), attempt.updatedAt.getTime(), attempt.id)
      .zadd(this.notificationKey(attempt.notificationId), attempt.attemptNumber, attempt.id)
      .zadd(this.createdKey(), attempt.createdAt.getTime(), attempt.id);

    await execTransaction(transaction, `save attempt ${attempt.id}`);
    return attempt;
  }

  async findById(id: string): Promise<DeliveryAttempt | null> {
    return this.decode(id, await this.redis.get(this.recordKey(id)));
  }

  async findByNotificationId(notificationId: string): Promise<DeliveryAttempt[]> {
    const ids = await this.redis.zrange(this.notificationKey(notificationId), 0, -1);
    return (await this.loadMany(ids)).sort((a, b) => a.attemptNumber - b.attemptNumber);
  }

  async findStale(statuses: readonly DeliveryStatus[], olderThan: Date): Promise<DeliveryAttempt[]> {
    const ids: string[] = [];
    for (const status of statuses) {
      ids.push(...(await this.redis.zrangebyscore(this.statusKey(status), '-inf', `(${olderThan.getTime()}`)));
    }

    return (await this.loadMany(ids)).filter(
      (attempt) => statuses.includes(attempt.status) && attempt.updatedAt.getTime() < olderThan.getTime()
    );
  }

  async findInRange(range: TimeRange): Promise<DeliveryAttempt[]> {
    const ids = await this.redis.zrangebyscore(this.createdKey(), range.start.getTime(), range.end.getTime());
    return this.loadMany(ids);
  }

  private async loadMany(ids: string[]): Promise<DeliveryAttempt[]> {
    if (ids.length === 0) {
      return [];
    }

    const raw = await this.redis.mget(...ids.map((id) => this.recordKey(id)));
    const attempts: DeliveryAttempt[] = [];
    raw.forEach((value, index) => {
      const attempt = this.decode(ids[index], value);
      if (attempt) {
        attempts.push(attempt);
      }
    });
    return attempts;
  }

  private decode(id: string, raw: string | null): DeliveryAttempt | null {
    if (raw === null) {
      return null;
    }

    const attempt = decodeDeliveryAttempt(raw);
    if (!attempt) {
      this.logger.warn('Skipping unreadable delivery attempt record', { attemptId: id });
    }
    return attempt;
  }

  private recordKey(id: string): string {
    return `${this.prefix}:attempt:${id}`;
  }

  private statusKey(status: DeliveryStatus): string {
    return `${this.prefix}:attempts:status:${status}`;
  }

  private notificationKey(notificationId: string): string {
    return `${this.prefix}:attempts:notification:${notificationId}`;
  }

  private createdKey(): string {
    return `${this.prefix}:attempts:created`;
  }
}
