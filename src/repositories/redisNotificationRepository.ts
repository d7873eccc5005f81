import { Redis } from 'ioredis';
import { Notification, NotificationStatus, TimeRange } from '../types/notification';
import { logger } from '../utils/logger';
import { execTransaction } from '../utils/redis';
import { NotificationPatch, NotificationRepository } from './notificationRepository';
import { decodeNotification, encodeRecord } from './records';

/**
 * Replaces a record only while its stored version is the one the caller
 * read, and moves the id between status indexes in the same step.
 */
export const CLAIM_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then
  return 0
end
if tonumber(cjson.decode(current).version) ~= tonumber(ARGV[1]) then
  return 0
end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('ZREM', KEYS[2], ARGV[3])
redis.call('ZADD', KEYS[3], ARGV[4], ARGV[3])
return 1
`;

export interface RedisRepositoryOptions {
  prefix?: string;
}

/**
 * Score of a notification in its status index: when it next becomes due
 * for the sweeps that read that status.
 */
export function indexScore(notification: Notification): number {
  switch (notification.status) {
    case NotificationStatus.PENDING:
    case NotificationStatus.QUEUED:
      return (notification.scheduledAt || notification.createdAt).getTime();
    case NotificationStatus.RETRY:
      return (notification.nextRetryAt || notification.updatedAt).getTime();
    case NotificationStatus.SENT:
      return (notification.sentAt || notification.updatedAt).getTime();
    default:
      return notification.updatedAt.getTime();
  }
}

const byCreatedAt = (a: Notification, b: Notification) => a.createdAt.getTime() - b.createdAt.getTime();

/**
 * Notifications as JSON strings under `{prefix}:notification:{id}`, with a
 * sorted set per status and one by creation time for the range queries.
 */
export class RedisNotificationRepository implements NotificationRepository {
  private redis: Redis;
  private prefix: string;
  private logger = logger.child({ repository: 'notifications' });

  constructor(redis: Redis, options: RedisRepositoryOptions = {}) {
    this.redis = redis;
    this.prefix = options.prefix || 'notif';
  }

  async findById(id: string): Promise<Notification | null> {
    return this.decode(id, await this.redis.get(this.recordKey(id)));
  }

  async save(notification: Notification): Promise<Notification> {
    const previous = await this.findById(notification.id);
    const transaction = this.redis.multi().set(this.recordKey(notification.id), encodeRecord(notification));

    if (previous && previous.status !== notification.status) {
      transaction.zrem(this.statusKey(previous.status), notification.id);
    }
    transaction
      .zadd(this.statusKey(notification.status), indexScore(notification), notification.id)
      .zadd(this.createdKey(), notification.createdAt.getTime(), notification.id);

    await execTransaction(transaction, `save notification ${notification.id}`);
    return notification;
  }

  async findReadyForDelivery(now: Date, limit = 100): Promise<Notification[]> {
    const ids = [
      ...(await this.dueIds(NotificationStatus.PENDING, String(now.getTime()), limit)),
      ...(await this.dueIds(NotificationStatus.QUEUED, String(now.getTime()), limit)),
    ];

    const ready = (await this.loadMany(ids)).filter(
      (n) =>
        (n.status === NotificationStatus.PENDING || n.status === NotificationStatus.QUEUED) &&
        (!n.scheduledAt || n.scheduledAt.getTime() <= now.getTime())
    );
    return ready.sort(byCreatedAt).slice(0, limit);
  }

  async findReadyForRetry(now: Date, limit = 100): Promise<Notification[]> {
    const ids = await this.dueIds(NotificationStatus.RETRY, String(now.getTime()), limit);
    const ready = (await this.loadMany(ids)).filter(
      (n) => n.status === NotificationStatus.RETRY && !!n.nextRetryAt && n.nextRetryAt.getTime() <= now.getTime()
    );
    return ready.sort(byCreatedAt);
  }

  async findAwaitingConfirmation(sentBefore: Date, limit = 100): Promise<Notification[]> {
    const ids = await this.dueIds(NotificationStatus.SENT, `(${sentBefore.getTime()}`, limit);
    const sent = (await this.loadMany(ids)).filter(
      (n) => n.status === NotificationStatus.SENT && !!n.sentAt && n.sentAt.getTime() < sentBefore.getTime()
    );
    return sent.sort(byCreatedAt);
  }

  async claim(
    id: string,
    from: readonly NotificationStatus[],
    patch: NotificationPatch,
    expectedVersion?: number
  ): Promise<Notification | null> {
    const current = await this.findById(id);
    if (!current || !from.includes(current.status)) {
      return null;
    }
    if (expectedVersion !== undefined && current.version !== expectedVersion) {
      return null;
    }

    const updated: Notification = {
      ...current,
      ...patch,
      version: current.version + 1,
      updatedAt: patch.updatedAt || new Date(),
    };

    const swapped = await this.redis.eval(
      CLAIM_SCRIPT,
      3,
      this.recordKey(id),
      this.statusKey(current.status),
      this.statusKey(updated.status),
      String(current.version),
      encodeRecord(updated),
      id,
      String(indexScore(updated))
    );
    return Number(swapped) === 1 ? updated : null;
  }

  async countByStatus(range: TimeRange): Promise<Partial<Record<NotificationStatus, number>>> {
    const counts: Partial<Record<NotificationStatus, number>> = {};
    for (const notification of await this.findCreatedBetween(range)) {
      counts[notification.status] = (counts[notification.status] || 0) + 1;
    }
    return counts;
  }

  async findCreatedBetween(range: TimeRange): Promise<Notification[]> {
    const ids = await this.redis.zrangebyscore(this.createdKey(), range.start.getTime(), range.end.getTime());
    return (await this.loadMany(ids)).sort(byCreatedAt);
  }

  private dueIds(status: NotificationStatus, max: string, limit: number): Promise<string[]> {
    return this.redis.zrangebyscore(this.statusKey(status), '-inf', max, 'LIMIT', 0, limit);
  }

  private async loadMany(ids: string[]): Promise<Notification[]> {
    if (ids.length === 0) {
      return [];
    }

    const raw = await this.redis.mget(...ids.map((id) => this.recordKey(id)));
    const notifications: Notification[] = [];
    raw.forEach((value, index) => {
      const notification = this.decode(ids[index], value);
      if (notification) {
        notifications.push(notification);
      }
    });
    return notifications;
  }

  private decode(id: string, raw: string | null): Notification | null {
    if (raw === null) {
      return null;
    }

    const notification = decodeNotification(raw);
    if (!notification) {
      this.logger.warn('Skipping unreadable notification record', { notificationId: id });
    }
    return notification;
  }

  private recordKey(id: string): string {
    return `${this.prefix}:notification:${id}`;
  }

  private statusKey(status: NotificationStatus): string {
    return `${this.prefix}:notifications:status:${status}`;
  }

  private createdKey(): string {
    return `${this.prefix}:notifications:created`;
  }
}
