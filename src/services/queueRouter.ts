import { Notification, NotificationChannel, NotificationPriority } from '../types/notification';
import { logger } from '../utils/logger';
import { EnvelopeKind, MESSAGE_PRIORITY, QueueEnvelope, toSnapshot } from './broker/envelope';
import { MessageBroker, QueueCounts } from './broker/messageBroker';

export const PRIORITY_QUEUE = 'notification.priority';
export const RETRY_QUEUE = 'notification.retry';
export const DEAD_LETTER_QUEUE = 'notification.dlq';

export type RouteKind = 'regular' | 'priority' | 'scheduled';

export function channelQueue(channel: NotificationChannel): string {
  return `notification.${channel.toLowerCase()}`;
}

/** Every queue a delivery worker reads from; the dead-letter queue is not one of them. */
export function deliveryQueues(): string[] {
  return [...Object.values(NotificationChannel).map(channelQueue), PRIORITY_QUEUE, RETRY_QUEUE];
}

function isUrgent(priority: NotificationPriority): boolean {
  return priority === NotificationPriority.CRITICAL || priority === NotificationPriority.URGENT;
}

export class QueueRouter {
  private broker: MessageBroker;
  private clock: () => number;
  private logger = logger.child({ service: 'QueueRouter' });

  constructor(broker: MessageBroker, clock: () => number = Date.now) {
    this.broker = broker;
    this.clock = clock;
  }

  /** Where a notification is consumed from, ignoring any delay. */
  targetQueue(notification: Notification): string {
    return isUrgent(notification.priority) ? PRIORITY_QUEUE : channelQueue(notification.channel);
  }

  /**
   * Publishes a notification for delivery. Future-scheduled notifications are
   * published with a delay onto their target queue; expired ones are dropped
   * and `false` is returned.
   */
  async route(notification: Notification): Promise<RouteKind | false> {
    const now = this.clock();

    if (notification.expiresAt && notification.expiresAt.getTime() < now) {
      this.logger.warn('Notification expired before routing', {
        notificationId: notification.id,
        expiresAt: notification.expiresAt,
      });
      return false;
    }

    const target = this.targetQueue(notification);
    const delayMs = notification.scheduledAt ? notification.scheduledAt.getTime() - now : 0;

    if (delayMs > 0) {
      await this.publish(target, notification, 'scheduled', { delayMs, originalQueue: target });
      this.logger.info('Notification scheduled', { notificationId: notification.id, queue: target, delayMs });
      return 'scheduled';
    }

    const kind: RouteKind = target === PRIORITY_QUEUE ? 'priority' : 'regular';
    await this.publish(target, notification, kind, { originalQueue: target });
    this.logger.info('Notification routed', { notificationId: notification.id, queue: target, kind });
    return kind;
  }

  /** Publishes onto the retry queue; the message becomes visible after `delayMs`. */
  async queueForRetry(notification: Notification, delayMs: number): Promise<void> {
    const originalQueue = this.targetQueue(notification);
    await this.publish(RETRY_QUEUE, notification, 'retry', { delayMs: Math.max(0, delayMs), originalQueue });

    this.logger.info('Notification queued for retry', {
      notificationId: notification.id,
      retryCount: notification.retryCount,
      delayMs,
      originalQueue,
    });
  }

  async sendToDeadLetter(notification: Notification, reason: string): Promise<void> {
    const originalQueue = this.targetQueue(notification);
    await this.publish(DEAD_LETTER_QUEUE, notification, 'dead_letter', {
      originalQueue,
      dlqReason: reason,
      dlqTimestamp: new Date(this.clock()).toISOString(),
    });

    this.logger.warn('Notification sent to dead-letter queue', {
      notificationId: notification.id,
      retryCount: notification.retryCount,
      reason,
    });
  }

  async getQueueStats(): Promise<Record<string, QueueCounts>> {
    const stats: Record<string, QueueCounts> = {};
    for (const queue of [...deliveryQueues(), DEAD_LETTER_QUEUE]) {
      stats[queue] = await this.broker.getQueueCounts(queue);
    }
    return stats;
  }

  private async publish(
    queue: string,
    notification: Notification,
    kind: EnvelopeKind,
    extra: Pick<QueueEnvelope, 'originalQueue'> & Partial<Pick<QueueEnvelope, 'delayMs' | 'dlqReason' | 'dlqTimestamp'>>
  ): Promise<void> {
    const messagePriority = MESSAGE_PRIORITY[notification.priority];
    const delayMs = extra.delayMs || 0;

    const envelope: QueueEnvelope = {
      notification: toSnapshot(notification),
      kind,
      routingKey: queue,
      messagePriority,
      retryCount: notification.retryCount,
      originalQueue: extra.originalQueue,
      delayMs,
      scheduled: kind === 'scheduled',
      queuedAt: new Date(this.clock()).toISOString(),
      dlqReason: extra.dlqReason,
      dlqTimestamp: extra.dlqTimestamp,
    };

    await this.broker.publish(queue, envelope, {
      priority: messagePriority,
      delayMs,
      jobId: `${notification.id}-${notification.retryCount}-${kind}`,
    });
  }
}
