import { EventEmitter } from 'events';
import { Redis } from 'ioredis';
import { randomUUID } from 'crypto';
import {
  DeliveryAttempt,
  DeliveryProvider,
  DeliveryResult,
  DeliveryStatus,
  Notification,
  NotificationChannel,
} from '../../types/notification';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { confirmAccepted, deliveryFailure, deliverySuccess } from './deliveryResult';

export interface InAppProviderConfig {
  redis?: Redis;
  maxNotificationsPerUser?: number;
  ttlSeconds?: number;
}

export interface InAppMessage {
  id: string;
  notificationId: string;
  userId: string;
  type: string;
  title: string;
  body: string;
  read: boolean;
  createdAt: string;
  expiresAt: string | null;
}

export class InAppProvider extends EventEmitter implements DeliveryProvider {
  private config: InAppProviderConfig;
  private logger = logger.child({ provider: 'inApp' });

  constructor(config: InAppProviderConfig = {}) {
    super();
    this.config = config;
  }

  getProviderName(): string {
    return 'IN_APP';
  }

  getSupportedChannels(): NotificationChannel[] {
    return [NotificationChannel.IN_APP];
  }

  canHandle(notification: Notification): boolean {
    return notification.channel === NotificationChannel.IN_APP && notification.userId.length > 0;
  }

  /** ioredis queues commands while it (re)connects; only a closed connection is unusable. */
  isAvailable(): boolean {
    return this.config.redis ? this.config.redis.status !== 'end' : true;
  }

  async deliver(notification: Notification): Promise<DeliveryResult> {
    const message: InAppMessage = {
      id: `inapp-${randomUUID()}`,
      notificationId: notification.id,
      userId: notification.userId,
      type: notification.type,
      title: notification.subject || 'Notification',
      body: notification.content || '',
      read: false,
      createdAt: new Date().toISOString(),
      expiresAt: notification.expiresAt ? notification.expiresAt.toISOString() : null,
    };

    try {
      if (this.config.redis) {
        await this.store(message);
      }

      this.emit('notification', message);

      return deliverySuccess(message.id, message.id, {
        providerResponse: { persisted: !!this.config.redis },
      });
    } catch (error) {
      this.logger.error('Failed to store in-app notification', {
        notificationId: notification.id,
        userId: notification.userId,
        error: errorMessage(error),
      });
      return deliveryFailure(DeliveryStatus.PROVIDER_ERROR, `Failed to store in-app notification: ${errorMessage(error)}`);
    }
  }

  async checkStatus(attempt: DeliveryAttempt): Promise<DeliveryResult> {
    return confirmAccepted(attempt);
  }

  private async store(message: InAppMessage): Promise<void> {
    const redis = this.config.redis;
    if (!redis) {
      return;
    }

    const key = this.inboxKey(message.userId);
    const max = this.config.maxNotificationsPerUser || 100;

    await redis.lpush(key, JSON.stringify(message));
    await redis.ltrim(key, 0, max - 1);
    await redis.expire(key, this.config.ttlSeconds || 30 * 24 * 60 * 60);
  }

  private inboxKey(userId: string): string {
    return `notif:inapp:${userId}`;
  }
}
