import { buildNotificationConfig, NotificationConfig } from '../../config/notifications';
import {
  Notification,
  NotificationChannel,
  NotificationPriority,
  NotificationStatus,
  NotificationType,
} from '../../types/notification';

export const START = Date.parse('2024-03-05T14:00:00.000Z');

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
  set: (at: number) => void;
}

export function createClock(start: number = START): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (at) => {
      current = at;
    },
  };
}

export function testConfig(overrides: NodeJS.ProcessEnv = {}): NotificationConfig {
  return buildNotificationConfig({ NODE_ENV: 'test', ...overrides });
}

let sequence = 0;

export function buildNotification(overrides: Partial<Notification> = {}): Notification {
  sequence++;
  const createdAt = new Date(START);
  return {
    id: `notif-${sequence}`,
    userId: 'user-1',
    channel: NotificationChannel.EMAIL,
    type: NotificationType.ORDER_SHIPPED,
    priority: NotificationPriority.NORMAL,
    status: NotificationStatus.PENDING,
    recipientAddress: 'jane@example.com',
    subject: 'Your order has shipped',
    content: 'Order 1001 is on its way.',
    retryCount: 0,
    maxRetryAttempts: 3,
    version: 0,
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}
