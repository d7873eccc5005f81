import { InMemoryDeliveryAttemptRepository } from '../repositories/deliveryAttemptRepository';
import { InMemoryNotificationRepository } from '../repositories/notificationRepository';
import { DeliveryAnalytics, hourBucket } from '../services/deliveryAnalytics';
import { CounterStore } from '../services/stores/counterStore';
import { MemoryStore } from '../services/stores/memoryStore';
import {
  DeliveryAttempt,
  DeliveryStatus,
  NotificationChannel,
  NotificationStatus,
  NotificationType,
} from '../types/notification';
import { buildNotification, createClock, START, TestClock } from './helpers/fixtures';

const EMAIL = NotificationChannel.EMAIL;
const SMS = NotificationChannel.SMS;
const HOUR = '2024-03-05-14';

function attempt(overrides: Partial<DeliveryAttempt>): DeliveryAttempt {
  const at = new Date(START);
  return {
    id: 'attempt-1',
    notificationId: 'notif-x',
    channel: EMAIL,
    providerName: 'FAKE',
    status: DeliveryStatus.SUCCESS,
    attemptNumber: 1,
    maxAttempts: 3,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

describe('DeliveryAnalytics', () => {
  let clock: TestClock;
  let store: MemoryStore;
  let notifications: InMemoryNotificationRepository;
  let attempts: InMemoryDeliveryAttemptRepository;
  let analytics: DeliveryAnalytics;

  beforeEach(() => {
    clock = createClock();
    store = new MemoryStore(clock.now);
    notifications = new InMemoryNotificationRepository();
    attempts = new InMemoryDeliveryAttemptRepository();
    analytics = new DeliveryAnalytics(store, notifications, attempts, { retentionDays: 7, clock: clock.now });
  });

  it('should bucket by UTC hour', () => {
    expect(hourBucket(START)).toBe(HOUR);
    expect(hourBucket(Date.parse('2024-12-31T23:59:59.999Z'))).toBe('2024-12-31-23');
  });

  describe('recordDeliveryAttempt', () => {
    it('should write attempt, status, outcome and timing counters', async () => {
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.ORDER_SHIPPED, DeliveryStatus.SUCCESS, 120);

      const prefix = 'email:order_shipped:2024-03-05-14';
      expect(await store.get(`metrics:delivery_attempts:${prefix}`)).toBe(1);
      expect(await store.get(`metrics:delivery_status_success:${prefix}`)).toBe(1);
      expect(await store.get(`metrics:delivery_success:${prefix}`)).toBe(1);
      expect(await store.get(`metrics:delivery_failure:${prefix}`)).toBe(0);
      expect(await store.get(`metrics:processing_time:${prefix}:count`)).toBe(1);
      expect(await store.get(`metrics:processing_time:${prefix}:total`)).toBe(120);
    });

    it('should count a timed out attempt as a failure', async () => {
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.ORDER_SHIPPED, DeliveryStatus.TIMEOUT, 0);

      expect(await analytics.getMetricValue('delivery_attempts', EMAIL, HOUR)).toBe(1);
      expect(await analytics.getMetricValue('delivery_status_timeout', EMAIL, HOUR)).toBe(1);
      expect(await analytics.getMetricValue('delivery_success', EMAIL, HOUR)).toBe(0);
      expect(await analytics.getMetricValue('delivery_failure', EMAIL, HOUR)).toBe(1);
    });

    it('should expire counters after the retention period', async () => {
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.ORDER_SHIPPED, DeliveryStatus.SUCCESS, 5);

      clock.advance(7 * 24 * 60 * 60 * 1000);

      expect(await analytics.getMetricValue('delivery_attempts', EMAIL, HOUR)).toBe(0);
    });

    it('should swallow counter store errors', async () => {
      const broken: CounterStore = {
        increment: jest.fn().mockRejectedValue(new Error('connection lost')),
        get: jest.fn().mockResolvedValue(0),
        scan: jest.fn().mockResolvedValue([]),
        delete: jest.fn().mockResolvedValue(undefined),
      };
      const failing = new DeliveryAnalytics(broken, notifications, attempts, { clock: clock.now });

      await expect(
        failing.recordDeliveryAttempt(EMAIL, NotificationType.ORDER_SHIPPED, DeliveryStatus.SUCCESS, 5)
      ).resolves.toBeUndefined();
    });
  });

  describe('getMetricValue', () => {
    it('should sum every type bucket for the channel and hour', async () => {
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.ORDER_SHIPPED, DeliveryStatus.SUCCESS, 100);
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.PAYMENT_SUCCESS, DeliveryStatus.FAILED, 80);
      await analytics.recordDeliveryAttempt(SMS, NotificationType.ORDER_SHIPPED, DeliveryStatus.SUCCESS, 50);

      expect(await analytics.getMetricValue('delivery_attempts', EMAIL, HOUR)).toBe(2);
      expect(await analytics.getMetricValue('delivery_attempts', SMS, HOUR)).toBe(1);
      expect(await analytics.getMetricValue('delivery_attempts', EMAIL, '2024-03-05-13')).toBe(0);
    });
  });

  describe('getRealTimeMetrics', () => {
    it('should report the current hour per channel', async () => {
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.ORDER_SHIPPED, DeliveryStatus.SUCCESS, 100);
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.PAYMENT_SUCCESS, DeliveryStatus.FAILED, 80);
      await analytics.recordDeliveryAttempt(EMAIL, NotificationType.PAYMENT_SUCCESS, DeliveryStatus.TIMEOUT, 30);

      const metrics = await analytics.getRealTimeMetrics();

      expect(metrics.hour).toBe(HOUR);
      expect(metrics.timestamp).toBe('2024-03-05T14:00:00.000Z');
      expect(metrics.channels[EMAIL]).toEqual({
        attempts: 3,
        successes: 1,
        failures: 2,
        successRate: 33.33,
        avgProcessingTimeMs: 70,
      });
      expect(metrics.channels[SMS]).toEqual({
        attempts: 0,
        successes: 0,
        failures: 0,
        successRate: 0,
        avgProcessingTimeMs: 0,
      });
      expect(metrics.error).toBeUndefined();
    });
  });

  describe('getDeliveryStatistics', () => {
    it('should aggregate notifications and attempts in the range', async () => {
      await notifications.save(buildNotification({ id: 'n1', status: NotificationStatus.DELIVERED }));
      await notifications.save(buildNotification({ id: 'n2', status: NotificationStatus.FAILED }));
      await notifications.save(
        buildNotification({ id: 'n3', status: NotificationStatus.DELIVERED, channel: SMS, recipientAddress: '+15550001111' })
      );
      await notifications.save(
        buildNotification({ id: 'old', status: NotificationStatus.DELIVERED, createdAt: new Date(START - 86400000) })
      );

      await attempts.save(attempt({ id: 'a1', notificationId: 'n1', processingTimeMs: 100 }));
      await attempts.save(
        attempt({ id: 'a2', notificationId: 'n2', status: DeliveryStatus.REJECTED, processingTimeMs: 50 })
      );
      await attempts.save(attempt({ id: 'a3', notificationId: 'n3', channel: SMS, processingTimeMs: 30 }));

      const range = { start: new Date(START - 1000), end: new Date(START + 1000) };
      const stats = await analytics.getDeliveryStatistics(range);

      expect(stats.startDate).toBe(range.start);
      expect(stats.notificationsByStatus).toEqual({
        [NotificationStatus.DELIVERED]: 2,
        [NotificationStatus.FAILED]: 1,
      });
      expect(stats.notificationsByTypeAndChannel).toEqual({
        [NotificationType.ORDER_SHIPPED]: { [EMAIL]: 2, [SMS]: 1 },
      });
      expect(stats.deliveriesByChannel[EMAIL]).toEqual({
        statusCounts: { [DeliveryStatus.SUCCESS]: 1, [DeliveryStatus.REJECTED]: 1 },
        avgProcessingTimeMs: 75,
      });
      expect(stats.successRatesByChannel).toEqual({ [EMAIL]: 50, [SMS]: 100 });
      expect(stats.realTimeMetrics.hour).toBe(HOUR);
    });
  });

  describe('getPerformanceMetrics', () => {
    it('should compute counts, rate, timing and cost for one channel', async () => {
      await attempts.save(attempt({ id: 'a1', channel: SMS, processingTimeMs: 100, costCents: 1 }));
      await attempts.save(attempt({ id: 'a2', channel: SMS, processingTimeMs: 200, costCents: 2 }));
      await attempts.save(
        attempt({ id: 'a3', channel: SMS, status: DeliveryStatus.TIMEOUT, processingTimeMs: 300, costCents: 0 })
      );
      await attempts.save(attempt({ id: 'a4', channel: SMS, status: DeliveryStatus.IN_PROGRESS }));
      await attempts.save(attempt({ id: 'a5', channel: EMAIL, processingTimeMs: 999, costCents: 50 }));

      const metrics = await analytics.getPerformanceMetrics(SMS, {
        start: new Date(START - 1000),
        end: new Date(START + 1000),
      });

      expect(metrics).toEqual({
        channel: SMS,
        avgProcessingTimeMs: 200,
        successCount: 2,
        failureCount: 1,
        totalCount: 3,
        successRate: 66.67,
        totalCostCents: 3,
      });
    });
  });
});
