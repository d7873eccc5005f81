import { DeliveryAttemptRepository } from '../repositories/deliveryAttemptRepository';
import { NotificationRepository } from '../repositories/notificationRepository';
import {
  DeliveryStatus,
  NotificationChannel,
  NotificationStatus,
  NotificationType,
  TimeRange,
} from '../types/notification';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { deliveryStatusPolicy } from './notificationLifecycle';
import { CounterStore } from './stores/counterStore';

export interface ChannelRealTimeMetrics {
  attempts: number;
  successes: number;
  failures: number;
  successRate: number;
  avgProcessingTimeMs: number;
}

export interface RealTimeMetrics {
  hour: string;
  timestamp: string;
  channels: Partial<Record<NotificationChannel, ChannelRealTimeMetrics>>;
  error?: string;
}

export interface ChannelDeliveryStats {
  statusCounts: Partial<Record<DeliveryStatus, number>>;
  avgProcessingTimeMs: number | null;
}

export interface DeliveryStatistics {
  startDate: Date;
  endDate: Date;
  generatedAt: Date;
  notificationsByStatus: Partial<Record<NotificationStatus, number>>;
  notificationsByTypeAndChannel: Partial<Record<NotificationType, Partial<Record<NotificationChannel, number>>>>;
  deliveriesByChannel: Partial<Record<NotificationChannel, ChannelDeliveryStats>>;
  successRatesByChannel: Partial<Record<NotificationChannel, number>>;
  realTimeMetrics: RealTimeMetrics;
}

export interface PerformanceMetrics {
  channel: NotificationChannel;
  avgProcessingTimeMs: number;
  successCount: number;
  failureCount: number;
  totalCount: number;
  successRate: number;
  totalCostCents: number;
}

export interface DeliveryAnalyticsOptions {
  retentionDays?: number;
  clock?: () => number;
}

/** UTC hour bucket, e.g. `2024-03-05-14`. */
export function hourBucket(at: number): string {
  const iso = new Date(at).toISOString();
  return `${iso.substring(0, 10)}-${iso.substring(11, 13)}`;
}

function percentage(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 100 * 100) / 100 : 0;
}

/**
 * Hourly delivery counters in a TTL'd counter store, plus range reports
 * computed from the notification and attempt repositories.
 *
 * Counter keys are `metrics:<metric>:<channel>:<type>:<hour>`; reads for a
 * channel sum every type bucket by pattern.
 */
export class DeliveryAnalytics {
  private counters: CounterStore;
  private notifications: NotificationRepository;
  private attempts: DeliveryAttemptRepository;
  private ttlSeconds: number;
  private clock: () => number;
  private logger = logger.child({ service: 'DeliveryAnalytics' });

  constructor(
    counters: CounterStore,
    notifications: NotificationRepository,
    attempts: DeliveryAttemptRepository,
    options: DeliveryAnalyticsOptions = {}
  ) {
    this.counters = counters;
    this.notifications = notifications;
    this.attempts = attempts;
    this.ttlSeconds = (options.retentionDays ?? 7) * 24 * 60 * 60;
    this.clock = options.clock || Date.now;
  }

  async recordDeliveryAttempt(
    channel: NotificationChannel,
    type: NotificationType,
    status: DeliveryStatus,
    processingTimeMs: number
  ): Promise<void> {
    const hour = hourBucket(this.clock());
    const policy = deliveryStatusPolicy(status);

    try {
      await this.increment('delivery_attempts', channel, type, hour);
      await this.increment(`delivery_status_${status.toLowerCase()}`, channel, type, hour);

      const timingKey = this.key('processing_time', channel, type, hour);
      await this.counters.increment(`${timingKey}:count`, 1, this.ttlSeconds);
      await this.counters.increment(`${timingKey}:total`, Math.max(0, Math.round(processingTimeMs)), this.ttlSeconds);

      if (policy.isSuccess) {
        await this.increment('delivery_success', channel, type, hour);
      } else if (policy.isFailure) {
        await this.increment('delivery_failure', channel, type, hour);
      }

      this.logger.debug('Recorded delivery attempt', { channel, type, status, processingTimeMs });
    } catch (error) {
      this.logger.error('Failed to record delivery attempt', {
        channel,
        type,
        status,
        error: errorMessage(error),
      });
    }
  }

  /** Sum of a metric across every notification type for one channel and hour. */
  async getMetricValue(metric: string, channel: NotificationChannel, hour: string): Promise<number> {
    return this.sumKeys(`metrics:${metric}:${channel.toLowerCase()}:*:${hour}`);
  }

  async getRealTimeMetrics(): Promise<RealTimeMetrics> {
    const now = this.clock();
    const hour = hourBucket(now);
    const metrics: RealTimeMetrics = {
      hour,
      timestamp: new Date(now).toISOString(),
      channels: {},
    };

    try {
      for (const channel of Object.values(NotificationChannel)) {
        const attempts = await this.getMetricValue('delivery_attempts', channel, hour);
        const successes = await this.getMetricValue('delivery_success', channel, hour);
        const failures = await this.getMetricValue('delivery_failure', channel, hour);

        const timingPattern = `metrics:processing_time:${channel.toLowerCase()}:*:${hour}`;
        const timedCount = await this.sumKeys(`${timingPattern}:count`);
        const timedTotal = await this.sumKeys(`${timingPattern}:total`);

        metrics.channels[channel] = {
          attempts,
          successes,
          failures,
          successRate: percentage(successes, attempts),
          avgProcessingTimeMs: timedCount > 0 ? Math.round((timedTotal / timedCount) * 100) / 100 : 0,
        };
      }
    } catch (error) {
      this.logger.error('Failed to get real-time metrics', { error: errorMessage(error) });
      metrics.error = errorMessage(error);
    }

    return metrics;
  }

  async getDeliveryStatistics(range: TimeRange): Promise<DeliveryStatistics> {
    this.logger.info('Generating delivery statistics', { start: range.start, end: range.end });

    try {
      const notificationsByStatus = await this.notifications.countByStatus(range);
      const notifications = await this.notifications.findCreatedBetween(range);
      const attempts = await this.attempts.findInRange(range);

      const notificationsByTypeAndChannel: DeliveryStatistics['notificationsByTypeAndChannel'] = {};
      for (const notification of notifications) {
        const byChannel = notificationsByTypeAndChannel[notification.type] || {};
        byChannel[notification.channel] = (byChannel[notification.channel] || 0) + 1;
        notificationsByTypeAndChannel[notification.type] = byChannel;
      }

      const deliveriesByChannel: DeliveryStatistics['deliveriesByChannel'] = {};
      const successRatesByChannel: DeliveryStatistics['successRatesByChannel'] = {};
      const timings = new Map<NotificationChannel, { total: number; count: number }>();
      const outcomes = new Map<NotificationChannel, { success: number; total: number }>();

      for (const attempt of attempts) {
        const stats = deliveriesByChannel[attempt.channel] || { statusCounts: {}, avgProcessingTimeMs: null };
        stats.statusCounts[attempt.status] = (stats.statusCounts[attempt.status] || 0) + 1;
        deliveriesByChannel[attempt.channel] = stats;

        if (attempt.processingTimeMs !== undefined) {
          const timing = timings.get(attempt.channel) || { total: 0, count: 0 };
          timing.total += attempt.processingTimeMs;
          timing.count += 1;
          timings.set(attempt.channel, timing);
        }

        const outcome = outcomes.get(attempt.channel) || { success: 0, total: 0 };
        outcome.total += 1;
        if (deliveryStatusPolicy(attempt.status).isSuccess) {
          outcome.success += 1;
        }
        outcomes.set(attempt.channel, outcome);
      }

      for (const [channel, timing] of timings) {
        const stats = deliveriesByChannel[channel];
        if (stats) {
          stats.avgProcessingTimeMs = Math.round((timing.total / timing.count) * 100) / 100;
        }
      }
      for (const [channel, outcome] of outcomes) {
        successRatesByChannel[channel] = percentage(outcome.success, outcome.total);
      }

      return {
        startDate: range.start,
        endDate: range.end,
        generatedAt: new Date(this.clock()),
        notificationsByStatus,
        notificationsByTypeAndChannel,
        deliveriesByChannel,
        successRatesByChannel,
        realTimeMetrics: await this.getRealTimeMetrics(),
      };
    } catch (error) {
      this.logger.error('Failed to generate delivery statistics', { error: errorMessage(error) });
      throw error;
    }
  }

  async getPerformanceMetrics(channel: NotificationChannel, range: TimeRange): Promise<PerformanceMetrics> {
    const attempts = (await this.attempts.findInRange(range)).filter((attempt) => attempt.channel === channel);

    let successCount = 0;
    let failureCount = 0;
    let timedTotal = 0;
    let timedCount = 0;
    let totalCostCents = 0;

    for (const attempt of attempts) {
      const policy = deliveryStatusPolicy(attempt.status);
      if (policy.isSuccess) successCount++;
      else if (policy.isFailure) failureCount++;

      if (attempt.processingTimeMs !== undefined) {
        timedTotal += attempt.processingTimeMs;
        timedCount++;
      }
      totalCostCents += attempt.costCents || 0;
    }

    const totalCount = successCount + failureCount;

    return {
      channel,
      avgProcessingTimeMs: timedCount > 0 ? Math.round((timedTotal / timedCount) * 100) / 100 : 0,
      successCount,
      failureCount,
      totalCount,
      successRate: percentage(successCount, totalCount),
      totalCostCents,
    };
  }

  private async increment(
    metric: string,
    channel: NotificationChannel,
    type: NotificationType,
    hour: string
  ): Promise<void> {
    await this.counters.increment(this.key(metric, channel, type, hour), 1, this.ttlSeconds);
  }

  private key(metric: string, channel: NotificationChannel, type: NotificationType, hour: string): string {
    return `metrics:${metric}:${channel.toLowerCase()}:${type.toLowerCase()}:${hour}`;
  }

  private async sumKeys(pattern: string): Promise<number> {
    const keys = await this.counters.scan(pattern);
    let total = 0;
    for (const key of keys) {
      total += await this.counters.get(key);
    }
    return total;
  }
}
