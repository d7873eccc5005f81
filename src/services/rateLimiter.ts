import { randomUUID } from 'crypto';
import { RateLimitConfig, WindowLimit } from '../config/notifications';
import { NotificationChannel, NotificationType } from '../types/notification';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { CounterStore, SlidingWindowStore } from './stores/counterStore';

export interface RateLimitWindowStatus {
  windowSeconds: number;
  limit: number;
  count: number;
  remaining: number;
  resetAt: Date | null;
}

export interface UserRateLimitStatus {
  userId: string;
  channel: NotificationChannel;
  type: NotificationType;
  windows: RateLimitWindowStatus[];
  burst: RateLimitWindowStatus;
  withinLimits: boolean;
}

interface WindowKey {
  key: string;
  limit: WindowLimit;
}

const ATTEMPT_COUNTER_TTL_SECONDS = 2 * 60 * 60;

/**
 * Rolling-window rate limiting for notification sends. The `is*` methods only
 * read; `recordNotificationAttempt` is the one call that consumes quota.
 */
export class RateLimiter {
  private windows: SlidingWindowStore;
  private counters: CounterStore;
  private config: RateLimitConfig;
  private clock: () => number;
  private logger = logger.child({ service: 'RateLimiter' });

  constructor(
    windows: SlidingWindowStore,
    counters: CounterStore,
    config: RateLimitConfig,
    clock: () => number = Date.now
  ) {
    this.windows = windows;
    this.counters = counters;
    this.config = config;
    this.clock = clock;
  }

  async isUserWithinRateLimit(
    userId: string,
    channel: NotificationChannel,
    type: NotificationType
  ): Promise<boolean> {
    try {
      const now = this.clock();
      for (const window of this.userWindows(userId, channel, type)) {
        const count = await this.windows.count(window.key, window.limit.windowSeconds * 1000, now);
        if (count >= window.limit.limit) {
          this.logger.warn('User rate limit exceeded', {
            userId,
            channel,
            type,
            windowSeconds: window.limit.windowSeconds,
            count,
          });
          return false;
        }
      }
      return true;
    } catch (error) {
      this.logger.error('Failed to check user rate limit', { userId, channel, type, error: errorMessage(error) });
      // Allow on error to avoid blocking notifications
      return true;
    }
  }

  async isProviderWithinRateLimit(channel: NotificationChannel): Promise<boolean> {
    const window = this.providerWindow(channel);
    try {
      const count = await this.windows.count(window.key, window.limit.windowSeconds * 1000, this.clock());
      if (count >= window.limit.limit) {
        this.logger.warn('Provider rate limit exceeded', { channel, count, limit: window.limit.limit });
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error('Failed to check provider rate limit', { channel, error: errorMessage(error) });
      return true;
    }
  }

  async isBurstProtectionTriggered(userId: string, channel: NotificationChannel): Promise<boolean> {
    const window = this.burstWindow(userId, channel);
    try {
      const count = await this.windows.count(window.key, window.limit.windowSeconds * 1000, this.clock());
      if (count >= window.limit.limit) {
        this.logger.warn('Burst protection triggered', { userId, channel, count });
        return true;
      }
      return false;
    } catch (error) {
      this.logger.error('Failed to check burst protection', { userId, channel, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Reserves a slot in every user, provider and burst window at once. When a
   * concurrent caller has taken the last slot of any window, the slots already
   * reserved are released and false is returned.
   */
  async recordNotificationAttempt(
    userId: string,
    channel: NotificationChannel,
    type: NotificationType
  ): Promise<boolean> {
    const now = this.clock();
    const member = `${now}-${randomUUID()}`;
    const keys = [
      ...this.userWindows(userId, channel, type),
      this.providerWindow(channel),
      this.burstWindow(userId, channel),
    ];
    const acquired: string[] = [];

    try {
      for (const window of keys) {
        const admitted = await this.windows.tryAcquire(
          window.key,
          window.limit.windowSeconds * 1000,
          window.limit.limit,
          now,
          member
        );
        if (!admitted) {
          await Promise.all(acquired.map((key) => this.windows.release(key, member)));
          this.logger.warn('Rate limit slot taken concurrently', { userId, channel, type, key: window.key });
          return false;
        }
        acquired.push(window.key);
      }
    } catch (error) {
      // Fail open, but hand back the slots reserved before the store broke.
      await Promise.allSettled(acquired.map((key) => this.windows.release(key, member)));
      this.logger.error('Failed to record notification attempt', {
        userId,
        channel,
        type,
        error: errorMessage(error),
      });
      return true;
    }

    try {
      await this.counters.increment(this.attemptsKey(channel, type, now), 1, ATTEMPT_COUNTER_TTL_SECONDS);
    } catch (error) {
      this.logger.error('Failed to count notification attempt', { channel, type, error: errorMessage(error) });
    }

    return true;
  }

  /** Attempts recorded for a channel and type in the UTC hour containing `at`. */
  async getAttemptCount(channel: NotificationChannel, type: NotificationType, at: number = this.clock()): Promise<number> {
    return this.counters.get(this.attemptsKey(channel, type, at));
  }

  async getUserRateLimitStatus(
    userId: string,
    channel: NotificationChannel,
    type: NotificationType
  ): Promise<UserRateLimitStatus> {
    const now = this.clock();
    const windows: RateLimitWindowStatus[] = [];

    for (const window of this.userWindows(userId, channel, type)) {
      windows.push(await this.windowStatus(window, now));
    }
    const burst = await this.windowStatus(this.burstWindow(userId, channel), now);

    return {
      userId,
      channel,
      type,
      windows,
      burst,
      withinLimits: windows.every((window) => window.remaining > 0) && burst.remaining > 0,
    };
  }

  /** Clears the user's windows for one type, or every type when none is given. */
  async reset(userId: string, channel: NotificationChannel, type?: NotificationType): Promise<void> {
    const types = type ? [type] : Object.values(NotificationType);
    const keys = types.flatMap((t) => this.userWindows(userId, channel, t).map((window) => window.key));
    keys.push(this.burstWindow(userId, channel).key);

    await this.windows.delete(...keys);
    this.logger.info('Rate limits reset', { userId, channel, type });
  }

  private async windowStatus(window: WindowKey, now: number): Promise<RateLimitWindowStatus> {
    const windowMs = window.limit.windowSeconds * 1000;
    const count = await this.windows.count(window.key, windowMs, now);
    const oldest = count > 0 ? await this.windows.oldest(window.key) : null;

    return {
      windowSeconds: window.limit.windowSeconds,
      limit: window.limit.limit,
      count,
      remaining: Math.max(0, window.limit.limit - count),
      resetAt: oldest !== null ? new Date(oldest + windowMs) : null,
    };
  }

  private userWindows(userId: string, channel: NotificationChannel, type: NotificationType): WindowKey[] {
    return this.config.perUser.map((limit) => ({
      key: `notif:ratelimit:user:${userId}:${channel}:${type}:${limit.windowSeconds}`,
      limit,
    }));
  }

  private providerWindow(channel: NotificationChannel): WindowKey {
    return {
      key: `notif:ratelimit:provider:${channel}`,
      limit: {
        limit: this.config.perProvider[channel] ?? this.config.defaultProviderPerMinute,
        windowSeconds: 60,
      },
    };
  }

  private burstWindow(userId: string, channel: NotificationChannel): WindowKey {
    return {
      key: `notif:ratelimit:burst:${userId}:${channel}`,
      limit: this.config.burst,
    };
  }

  private attemptsKey(channel: NotificationChannel, type: NotificationType, at: number): string {
    const hour = new Date(at).toISOString().substring(0, 13);
    return `notif:ratelimit:attempts:${channel}:${type}:${hour}`;
  }
}
