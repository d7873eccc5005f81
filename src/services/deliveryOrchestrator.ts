import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { DeliveryAttemptRepository } from '../repositories/deliveryAttemptRepository';
import { NotificationPatch, NotificationRepository } from '../repositories/notificationRepository';
import {
  DeliveryAttempt,
  DeliveryOutcome,
  DeliveryProvider,
  DeliveryResult,
  DeliveryStatus,
  FailureKind,
  Notification,
  NotificationStatus,
} from '../types/notification';
import { ConcurrentModificationError, InvalidTransitionError, NotFoundError, errorMessage } from '../utils/errors';
import { logger, maskAddress } from '../utils/logger';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { DeliveryAnalytics } from './deliveryAnalytics';
import {
  BackoffOptions,
  assertTransition,
  computeRetryDelayMs,
  deliveryStatusPolicy,
  isDeliverable,
} from './notificationLifecycle';
import { ProviderRegistry } from './providers/providerRegistry';
import { deliveryFailure } from './providers/deliveryResult';
import { QueueRouter, RouteKind } from './queueRouter';
import { RateLimiter } from './rateLimiter';

export interface DeliveryOrchestratorDeps {
  notifications: NotificationRepository;
  attempts: DeliveryAttemptRepository;
  providers: ProviderRegistry;
  rateLimiter: RateLimiter;
  analytics: DeliveryAnalytics;
  router: QueueRouter;
}

export interface DeliveryOrchestratorOptions {
  providerTimeoutMs: number;
  staleAttemptMs: number;
  backoff: BackoffOptions;
  batchSize?: number;
  clock?: () => number;
}

export interface BatchResult {
  processed: number;
  succeeded: number;
  failed: number;
  errors: number;
}

export interface StatusCheckResult {
  checked: number;
  delivered: number;
  failed: number;
  unresolved: number;
}

// Attempts that never got a provider answer, e.g. after a worker crash mid-call.
const OPEN_ATTEMPT_STATUSES = [DeliveryStatus.PENDING, DeliveryStatus.IN_PROGRESS];

/**
 * Drives a notification from PENDING/QUEUED/RETRY through one provider
 * attempt to SENT, DELIVERED, RETRY or FAILED.
 *
 * Each attempt is guarded twice: an in-process set stops the same worker from
 * running two attempts for one id, and every status write is a compare-and-set
 * on status and version, so a second worker holding a stale copy backs off.
 *
 * Events: `notification:delivered`, `notification:retry`,
 * `notification:failed`, `notification:deadLettered`, `notification:read`.
 */
export class DeliveryOrchestrator extends EventEmitter {
  private notifications: NotificationRepository;
  private attempts: DeliveryAttemptRepository;
  private providers: ProviderRegistry;
  private rateLimiter: RateLimiter;
  private analytics: DeliveryAnalytics;
  private router: QueueRouter;
  private options: DeliveryOrchestratorOptions;
  private clock: () => number;
  private inFlight = new Set<string>();
  private logger = logger.child({ service: 'DeliveryOrchestrator' });

  constructor(deps: DeliveryOrchestratorDeps, options: DeliveryOrchestratorOptions) {
    super();
    this.notifications = deps.notifications;
    this.attempts = deps.attempts;
    this.providers = deps.providers;
    this.rateLimiter = deps.rateLimiter;
    this.analytics = deps.analytics;
    this.router = deps.router;
    this.options = options;
    this.clock = options.clock || Date.now;
  }

  async deliver(notification: Notification): Promise<DeliveryOutcome> {
    if (!isDeliverable(notification.status)) {
      return this.notDeliverable(notification, `Notification is ${notification.status}`);
    }
    if (this.inFlight.has(notification.id)) {
      return this.notDeliverable(notification, 'Delivery already in progress');
    }

    this.inFlight.add(notification.id);
    try {
      return await this.attemptDelivery(notification);
    } finally {
      this.inFlight.delete(notification.id);
    }
  }

  deliverNotification(notification: Notification): Promise<DeliveryOutcome> {
    return this.deliver(notification);
  }

  async processDeliveryQueue(): Promise<BatchResult> {
    const ready = await this.notifications.findReadyForDelivery(new Date(this.clock()), this.options.batchSize);
    return this.processBatch(ready, 'delivery');
  }

  async processRetryQueue(): Promise<BatchResult> {
    const ready = await this.notifications.findReadyForRetry(new Date(this.clock()), this.options.batchSize);
    return this.processBatch(ready, 'retry');
  }

  /**
   * Recovery and confirmation sweep. Attempts left open past the staleness
   * threshold are closed as TIMEOUT and their notification goes through the
   * usual retry or dead-letter decision. SENT notifications older than the
   * threshold are checked with their provider: a confirmation moves them to
   * DELIVERED, a reported bounce or rejection to FAILED.
   */
  async checkDeliveryStatuses(): Promise<StatusCheckResult> {
    const olderThan = new Date(this.clock() - this.options.staleAttemptMs);
    const summary: StatusCheckResult = { checked: 0, delivered: 0, failed: 0, unresolved: 0 };

    const abandoned = await this.attempts.findStale(OPEN_ATTEMPT_STATUSES, olderThan);
    for (const attempt of abandoned) {
      if (this.inFlight.has(attempt.notificationId)) {
        continue;
      }
      summary.checked++;

      try {
        await this.closeAbandonedAttempt(attempt);
        summary.failed++;
      } catch (error) {
        summary.unresolved++;
        this.logger.error('Failed to close abandoned attempt', {
          attemptId: attempt.id,
          notificationId: attempt.notificationId,
          error: errorMessage(error),
        });
      }
    }

    const awaiting = await this.notifications.findAwaitingConfirmation(olderThan, this.options.batchSize);
    for (const notification of awaiting) {
      summary.checked++;

      try {
        const resolution = await this.confirmDelivery(notification);
        summary[resolution]++;
      } catch (error) {
        summary.unresolved++;
        this.logger.error('Failed to check delivery status', {
          notificationId: notification.id,
          error: errorMessage(error),
        });
      }
    }

    if (summary.checked > 0) {
      this.logger.info('Checked delivery statuses', { ...summary });
    }
    return summary;
  }

  /** Withdraws a notification no worker has claimed yet. */
  async cancel(id: string): Promise<Notification> {
    const current = await this.findOrThrow(id);
    if (current.status !== NotificationStatus.PENDING && current.status !== NotificationStatus.QUEUED) {
      throw new InvalidTransitionError(current.status, NotificationStatus.FAILED);
    }

    const cancelled = await this.notifications.claim(
      id,
      [NotificationStatus.PENDING, NotificationStatus.QUEUED],
      { status: NotificationStatus.FAILED, errorMessage: 'cancelled', failedAt: new Date(this.clock()) },
      current.version
    );
    if (!cancelled) {
      throw new ConcurrentModificationError(`Notification ${id}`);
    }

    this.logger.info('Notification cancelled', { notificationId: id, from: current.status });
    this.emit('notification:failed', { notification: cancelled, kind: FailureKind.PERMANENT, reason: 'cancelled' });
    return cancelled;
  }

  async markAsRead(id: string): Promise<Notification> {
    const current = await this.findOrThrow(id);
    const read = await this.commit(current, NotificationStatus.READ, { readAt: new Date(this.clock()) });
    this.emit('notification:read', { notification: read });
    return read;
  }

  /** PENDING -> QUEUED and hand to the router. Expired notifications fail instead. */
  async enqueue(notification: Notification): Promise<RouteKind | false> {
    const queued = await this.commit(notification, NotificationStatus.QUEUED, {});

    const routed = await this.router.route(queued);
    if (routed === false) {
      await this.commit(queued, NotificationStatus.FAILED, {
        errorMessage: 'Notification expired before it could be queued',
        failedAt: new Date(this.clock()),
      });
    }
    return routed;
  }

  private async attemptDelivery(notification: Notification): Promise<DeliveryOutcome> {
    const now = this.clock();

    if (notification.expiresAt && notification.expiresAt.getTime() < now) {
      return this.reject(notification, FailureKind.EXPIRED, `Notification expired at ${notification.expiresAt.toISOString()}`);
    }

    const provider = this.providers.select(notification);
    if (!provider) {
      return this.reject(
        notification,
        FailureKind.NO_PROVIDER,
        `No delivery provider available for channel: ${notification.channel}`
      );
    }

    if (!provider.isAvailable()) {
      return this.reject(
        notification,
        FailureKind.PROVIDER_UNAVAILABLE,
        `Delivery provider unavailable: ${provider.getProviderName()}`
      );
    }

    const { userId, channel, type } = notification;

    if (!(await this.rateLimiter.isUserWithinRateLimit(userId, channel, type))) {
      return this.reject(notification, FailureKind.RATE_LIMITED, `User rate limit exceeded for ${channel} ${type}`);
    }
    if (!(await this.rateLimiter.isProviderWithinRateLimit(channel))) {
      return this.reject(notification, FailureKind.RATE_LIMITED, `Provider rate limit exceeded for channel: ${channel}`);
    }
    if (await this.rateLimiter.isBurstProtectionTriggered(userId, channel)) {
      return this.reject(
        notification,
        FailureKind.BURST_PROTECTED,
        `Burst protection triggered for user ${userId} on ${channel}`
      );
    }

    const processing = await this.notifications.claim(
      notification.id,
      [notification.status],
      { status: NotificationStatus.PROCESSING, updatedAt: new Date(this.clock()) },
      notification.version
    );
    if (!processing) {
      return this.notDeliverable(notification, 'Notification was claimed by another worker');
    }

    if (!(await this.rateLimiter.recordNotificationAttempt(userId, channel, type))) {
      const reason = `Rate limit reached while reserving quota for ${channel} ${type}`;
      const failed = await this.commit(processing, NotificationStatus.FAILED, {
        errorMessage: reason,
        failedAt: new Date(this.clock()),
      });
      this.logFailure(failed, FailureKind.RATE_LIMITED, reason);
      return { ok: false, notificationId: failed.id, kind: FailureKind.RATE_LIMITED, reason, status: failed.status };
    }

    const attempt = await this.attempts.save(this.newAttempt(processing, provider));
    const result = await this.callProvider(provider, processing);

    await this.analytics.recordDeliveryAttempt(
      channel,
      type,
      result.success ? DeliveryStatus.SUCCESS : result.status,
      result.processingTimeMs || 0
    );

    if (result.success) {
      return this.handleSuccess(processing, attempt, result);
    }
    return this.handleFailure(processing, attempt, result);
  }

  private async callProvider(provider: DeliveryProvider, notification: Notification): Promise<DeliveryResult> {
    const started = this.clock();
    let result: DeliveryResult;

    try {
      result = await withTimeout(
        Promise.resolve().then(() => provider.deliver(notification)),
        this.options.providerTimeoutMs,
        `${provider.getProviderName()} delivery`
      );
    } catch (error) {
      result =
        error instanceof TimeoutError
          ? deliveryFailure(DeliveryStatus.TIMEOUT, error.message)
          : deliveryFailure(DeliveryStatus.FAILED, `Provider error: ${errorMessage(error)}`);

      this.logger.warn('Provider call failed', {
        notificationId: notification.id,
        provider: provider.getProviderName(),
        error: errorMessage(error),
      });
    }

    if (!result.success && !deliveryStatusPolicy(result.status).isFailure) {
      result = { ...result, status: DeliveryStatus.FAILED };
    }

    return { ...result, processingTimeMs: Math.max(0, this.clock() - started) };
  }

  private async handleSuccess(
    processing: Notification,
    attempt: DeliveryAttempt,
    result: DeliveryResult
  ): Promise<DeliveryOutcome> {
    const finishedAt = new Date(this.clock());
    const confirmed = result.status === DeliveryStatus.SUCCESS;

    // The attempt closes on acceptance; confirmation is tracked on the SENT notification.
    const savedAttempt = await this.attempts.save({
      ...attempt,
      ...this.resultFields(result),
      status: DeliveryStatus.SUCCESS,
      deliveredAt: confirmed ? result.deliveredAt || finishedAt : undefined,
      updatedAt: finishedAt,
    });

    const target = confirmed ? NotificationStatus.DELIVERED : NotificationStatus.SENT;
    const updated = await this.commit(processing, target, {
      externalId: result.externalId,
      errorMessage: undefined,
      nextRetryAt: undefined,
      sentAt: finishedAt,
      deliveredAt: confirmed ? finishedAt : undefined,
    });

    this.logger.info('Notification delivered', {
      notificationId: updated.id,
      channel: updated.channel,
      provider: attempt.providerName,
      recipient: maskAddress(updated.recipientAddress),
      status: target,
      processingTimeMs: result.processingTimeMs,
    });
    this.emit('notification:delivered', { notification: updated, attempt: savedAttempt });

    return {
      ok: true,
      notificationId: updated.id,
      status: confirmed ? NotificationStatus.DELIVERED : NotificationStatus.SENT,
      attemptId: savedAttempt.id,
      externalId: result.externalId,
    };
  }

  private async handleFailure(
    processing: Notification,
    attempt: DeliveryAttempt,
    result: DeliveryResult
  ): Promise<DeliveryOutcome> {
    const now = this.clock();
    const finishedAt = new Date(now);
    const reason = result.errorMessage || `Delivery failed with status ${result.status}`;
    const delayMs = computeRetryDelayMs(result.status, processing.retryCount, this.options.backoff);
    const canRetry = delayMs !== null && processing.retryCount < processing.maxRetryAttempts;
    const retryAt = canRetry && delayMs !== null ? new Date(now + delayMs) : undefined;

    const savedAttempt = await this.attempts.save({
      ...attempt,
      ...this.resultFields(result),
      status: result.status,
      errorMessage: reason,
      failedAt: finishedAt,
      nextAttemptAt: retryAt,
      updatedAt: finishedAt,
    });

    if (retryAt && delayMs !== null) {
      const retrying = await this.commit(processing, NotificationStatus.RETRY, {
        retryCount: processing.retryCount + 1,
        nextRetryAt: retryAt,
        errorMessage: reason,
      });

      try {
        await this.router.queueForRetry(retrying, delayMs);
      } catch (error) {
        // RETRY is persisted; processRetryQueue picks it up once nextRetryAt passes.
        this.logger.error('Failed to publish retry', { notificationId: retrying.id, error: errorMessage(error) });
      }

      this.logger.warn('Notification delivery failed, retry scheduled', {
        notificationId: retrying.id,
        channel: retrying.channel,
        status: result.status,
        retryCount: retrying.retryCount,
        retryAt,
        reason,
      });
      this.emit('notification:retry', { notification: retrying, attempt: savedAttempt, retryAt });

      return {
        ok: false,
        notificationId: retrying.id,
        kind: FailureKind.TRANSIENT,
        reason,
        status: NotificationStatus.RETRY,
        attemptId: savedAttempt.id,
        retryAt,
      };
    }

    const exhausted = delayMs !== null;
    const kind = exhausted ? FailureKind.RETRIES_EXHAUSTED : FailureKind.PERMANENT;
    const finalReason = exhausted ? `${reason} (retries exhausted after ${processing.retryCount} retries)` : reason;

    const failed = await this.commit(processing, NotificationStatus.FAILED, {
      errorMessage: finalReason,
      failedAt: finishedAt,
      nextRetryAt: undefined,
    });

    if (exhausted) {
      const dlqReason = `Delivery retries exhausted after ${processing.retryCount} retries: ${reason}`;
      try {
        await this.router.sendToDeadLetter(failed, dlqReason);
        this.emit('notification:deadLettered', { notification: failed, reason: dlqReason });
      } catch (error) {
        this.logger.error('Failed to publish dead letter', { notificationId: failed.id, error: errorMessage(error) });
      }
    }

    this.logFailure(failed, kind, finalReason);
    return {
      ok: false,
      notificationId: failed.id,
      kind,
      reason: finalReason,
      status: NotificationStatus.FAILED,
      attemptId: savedAttempt.id,
    };
  }

  private async closeAbandonedAttempt(attempt: DeliveryAttempt): Promise<void> {
    const result = deliveryFailure(DeliveryStatus.TIMEOUT, 'Delivery attempt abandoned without a provider response');
    const notification = await this.notifications.findById(attempt.notificationId);

    this.logger.warn('Closing abandoned delivery attempt', {
      attemptId: attempt.id,
      notificationId: attempt.notificationId,
      provider: attempt.providerName,
      notificationStatus: notification?.status,
    });

    if (notification && notification.status === NotificationStatus.PROCESSING) {
      await this.analytics.recordDeliveryAttempt(notification.channel, notification.type, result.status, 0);
      await this.handleFailure(notification, attempt, result);
      return;
    }

    const closedAt = new Date(this.clock());
    await this.attempts.save({
      ...attempt,
      status: result.status,
      errorMessage: result.errorMessage,
      failedAt: closedAt,
      updatedAt: closedAt,
    });
  }

  private async confirmDelivery(notification: Notification): Promise<'delivered' | 'failed' | 'unresolved'> {
    const history = await this.attempts.findByNotificationId(notification.id);
    const accepted = history
      .filter((attempt) => attempt.status === DeliveryStatus.SUCCESS && !!attempt.externalId)
      .pop();
    if (!accepted) {
      this.logger.warn('SENT notification has no accepted attempt', { notificationId: notification.id });
      return 'unresolved';
    }

    const provider = this.providers.findByName(accepted.providerName);
    if (!provider) {
      this.logger.warn('No provider registered for accepted attempt', {
        attemptId: accepted.id,
        provider: accepted.providerName,
      });
      return 'unresolved';
    }

    let result: DeliveryResult;
    try {
      result = await withTimeout(
        Promise.resolve().then(() => provider.checkStatus(accepted)),
        this.options.providerTimeoutMs,
        `${provider.getProviderName()} status check`
      );
    } catch (error) {
      this.logger.warn('Status check failed, will retry on next scan', {
        attemptId: accepted.id,
        error: errorMessage(error),
      });
      return 'unresolved';
    }

    const checkedAt = new Date(this.clock());

    if (result.success && result.status === DeliveryStatus.SUCCESS) {
      const delivered = await this.notifications.claim(
        notification.id,
        [NotificationStatus.SENT],
        { status: NotificationStatus.DELIVERED, deliveredAt: checkedAt, updatedAt: checkedAt },
        notification.version
      );
      if (!delivered) {
        return 'unresolved';
      }
      this.emit('notification:delivered', { notification: delivered, attempt: accepted });
      return 'delivered';
    }

    if (!result.success && deliveryStatusPolicy(result.status).isFailure) {
      const reason = result.errorMessage || `Provider reported ${result.status} after accepting the message`;
      const failed = await this.notifications.claim(
        notification.id,
        [NotificationStatus.SENT],
        { status: NotificationStatus.FAILED, errorMessage: reason, failedAt: checkedAt, updatedAt: checkedAt },
        notification.version
      );
      if (!failed) {
        return 'unresolved';
      }
      this.logFailure(failed, FailureKind.PERMANENT, reason);
      return 'failed';
    }

    return 'unresolved';
  }

  private async processBatch(batch: Notification[], label: string): Promise<BatchResult> {
    const summary: BatchResult = { processed: 0, succeeded: 0, failed: 0, errors: 0 };

    for (const notification of batch) {
      summary.processed++;
      try {
        const outcome = await this.deliver(notification);
        if (outcome.ok) {
          summary.succeeded++;
        } else {
          summary.failed++;
        }
      } catch (error) {
        summary.errors++;
        this.logger.error(`Failed to process ${label} queue item`, {
          notificationId: notification.id,
          error: errorMessage(error),
        });
      }
    }

    if (summary.processed > 0) {
      this.logger.info(`Processed ${label} queue`, { ...summary });
    }
    return summary;
  }

  /** Fails a notification before any attempt exists. */
  private async reject(notification: Notification, kind: FailureKind, reason: string): Promise<DeliveryOutcome> {
    const failed = await this.notifications.claim(
      notification.id,
      [notification.status],
      { status: NotificationStatus.FAILED, errorMessage: reason, failedAt: new Date(this.clock()) },
      notification.version
    );
    if (!failed) {
      return this.notDeliverable(notification, 'Notification was claimed by another worker');
    }

    this.logFailure(failed, kind, reason);
    return { ok: false, notificationId: failed.id, kind, reason, status: NotificationStatus.FAILED };
  }

  private notDeliverable(notification: Notification, reason: string): DeliveryOutcome {
    this.logger.debug('Notification not deliverable', { notificationId: notification.id, reason });
    return {
      ok: false,
      notificationId: notification.id,
      kind: FailureKind.NOT_DELIVERABLE,
      reason,
      status: notification.status,
    };
  }

  private logFailure(notification: Notification, kind: FailureKind, reason: string): void {
    this.logger.warn('Notification delivery failed', {
      notificationId: notification.id,
      channel: notification.channel,
      userId: notification.userId,
      kind,
      reason,
    });
    this.emit('notification:failed', { notification, kind, reason });
  }

  /** Status write on a notification this process holds; losing the CAS here is a bug or a rogue writer. */
  private async commit(
    current: Notification,
    to: NotificationStatus,
    patch: NotificationPatch
  ): Promise<Notification> {
    assertTransition(current.status, to);
    const updated = await this.notifications.claim(
      current.id,
      [current.status],
      { ...patch, status: to, updatedAt: new Date(this.clock()) },
      current.version
    );
    if (!updated) {
      throw new ConcurrentModificationError(`Notification ${current.id}`);
    }
    return updated;
  }

  private async findOrThrow(id: string): Promise<Notification> {
    const notification = await this.notifications.findById(id);
    if (!notification) {
      throw new NotFoundError(`Notification ${id}`);
    }
    return notification;
  }

  private newAttempt(notification: Notification, provider: DeliveryProvider): DeliveryAttempt {
    const now = new Date(this.clock());
    return {
      id: randomUUID(),
      notificationId: notification.id,
      channel: notification.channel,
      providerName: provider.getProviderName(),
      status: DeliveryStatus.PENDING,
      recipientAddress: notification.recipientAddress,
      senderAddress: notification.senderAddress,
      attemptNumber: notification.retryCount + 1,
      maxAttempts: notification.maxRetryAttempts,
      createdAt: now,
      updatedAt: now,
    };
  }

  private resultFields(result: DeliveryResult): Partial<DeliveryAttempt> {
    return {
      externalId: result.externalId,
      providerMessageId: result.providerMessageId,
      responseCode: result.responseCode,
      responseMessage: result.responseMessage,
      errorMessage: result.errorMessage,
      processingTimeMs: result.processingTimeMs,
      costCents: result.costCents,
      providerResponse: result.providerResponse,
    };
  }
}
