import { NotificationRepository } from '../repositories/notificationRepository';
import { DeliveryOutcome } from '../types/notification';
import { logger } from '../utils/logger';
import { parseEnvelope } from './broker/envelope';
import { MessageBroker } from './broker/messageBroker';
import { DeliveryOrchestrator } from './deliveryOrchestrator';
import { DEAD_LETTER_QUEUE, deliveryQueues } from './queueRouter';

export interface DeliveryWorkerOptions {
  concurrency?: number;
}

/**
 * Consumes the channel, priority and retry queues and hands each message to
 * the orchestrator. The stored notification is authoritative; the envelope
 * snapshot only identifies it.
 */
export class DeliveryWorker {
  private broker: MessageBroker;
  private orchestrator: DeliveryOrchestrator;
  private notifications: NotificationRepository;
  private options: DeliveryWorkerOptions;
  private logger = logger.child({ service: 'DeliveryWorker' });

  constructor(
    broker: MessageBroker,
    orchestrator: DeliveryOrchestrator,
    notifications: NotificationRepository,
    options: DeliveryWorkerOptions = {}
  ) {
    this.broker = broker;
    this.orchestrator = orchestrator;
    this.notifications = notifications;
    this.options = options;
  }

  async start(): Promise<void> {
    for (const queue of deliveryQueues()) {
      await this.broker.consume(
        queue,
        async (payload) => {
          await this.handle(queue, payload);
        },
        this.options.concurrency
      );
    }

    await this.broker.consume(DEAD_LETTER_QUEUE, (payload) => this.monitorDeadLetter(payload), 1);
    this.logger.info('Delivery worker started', { queues: deliveryQueues().length + 1 });
  }

  /** Malformed envelopes throw InvalidEnvelopeError so the broker marks the message failed. */
  async handle(queue: string, payload: unknown): Promise<DeliveryOutcome | null> {
    const envelope = parseEnvelope(payload);
    const notification = await this.notifications.findById(envelope.notification.id);

    if (!notification) {
      this.logger.warn('Queued notification no longer exists', {
        queue,
        notificationId: envelope.notification.id,
      });
      return null;
    }

    const outcome = await this.orchestrator.deliver(notification);
    this.logger.debug('Queue message processed', {
      queue,
      kind: envelope.kind,
      notificationId: notification.id,
      ok: outcome.ok,
      status: outcome.status,
    });
    return outcome;
  }

  async monitorDeadLetter(payload: unknown): Promise<void> {
    const envelope = parseEnvelope(payload);
    this.logger.error('Notification dead-lettered', {
      notificationId: envelope.notification.id,
      channel: envelope.notification.channel,
      originalQueue: envelope.originalQueue,
      retryCount: envelope.retryCount,
      reason: envelope.dlqReason,
      at: envelope.dlqTimestamp,
    });
  }
}
