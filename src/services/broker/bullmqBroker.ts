import { ConnectionOptions, Job, Queue, Worker } from 'bullmq';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { QueueEnvelope } from './envelope';
import { MessageBroker, MessageHandler, PublishOptions, QueueCounts } from './messageBroker';

export interface BullMqBrokerOptions {
  connection: ConnectionOptions;
  prefix?: string;
  concurrency?: number;
}

/** bullmq ranks 1 as most urgent; envelope priorities run 10 (critical) down to 2. */
export function toBullPriority(priority: number): number {
  return Math.max(1, 11 - priority);
}

/**
 * MessageBroker on bullmq. Delays use bullmq's native delayed jobs, so a
 * delayed message becomes visible on its target queue once the delay elapses.
 */
export class BullMqBroker implements MessageBroker {
  private options: BullMqBrokerOptions;
  private queues: Map<string, Queue<QueueEnvelope>>;
  private workers: Map<string, Worker<unknown>>;
  private logger = logger.child({ service: 'BullMqBroker' });

  constructor(options: BullMqBrokerOptions) {
    this.options = options;
    this.queues = new Map();
    this.workers = new Map();
  }

  async publish(queueName: string, envelope: QueueEnvelope, options: PublishOptions): Promise<void> {
    const queue = this.queue(queueName);

    await queue.add(envelope.kind, envelope, {
      priority: toBullPriority(options.priority),
      delay: options.delayMs && options.delayMs > 0 ? options.delayMs : undefined,
      jobId: options.jobId,
    });

    this.logger.debug('Message published', {
      queue: queueName,
      notificationId: envelope.notification.id,
      kind: envelope.kind,
      delayMs: options.delayMs,
    });
  }

  async consume(queueName: string, handler: MessageHandler, concurrency?: number): Promise<void> {
    if (this.workers.has(queueName)) {
      throw new Error(`Already consuming queue: ${queueName}`);
    }

    const worker = new Worker<unknown>(queueName, async (job: Job<unknown>) => handler(job.data), {
      connection: this.options.connection,
      prefix: this.options.prefix,
      concurrency: concurrency || this.options.concurrency || 1,
    });

    worker.on('failed', (job, err) => {
      this.logger.error('Message handling failed', { queue: queueName, jobId: job?.id, error: err.message });
    });

    worker.on('error', (err) => {
      this.logger.error('Queue worker error', { queue: queueName, error: errorMessage(err) });
    });

    this.workers.set(queueName, worker);
  }

  async getQueueCounts(queueName: string): Promise<QueueCounts> {
    const counts = await this.queue(queueName).getJobCounts(
      'waiting',
      'prioritized',
      'delayed',
      'active',
      'completed',
      'failed'
    );

    return {
      waiting: (counts.waiting || 0) + (counts.prioritized || 0),
      delayed: counts.delayed || 0,
      active: counts.active || 0,
      completed: counts.completed || 0,
      failed: counts.failed || 0,
    };
  }

  async close(): Promise<void> {
    for (const worker of this.workers.values()) {
      await worker.close();
    }
    for (const queue of this.queues.values()) {
      await queue.close();
    }
    this.workers.clear();
    this.queues.clear();
  }

  private queue(name: string): Queue<QueueEnvelope> {
    let queue = this.queues.get(name);
    if (!queue) {
      queue = new Queue<QueueEnvelope>(name, {
        connection: this.options.connection,
        prefix: this.options.prefix,
        defaultJobOptions: {
          removeOnComplete: 1000,
          removeOnFail: 5000,
        },
      });
      this.queues.set(name, queue);
    }
    return queue;
  }
}
