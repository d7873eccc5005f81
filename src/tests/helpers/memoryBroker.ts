import { QueueEnvelope } from '../../services/broker/envelope';
import { MessageBroker, MessageHandler, PublishOptions, QueueCounts } from '../../services/broker/messageBroker';

export interface PublishedMessage {
  queue: string;
  envelope: QueueEnvelope;
  options: PublishOptions;
  visibleAt: number;
}

/**
 * In-process broker on a virtual clock. Delayed messages stay invisible until
 * the clock passes `visibleAt`; `dispatchDue` hands visible messages to the
 * registered consumers in priority order.
 */
export class MemoryBroker implements MessageBroker {
  readonly published: PublishedMessage[] = [];
  private pending: PublishedMessage[] = [];
  private handlers = new Map<string, MessageHandler>();
  private completed = new Map<string, number>();
  private failed = new Map<string, number>();
  private clock: () => number;

  constructor(clock: () => number) {
    this.clock = clock;
  }

  async publish(queue: string, envelope: QueueEnvelope, options: PublishOptions): Promise<void> {
    if (options.jobId && this.pending.some((message) => message.options.jobId === options.jobId)) {
      return;
    }

    const message: PublishedMessage = {
      queue,
      envelope,
      options,
      visibleAt: this.clock() + (options.delayMs || 0),
    };
    this.published.push(message);
    this.pending.push(message);
  }

  async consume(queue: string, handler: MessageHandler, _concurrency?: number): Promise<void> {
    this.handlers.set(queue, handler);
  }

  async getQueueCounts(queue: string): Promise<QueueCounts> {
    const now = this.clock();
    const queued = this.pending.filter((message) => message.queue === queue);
    return {
      waiting: queued.filter((message) => message.visibleAt <= now).length,
      delayed: queued.filter((message) => message.visibleAt > now).length,
      active: 0,
      completed: this.completed.get(queue) || 0,
      failed: this.failed.get(queue) || 0,
    };
  }

  async close(): Promise<void> {
    this.handlers.clear();
  }

  /** Messages on `queue` visible now, without consuming them. */
  visible(queue: string): PublishedMessage[] {
    const now = this.clock();
    return this.pending.filter((message) => message.queue === queue && message.visibleAt <= now);
  }

  publishedTo(queue: string): PublishedMessage[] {
    return this.published.filter((message) => message.queue === queue);
  }

  /** Runs every visible message whose queue has a consumer. Returns how many ran. */
  async dispatchDue(): Promise<number> {
    const now = this.clock();
    const due = this.pending
      .filter((message) => message.visibleAt <= now && this.handlers.has(message.queue))
      .sort((a, b) => b.options.priority - a.options.priority);

    for (const message of due) {
      this.pending = this.pending.filter((candidate) => candidate !== message);
      const handler = this.handlers.get(message.queue);
      if (!handler) {
        continue;
      }
      try {
        await handler(message.envelope);
        this.completed.set(message.queue, (this.completed.get(message.queue) || 0) + 1);
      } catch {
        this.failed.set(message.queue, (this.failed.get(message.queue) || 0) + 1);
      }
    }

    return due.length;
  }
}
