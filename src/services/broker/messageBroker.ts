import { QueueEnvelope } from './envelope';

export interface PublishOptions {
  /** Envelope priority, 0..10, higher is more urgent. */
  priority: number;
  delayMs?: number;
  /** Publishing twice with the same id while the first copy is queued is a no-op. */
  jobId?: string;
}

export type MessageHandler = (payload: unknown) => Promise<void>;

export interface QueueCounts {
  waiting: number;
  delayed: number;
  active: number;
  completed: number;
  failed: number;
}

export interface MessageBroker {
  publish(queue: string, envelope: QueueEnvelope, options: PublishOptions): Promise<void>;
  consume(queue: string, handler: MessageHandler, concurrency?: number): Promise<void>;
  getQueueCounts(queue: string): Promise<QueueCounts>;
  close(): Promise<void>;
}
