import { BullMqBroker, toBullPriority } from '../services/broker/bullmqBroker';
import { QueueEnvelope, toSnapshot } from '../services/broker/envelope';
import { buildNotification } from './helpers/fixtures';

interface MockQueue {
  name: string;
  opts: unknown;
  add: jest.Mock;
  getJobCounts: jest.Mock;
  close: jest.Mock;
}

interface MockWorker {
  name: string;
  processor: (job: { data: unknown }) => Promise<unknown>;
  opts: unknown;
  on: jest.Mock;
  close: jest.Mock;
}

const mockQueues: MockQueue[] = [];
const mockWorkers: MockWorker[] = [];

jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation((name: string, opts: unknown) => {
    const queue: MockQueue = {
      name,
      opts,
      add: jest.fn().mockResolvedValue({}),
      getJobCounts: jest.fn().mockResolvedValue({}),
      close: jest.fn().mockResolvedValue(undefined),
    };
    mockQueues.push(queue);
    return queue;
  }),
  Worker: jest
    .fn()
    .mockImplementation((name: string, processor: (job: { data: unknown }) => Promise<unknown>, opts: unknown) => {
      const worker: MockWorker = {
        name,
        processor,
        opts,
        on: jest.fn(),
        close: jest.fn().mockResolvedValue(undefined),
      };
      mockWorkers.push(worker);
      return worker;
    }),
}));

const connection = { host: 'localhost', port: 6379 };

function envelope(): QueueEnvelope {
  const notification = buildNotification({ id: 'notif-bull' });
  return {
    notification: toSnapshot(notification),
    kind: 'regular',
    routingKey: 'notification.email',
    messagePriority: 4,
    retryCount: 0,
    originalQueue: 'notification.email',
    delayMs: 0,
    scheduled: false,
    queuedAt: '2024-03-05T14:00:00.000Z',
  };
}

describe('BullMqBroker', () => {
  let broker: BullMqBroker;

  beforeEach(() => {
    mockQueues.length = 0;
    mockWorkers.length = 0;
    broker = new BullMqBroker({ connection, prefix: 'notif', concurrency: 3 });
  });

  it('should invert envelope priority into bullmq ranking', () => {
    expect(toBullPriority(10)).toBe(1);
    expect(toBullPriority(8)).toBe(3);
    expect(toBullPriority(4)).toBe(7);
    expect(toBullPriority(2)).toBe(9);
  });

  it('should create each queue once and add jobs with priority, delay and id', async () => {
    const message = envelope();

    await broker.publish('notification.email', message, { priority: 4, jobId: 'notif-bull-0-regular' });
    await broker.publish('notification.email', message, { priority: 4, delayMs: 5000, jobId: 'notif-bull-0-scheduled' });

    expect(mockQueues).toHaveLength(1);
    expect(mockQueues[0].name).toBe('notification.email');
    expect(mockQueues[0].opts).toEqual({
      connection,
      prefix: 'notif',
      defaultJobOptions: { removeOnComplete: 1000, removeOnFail: 5000 },
    });
    expect(mockQueues[0].add).toHaveBeenNthCalledWith(1, 'regular', message, {
      priority: 7,
      delay: undefined,
      jobId: 'notif-bull-0-regular',
    });
    expect(mockQueues[0].add).toHaveBeenNthCalledWith(2, 'regular', message, {
      priority: 7,
      delay: 5000,
      jobId: 'notif-bull-0-scheduled',
    });
  });

  it('should hand job data to the consumer', async () => {
    const handler = jest.fn().mockResolvedValue(undefined);

    await broker.consume('notification.sms', handler);
    await mockWorkers[0].processor({ data: { hello: 'world' } });

    expect(mockWorkers[0].name).toBe('notification.sms');
    expect(mockWorkers[0].opts).toEqual({ connection, prefix: 'notif', concurrency: 3 });
    expect(handler).toHaveBeenCalledWith({ hello: 'world' });
    expect(mockWorkers[0].on.mock.calls.map((call) => call[0])).toEqual(['failed', 'error']);
  });

  it('should refuse a second consumer on the same queue', async () => {
    await broker.consume('notification.sms', jest.fn(), 8);

    expect(mockWorkers[0].opts).toEqual({ connection, prefix: 'notif', concurrency: 8 });
    await expect(broker.consume('notification.sms', jest.fn())).rejects.toThrow(
      'Already consuming queue: notification.sms'
    );
  });

  it('should fold prioritized jobs into waiting', async () => {
    await broker.publish('notification.push', envelope(), { priority: 4 });
    mockQueues[0].getJobCounts.mockResolvedValueOnce({
      waiting: 2,
      prioritized: 3,
      delayed: 1,
      active: 0,
      completed: 5,
      failed: 1,
    });

    expect(await broker.getQueueCounts('notification.push')).toEqual({
      waiting: 5,
      delayed: 1,
      active: 0,
      completed: 5,
      failed: 1,
    });
  });

  it('should close workers and queues', async () => {
    await broker.publish('notification.push', envelope(), { priority: 4 });
    await broker.consume('notification.push', jest.fn());

    await broker.close();

    expect(mockWorkers[0].close).toHaveBeenCalledTimes(1);
    expect(mockQueues[0].close).toHaveBeenCalledTimes(1);
  });
});
