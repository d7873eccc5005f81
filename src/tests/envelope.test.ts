import { fromSnapshot, MESSAGE_PRIORITY, parseEnvelope, toSnapshot } from '../services/broker/envelope';
import { NotificationPriority } from '../types/notification';
import { InvalidEnvelopeError } from '../utils/errors';
import { buildNotification, START } from './helpers/fixtures';

describe('queue envelope', () => {
  const valid = () => ({
    notification: toSnapshot(buildNotification({ id: 'notif-env', scheduledAt: new Date(START + 60000) })),
    kind: 'scheduled',
    routingKey: 'notification.email',
    messagePriority: 4,
    retryCount: 0,
    originalQueue: 'notification.email',
    delayMs: 60000,
    scheduled: true,
    queuedAt: '2024-03-05T14:00:00.000Z',
  });

  it('should rank priorities from critical down to low', () => {
    expect(MESSAGE_PRIORITY[NotificationPriority.CRITICAL]).toBe(10);
    expect(MESSAGE_PRIORITY[NotificationPriority.URGENT]).toBe(8);
    expect(MESSAGE_PRIORITY[NotificationPriority.LOW]).toBe(2);
  });

  it('should write dates as ISO strings and read them back', () => {
    const snapshot = toSnapshot(buildNotification({ scheduledAt: new Date(START + 60000) }));

    expect(snapshot.scheduledAt).toBe('2024-03-05T14:01:00.000Z');
    expect(snapshot.createdAt).toBe('2024-03-05T14:00:00.000Z');
    expect(fromSnapshot(snapshot).scheduledAt).toEqual(new Date(START + 60000));
    expect(fromSnapshot(snapshot).nextRetryAt).toBeUndefined();
  });

  it('should accept a well-formed envelope', () => {
    const envelope = parseEnvelope(valid());

    expect(envelope.kind).toBe('scheduled');
    expect(envelope.notification.id).toBe('notif-env');
  });

  it('should reject malformed envelopes with the offending paths', () => {
    const payload = { ...valid(), kind: 'bogus', messagePriority: 11 };

    let caught: unknown;
    try {
      parseEnvelope(payload);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidEnvelopeError);
    const issues = caught instanceof InvalidEnvelopeError ? caught.issues : [];
    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['kind', 'messagePriority']);
  });

  it('should reject payloads that are not objects', () => {
    expect(() => parseEnvelope('notif-1')).toThrow('Malformed queue envelope');
    expect(() => parseEnvelope(null)).toThrow(InvalidEnvelopeError);
  });
});
