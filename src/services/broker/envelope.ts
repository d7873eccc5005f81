import { z } from 'zod';
import {
  Notification,
  NotificationChannel,
  NotificationPriority,
  NotificationStatus,
  NotificationType,
} from '../../types/notification';
import { InvalidEnvelopeError } from '../../utils/errors';

const isoDate = z.string().datetime();

const notificationSnapshotSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  channel: z.nativeEnum(NotificationChannel),
  type: z.nativeEnum(NotificationType),
  priority: z.nativeEnum(NotificationPriority),
  status: z.nativeEnum(NotificationStatus),
  recipientAddress: z.string().optional(),
  senderAddress: z.string().optional(),
  subject: z.string().optional(),
  content: z.string().optional(),
  htmlContent: z.string().optional(),
  templateId: z.string().optional(),
  templateVariables: z.record(z.unknown()).optional(),
  metadata: z.record(z.unknown()).optional(),
  scheduledAt: isoDate.optional(),
  expiresAt: isoDate.optional(),
  retryCount: z.number().int().nonnegative(),
  maxRetryAttempts: z.number().int().nonnegative(),
  nextRetryAt: isoDate.optional(),
  correlationId: z.string().optional(),
  externalId: z.string().optional(),
  version: z.number().int().nonnegative(),
  createdAt: isoDate,
  updatedAt: isoDate,
});

export const envelopeKinds = ['regular', 'priority', 'scheduled', 'retry', 'dead_letter'] as const;

export const queueEnvelopeSchema = z.object({
  notification: notificationSnapshotSchema,
  kind: z.enum(envelopeKinds),
  routingKey: z.string().min(1),
  messagePriority: z.number().int().min(0).max(10),
  retryCount: z.number().int().nonnegative(),
  originalQueue: z.string().min(1),
  delayMs: z.number().int().nonnegative(),
  scheduled: z.boolean(),
  queuedAt: isoDate,
  dlqReason: z.string().optional(),
  dlqTimestamp: isoDate.optional(),
});

export type NotificationSnapshot = z.infer<typeof notificationSnapshotSchema>;
export type QueueEnvelope = z.infer<typeof queueEnvelopeSchema>;
export type EnvelopeKind = QueueEnvelope['kind'];

export const MESSAGE_PRIORITY: Record<NotificationPriority, number> = {
  [NotificationPriority.CRITICAL]: 10,
  [NotificationPriority.URGENT]: 8,
  [NotificationPriority.HIGH]: 6,
  [NotificationPriority.NORMAL]: 4,
  [NotificationPriority.LOW]: 2,
};

const iso = (date?: Date): string | undefined => (date ? date.toISOString() : undefined);
const date = (value?: string): Date | undefined => (value ? new Date(value) : undefined);

/** Wire form of a notification; dates become ISO strings. */
export function toSnapshot(notification: Notification): NotificationSnapshot {
  return {
    id: notification.id,
    userId: notification.userId,
    channel: notification.channel,
    type: notification.type,
    priority: notification.priority,
    status: notification.status,
    recipientAddress: notification.recipientAddress,
    senderAddress: notification.senderAddress,
    subject: notification.subject,
    content: notification.content,
    htmlContent: notification.htmlContent,
    templateId: notification.templateId,
    templateVariables: notification.templateVariables,
    metadata: notification.metadata,
    scheduledAt: iso(notification.scheduledAt),
    expiresAt: iso(notification.expiresAt),
    retryCount: notification.retryCount,
    maxRetryAttempts: notification.maxRetryAttempts,
    nextRetryAt: iso(notification.nextRetryAt),
    correlationId: notification.correlationId,
    externalId: notification.externalId,
    version: notification.version,
    createdAt: notification.createdAt.toISOString(),
    updatedAt: notification.updatedAt.toISOString(),
  };
}

export function fromSnapshot(snapshot: NotificationSnapshot): Notification {
  return {
    ...snapshot,
    scheduledAt: date(snapshot.scheduledAt),
    expiresAt: date(snapshot.expiresAt),
    nextRetryAt: date(snapshot.nextRetryAt),
    createdAt: new Date(snapshot.createdAt),
    updatedAt: new Date(snapshot.updatedAt),
  };
}

/** Validates a raw queue payload. Malformed messages are programming errors and throw. */
export function parseEnvelope(payload: unknown): QueueEnvelope {
  const parsed = queueEnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidEnvelopeError('Malformed queue envelope', issues);
  }
  return parsed.data;
}
