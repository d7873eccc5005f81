import { z } from 'zod';
import {
  DeliveryAttempt,
  DeliveryStatus,
  Notification,
  NotificationChannel,
  NotificationPriority,
  NotificationStatus,
  NotificationType,
} from '../types/notification';

// Dates are written by JSON.stringify, i.e. as ISO strings.
const storedDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const notificationRecordSchema = z.object({
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
  scheduledAt: storedDate.optional(),
  expiresAt: storedDate.optional(),
  retryCount: z.number().int().nonnegative(),
  maxRetryAttempts: z.number().int().nonnegative(),
  nextRetryAt: storedDate.optional(),
  correlationId: z.string().optional(),
  externalId: z.string().optional(),
  errorMessage: z.string().optional(),
  sentAt: storedDate.optional(),
  deliveredAt: storedDate.optional(),
  readAt: storedDate.optional(),
  failedAt: storedDate.optional(),
  version: z.number().int().nonnegative(),
  createdAt: storedDate,
  updatedAt: storedDate,
});

const deliveryAttemptRecordSchema = z.object({
  id: z.string().min(1),
  notificationId: z.string().min(1),
  channel: z.nativeEnum(NotificationChannel),
  providerName: z.string(),
  status: z.nativeEnum(DeliveryStatus),
  recipientAddress: z.string().optional(),
  senderAddress: z.string().optional(),
  externalId: z.string().optional(),
  providerMessageId: z.string().optional(),
  responseCode: z.string().optional(),
  responseMessage: z.string().optional(),
  errorMessage: z.string().optional(),
  processingTimeMs: z.number().optional(),
  costCents: z.number().optional(),
  attemptNumber: z.number().int().positive(),
  maxAttempts: z.number().int().nonnegative(),
  nextAttemptAt: storedDate.optional(),
  deliveredAt: storedDate.optional(),
  failedAt: storedDate.optional(),
  providerResponse: z.record(z.unknown()).optional(),
  createdAt: storedDate,
  updatedAt: storedDate,
});

export function encodeRecord(record: Notification | DeliveryAttempt): string {
  return JSON.stringify(record);
}

/** Null when the stored value is not a valid notification record. */
export function decodeNotification(raw: string): Notification | null {
  const parsed = notificationRecordSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : null;
}

export function decodeDeliveryAttempt(raw: string): DeliveryAttempt | null {
  const parsed = deliveryAttemptRecordSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : null;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    return { unreadable: error instanceof Error ? error.message : String(error) };
  }
}
