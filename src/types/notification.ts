export enum NotificationChannel {
  EMAIL = 'EMAIL',
  SMS = 'SMS',
  PUSH = 'PUSH',
  IN_APP = 'IN_APP',
  WEBHOOK = 'WEBHOOK',
  SLACK = 'SLACK',
  TEAMS = 'TEAMS',
  DISCORD = 'DISCORD',
}

export enum NotificationType {
  // Order
  ORDER_PLACED = 'ORDER_PLACED',
  ORDER_CONFIRMED = 'ORDER_CONFIRMED',
  ORDER_SHIPPED = 'ORDER_SHIPPED',
  ORDER_DELIVERED = 'ORDER_DELIVERED',
  ORDER_CANCELLED = 'ORDER_CANCELLED',

  // Payment
  PAYMENT_SUCCESS = 'PAYMENT_SUCCESS',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
  PAYMENT_REFUND = 'PAYMENT_REFUND',

  // Account
  USER_REGISTRATION = 'USER_REGISTRATION',
  PASSWORD_RESET = 'PASSWORD_RESET',
  ACCOUNT_LOCKED = 'ACCOUNT_LOCKED',
  SECURITY_ALERT = 'SECURITY_ALERT',

  // Marketing
  PROMOTIONAL = 'PROMOTIONAL',
  NEWSLETTER = 'NEWSLETTER',

  // System
  SYSTEM_MAINTENANCE = 'SYSTEM_MAINTENANCE',
  REMINDER = 'REMINDER',
  CUSTOM = 'CUSTOM',
}

export enum NotificationPriority {
  LOW = 'LOW',
  NORMAL = 'NORMAL',
  HIGH = 'HIGH',
  URGENT = 'URGENT',
  CRITICAL = 'CRITICAL',
}

export enum NotificationStatus {
  DRAFT = 'DRAFT',
  PENDING = 'PENDING',
  QUEUED = 'QUEUED',
  PROCESSING = 'PROCESSING',
  SENT = 'SENT',
  DELIVERED = 'DELIVERED',
  READ = 'READ',
  RETRY = 'RETRY',
  FAILED = 'FAILED',
}

export enum DeliveryStatus {
  PENDING = 'PENDING',
  IN_PROGRESS = 'IN_PROGRESS',
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
  BOUNCED = 'BOUNCED',
  REJECTED = 'REJECTED',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  INVALID_RECIPIENT = 'INVALID_RECIPIENT',
  CANCELLED = 'CANCELLED',
  EXPIRED = 'EXPIRED',
}

export interface Notification {
  id: string;
  userId: string;
  channel: NotificationChannel;
  type: NotificationType;
  priority: NotificationPriority;
  status: NotificationStatus;
  recipientAddress?: string;
  senderAddress?: string;
  subject?: string;
  content?: string;
  htmlContent?: string;
  templateId?: string;
  templateVariables?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  scheduledAt?: Date;
  expiresAt?: Date;
  retryCount: number;
  maxRetryAttempts: number;
  nextRetryAt?: Date;
  correlationId?: string;
  externalId?: string;
  errorMessage?: string;
  sentAt?: Date;
  deliveredAt?: Date;
  readAt?: Date;
  failedAt?: Date;
  /** Bumped on every persisted status change; used for compare-and-set claims. */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface DeliveryAttempt {
  id: string;
  notificationId: string;
  channel: NotificationChannel;
  providerName: string;
  status: DeliveryStatus;
  recipientAddress?: string;
  senderAddress?: string;
  externalId?: string;
  providerMessageId?: string;
  responseCode?: string;
  responseMessage?: string;
  errorMessage?: string;
  processingTimeMs?: number;
  costCents?: number;
  attemptNumber: number;
  maxAttempts: number;
  nextAttemptAt?: Date;
  deliveredAt?: Date;
  failedAt?: Date;
  providerResponse?: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface DeliveryResult {
  success: boolean;
  status: DeliveryStatus;
  externalId?: string;
  providerMessageId?: string;
  responseCode?: string;
  responseMessage?: string;
  errorMessage?: string;
  processingTimeMs?: number;
  costCents?: number;
  deliveredAt?: Date;
  providerResponse?: Record<string, unknown>;
}

export interface DeliveryProvider {
  getProviderName(): string;
  getSupportedChannels(): NotificationChannel[];
  canHandle(notification: Notification): boolean;
  isAvailable(): boolean;
  deliver(notification: Notification): Promise<DeliveryResult>;
  checkStatus(attempt: DeliveryAttempt): Promise<DeliveryResult>;
}

export enum FailureKind {
  NO_PROVIDER = 'NO_PROVIDER',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  RATE_LIMITED = 'RATE_LIMITED',
  BURST_PROTECTED = 'BURST_PROTECTED',
  TRANSIENT = 'TRANSIENT',
  PERMANENT = 'PERMANENT',
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
  EXPIRED = 'EXPIRED',
  NOT_DELIVERABLE = 'NOT_DELIVERABLE',
}

export type DeliveryOutcome =
  | {
      ok: true;
      notificationId: string;
      status: NotificationStatus.SENT | NotificationStatus.DELIVERED;
      attemptId: string;
      externalId?: string;
    }
  | {
      ok: false;
      notificationId: string;
      kind: FailureKind;
      reason: string;
      status: NotificationStatus;
      attemptId?: string;
      retryAt?: Date;
    };

export interface TimeRange {
  start: Date;
  end: Date;
}
