import dotenv from 'dotenv';
import { z } from 'zod';
import { NotificationChannel } from '../types/notification';
import { ConfigurationError } from '../utils/errors';

const intFrom = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: intFrom(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: intFrom(0),

  QUEUE_PREFIX: z.string().default('notification'),
  NOTIFICATION_CONCURRENCY: intFrom(10),
  NOTIFICATION_TIMEOUT: intFrom(30000),
  NOTIFICATION_STALE_ATTEMPT_MS: intFrom(5 * 60 * 1000),
  NOTIFICATION_BACKOFF_CAP_MS: intFrom(60 * 60 * 1000),

  SCHEDULER_DELIVERY_INTERVAL_MS: intFrom(30000),
  SCHEDULER_RETRY_INTERVAL_MS: intFrom(60000),
  SCHEDULER_STATUS_INTERVAL_MS: intFrom(5 * 60 * 1000),

  RATE_LIMIT_USER_PER_MINUTE: intFrom(10),
  RATE_LIMIT_USER_PER_HOUR: intFrom(100),
  RATE_LIMIT_USER_PER_DAY: intFrom(500),
  RATE_LIMIT_EMAIL_PER_MINUTE: intFrom(100),
  RATE_LIMIT_SMS_PER_MINUTE: intFrom(50),
  RATE_LIMIT_PUSH_PER_MINUTE: intFrom(200),
  RATE_LIMIT_IN_APP_PER_MINUTE: intFrom(500),
  RATE_LIMIT_DEFAULT_PER_MINUTE: intFrom(100),
  BURST_LIMIT: intFrom(5),
  BURST_WINDOW_SECONDS: intFrom(10),

  ANALYTICS_RETENTION_DAYS: intFrom(7),

  SENDGRID_API_KEY: z.string().optional(),
  EMAIL_FROM_ADDRESS: z.string().email().default('noreply@example.com'),
  EMAIL_FROM_NAME: z.string().default('Notifications'),
  EMAIL_SANDBOX: flag,

  TWILIO_ACCOUNT_SID: z.string().optional(),
  TWILIO_AUTH_TOKEN: z.string().optional(),
  SMS_FROM_NUMBER: z.string().optional(),
  SMS_STATUS_CALLBACK_URL: z.string().url().optional(),
  SMS_SANDBOX: flag,

  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_PRIVATE_KEY: z.string().optional(),
  FIREBASE_CLIENT_EMAIL: z.string().optional(),
  PUSH_SANDBOX: flag,

  WEBHOOK_SIGNATURE_SECRET: z.string().optional(),
  WEBHOOK_TIMEOUT: intFrom(10000),
  WEBHOOK_SANDBOX: flag,

  IN_APP_MAX_PER_USER: intFrom(100),
});

export interface WindowLimit {
  limit: number;
  windowSeconds: number;
}

export interface RateLimitConfig {
  perUser: WindowLimit[];
  perProvider: Partial<Record<NotificationChannel, number>>;
  defaultProviderPerMinute: number;
  burst: WindowLimit;
}

export interface BackoffConfig {
  capMs: number;
}

export interface NotificationConfig {
  env: 'development' | 'test' | 'production';
  redis: {
    host: string;
    port: number;
    password?: string;
    db: number;
  };
  queues: {
    prefix: string;
    concurrency: number;
  };
  processing: {
    providerTimeoutMs: number;
    staleAttemptMs: number;
    backoff: BackoffConfig;
  };
  scheduler: {
    deliveryIntervalMs: number;
    retryIntervalMs: number;
    statusIntervalMs: number;
  };
  rateLimit: RateLimitConfig;
  analytics: {
    retentionDays: number;
  };
  providers: {
    email: {
      apiKey?: string;
      from: { email: string; name: string };
      sandbox: boolean;
    };
    sms: {
      accountSid?: string;
      authToken?: string;
      fromNumber?: string;
      statusCallbackUrl?: string;
      sandbox: boolean;
    };
    push: {
      firebase?: { projectId: string; privateKey: string; clientEmail: string };
      sandbox: boolean;
    };
    webhook: {
      signatureSecret?: string;
      timeout: number;
      sandbox: boolean;
    };
    inApp: {
      maxPerUser: number;
    };
  };
}

export function buildNotificationConfig(env: NodeJS.ProcessEnv): NotificationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid notification configuration', issues);
  }

  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    redis: {
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD,
      db: e.REDIS_DB,
    },
    queues: {
      prefix: e.QUEUE_PREFIX,
      concurrency: e.NOTIFICATION_CONCURRENCY,
    },
    processing: {
      providerTimeoutMs: e.NOTIFICATION_TIMEOUT,
      staleAttemptMs: e.NOTIFICATION_STALE_ATTEMPT_MS,
      backoff: { capMs: e.NOTIFICATION_BACKOFF_CAP_MS },
    },
    scheduler: {
      deliveryIntervalMs: e.SCHEDULER_DELIVERY_INTERVAL_MS,
      retryIntervalMs: e.SCHEDULER_RETRY_INTERVAL_MS,
      statusIntervalMs: e.SCHEDULER_STATUS_INTERVAL_MS,
    },
    rateLimit: {
      perUser: [
        { limit: e.RATE_LIMIT_USER_PER_MINUTE, windowSeconds: 60 },
        { limit: e.RATE_LIMIT_USER_PER_HOUR, windowSeconds: 3600 },
        { limit: e.RATE_LIMIT_USER_PER_DAY, windowSeconds: 86400 },
      ],
      perProvider: {
        [NotificationChannel.EMAIL]: e.RATE_LIMIT_EMAIL_PER_MINUTE,
        [NotificationChannel.SMS]: e.RATE_LIMIT_SMS_PER_MINUTE,
        [NotificationChannel.PUSH]: e.RATE_LIMIT_PUSH_PER_MINUTE,
        [NotificationChannel.IN_APP]: e.RATE_LIMIT_IN_APP_PER_MINUTE,
      },
      defaultProviderPerMinute: e.RATE_LIMIT_DEFAULT_PER_MINUTE,
      burst: { limit: e.BURST_LIMIT, windowSeconds: e.BURST_WINDOW_SECONDS },
    },
    analytics: {
      retentionDays: e.ANALYTICS_RETENTION_DAYS,
    },
    providers: {
      email: {
        apiKey: e.SENDGRID_API_KEY,
        from: { email: e.EMAIL_FROM_ADDRESS, name: e.EMAIL_FROM_NAME },
        sandbox: e.EMAIL_SANDBOX,
      },
      sms: {
        accountSid: e.TWILIO_ACCOUNT_SID,
        authToken: e.TWILIO_AUTH_TOKEN,
        fromNumber: e.SMS_FROM_NUMBER,
        statusCallbackUrl: e.SMS_STATUS_CALLBACK_URL,
        sandbox: e.SMS_SANDBOX,
      },
      push: {
        firebase:
          e.FIREBASE_PROJECT_ID && e.FIREBASE_PRIVATE_KEY && e.FIREBASE_CLIENT_EMAIL
            ? {
                projectId: e.FIREBASE_PROJECT_ID,
                privateKey: e.FIREBASE_PRIVATE_KEY.replace(/\\n/g, '\n'),
                clientEmail: e.FIREBASE_CLIENT_EMAIL,
              }
            : undefined,
        sandbox: e.PUSH_SANDBOX,
      },
      webhook: {
        signatureSecret: e.WEBHOOK_SIGNATURE_SECRET,
        timeout: e.WEBHOOK_TIMEOUT,
        sandbox: e.WEBHOOK_SANDBOX,
      },
      inApp: {
        maxPerUser: e.IN_APP_MAX_PER_USER,
      },
    },
  };
}

export function loadNotificationConfig(): NotificationConfig {
  dotenv.config();
  return buildNotificationConfig(process.env);
}
