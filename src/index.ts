import { loadNotificationConfig, NotificationConfig } from './config/notifications';
import { RedisDeliveryAttemptRepository } from './repositories/redisDeliveryAttemptRepository';
import { RedisNotificationRepository } from './repositories/redisNotificationRepository';
import { BullMqBroker } from './services/broker/bullmqBroker';
import { DeliveryAnalytics } from './services/deliveryAnalytics';
import { DeliveryOrchestrator } from './services/deliveryOrchestrator';
import { DeliveryScheduler } from './services/deliveryScheduler';
import { DeliveryWorker } from './services/deliveryWorker';
import { EmailProvider } from './services/providers/emailProvider';
import { InAppProvider } from './services/providers/inAppProvider';
import { ProviderRegistry } from './services/providers/providerRegistry';
import { PushProvider } from './services/providers/pushProvider';
import { SmsProvider } from './services/providers/smsProvider';
import { WebhookProvider } from './services/providers/webhookProvider';
import { QueueRouter } from './services/queueRouter';
import { RateLimiter } from './services/rateLimiter';
import { RedisStore } from './services/stores/redisStore';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import { createRedisConnection } from './utils/redis';

function buildProviders(config: NotificationConfig, inApp: InAppProvider): ProviderRegistry {
  const { email, sms, push, webhook } = config.providers;

  return new ProviderRegistry([
    new EmailProvider({ apiKey: email.apiKey, from: email.from, sandbox: email.sandbox }),
    new SmsProvider(sms),
    new PushProvider(push),
    inApp,
    new WebhookProvider(webhook),
  ]);
}

async function main(): Promise<void> {
  const config = loadNotificationConfig();
  const redis = createRedisConnection(config.redis);
  const store = new RedisStore(redis);

  const notifications = new RedisNotificationRepository(redis, { prefix: config.queues.prefix });
  const attempts = new RedisDeliveryAttemptRepository(redis, { prefix: config.queues.prefix });

  const broker = new BullMqBroker({
    connection: redis,
    prefix: config.queues.prefix,
    concurrency: config.queues.concurrency,
  });

  const inApp = new InAppProvider({ redis, maxNotificationsPerUser: config.providers.inApp.maxPerUser });
  const orchestrator = new DeliveryOrchestrator(
    {
      notifications,
      attempts,
      providers: buildProviders(config, inApp),
      rateLimiter: new RateLimiter(store, store, config.rateLimit),
      analytics: new DeliveryAnalytics(store, notifications, attempts, {
        retentionDays: config.analytics.retentionDays,
      }),
      router: new QueueRouter(broker),
    },
    {
      providerTimeoutMs: config.processing.providerTimeoutMs,
      staleAttemptMs: config.processing.staleAttemptMs,
      backoff: config.processing.backoff,
    }
  );

  const worker = new DeliveryWorker(broker, orchestrator, notifications, {
    concurrency: config.queues.concurrency,
  });
  const scheduler = new DeliveryScheduler(orchestrator, config.scheduler);

  await worker.start();
  scheduler.start();

  logger.info('Notification delivery service started', { env: config.env });

  const shutdown = async (signal: string) => {
    logger.info('Shutting down...', { signal });
    scheduler.stop();
    await broker.close();
    await redis.quit();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  logger.error('Failed to start notification delivery service', { error: errorMessage(error) });
  process.exit(1);
});
