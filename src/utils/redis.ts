import Redis, { ChainableCommander } from 'ioredis';
import { NotificationConfig } from '../config/notifications';
import { logger } from './logger';

/**
 * Shared ioredis connection. bullmq workers block on the connection, so
 * `maxRetriesPerRequest` must stay null.
 */
export function createRedisConnection(config: NotificationConfig['redis']): Redis {
  const redis = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    maxRetriesPerRequest: null,
    retryStrategy: (times) => {
      if (times > 10) {
        logger.error('Redis reconnection failed after 10 attempts');
        return null;
      }
      return Math.min(times * 100, 3000);
    },
  });

  redis.on('error', (err) => {
    logger.error('Redis error', { error: err.message });
  });

  redis.on('connect', () => {
    logger.info('Connected to Redis', { host: config.host, port: config.port });
  });

  redis.on('reconnecting', () => {
    logger.warn('Reconnecting to Redis...');
  });

  return redis;
}

/** Runs a MULTI block and surfaces the first command error. */
export async function execTransaction(transaction: ChainableCommander, label: string): Promise<void> {
  const results = await transaction.exec();
  if (!results) {
    throw new Error(`Transaction aborted: ${label}`);
  }

  for (const [error] of results) {
    if (error) {
      throw error;
    }
  }
}
