import { Redis } from 'ioredis';

import { config } from '../config/index.js';
import { logger } from '../logger/index.js';

// Admission has a per-call timeout, so commands fail fast instead of queueing
export const redis = new Redis(config.REDIS_URL, {
  maxRetriesPerRequest: 1,
  enableOfflineQueue: false,
  retryStrategy(times: number) {
    return Math.min(times * 50, 2000);
  },
  lazyConnect: true,
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

redis.on('error', (err: Error) => {
  logger.error({ err }, 'Redis error');
});

redis.on('close', () => {
  logger.info('Redis connection closed');
});

/**
 * A connection in subscriber mode cannot run other commands, so pub/sub
 * listeners get their own.
 */
export function createSubscriber(): Redis {
  const subscriber = redis.duplicate();
  subscriber.on('error', (err: Error) => {
    logger.error({ err }, 'Redis subscriber error');
  });
  return subscriber;
}

export async function connectRedis(): Promise<void> {
  await redis.connect();
}

export async function pingRedis(): Promise<boolean> {
  return (await redis.ping()) === 'PONG';
}

export async function closeRedis(): Promise<void> {
  await redis.quit();
}
