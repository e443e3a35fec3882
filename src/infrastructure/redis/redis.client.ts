import { createClient } from 'redis';

import { logger } from '@utils/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedis(url: string): RedisClient {
  const redis: RedisClient = createClient({ url });

  redis.on('error', (err: Error) => {
    logger.error('[redis] error', { message: err.message });
  });

  redis.on('connect', () => {
    logger.info('[redis] connected');
  });

  redis.on('end', () => {
    logger.info('[redis] connection closed');
  });

  return redis;
}

export async function connectRedis(redis: RedisClient): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function disconnectRedis(redis: RedisClient): Promise<void> {
  if (redis.isOpen) {
    await redis.quit();
  }
}

export async function pingRedis(redis: RedisClient): Promise<string> {
  await connectRedis(redis);
  return redis.ping();
}
