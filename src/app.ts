import { config } from '@config/env.config.js';

import { buildContainer, closeContainer, startWorkers } from './container.js';
import { connectRedis } from './infrastructure/redis/redis.client.js';
import { createApp } from './server.js';
import { logger } from './utils/logger.js';

async function bootstrap() {
  const container = buildContainer(config);
  // connect Redis early so the cache and rate limiter are ready
  await connectRedis(container.redis);
  const worker = startWorkers(container);

  const app = createApp({
    bookings: container.bookings,
    availability: container.availability,
    spaces: container.spaces,
    timezone: config.TIMEZONE,
    rateLimit: container.rateLimit,
    healthChecks: container.healthChecks,
  });
  const server = app.listen(config.PORT, () => {
    logger.info('[app] listening', { port: config.PORT, env: config.NODE_ENV });
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('[app] shutting down', { signal });
    server.close();
    closeContainer(container, worker)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('[app] shutdown failed', { err });
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err: unknown) => {
  logger.error('[app] fatal bootstrap error', { err });
  process.exit(1);
});
