import type { RequestHandler } from 'express';
import type { Worker } from 'bullmq';

import type { AppConfig } from '@config/env.config.js';
import type { ReminderPayload } from '@core/interfaces/ports.js';
import { BookingRepository } from '@core/repositories/booking.repo.js';
import { SpaceRepository } from '@core/repositories/space.repo.js';
import { UserRepository } from '@core/repositories/user.repo.js';

import { createGoogleCalendarApi } from '@infra/calendar/google-calendar.client.js';
import { createPool, pingDatabase, type Pool } from '@infra/database/pg.client.js';
import { createResendClient } from '@infra/email/resend.client.js';
import { createRedis, disconnectRedis, pingRedis, type RedisClient } from '@infra/redis/redis.client.js';
import { bullConnectionFromUrl } from '@infra/redis/redis.config.js';

import { createRateLimitMiddleware, type RateLimitStore } from '@middleware/rate-limit.middleware.js';

import { AvailabilityService } from '@services/booking/availability.service.js';
import { BookingService } from '@services/booking/booking.service.js';
import { readBookingConfig } from '@services/booking/config.defaults.js';
import { ConstraintService } from '@services/booking/constraint.service.js';
import { AvailabilityCache } from '@services/cache/availability-cache.js';
import { GoogleCalendarSync } from '@services/calendar/calendar-sync.service.js';
import { EmailNotifier } from '@services/notifications/email.notifier.js';
import {
  BullReminderBackend,
  startReminderWorker,
  type ReminderQueueOptions,
} from '@services/queue/queue.manager.js';
import { ReminderDispatcher } from '@services/reminders/reminder.dispatcher.js';
import { ReminderScheduler } from '@services/reminders/reminder.scheduler.js';

import { logger } from '@utils/logger.js';

export interface Container {
  config: Readonly<AppConfig>;
  pool: Pool;
  redis: RedisClient;
  spaces: SpaceRepository;
  availability: AvailabilityService;
  bookings: BookingService;
  dispatcher: ReminderDispatcher;
  reminderBackend: BullReminderBackend;
  queueOptions: ReminderQueueOptions;
  rateLimit: RequestHandler;
  healthChecks: Record<string, () => Promise<unknown>>;
}

export function buildContainer(config: Readonly<AppConfig>): Container {
  const pool = createPool({
    connectionString: config.DATABASE_URL,
    max: config.DB_POOL_MAX,
    ssl: config.NODE_ENV === 'production',
  });
  const redis = createRedis(config.REDIS_URL);

  const bookingStore = new BookingRepository(pool);
  const spaces = new SpaceRepository(pool);
  const users = new UserRepository(pool);

  const bookingConfig = readBookingConfig(config.TIMEZONE);
  const constraints = new ConstraintService(bookingConfig);
  const availability = new AvailabilityService({
    bookings: bookingStore,
    spaces,
    constraints,
    cache: new AvailabilityCache(redis, config.REDIS_TTL),
    config: bookingConfig,
  });

  const emailClient = config.RESEND_API_KEY
    ? createResendClient(config.RESEND_API_KEY, config.EMAIL_FROM)
    : null;
  if (!emailClient) logger.warn('[container] RESEND_API_KEY not set, emails disabled');
  const notifier = new EmailNotifier(emailClient, config.TIMEZONE, config.REMINDER_LEAD_HOURS);

  const calendarApi =
    config.GOOGLE_CALENDAR_ID && config.GOOGLE_SERVICE_ACCOUNT_EMAIL && config.GOOGLE_PRIVATE_KEY
      ? createGoogleCalendarApi({
          calendarId: config.GOOGLE_CALENDAR_ID,
          clientEmail: config.GOOGLE_SERVICE_ACCOUNT_EMAIL,
          privateKey: config.GOOGLE_PRIVATE_KEY,
        })
      : null;
  if (!calendarApi) logger.warn('[container] Google Calendar not configured, sync disabled');
  const calendar = new GoogleCalendarSync(calendarApi, config.TIMEZONE);

  const queueOptions: ReminderQueueOptions = {
    connection: bullConnectionFromUrl(config.REDIS_URL),
    concurrency: config.QUEUE_CONCURRENCY,
    maxAttempts: config.QUEUE_MAX_ATTEMPTS,
  };
  const reminderBackend = new BullReminderBackend(queueOptions);
  const reminders = new ReminderScheduler(reminderBackend, config.REMINDER_LEAD_HOURS);
  const dispatcher = new ReminderDispatcher({ bookings: bookingStore, spaces, users, notifier });

  const bookings = new BookingService({
    bookings: bookingStore,
    spaces,
    users,
    constraints,
    availability,
    notifier,
    calendar,
    reminders,
    config: bookingConfig,
    sideEffectTimeoutMs: config.SIDE_EFFECT_TIMEOUT_MS,
  });

  const rateLimitStore: RateLimitStore = {
    incr: (key) => redis.incr(key),
    expire: (key, seconds) => redis.expire(key, seconds),
  };

  return {
    config,
    pool,
    redis,
    spaces,
    availability,
    bookings,
    dispatcher,
    reminderBackend,
    queueOptions,
    rateLimit: createRateLimitMiddleware(rateLimitStore, {
      windowSec: config.RATE_LIMIT_WINDOW_SEC,
      max: config.RATE_LIMIT_MAX,
    }),
    healthChecks: {
      database: () => pingDatabase(pool),
      redis: () => pingRedis(redis),
    },
  };
}

export function startWorkers(container: Container): Worker<ReminderPayload> {
  const worker = startReminderWorker(container.queueOptions, container.dispatcher);
  logger.info('[container] reminder worker started', { concurrency: container.queueOptions.concurrency });
  return worker;
}

export async function closeContainer(container: Container, worker?: Worker<ReminderPayload>): Promise<void> {
  if (worker) await worker.close();
  await container.reminderBackend.close();
  await disconnectRedis(container.redis);
  await container.pool.end();
}
