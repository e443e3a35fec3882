import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';

import type { ReminderBackend, ReminderPayload } from '@core/interfaces/ports.js';

import { logger } from '@utils/logger.js';

import type { ReminderDispatcher } from '../reminders/reminder.dispatcher.js';

import { processReminderJob } from './job.handlers.js';

export const REMINDER_QUEUE = 'reminders';

export interface ReminderQueueOptions {
  connection: ConnectionOptions;
  concurrency: number;
  maxAttempts: number;
}

/** Delayed BullMQ jobs; the job id is the reminder key, so one booking holds at most one job. */
export class BullReminderBackend implements ReminderBackend {
  private readonly queue: Queue<ReminderPayload>;

  constructor(private readonly opts: ReminderQueueOptions) {
    this.queue = new Queue<ReminderPayload>(REMINDER_QUEUE, { connection: opts.connection });
  }

  async scheduleOnce(jobKey: string, fireAt: Date, payload: ReminderPayload): Promise<void> {
    await this.cancel(jobKey);
    await this.queue.add('reminder', payload, {
      jobId: jobKey,
      delay: Math.max(0, fireAt.getTime() - Date.now()),
      removeOnComplete: true,
      removeOnFail: 50,
      attempts: this.opts.maxAttempts,
      backoff: { type: 'fixed', delay: 2000 },
    });
  }

  async cancel(jobKey: string): Promise<boolean> {
    const job = await this.queue.getJob(jobKey);
    if (!job) return false;
    await job.remove();
    return true;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export function startReminderWorker(
  opts: ReminderQueueOptions,
  dispatcher: ReminderDispatcher,
): Worker<ReminderPayload> {
  const worker = new Worker<ReminderPayload>(
    REMINDER_QUEUE,
    async (job: Job<ReminderPayload>) => {
      await processReminderJob(job, dispatcher);
    },
    { connection: opts.connection, concurrency: opts.concurrency },
  );

  worker.on('failed', (job, err) => {
    logger.error('[reminder] job failed', { jobId: job?.id, attempts: job?.attemptsMade, err });
  });

  return worker;
}
