import { UnrecoverableError } from 'bullmq';
import { z } from 'zod';

import type { ReminderPayload } from '@core/interfaces/ports.js';

import { logger } from '@utils/logger.js';

import type { ReminderDispatcher, ReminderFireResult } from '../reminders/reminder.dispatcher.js';

const ReminderPayloadSchema = z.object({
  bookingId: z.string().min(1),
  ownerId: z.string().min(1),
  email: z.string().email(),
  startAtISO: z.string().datetime(),
}) satisfies z.ZodType<ReminderPayload>;

/** Payloads that fail validation are never retried. */
export async function processReminderJob(
  job: { id?: string; data: unknown },
  dispatcher: ReminderDispatcher,
): Promise<ReminderFireResult> {
  const parsed = ReminderPayloadSchema.safeParse(job.data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'payload'}: ${i.message}`);
    logger.error('[reminder] malformed job payload', { jobId: job.id, issues });
    throw new UnrecoverableError(`Malformed reminder payload: ${issues.join('; ')}`);
  }
  return dispatcher.fire(parsed.data);
}
