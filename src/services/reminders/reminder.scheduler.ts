import type { Booking } from '@core/interfaces/booking.types.js';
import type { ReminderBackend, ReminderPayload } from '@core/interfaces/ports.js';
import type { UserContact } from '@core/interfaces/space.types.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';

export type ReminderScheduleStatus = 'scheduled' | 'skipped';

export function reminderJobKey(bookingId: string): string {
  return `reminder-${bookingId}`;
}

/**
 * One reminder per booking, keyed by booking id. Scheduling always drops any earlier
 * job for the same booking first, so a reschedule never leaves two reminders behind.
 */
export class ReminderScheduler {
  constructor(
    private readonly backend: ReminderBackend,
    private readonly leadHours = 24,
  ) {}

  fireAtFor(startAt: Date): Date {
    return new Date(startAt.getTime() - this.leadHours * 60 * 60 * 1000);
  }

  async schedule(booking: Booking, owner: UserContact, now: Date): Promise<ReminderScheduleStatus> {
    const jobKey = reminderJobKey(booking.id);
    await this.backend.cancel(jobKey);

    const fireAt = this.fireAtFor(booking.startAt);
    if (fireAt <= now) {
      logger.info('[reminder] fire time already passed, not scheduled', {
        bookingId: booking.id,
        fireAt: fireAt.toISOString(),
      });
      return 'skipped';
    }

    const payload: ReminderPayload = {
      bookingId: booking.id,
      ownerId: booking.ownerId,
      email: owner.email,
      startAtISO: booking.startAt.toISOString(),
    };
    await this.backend.scheduleOnce(jobKey, fireAt, payload);
    incrementCounter('reminder_scheduled');
    logger.info('[reminder] scheduled', { bookingId: booking.id, fireAt: fireAt.toISOString() });
    return 'scheduled';
  }

  async cancel(bookingId: string): Promise<boolean> {
    const removed = await this.backend.cancel(reminderJobKey(bookingId));
    logger.info('[reminder] cancel', { bookingId, removed });
    return removed;
  }
}
