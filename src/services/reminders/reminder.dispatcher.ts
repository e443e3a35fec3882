import type { BookingStore, Notifier, ReminderPayload, SpaceDirectory, UserDirectory } from '@core/interfaces/ports.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';

export type ReminderFireResult =
  | { status: 'sent' }
  | { status: 'skipped'; reason: 'not_found' | 'cancelled' | 'rescheduled' | 'started' | 'space_missing' | 'not_delivered' };

export interface ReminderDispatcherDeps {
  bookings: BookingStore;
  spaces: SpaceDirectory;
  users: UserDirectory;
  notifier: Notifier;
}

/**
 * Executes a due reminder. The booking is re-read first: a reminder whose booking was
 * cancelled or moved since scheduling is dropped even if its job was never removed.
 */
export class ReminderDispatcher {
  constructor(private readonly deps: ReminderDispatcherDeps) {}

  async fire(payload: ReminderPayload, now: Date = new Date()): Promise<ReminderFireResult> {
    const result = await this.evaluate(payload, now);
    if (result.status === 'sent') {
      incrementCounter('reminder_sent');
    } else {
      incrementCounter('reminder_skipped');
      logger.info('[reminder] skipped', { bookingId: payload.bookingId, reason: result.reason });
    }
    return result;
  }

  private async evaluate(payload: ReminderPayload, now: Date): Promise<ReminderFireResult> {
    const booking = await this.deps.bookings.findById(payload.bookingId);
    if (!booking) return { status: 'skipped', reason: 'not_found' };
    if (booking.status === 'cancelled') return { status: 'skipped', reason: 'cancelled' };
    if (booking.startAt.toISOString() !== payload.startAtISO) return { status: 'skipped', reason: 'rescheduled' };
    if (booking.startAt <= now) return { status: 'skipped', reason: 'started' };

    const space = await this.deps.spaces.getSpace(booking.spaceId);
    if (!space) return { status: 'skipped', reason: 'space_missing' };

    const contact = (await this.deps.users.getContact(booking.ownerId)) ?? {
      id: booking.ownerId,
      email: payload.email,
      fullName: '',
    };
    const delivery = await this.deps.notifier.sendReminder(booking, space, contact);
    return delivery === 'sent' ? { status: 'sent' } : { status: 'skipped', reason: 'not_delivered' };
  }
}
