import type { Booking } from '@core/interfaces/booking.types.js';
import type { CalendarSync, CalendarSyncStatus } from '@core/interfaces/ports.js';
import type { Space } from '@core/interfaces/space.types.js';

import type { CalendarEventBody, CalendarEventsApi } from '@infra/calendar/google-calendar.client.js';

import { logger } from '@utils/logger.js';
import { tzOfSpace } from '@utils/time.js';

/** Calendar event ids allow base32hex characters only; a UUID without dashes qualifies. */
export function eventIdFor(bookingId: string): string {
  return `rb${bookingId.replace(/-/g, '').toLowerCase()}`;
}

export function buildEventBody(booking: Booking, space: Space, tz: string): CalendarEventBody {
  const materials = booking.materialsRequested.length ? booking.materialsRequested.join(', ') : 'None';
  return {
    summary: `Booking: ${space.name}`,
    location: space.location,
    description: [
      `Space: ${space.name}`,
      `Purpose: ${booking.purpose}`,
      `Materials: ${materials}`,
      `Notes: ${booking.notes || 'None'}`,
    ].join('\n'),
    start: { dateTime: booking.startAt.toISOString(), timeZone: tz },
    end: { dateTime: booking.endAt.toISOString(), timeZone: tz },
    reminders: { useDefault: false, overrides: [{ method: 'popup', minutes: 24 * 60 }] },
  };
}

/** Mirrors bookings into a shared calendar; a missing API client means sync is switched off. */
export class GoogleCalendarSync implements CalendarSync {
  constructor(
    private readonly api: CalendarEventsApi | null,
    private readonly timezone: string,
  ) {}

  async upsertEvent(booking: Booking, space: Space): Promise<CalendarSyncStatus> {
    if (!this.api) return 'skipped';
    await this.api.upsert(eventIdFor(booking.id), buildEventBody(booking, space, tzOfSpace(space, this.timezone)));
    logger.info('[calendar] event upserted', { bookingId: booking.id });
    return 'synced';
  }

  async removeEvent(bookingId: string): Promise<CalendarSyncStatus> {
    if (!this.api) return 'skipped';
    const removed = await this.api.remove(eventIdFor(bookingId));
    logger.info('[calendar] event removal', { bookingId, removed });
    return removed ? 'synced' : 'skipped';
  }
}
