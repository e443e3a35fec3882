import { google, type calendar_v3 } from 'googleapis';

import { extractStatus, withRetry } from '@utils/retry.js';

export interface CalendarEventBody {
  summary: string;
  description: string;
  location: string;
  start: { dateTime: string; timeZone: string };
  end: { dateTime: string; timeZone: string };
  reminders: { useDefault: boolean; overrides: Array<{ method: 'popup' | 'email'; minutes: number }> };
}

/** The two calendar calls booking sync needs. */
export interface CalendarEventsApi {
  upsert(eventId: string, body: CalendarEventBody): Promise<void>;
  /** Resolves false when the event did not exist. */
  remove(eventId: string): Promise<boolean>;
}

export interface GoogleCalendarOptions {
  calendarId: string;
  clientEmail: string;
  privateKey: string;
}

export function createGoogleCalendarApi(opts: GoogleCalendarOptions): CalendarEventsApi {
  const auth = new google.auth.JWT({
    email: opts.clientEmail,
    key: opts.privateKey.replace(/\\n/g, '\n'),
    scopes: ['https://www.googleapis.com/auth/calendar'],
  });
  const calendar = google.calendar({ version: 'v3', auth });
  const { calendarId } = opts;

  return {
    async upsert(eventId: string, body: CalendarEventBody): Promise<void> {
      const requestBody: calendar_v3.Schema$Event = { ...body, id: eventId };
      try {
        await withRetry(() => calendar.events.update({ calendarId, eventId, requestBody }), {
          label: 'calendar.update',
        });
      } catch (err) {
        if (extractStatus(err) !== 404) throw err;
        await withRetry(() => calendar.events.insert({ calendarId, requestBody }), { label: 'calendar.insert' });
      }
    },

    async remove(eventId: string): Promise<boolean> {
      try {
        await withRetry(() => calendar.events.delete({ calendarId, eventId }), { label: 'calendar.delete' });
        return true;
      } catch (err) {
        const status = extractStatus(err);
        if (status === 404 || status === 410) return false;
        throw err;
      }
    },
  };
}
