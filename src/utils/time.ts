import { DateTime } from 'luxon';

export function tzOfSpace(space: { timezone?: string | null }, fallback: string): string {
  return space.timezone || fallback;
}

/** Accepts a Date or an ISO string; an ISO string without offset is read as local time in `tz`. */
export function toInstant(value: Date | string, tz: string): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  const dt = DateTime.fromISO(value, { zone: tz });
  return dt.isValid ? dt.toJSDate() : null;
}

export function formatYMD(date: Date, tz: string): string {
  return DateTime.fromJSDate(date).setZone(tz).toFormat('yyyy-LL-dd');
}

export function overlaps(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart < bEnd && aEnd > bStart;
}

/** "HH:mm" -> minutes since midnight; "24:00" is accepted as end of day. */
export function parseTimeOfDay(hm: string): number | null {
  const match = /^(\d{2}):(\d{2})$/.exec(hm);
  if (!match) return null;
  const h = Number(match[1]);
  const m = Number(match[2]);
  if (m > 59) return null;
  if (h === 24 && m === 0) return 24 * 60;
  if (h > 23) return null;
  return h * 60 + m;
}

export function minutesBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 60000;
}
