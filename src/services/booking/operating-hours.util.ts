import { DateTime } from 'luxon';

import type { OperatingHours } from '@core/interfaces/space.types.js';

import { parseTimeOfDay } from '@utils/time.js';

export interface LocalSlot {
  start: DateTime;
  end: DateTime;
}

export interface OperatingWindow {
  open: number; // minutes since midnight
  close: number;
}

/** Null when either bound is malformed or the window is empty or wraps past midnight. */
export function parseOperatingHours(hours: OperatingHours): OperatingWindow | null {
  const open = parseTimeOfDay(hours.start);
  const close = parseTimeOfDay(hours.end);
  if (open === null || close === null || close <= open) return null;
  return { open, close };
}

function fractionalMinutes(dt: DateTime): number {
  return dt.hour * 60 + dt.minute + dt.second / 60 + dt.millisecond / 60000;
}

/**
 * Start and end must share a local calendar day (an end at exactly the following midnight
 * counts as 24:00 of the start day) and both lie inside [open, close].
 */
export function isWithinOperatingHours(
  startAt: Date,
  endAt: Date,
  hours: OperatingHours,
  tz: string,
): boolean {
  const window = parseOperatingHours(hours);
  if (!window) return false;

  const startLocal = DateTime.fromJSDate(startAt).setZone(tz);
  const endLocal = DateTime.fromJSDate(endAt).setZone(tz);

  let endMin = fractionalMinutes(endLocal);
  if (startLocal.toISODate() !== endLocal.toISODate()) {
    const endsAtNextMidnight =
      endMin === 0 && endLocal.minus({ days: 1 }).toISODate() === startLocal.toISODate();
    if (!endsAtNextMidnight) return false;
    endMin = 24 * 60;
  }

  const startMin = fractionalMinutes(startLocal);
  return startMin >= window.open && endMin <= window.close;
}

/** Opening window of a local date ('yyyy-MM-dd'); null for an invalid date or malformed hours. */
export function operatingWindowForDate(
  dayISO: string,
  tz: string,
  hours: OperatingHours,
): { start: DateTime; end: DateTime } | null {
  const day = DateTime.fromISO(dayISO, { zone: tz });
  const window = parseOperatingHours(hours);
  if (!day.isValid || !window) return null;
  const midnight = day.startOf('day');
  return {
    start: midnight.plus({ minutes: window.open }),
    end: midnight.plus({ minutes: window.close }),
  };
}

/** Slot grid (start-inclusive, end-exclusive) confined to the opening window. */
export function buildSlotsForDay(
  dayISO: string,
  tz: string,
  hours: OperatingHours,
  slotSizeMinutes: number,
): LocalSlot[] {
  const window = operatingWindowForDate(dayISO, tz, hours);
  if (!window) return [];
  const slots: LocalSlot[] = [];
  let cursor = window.start;
  while (cursor < window.end) {
    const next = cursor.plus({ minutes: slotSizeMinutes });
    if (next > window.end) break;
    slots.push({ start: cursor, end: next });
    cursor = next;
  }
  return slots;
}
