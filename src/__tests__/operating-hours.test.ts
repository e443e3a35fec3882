import { describe, it, expect } from 'vitest';

import {
  buildSlotsForDay,
  operatingWindowForDate,
  parseOperatingHours,
} from '@services/booking/operating-hours.util.js';

describe('operating hours', () => {
  it('parses a window into minutes since midnight', () => {
    expect(parseOperatingHours({ start: '08:00', end: '20:00' })).toEqual({ open: 480, close: 1200 });
    expect(parseOperatingHours({ start: '00:00', end: '24:00' })).toEqual({ open: 0, close: 1440 });
  });

  it('rejects malformed or inverted windows', () => {
    expect(parseOperatingHours({ start: '25:00', end: '26:00' })).toBeNull();
    expect(parseOperatingHours({ start: '8:00', end: '20:00' })).toBeNull();
    expect(parseOperatingHours({ start: '20:00', end: '08:00' })).toBeNull();
    expect(parseOperatingHours({ start: '10:00', end: '10:00' })).toBeNull();
  });

  it('anchors the window to the local date', () => {
    const window = operatingWindowForDate('2030-03-06', 'Europe/Rome', { start: '08:00', end: '20:00' });
    expect(window?.start.toJSDate().toISOString()).toBe('2030-03-06T07:00:00.000Z');
    expect(window?.end.toJSDate().toISOString()).toBe('2030-03-06T19:00:00.000Z');
    expect(operatingWindowForDate('2030-02-30', 'Europe/Rome', { start: '08:00', end: '20:00' })).toBeNull();
  });

  it('builds back-to-back slots inside the window', () => {
    const slots = buildSlotsForDay('2030-03-06', 'Europe/Rome', { start: '08:00', end: '11:00' }, 60);
    expect(slots.map((s) => s.start.toJSDate().toISOString())).toEqual([
      '2030-03-06T07:00:00.000Z',
      '2030-03-06T08:00:00.000Z',
      '2030-03-06T09:00:00.000Z',
    ]);
    expect(slots[2]?.end.toJSDate().toISOString()).toBe('2030-03-06T10:00:00.000Z');
  });

  it('drops a trailing partial slot', () => {
    const slots = buildSlotsForDay('2030-03-06', 'Europe/Rome', { start: '08:00', end: '10:30' }, 60);
    expect(slots).toHaveLength(2);
  });
});
