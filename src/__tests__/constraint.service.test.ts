import { describe, it, expect } from 'vitest';

import type { SpacePolicy } from '@core/interfaces/space.types.js';

import { readBookingConfig } from '@services/booking/config.defaults.js';
import { ConstraintService } from '@services/booking/constraint.service.js';

import { NOW, TZ } from '@test/utils/harness.js';

const service = new ConstraintService(readBookingConfig(TZ));

const lab: SpacePolicy = {
  timezone: null,
  operatingHours: { start: '08:00', end: '20:00' },
  constraints: {},
};

function interval(startISO: string, endISO: string) {
  return { startAt: new Date(startISO), endAt: new Date(endISO) };
}

describe('ConstraintService', () => {
  it('accepts a booking inside operating hours', () => {
    // 10:00-12:00 in Rome
    const res = service.validate(lab, interval('2030-03-06T09:00:00Z', '2030-03-06T11:00:00Z'), NOW);
    expect(res).toEqual({ ok: true });
  });

  it('rejects an empty interval', () => {
    const res = service.validate(lab, interval('2030-03-06T09:00:00Z', '2030-03-06T09:00:00Z'), NOW);
    expect(res).toEqual({
      ok: false,
      violation: { kind: 'InvalidInterval', message: 'The end time must be after the start time' },
    });
  });

  it('rejects a start in the past', () => {
    const res = service.validate(lab, interval('2030-03-04T07:00:00Z', '2030-03-04T08:00:00Z'), NOW);
    expect(res).toEqual({
      ok: false,
      violation: { kind: 'PastBooking', message: 'Bookings cannot start in the past' },
    });
  });

  it('reports the past before operating hours', () => {
    const res = service.validate(lab, interval('2030-03-03T22:00:00Z', '2030-03-03T23:00:00Z'), NOW);
    expect(res.ok ? null : res.violation.kind).toBe('PastBooking');
  });

  it('enforces the global duration bounds', () => {
    const res = service.validate(lab, interval('2030-03-06T09:00:00Z', '2030-03-06T09:15:00Z'), NOW);
    expect(res).toEqual({
      ok: false,
      violation: {
        kind: 'DurationOutOfBounds',
        message: 'Booking duration must be between 30 and 480 minutes',
      },
    });
  });

  it('lets a space tighten the maximum duration', () => {
    const capped: SpacePolicy = { ...lab, constraints: { maxDurationMinutes: 120 } };
    const res = service.validate(capped, interval('2030-03-06T08:00:00Z', '2030-03-06T11:00:00Z'), NOW);
    expect(res.ok ? null : res.violation.message).toBe('Booking duration must be between 30 and 120 minutes');
    expect(service.maxDurationFor(capped)).toBe(120);
    expect(service.maxDurationFor({ ...lab, constraints: { maxDurationMinutes: 600 } })).toBe(480);
  });

  it('requires advance notice in whole days', () => {
    const hall: SpacePolicy = { ...lab, constraints: { advanceBookingDays: 3 } };
    const early = service.validate(hall, interval('2030-03-06T09:00:00Z', '2030-03-06T10:00:00Z'), NOW);
    expect(early).toEqual({
      ok: false,
      violation: {
        kind: 'InsufficientAdvanceNotice',
        message: 'This space must be booked at least 3 day(s) in advance',
      },
    });

    const exact = service.validate(hall, interval('2030-03-07T08:00:00Z', '2030-03-07T09:00:00Z'), NOW);
    expect(exact).toEqual({ ok: true });
  });

  it('rejects bookings running past closing time', () => {
    // 19:30-20:30 in Rome
    const res = service.validate(lab, interval('2030-03-06T18:30:00Z', '2030-03-06T19:30:00Z'), NOW);
    expect(res).toEqual({
      ok: false,
      violation: {
        kind: 'OutsideOperatingHours',
        message: "The requested time is outside the space's operating hours (08:00-20:00)",
      },
    });
  });

  it('accepts a booking ending exactly at closing time', () => {
    const res = service.validate(lab, interval('2030-03-06T17:00:00Z', '2030-03-06T19:00:00Z'), NOW);
    expect(res).toEqual({ ok: true });
  });

  it('treats an end at the following midnight as 24:00', () => {
    const allDay: SpacePolicy = { ...lab, operatingHours: { start: '00:00', end: '24:00' } };
    // 23:00-00:00 in Rome
    const res = service.validate(allDay, interval('2030-03-06T22:00:00Z', '2030-03-06T23:00:00Z'), NOW);
    expect(res).toEqual({ ok: true });

    // 23:30-00:30 spans two local days
    const spanning = service.validate(allDay, interval('2030-03-06T22:30:00Z', '2030-03-06T23:30:00Z'), NOW);
    expect(spanning.ok ? null : spanning.violation.kind).toBe('OutsideOperatingHours');
  });

  it('reads local time in the space timezone', () => {
    const london: SpacePolicy = { ...lab, timezone: 'Europe/London' };
    // 07:30-08:30 in London, 08:30-09:30 in Rome
    const res = service.validate(london, interval('2030-03-06T07:30:00Z', '2030-03-06T08:30:00Z'), NOW);
    expect(res.ok ? null : res.violation.kind).toBe('OutsideOperatingHours');
  });

  it('skips the hours check for spaces without operating hours', () => {
    const open: SpacePolicy = { ...lab, operatingHours: null };
    const res = service.validate(open, interval('2030-03-06T02:00:00Z', '2030-03-06T03:00:00Z'), NOW);
    expect(res).toEqual({ ok: true });
  });

  it('accepts nothing when the operating hours are inverted', () => {
    const broken: SpacePolicy = { ...lab, operatingHours: { start: '20:00', end: '08:00' } };
    const res = service.validate(broken, interval('2030-03-06T09:00:00Z', '2030-03-06T10:00:00Z'), NOW);
    expect(res.ok ? null : res.violation.kind).toBe('OutsideOperatingHours');
  });
});
