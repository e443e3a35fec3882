import type {
  ConstraintResult,
  ConstraintViolationKind,
  TimeInterval,
} from '@core/interfaces/booking.types.js';
import type { SpacePolicy } from '@core/interfaces/space.types.js';

import { minutesBetween, tzOfSpace } from '@utils/time.js';

import type { BookingRuntimeConfig } from './config.defaults.js';
import { isWithinOperatingHours } from './operating-hours.util.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function violation(kind: ConstraintViolationKind, message: string): ConstraintResult {
  return { ok: false, violation: { kind, message } };
}

/**
 * Space policy checks, applied in a fixed order; the first failing rule is reported.
 * `now` is the instant the request was received and is never re-sampled here.
 */
export class ConstraintService {
  constructor(
    private readonly cfg: Pick<BookingRuntimeConfig, 'timezone' | 'minDurationMinutes' | 'maxDurationMinutes'>,
  ) {}

  validate(policy: SpacePolicy, interval: TimeInterval, now: Date): ConstraintResult {
    const { startAt, endAt } = interval;

    if (!(endAt > startAt)) {
      return violation('InvalidInterval', 'The end time must be after the start time');
    }

    if (startAt < now) {
      return violation('PastBooking', 'Bookings cannot start in the past');
    }

    const minMinutes = this.cfg.minDurationMinutes;
    const maxMinutes = this.maxDurationFor(policy);
    const duration = minutesBetween(startAt, endAt);
    if (duration < minMinutes || duration > maxMinutes) {
      return violation(
        'DurationOutOfBounds',
        `Booking duration must be between ${minMinutes} and ${maxMinutes} minutes`,
      );
    }

    const advanceDays = policy.constraints.advanceBookingDays;
    if (advanceDays !== undefined && advanceDays > 0) {
      const earliest = new Date(now.getTime() + advanceDays * DAY_MS);
      if (startAt < earliest) {
        return violation(
          'InsufficientAdvanceNotice',
          `This space must be booked at least ${advanceDays} day(s) in advance`,
        );
      }
    }

    const hours = policy.operatingHours;
    if (hours) {
      const tz = tzOfSpace(policy, this.cfg.timezone);
      if (!isWithinOperatingHours(startAt, endAt, hours, tz)) {
        return violation(
          'OutsideOperatingHours',
          `The requested time is outside the space's operating hours (${hours.start}-${hours.end})`,
        );
      }
    }

    return { ok: true };
  }

  /** The stricter of the global maximum and the space's own cap. */
  maxDurationFor(policy: SpacePolicy): number {
    const cap = policy.constraints.maxDurationMinutes;
    if (cap === undefined || cap <= 0) return this.cfg.maxDurationMinutes;
    return Math.min(this.cfg.maxDurationMinutes, cap);
  }
}
