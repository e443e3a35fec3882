import type { OperatingHours } from '@core/interfaces/space.types.js';

export interface BookingRuntimeConfig {
  /** IANA zone used when a space declares none. */
  timezone: string;
  /** Global lower bound on booking length. Default 30. */
  minDurationMinutes: number;
  /** Global upper bound; a space's maxDurationMinutes can only tighten it. Default 480. */
  maxDurationMinutes: number;
  /** Step between candidate start times when suggesting alternatives. Default 30. */
  alternativeStepMinutes: number;
  /** Slot size of the daily availability grid. Default 60. */
  gridSlotMinutes: number;
  /** Hours used for grids and suggestions when a space declares none. */
  defaultOperatingHours: OperatingHours;
}

export const BOOKING_DEFAULTS: Omit<BookingRuntimeConfig, 'timezone'> = {
  minDurationMinutes: 30,
  maxDurationMinutes: 8 * 60,
  alternativeStepMinutes: 30,
  gridSlotMinutes: 60,
  defaultOperatingHours: { start: '08:00', end: '20:00' },
};

export function readBookingConfig(
  timezone: string,
  overrides: Partial<Omit<BookingRuntimeConfig, 'timezone'>> = {},
): BookingRuntimeConfig {
  return { ...BOOKING_DEFAULTS, ...overrides, timezone };
}
