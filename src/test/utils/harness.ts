import type { BookingFailure, BookingOutcome } from '@core/interfaces/booking.types.js';
import type { Space, UserContact } from '@core/interfaces/space.types.js';

import { AvailabilityService } from '@services/booking/availability.service.js';
import { BookingService } from '@services/booking/booking.service.js';
import { readBookingConfig } from '@services/booking/config.defaults.js';
import { ConstraintService } from '@services/booking/constraint.service.js';
import { ReminderScheduler } from '@services/reminders/reminder.scheduler.js';

import {
  FakeUserDirectory,
  InMemoryAvailabilityCache,
  InMemoryBookingStore,
  InMemoryReminderBackend,
  InMemorySpaceDirectory,
  RecordingCalendar,
  RecordingNotifier,
} from './fakes.js';

/** Monday 2030-03-04, 09:00 in Rome. */
export const NOW = new Date('2030-03-04T08:00:00Z');
export const TZ = 'Europe/Rome';

export function makeSpace(overrides: Partial<Space> = {}): Space {
  return {
    id: 'lab-101',
    name: 'Computer Lab 101',
    location: 'Building A',
    capacity: 30,
    active: true,
    timezone: null,
    operatingHours: { start: '08:00', end: '20:00' },
    constraints: {},
    ...overrides,
  };
}

export const ALICE: UserContact = { id: 'u-alice', email: 'alice@example.edu', fullName: 'Alice Example' };
export const BRUNO: UserContact = { id: 'u-bruno', email: 'bruno@example.edu', fullName: 'Bruno Example' };

export interface HarnessOptions {
  spaces?: Space[];
  users?: UserContact[];
  sideEffectTimeoutMs?: number;
}

export function buildHarness(opts: HarnessOptions = {}) {
  const config = readBookingConfig(TZ);
  const store = new InMemoryBookingStore();
  const spaces = new InMemorySpaceDirectory(opts.spaces ?? [makeSpace()]);
  const users = new FakeUserDirectory(opts.users ?? [ALICE, BRUNO]);
  const notifier = new RecordingNotifier();
  const calendar = new RecordingCalendar();
  const reminderBackend = new InMemoryReminderBackend();
  const cache = new InMemoryAvailabilityCache();
  const constraints = new ConstraintService(config);
  const availability = new AvailabilityService({ bookings: store, spaces, constraints, cache, config });
  const reminders = new ReminderScheduler(reminderBackend, 24);
  const clock = () => NOW;

  const service = new BookingService({
    bookings: store,
    spaces,
    users,
    constraints,
    availability,
    notifier,
    calendar,
    reminders,
    config,
    sideEffectTimeoutMs: opts.sideEffectTimeoutMs ?? 1000,
    clock,
  });

  return {
    config,
    store,
    spaces,
    users,
    notifier,
    calendar,
    reminderBackend,
    cache,
    constraints,
    availability,
    reminders,
    service,
    clock,
  };
}

export type Harness = ReturnType<typeof buildHarness>;

export function expectOk(outcome: BookingOutcome): Extract<BookingOutcome, { ok: true }> {
  if (!outcome.ok) {
    throw new Error(`expected success, got ${outcome.error.kind}: ${outcome.error.message}`);
  }
  return outcome;
}

export function expectFailure(outcome: BookingOutcome): BookingFailure {
  if (outcome.ok) {
    throw new Error(`expected failure, got booking ${outcome.booking.id}`);
  }
  return outcome.error;
}
