import { DateTime } from 'luxon';
import type { z } from 'zod';

import { ConflictError } from '@core/errors/conflict.error.js';
import type {
  Booking,
  BookingFailure,
  BookingFailureKind,
  BookingOutcome,
  BookingPatch,
  BookingStatistics,
  CalendarBookingView,
  CreateBookingInput,
  DashboardStats,
  NewBooking,
  OwnerBookingView,
  SideEffectOutcome,
  TimeInterval,
  UpdateBookingInput,
} from '@core/interfaces/booking.types.js';
import type {
  BookingStore,
  CalendarSync,
  Notifier,
  SpaceDirectory,
  UserDirectory,
} from '@core/interfaces/ports.js';
import type { Space, UserContact } from '@core/interfaces/space.types.js';

import { runSideEffect, skipped, warningsOf } from '@services/notifications/side-effects.js';
import type { ReminderScheduler } from '@services/reminders/reminder.scheduler.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';
import { formatYMD, toInstant, tzOfSpace } from '@utils/time.js';

import type { AvailabilityService } from './availability.service.js';
import { publicPurpose } from './booking.privacy.js';
import { CreateBookingSchema, issuesOf, UpdateBookingSchema } from './booking.schemas.js';
import type { BookingRuntimeConfig } from './config.defaults.js';
import type { ConstraintService } from './constraint.service.js';

export interface BookingServiceDeps {
  bookings: BookingStore;
  spaces: SpaceDirectory;
  users: UserDirectory;
  constraints: ConstraintService;
  availability: AvailabilityService;
  notifier: Notifier;
  calendar: CalendarSync;
  reminders: ReminderScheduler;
  config: BookingRuntimeConfig;
  sideEffectTimeoutMs: number;
  clock?: () => Date;
}

const DELETED_SPACE = 'Deleted space';
const POPULAR_SPACES_LIMIT = 5;
const NEXT_BOOKINGS_LIMIT = 3;

type LockedWrite = { status: 'ok'; booking: Booking } | { status: 'conflict' } | { status: 'gone' };

function failure(kind: BookingFailureKind, message: string, data?: BookingFailure['data']): BookingOutcome {
  return { ok: false, error: data ? { kind, message, data } : { kind, message } };
}

function invalidRequest(error: z.ZodError): BookingOutcome {
  return failure('InvalidRequest', 'The booking request is incomplete or malformed', {
    issues: issuesOf(error),
  });
}

function success(booking: Booking, sideEffects: SideEffectOutcome[]): BookingOutcome {
  return { ok: true, booking, sideEffects, warnings: warningsOf(sideEffects) };
}

function sameInterval(a: TimeInterval, b: TimeInterval): boolean {
  return a.startAt.getTime() === b.startAt.getTime() && a.endAt.getTime() === b.endAt.getTime();
}

/**
 * Booking lifecycle: create, update and cancel. Decisions (validation, availability,
 * persistence) are reported as a `BookingOutcome`; notification, calendar, reminder and
 * cache work happens afterwards and can only add warnings.
 */
export class BookingService {
  private readonly clock: () => Date;

  constructor(private readonly deps: BookingServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async createBooking(input: CreateBookingInput, now: Date = this.clock()): Promise<BookingOutcome> {
    const parsed = CreateBookingSchema.safeParse(input);
    if (!parsed.success) return this.rejected(invalidRequest(parsed.error));
    const dto = parsed.data;

    const space = await this.deps.spaces.getSpace(dto.spaceId);
    if (!space || !space.active) {
      return this.rejected(failure('SpaceNotFound', 'Space not found or not accepting bookings'));
    }

    const interval = this.parseInterval(dto.startAt, dto.endAt, space);
    if (!interval) {
      return this.rejected(failure('InvalidRequest', 'startAt and endAt must be valid ISO datetimes'));
    }

    const check = this.deps.constraints.validate(space, interval, now);
    if (!check.ok) return this.rejected(failure(check.violation.kind, check.violation.message));

    const free = await this.deps.availability.isAvailable(space.id, interval.startAt, interval.endAt);
    if (!free) return this.unavailable(space, interval, now);

    const record: NewBooking = {
      ownerId: dto.ownerId,
      spaceId: space.id,
      startAt: interval.startAt,
      endAt: interval.endAt,
      status: 'confirmed',
      purpose: dto.purpose,
      materialsRequested: dto.materialsRequested,
      notes: dto.notes,
      createdAt: now,
      updatedAt: now,
      cancellationReason: null,
    };

    const written = await this.lockedWrite(space.id, interval, undefined, (store) => store.insert(record));
    if (written.status !== 'ok') return this.unavailable(space, interval, now);

    const booking = written.booking;
    const sideEffects = await this.afterCreate(booking, space, now);
    incrementCounter('booking_created');
    logger.info('[booking] created', { bookingId: booking.id, spaceId: space.id, ownerId: booking.ownerId });
    return success(booking, sideEffects);
  }

  async updateBooking(
    id: string,
    ownerId: string,
    patch: UpdateBookingInput,
    now: Date = this.clock(),
  ): Promise<BookingOutcome> {
    const parsed = UpdateBookingSchema.safeParse(patch);
    if (!parsed.success) return this.rejected(invalidRequest(parsed.error));
    const dto = parsed.data;

    const existing = await this.deps.bookings.findByIdAndOwner(id, ownerId);
    if (!existing || existing.status === 'cancelled') {
      return this.rejected(failure('BookingNotFound', 'Booking not found'));
    }
    if (existing.startAt <= now) {
      return this.rejected(
        failure('AlreadyStarted', 'Bookings that have already started cannot be modified'),
      );
    }

    const fields: BookingPatch = { updatedAt: now };
    if (dto.purpose !== undefined) fields.purpose = dto.purpose;
    if (dto.materialsRequested !== undefined) fields.materialsRequested = dto.materialsRequested;
    if (dto.notes !== undefined) fields.notes = dto.notes;

    if (dto.startAt === undefined && dto.endAt === undefined) {
      const updated = await this.deps.bookings.update(id, fields, { onlyActive: true });
      if (!updated) return this.rejected(failure('BookingNotFound', 'Booking not found'));
      incrementCounter('booking_updated');
      logger.info('[booking] updated', { bookingId: id, intervalChanged: false });
      return success(updated, []);
    }

    const space = await this.deps.spaces.getSpace(existing.spaceId);
    if (!space || !space.active) {
      return this.rejected(failure('SpaceNotFound', 'Space not found or not accepting bookings'));
    }

    const interval = this.parseInterval(dto.startAt ?? existing.startAt, dto.endAt ?? existing.endAt, space);
    if (!interval) {
      return this.rejected(failure('InvalidRequest', 'startAt and endAt must be valid ISO datetimes'));
    }

    const check = this.deps.constraints.validate(space, interval, now);
    if (!check.ok) return this.rejected(failure(check.violation.kind, check.violation.message));

    const free = await this.deps.availability.isAvailable(space.id, interval.startAt, interval.endAt, id);
    if (!free) return this.unavailable(space, interval, now, id);

    const written = await this.lockedWrite(space.id, interval, id, (store) =>
      store.update(id, { ...fields, startAt: interval.startAt, endAt: interval.endAt }, { onlyActive: true }),
    );
    if (written.status === 'conflict') return this.unavailable(space, interval, now, id);
    if (written.status === 'gone') return this.rejected(failure('BookingNotFound', 'Booking not found'));

    const updated = written.booking;
    const intervalChanged = !sameInterval(existing, updated);
    const sideEffects = intervalChanged ? await this.afterReschedule(updated, existing, space, now) : [];
    incrementCounter('booking_updated');
    logger.info('[booking] updated', { bookingId: id, intervalChanged });
    return success(updated, sideEffects);
  }

  async cancelBooking(
    id: string,
    ownerId: string,
    reason?: string | null,
    now: Date = this.clock(),
  ): Promise<BookingOutcome> {
    const existing = await this.deps.bookings.findByIdAndOwner(id, ownerId);
    if (!existing || existing.status === 'cancelled') {
      return this.rejected(failure('BookingNotFound', 'Booking not found or already cancelled'));
    }
    if (existing.startAt <= now) {
      return this.rejected(
        failure('AlreadyStarted', 'Bookings that have already started cannot be cancelled'),
      );
    }

    const cancellationReason = reason?.trim() || null;
    const cancelled = await this.deps.bookings.update(
      id,
      { status: 'cancelled', updatedAt: now, cancellationReason },
      { onlyActive: true },
    );
    if (!cancelled) {
      return this.rejected(failure('BookingNotFound', 'Booking not found or already cancelled'));
    }

    const space = await this.spaceForSideEffects(cancelled.spaceId);
    const sideEffects = await this.afterCancel(cancelled, space);
    incrementCounter('booking_cancelled');
    logger.info('[booking] cancelled', { bookingId: id, ownerId });
    return success(cancelled, sideEffects);
  }

  async listForOwner(ownerId: string): Promise<OwnerBookingView[]> {
    const bookings = await this.deps.bookings.findByOwner(ownerId);
    const spaces = await this.spacesById(bookings);
    return bookings.map((b) => ({ ...b, spaceName: spaces.get(b.spaceId)?.name ?? DELETED_SPACE }));
  }

  async getStatistics(ownerId: string): Promise<BookingStatistics> {
    const stats = await this.deps.bookings.statisticsForOwner(ownerId);
    return { ...stats, totalHours: Math.round(stats.totalHours * 100) / 100 };
  }

  /**
   * Shared calendar of active bookings starting between two local dates (inclusive).
   * Other users' bookings hide notes and owner and shorten the purpose. Null on malformed dates.
   */
  async listCalendar(
    range: { from: string; to: string; spaceId?: string },
    viewerId: string,
  ): Promise<CalendarBookingView[] | null> {
    const tz = this.deps.config.timezone;
    const from = DateTime.fromFormat(range.from, 'yyyy-LL-dd', { zone: tz });
    const to = DateTime.fromFormat(range.to, 'yyyy-LL-dd', { zone: tz });
    if (!from.isValid || !to.isValid || to < from) return null;

    const bookings = await this.deps.bookings.findActiveStartingBetween(
      from.startOf('day').toJSDate(),
      to.startOf('day').plus({ days: 1 }).toJSDate(),
      range.spaceId,
    );
    const spaces = await this.spacesById(bookings);

    return bookings.map((b) => {
      const space = spaces.get(b.spaceId);
      const own = b.ownerId === viewerId;
      const view: CalendarBookingView = {
        id: b.id,
        spaceId: b.spaceId,
        spaceName: space?.name ?? DELETED_SPACE,
        spaceLocation: space?.location ?? '',
        startAt: b.startAt.toISOString(),
        endAt: b.endAt.toISOString(),
        purpose: own ? b.purpose : publicPurpose(b.purpose),
        status: b.status,
        materialsRequested: b.materialsRequested,
        notes: own ? b.notes : '',
        createdAt: b.createdAt.toISOString(),
        isOwnBooking: own,
      };
      if (own) view.ownerId = b.ownerId;
      return view;
    });
  }

  /**
   * Dashboard figures in the service timezone: active bookings starting today, this ISO week
   * and this month, the busiest spaces of the month, and the viewer's next bookings.
   */
  async getDashboardStats(viewerId: string, now: Date = this.clock()): Promise<DashboardStats> {
    const local = DateTime.fromJSDate(now).setZone(this.deps.config.timezone);
    const today = { from: local.startOf('day'), to: local.startOf('day').plus({ days: 1 }) };
    const week = { from: local.startOf('week'), to: local.startOf('week').plus({ weeks: 1 }) };
    const month = { from: local.startOf('month'), to: local.startOf('month').plus({ months: 1 }) };

    const active = await this.deps.bookings.findActiveStartingBetween(
      new Date(Math.min(week.from.toMillis(), month.from.toMillis())),
      new Date(Math.max(week.to.toMillis(), month.to.toMillis())),
    );
    const within = (range: { from: DateTime; to: DateTime }) =>
      active.filter((b) => b.startAt >= range.from.toJSDate() && b.startAt < range.to.toJSDate());
    const monthBookings = within(month);

    const perSpace = new Map<string, number>();
    for (const b of monthBookings) perSpace.set(b.spaceId, (perSpace.get(b.spaceId) ?? 0) + 1);
    const ranked = [...perSpace.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));

    const popularSpaces: DashboardStats['popularSpaces'] = [];
    for (const [spaceId, bookingCount] of ranked) {
      if (popularSpaces.length === POPULAR_SPACES_LIMIT) break;
      const space = await this.deps.spaces.getSpace(spaceId);
      if (space) popularSpaces.push({ spaceId, spaceName: space.name, bookingCount });
    }

    const upcoming = (await this.deps.bookings.findByOwner(viewerId))
      .filter((b) => b.status !== 'cancelled' && b.startAt >= now)
      .sort((a, b) => a.startAt.getTime() - b.startAt.getTime())
      .slice(0, NEXT_BOOKINGS_LIMIT);
    const spaces = await this.spacesById(upcoming);

    return {
      todayBookings: within(today).length,
      weekBookings: within(week).length,
      monthBookings: monthBookings.length,
      popularSpaces,
      nextBookings: upcoming.map((b) => ({
        id: b.id,
        spaceId: b.spaceId,
        spaceName: spaces.get(b.spaceId)?.name ?? DELETED_SPACE,
        startAt: b.startAt.toISOString(),
        endAt: b.endAt.toISOString(),
        purpose: b.purpose,
      })),
      generatedAt: now.toISOString(),
    };
  }

  private tzOf(space: Pick<Space, 'timezone'> | null): string {
    return tzOfSpace(space ?? {}, this.deps.config.timezone);
  }

  private parseInterval(start: Date | string, end: Date | string, space: Space): TimeInterval | null {
    const tz = this.tzOf(space);
    const startAt = toInstant(start, tz);
    const endAt = toInstant(end, tz);
    return startAt && endAt ? { startAt, endAt } : null;
  }

  /** Re-checks availability and writes while holding the space lock. */
  private async lockedWrite(
    spaceId: string,
    interval: TimeInterval,
    excludeId: string | undefined,
    write: (store: BookingStore) => Promise<Booking | null>,
  ): Promise<LockedWrite> {
    try {
      return await this.deps.bookings.withSpaceLock(spaceId, async (store): Promise<LockedWrite> => {
        const free = await this.deps.availability.isAvailable(
          spaceId,
          interval.startAt,
          interval.endAt,
          excludeId,
          store,
        );
        if (!free) return { status: 'conflict' };
        const booking = await write(store);
        return booking ? { status: 'ok', booking } : { status: 'gone' };
      });
    } catch (err) {
      if (err instanceof ConflictError) return { status: 'conflict' };
      throw err;
    }
  }

  private async unavailable(
    space: Space,
    interval: TimeInterval,
    now: Date,
    excludeBookingId?: string,
  ): Promise<BookingOutcome> {
    const alternatives = await this.deps.availability.suggestAlternatives(
      space,
      interval.startAt,
      interval.endAt,
      now,
      { excludeBookingId },
    );
    return this.rejected(
      failure('SpaceUnavailable', 'The space is already booked for the requested time', { alternatives }),
    );
  }

  private rejected(outcome: BookingOutcome): BookingOutcome {
    if (!outcome.ok) {
      incrementCounter('booking_rejected');
      logger.info('[booking] rejected', { kind: outcome.error.kind });
    }
    return outcome;
  }

  private async spacesById(bookings: Booking[]): Promise<Map<string, Space>> {
    const spaces = new Map<string, Space>();
    for (const spaceId of new Set(bookings.map((b) => b.spaceId))) {
      const space = await this.deps.spaces.getSpace(spaceId);
      if (space) spaces.set(spaceId, space);
    }
    return spaces;
  }

  /** The cancellation is already stored; a failed lookup only downgrades the email. */
  private async spaceForSideEffects(spaceId: string): Promise<Space | null> {
    try {
      return await this.deps.spaces.getSpace(spaceId);
    } catch (err) {
      logger.error('[booking] space lookup failed', { spaceId, err });
      return null;
    }
  }

  private async ownerContact(ownerId: string): Promise<UserContact | null> {
    try {
      return await this.deps.users.getContact(ownerId);
    } catch (err) {
      logger.error('[booking] owner contact lookup failed', { ownerId, err });
      return null;
    }
  }

  private invalidateDays(spaceId: string, dates: Date[], tz: string): Promise<SideEffectOutcome> {
    return runSideEffect(
      'availability_cache',
      async () => {
        const days = new Map(dates.map((d) => [formatYMD(d, tz), d]));
        for (const day of days.values()) {
          await this.deps.availability.invalidateDay(spaceId, day, tz);
        }
        return 'ok';
      },
      this.deps.sideEffectTimeoutMs,
      { spaceId },
    );
  }

  private async afterCreate(booking: Booking, space: Space, now: Date): Promise<SideEffectOutcome[]> {
    const { notifier, calendar, reminders, sideEffectTimeoutMs: timeout } = this.deps;
    const ctx = { bookingId: booking.id };
    const owner = await this.ownerContact(booking.ownerId);

    return Promise.all([
      owner
        ? runSideEffect(
            'confirmation_email',
            async () => ((await notifier.notifyCreated(booking, space, owner)) === 'sent' ? 'ok' : 'skipped'),
            timeout,
            ctx,
          )
        : skipped('confirmation_email', 'owner contact not found'),
      runSideEffect(
        'calendar_upsert',
        async () => ((await calendar.upsertEvent(booking, space)) === 'synced' ? 'ok' : 'skipped'),
        timeout,
        ctx,
      ),
      owner
        ? runSideEffect(
            'reminder_schedule',
            async () => ((await reminders.schedule(booking, owner, now)) === 'scheduled' ? 'ok' : 'skipped'),
            timeout,
            ctx,
          )
        : skipped('reminder_schedule', 'owner contact not found'),
      this.invalidateDays(space.id, [booking.startAt], this.tzOf(space)),
    ]);
  }

  private async afterReschedule(
    booking: Booking,
    previous: Booking,
    space: Space,
    now: Date,
  ): Promise<SideEffectOutcome[]> {
    const { notifier, calendar, reminders, sideEffectTimeoutMs: timeout } = this.deps;
    const ctx = { bookingId: booking.id };
    const owner = await this.ownerContact(booking.ownerId);

    return Promise.all([
      owner
        ? runSideEffect(
            'reschedule_email',
            async () => ((await notifier.notifyRescheduled(booking, space, owner)) === 'sent' ? 'ok' : 'skipped'),
            timeout,
            ctx,
          )
        : skipped('reschedule_email', 'owner contact not found'),
      runSideEffect(
        'calendar_upsert',
        async () => ((await calendar.upsertEvent(booking, space)) === 'synced' ? 'ok' : 'skipped'),
        timeout,
        ctx,
      ),
      owner
        ? runSideEffect(
            'reminder_schedule',
            async () => ((await reminders.schedule(booking, owner, now)) === 'scheduled' ? 'ok' : 'skipped'),
            timeout,
            ctx,
          )
        : runSideEffect(
            'reminder_cancel',
            async () => ((await reminders.cancel(booking.id)) ? 'ok' : 'skipped'),
            timeout,
            ctx,
          ),
      this.invalidateDays(space.id, [previous.startAt, booking.startAt], this.tzOf(space)),
    ]);
  }

  private cancellationEmail(
    booking: Booking,
    space: Space | null,
    owner: UserContact | null,
  ): Promise<SideEffectOutcome> | SideEffectOutcome {
    if (!owner) return skipped('cancellation_email', 'owner contact not found');
    if (!space) return skipped('cancellation_email', 'space not found');
    return runSideEffect(
      'cancellation_email',
      async () =>
        (await this.deps.notifier.notifyCancelled(booking, space, owner, booking.cancellationReason)) === 'sent'
          ? 'ok'
          : 'skipped',
      this.deps.sideEffectTimeoutMs,
      { bookingId: booking.id },
    );
  }

  private async afterCancel(booking: Booking, space: Space | null): Promise<SideEffectOutcome[]> {
    const { calendar, reminders, sideEffectTimeoutMs: timeout } = this.deps;
    const ctx = { bookingId: booking.id };
    const owner = await this.ownerContact(booking.ownerId);

    return Promise.all([
      this.cancellationEmail(booking, space, owner),
      runSideEffect(
        'calendar_remove',
        async () => ((await calendar.removeEvent(booking.id)) === 'synced' ? 'ok' : 'skipped'),
        timeout,
        ctx,
      ),
      runSideEffect(
        'reminder_cancel',
        async () => ((await reminders.cancel(booking.id)) ? 'ok' : 'skipped'),
        timeout,
        ctx,
      ),
      this.invalidateDays(booking.spaceId, [booking.startAt], this.tzOf(space)),
    ]);
  }
}
