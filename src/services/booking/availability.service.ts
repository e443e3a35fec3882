import { DateTime } from 'luxon';

import {
  ACTIVE_STATUSES,
  type AlternativeSuggestion,
  type BulkAvailabilityEntry,
  type BulkAvailabilityQuery,
  type BulkAvailabilityResult,
  type DailyAvailability,
  type DailyGrid,
} from '@core/interfaces/booking.types.js';
import type { AvailabilityCachePort, BookingStore, SpaceDirectory } from '@core/interfaces/ports.js';
import type { Space } from '@core/interfaces/space.types.js';

import { logger } from '@utils/logger.js';
import { formatYMD, minutesBetween, overlaps, parseTimeOfDay, tzOfSpace } from '@utils/time.js';

import { dayBookingFor } from './booking.privacy.js';
import type { BookingRuntimeConfig } from './config.defaults.js';
import type { ConstraintService } from './constraint.service.js';
import { buildSlotsForDay, operatingWindowForDate } from './operating-hours.util.js';

export interface AvailabilityServiceDeps {
  bookings: BookingStore;
  spaces: SpaceDirectory;
  constraints: ConstraintService;
  cache: AvailabilityCachePort;
  config: BookingRuntimeConfig;
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export class AvailabilityService {
  constructor(private readonly deps: AvailabilityServiceDeps) {}

  /**
   * True when no pending or confirmed booking of the space overlaps [startAt, endAt).
   * Read-only; `store` lets callers run the check on a locked store.
   */
  async isAvailable(
    spaceId: string,
    startAt: Date,
    endAt: Date,
    excludeBookingId?: string,
    store: BookingStore = this.deps.bookings,
  ): Promise<boolean> {
    const existing = await store.findOverlapping(spaceId, startAt, endAt, {
      excludeId: excludeBookingId,
      statuses: ACTIVE_STATUSES,
    });
    return !existing.some(
      (b) =>
        b.id !== excludeBookingId &&
        ACTIVE_STATUSES.includes(b.status) &&
        overlaps(startAt, endAt, b.startAt, b.endAt),
    );
  }

  /** Free windows of the same length on the same local day, closest to the requested start first. */
  async suggestAlternatives(
    space: Space,
    startAt: Date,
    endAt: Date,
    now: Date,
    opts: { excludeBookingId?: string; max?: number } = {},
  ): Promise<AlternativeSuggestion[]> {
    const { config, constraints } = this.deps;
    const max = opts.max ?? 6;
    const tz = tzOfSpace(space, config.timezone);
    const durationMin = minutesBetween(startAt, endAt);
    if (durationMin <= 0) return [];

    const hours = space.operatingHours ?? config.defaultOperatingHours;
    const window = operatingWindowForDate(formatYMD(startAt, tz), tz, hours);
    if (!window) return [];

    const occupied = await this.deps.bookings.findOverlapping(
      space.id,
      window.start.toJSDate(),
      window.end.toJSDate(),
      { excludeId: opts.excludeBookingId, statuses: ACTIVE_STATUSES },
    );
    const busy = occupied.filter((b) => b.id !== opts.excludeBookingId);

    const base = startAt.getTime();
    const candidates: Date[] = [];
    let cursor = window.start;
    while (cursor.plus({ minutes: durationMin }) <= window.end) {
      const cStart = cursor.toJSDate();
      const cEnd = cursor.plus({ minutes: durationMin }).toJSDate();
      cursor = cursor.plus({ minutes: config.alternativeStepMinutes });

      if (cStart.getTime() === base) continue;
      if (busy.some((b) => overlaps(cStart, cEnd, b.startAt, b.endAt))) continue;
      if (!constraints.validate(space, { startAt: cStart, endAt: cEnd }, now).ok) continue;
      candidates.push(cStart);
    }

    return candidates
      .sort((a, b) => Math.abs(a.getTime() - base) - Math.abs(b.getTime() - base))
      .slice(0, max)
      .map(
        (start, i): AlternativeSuggestion => ({
          start: start.toISOString(),
          end: new Date(start.getTime() + durationMin * 60000).toISOString(),
          reason: i === 0 ? 'closest' : start.getTime() < base ? 'shift_earlier' : 'shift_later',
        }),
      );
  }

  /**
   * Hourly grid of a local date plus the active bookings on it, masked for `viewerId`
   * the same way as the shared calendar. Null when the date is malformed.
   */
  async getDailyAvailability(space: Space, dayISO: string, viewerId: string): Promise<DailyAvailability | null> {
    const grid = await this.dailyGrid(space, dayISO);
    if (!grid) return null;
    return { ...grid, bookings: grid.bookings.map((b) => dayBookingFor(b, viewerId)) };
  }

  private async dailyGrid(space: Space, dayISO: string): Promise<DailyGrid | null> {
    const { config } = this.deps;
    const tz = tzOfSpace(space, config.timezone);
    if (!DATE_RE.test(dayISO) || !DateTime.fromISO(dayISO, { zone: tz }).isValid) return null;

    const cached = await this.readCache(space.id, dayISO);
    if (cached) return cached;

    const hours = space.operatingHours ?? config.defaultOperatingHours;
    const slots = buildSlotsForDay(dayISO, tz, hours, config.gridSlotMinutes);
    const dayStart = DateTime.fromISO(dayISO, { zone: tz }).startOf('day');
    const bookings = await this.deps.bookings.findOverlapping(
      space.id,
      dayStart.toJSDate(),
      dayStart.plus({ days: 1 }).toJSDate(),
      { statuses: ACTIVE_STATUSES },
    );
    bookings.sort((a, b) => a.startAt.getTime() - b.startAt.getTime());

    const grid: DailyGrid = {
      spaceId: space.id,
      date: dayISO,
      operatingHours: hours,
      slots: slots.map((slot) => {
        const start = slot.start.toJSDate();
        const end = slot.end.toJSDate();
        return {
          start: start.toISOString(),
          end: end.toISOString(),
          available: !bookings.some((b) => overlaps(start, end, b.startAt, b.endAt)),
        };
      }),
      bookings: bookings.map((b) => ({
        id: b.id,
        ownerId: b.ownerId,
        startAt: b.startAt.toISOString(),
        endAt: b.endAt.toISOString(),
        purpose: b.purpose,
        status: b.status,
      })),
    };

    await this.writeCache(space.id, dayISO, grid);
    return grid;
  }

  async checkBulk(query: BulkAvailabilityQuery): Promise<BulkAvailabilityResult[]> {
    const results: BulkAvailabilityResult[] = [];
    for (const spaceId of query.spaceIds) {
      const space = await this.deps.spaces.getSpace(spaceId);
      if (!space || !space.active) continue;

      const availability: BulkAvailabilityEntry[] = [];
      for (const date of query.dates) {
        availability.push(await this.checkWindow(space, date, query.startTime, query.endTime));
      }
      results.push({
        spaceId: space.id,
        spaceName: space.name,
        spaceLocation: space.location,
        availability,
      });
    }
    return results;
  }

  private async checkWindow(
    space: Space,
    date: string,
    startTime: string,
    endTime: string,
  ): Promise<BulkAvailabilityEntry> {
    const tz = tzOfSpace(space, this.deps.config.timezone);
    const day = DateTime.fromISO(date, { zone: tz });
    if (!DATE_RE.test(date) || !day.isValid) {
      return { date, available: false, conflictReason: 'invalid_date' };
    }
    const open = parseTimeOfDay(startTime);
    const close = parseTimeOfDay(endTime);
    if (open === null || close === null || close <= open) {
      return { date, available: false, conflictReason: 'invalid_time' };
    }
    const startAt = day.startOf('day').plus({ minutes: open }).toJSDate();
    const endAt = day.startOf('day').plus({ minutes: close }).toJSDate();
    const free = await this.isAvailable(space.id, startAt, endAt);
    return { date, available: free, conflictReason: free ? null : 'occupied' };
  }

  async invalidateDay(spaceId: string, startAt: Date, tz: string): Promise<void> {
    await this.deps.cache.invalidateDailyAvailability(spaceId, formatYMD(startAt, tz));
  }

  private async readCache(spaceId: string, dayISO: string): Promise<DailyGrid | null> {
    try {
      const cached = await this.deps.cache.getDailyAvailability(spaceId, dayISO);
      // older entries carry no bookings list
      return cached && Array.isArray(cached.bookings) ? cached : null;
    } catch (err) {
      logger.warn('[availability] cache read failed', { spaceId, dayISO, err });
      return null;
    }
  }

  private async writeCache(spaceId: string, dayISO: string, grid: DailyGrid): Promise<void> {
    try {
      await this.deps.cache.setDailyAvailability(spaceId, dayISO, grid);
    } catch (err) {
      logger.warn('[availability] cache write failed', { spaceId, dayISO, err });
    }
  }
}
