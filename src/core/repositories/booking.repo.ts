import {
  ACTIVE_STATUSES,
  type Booking,
  type BookingPatch,
  type BookingStatistics,
  type BookingStatus,
  type NewBooking,
} from '@core/interfaces/booking.types.js';
import type { BookingStore, OverlapQuery } from '@core/interfaces/ports.js';
import { ConflictError } from '@core/errors/conflict.error.js';

import { pgErrorCode, withTransaction, type Pool, type Queryable } from '@infra/database/pg.client.js';

import { pgAdvisoryXactLock, spaceLockKey } from '@utils/locks.js';

interface BookingRow {
  id: string;
  owner_id: string;
  space_id: string;
  start_at: Date;
  end_at: Date;
  status: BookingStatus;
  purpose: string;
  materials_requested: string[] | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
  cancellation_reason: string | null;
}

const COLUMNS = `id, owner_id, space_id, start_at, end_at, status, purpose,
  materials_requested, notes, created_at, updated_at, cancellation_reason`;

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof BookingPatch, string]> = [
  ['startAt', 'start_at'],
  ['endAt', 'end_at'],
  ['status', 'status'],
  ['purpose', 'purpose'],
  ['materialsRequested', 'materials_requested'],
  ['notes', 'notes'],
  ['updatedAt', 'updated_at'],
  ['cancellationReason', 'cancellation_reason'],
];

// exclusion constraint bookings_no_overlap
const EXCLUSION_VIOLATION = '23P01';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function toBooking(row: BookingRow): Booking {
  return {
    id: row.id,
    ownerId: row.owner_id,
    spaceId: row.space_id,
    startAt: row.start_at,
    endAt: row.end_at,
    status: row.status,
    purpose: row.purpose,
    materialsRequested: row.materials_requested ?? [],
    notes: row.notes ?? '',
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    cancellationReason: row.cancellation_reason,
  };
}

function rethrowOverlap(err: unknown): never {
  if (pgErrorCode(err) === EXCLUSION_VIOLATION) {
    throw new ConflictError('The space is already booked for the requested time');
  }
  throw err;
}

export class BookingRepository implements BookingStore {
  constructor(
    private readonly pool: Pool,
    private readonly db: Queryable = pool,
    private readonly inTransaction = false,
  ) {}

  async findOverlapping(
    spaceId: string,
    startAt: Date,
    endAt: Date,
    query: OverlapQuery = {},
  ): Promise<Booking[]> {
    const statuses = query.statuses ?? ACTIVE_STATUSES;
    const excludeId = query.excludeId && UUID_RE.test(query.excludeId) ? query.excludeId : null;
    const res = await this.db.query<BookingRow>(
      `SELECT ${COLUMNS}
         FROM bookings
        WHERE space_id = $1
          AND status = ANY($2::text[])
          AND start_at < $3
          AND end_at > $4
          AND ($5::uuid IS NULL OR id <> $5::uuid)
        ORDER BY start_at`,
      [spaceId, [...statuses], endAt, startAt, excludeId],
    );
    return res.rows.map(toBooking);
  }

  async insert(booking: NewBooking): Promise<Booking> {
    try {
      const res = await this.db.query<BookingRow>(
        `INSERT INTO bookings (owner_id, space_id, start_at, end_at, status, purpose,
                               materials_requested, notes, created_at, updated_at, cancellation_reason)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         RETURNING ${COLUMNS}`,
        [
          booking.ownerId,
          booking.spaceId,
          booking.startAt,
          booking.endAt,
          booking.status,
          booking.purpose,
          booking.materialsRequested,
          booking.notes,
          booking.createdAt,
          booking.updatedAt,
          booking.cancellationReason,
        ],
      );
      return toBooking(res.rows[0]);
    } catch (err) {
      return rethrowOverlap(err);
    }
  }

  async update(id: string, fields: BookingPatch, opts: { onlyActive?: boolean } = {}): Promise<Booking | null> {
    if (!UUID_RE.test(id)) return null;
    const sets: string[] = [];
    const values: unknown[] = [id];
    for (const [key, column] of PATCH_COLUMNS) {
      const value = fields[key];
      if (value === undefined) continue;
      values.push(value);
      sets.push(`${column} = $${values.length}`);
    }
    if (sets.length === 0) return this.findById(id);

    let where = 'id = $1';
    if (opts.onlyActive) {
      values.push([...ACTIVE_STATUSES]);
      where += ` AND status = ANY($${values.length}::text[])`;
    }

    try {
      const res = await this.db.query<BookingRow>(
        `UPDATE bookings SET ${sets.join(', ')} WHERE ${where} RETURNING ${COLUMNS}`,
        values,
      );
      return res.rows[0] ? toBooking(res.rows[0]) : null;
    } catch (err) {
      return rethrowOverlap(err);
    }
  }

  async findByIdAndOwner(id: string, ownerId: string): Promise<Booking | null> {
    if (!UUID_RE.test(id)) return null;
    const res = await this.db.query<BookingRow>(
      `SELECT ${COLUMNS} FROM bookings WHERE id = $1 AND owner_id = $2`,
      [id, ownerId],
    );
    return res.rows[0] ? toBooking(res.rows[0]) : null;
  }

  async findById(id: string): Promise<Booking | null> {
    if (!UUID_RE.test(id)) return null;
    const res = await this.db.query<BookingRow>(`SELECT ${COLUMNS} FROM bookings WHERE id = $1`, [id]);
    return res.rows[0] ? toBooking(res.rows[0]) : null;
  }

  async findByOwner(ownerId: string): Promise<Booking[]> {
    const res = await this.db.query<BookingRow>(
      `SELECT ${COLUMNS} FROM bookings WHERE owner_id = $1 ORDER BY start_at DESC`,
      [ownerId],
    );
    return res.rows.map(toBooking);
  }

  async findActiveStartingBetween(from: Date, to: Date, spaceId?: string): Promise<Booking[]> {
    const res = await this.db.query<BookingRow>(
      `SELECT ${COLUMNS}
         FROM bookings
        WHERE start_at >= $1
          AND start_at < $2
          AND status = ANY($3::text[])
          AND ($4::text IS NULL OR space_id = $4)
        ORDER BY start_at`,
      [from, to, [...ACTIVE_STATUSES], spaceId ?? null],
    );
    return res.rows.map(toBooking);
  }

  async statisticsForOwner(ownerId: string): Promise<BookingStatistics> {
    const res = await this.db.query<{
      total: number;
      confirmed: number;
      cancelled: number;
      hours: number;
    }>(
      `SELECT COUNT(*)::int AS total,
              COUNT(*) FILTER (WHERE status = 'confirmed')::int AS confirmed,
              COUNT(*) FILTER (WHERE status = 'cancelled')::int AS cancelled,
              COALESCE(SUM(EXTRACT(EPOCH FROM (end_at - start_at))) / 3600, 0)::float8 AS hours
         FROM bookings
        WHERE owner_id = $1`,
      [ownerId],
    );
    const row = res.rows[0];
    return {
      totalBookings: row?.total ?? 0,
      confirmedBookings: row?.confirmed ?? 0,
      cancelledBookings: row?.cancelled ?? 0,
      totalHours: row?.hours ?? 0,
    };
  }

  async withSpaceLock<T>(spaceId: string, fn: (store: BookingStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      await pgAdvisoryXactLock(this.db, spaceLockKey(spaceId));
      return fn(this);
    }
    return withTransaction(this.pool, async (client) => {
      await pgAdvisoryXactLock(client, spaceLockKey(spaceId));
      return fn(new BookingRepository(this.pool, client, true));
    });
  }
}
