import type { Space, SpaceDirectory } from '@core/interfaces/index.js';

import type { Queryable } from '@infra/database/pg.client.js';

interface SpaceRow {
  id: string;
  name: string;
  location: string;
  capacity: number;
  active: boolean;
  timezone: string | null;
  open_time: string | null;
  close_time: string | null;
  max_duration_minutes: number | null;
  advance_booking_days: number | null;
}

function toSpace(row: SpaceRow): Space {
  return {
    id: row.id,
    name: row.name,
    location: row.location,
    capacity: row.capacity,
    active: row.active,
    timezone: row.timezone,
    operatingHours:
      row.open_time && row.close_time ? { start: row.open_time, end: row.close_time } : null,
    constraints: {
      maxDurationMinutes: row.max_duration_minutes ?? undefined,
      advanceBookingDays: row.advance_booking_days ?? undefined,
    },
  };
}

export class SpaceRepository implements SpaceDirectory {
  constructor(private readonly db: Queryable) {}

  async getSpace(id: string): Promise<Space | null> {
    const res = await this.db.query<SpaceRow>(
      `SELECT id, name, location, capacity, active, timezone, open_time, close_time,
              max_duration_minutes, advance_booking_days
         FROM spaces
        WHERE id = $1`,
      [id],
    );
    return res.rows[0] ? toSpace(res.rows[0]) : null;
  }
}
