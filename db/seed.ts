import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { config } from '../src/config/env.config.js';
import { createPool, withTransaction } from '../src/infrastructure/database/pg.client.js';
import { logger } from '../src/utils/logger.js';

const SeedSchema = z.object({
  users: z.array(z.object({ id: z.string(), email: z.string().email(), fullName: z.string() })),
  spaces: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      location: z.string(),
      capacity: z.number().int().nonnegative(),
      openTime: z.string().nullable(),
      closeTime: z.string().nullable(),
      maxDurationMinutes: z.number().int().positive().nullable(),
      advanceBookingDays: z.number().int().nonnegative().nullable(),
    }),
  ),
});

async function main() {
  const raw = await readFile(new URL('./seed-data.json', import.meta.url), 'utf8');
  const data = SeedSchema.parse(JSON.parse(raw));
  const schema = await readFile(new URL('./schema.sql', import.meta.url), 'utf8');

  const pool = createPool({ connectionString: config.DATABASE_URL, max: 2, ssl: false });
  try {
    await pool.query(schema);
    await withTransaction(pool, async (client) => {
      for (const u of data.users) {
        await client.query(
          `INSERT INTO users (id, email, full_name) VALUES ($1, $2, $3)
           ON CONFLICT (id) DO UPDATE SET email = EXCLUDED.email, full_name = EXCLUDED.full_name`,
          [u.id, u.email, u.fullName],
        );
      }
      for (const s of data.spaces) {
        await client.query(
          `INSERT INTO spaces (id, name, location, capacity, active, open_time, close_time,
                               max_duration_minutes, advance_booking_days)
           VALUES ($1, $2, $3, $4, TRUE, $5, $6, $7, $8)
           ON CONFLICT (id) DO UPDATE SET
             name = EXCLUDED.name, location = EXCLUDED.location, capacity = EXCLUDED.capacity,
             open_time = EXCLUDED.open_time, close_time = EXCLUDED.close_time,
             max_duration_minutes = EXCLUDED.max_duration_minutes,
             advance_booking_days = EXCLUDED.advance_booking_days`,
          [s.id, s.name, s.location, s.capacity, s.openTime, s.closeTime, s.maxDurationMinutes, s.advanceBookingDays],
        );
      }
    });
    logger.info('[seed] done', { users: data.users.length, spaces: data.spaces.length });
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.error('[seed] failed', { err });
  process.exit(1);
});
