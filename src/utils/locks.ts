import crypto from 'crypto';

import type { Queryable } from '@infra/database/pg.client.js';

function hashKey(str: string): number {
  // signed 32-bit int for pg advisory lock
  return crypto.createHash('md5').update(str).digest().readInt32BE(0);
}

/** Held until the surrounding transaction commits or rolls back. */
export async function pgAdvisoryXactLock(client: Queryable, key: string): Promise<void> {
  await client.query('SELECT pg_advisory_xact_lock($1)', [hashKey(key)]);
}

export function spaceLockKey(spaceId: string): string {
  return `bookings:space:${spaceId}`;
}
