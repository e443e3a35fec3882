import pg from 'pg';
import type { Pool as PgPool, PoolClient } from 'pg';

import { logger } from '@utils/logger.js';

export type Pool = PgPool;

/** Anything that can run a parameterised query: the pool or a checked-out client. */
export type Queryable = Pick<PoolClient, 'query'>;

export interface DatabaseOptions {
  connectionString: string;
  max: number;
  ssl: boolean;
}

export function createPool(options: DatabaseOptions): Pool {
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
    max: options.max,
    ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
  });

  pool.on('error', (err) => {
    logger.error('[db] pool error', { err });
  });

  return pool;
}

export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error('[db] rollback failed', { err: rollbackErr });
    }
    throw err;
  } finally {
    client.release();
  }
}

export function pgErrorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export async function pingDatabase(db: Queryable): Promise<boolean> {
  const res = await db.query<{ ok: number }>('SELECT 1 AS ok');
  return res.rows[0]?.ok === 1;
}
