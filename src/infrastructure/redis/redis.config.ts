import type { ConnectionOptions } from 'bullmq';

export const redisPrefixes = {
  availability: 'avail',
  rateLimit: 'ratelimit',
} as const;

/** BullMQ talks to Redis through ioredis, which takes discrete options rather than a URL. */
export function bullConnectionFromUrl(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : 0;
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: Number.isInteger(db) ? db : 0,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}
