import type { DailyGrid } from '@core/interfaces/booking.types.js';
import type { AvailabilityCachePort } from '@core/interfaces/ports.js';

import type { RedisClient } from '@infra/redis/redis.client.js';
import { redisPrefixes } from '@infra/redis/redis.config.js';

function keyForAvailability(spaceId: string, dateKey: string): string {
  return `${redisPrefixes.availability}:${spaceId}:${dateKey}`;
}

function safeParse<T>(raw: string | null): T | null {
  if (!raw) return null;
  try {
    return JSON.parse(raw) as T;
  } catch {
    return null;
  }
}

export class AvailabilityCache implements AvailabilityCachePort {
  constructor(
    private readonly redis: RedisClient,
    private readonly defaultTtl: number,
  ) {}

  async getDailyAvailability(spaceId: string, dateKey: string): Promise<DailyGrid | null> {
    const raw = await this.redis.get(keyForAvailability(spaceId, dateKey));
    return safeParse<DailyGrid>(raw);
  }

  async setDailyAvailability(
    spaceId: string,
    dateKey: string,
    payload: DailyGrid,
    ttlSec: number = this.defaultTtl,
  ): Promise<void> {
    await this.redis.set(keyForAvailability(spaceId, dateKey), JSON.stringify(payload), { EX: ttlSec });
  }

  async invalidateDailyAvailability(spaceId: string, dateKey: string): Promise<number> {
    return this.redis.del(keyForAvailability(spaceId, dateKey));
  }
}
