import type { NextFunction, Request, Response } from 'express';

import { redisPrefixes } from '@infra/redis/redis.config.js';

import { logger } from '@utils/logger.js';

export interface RateLimitStore {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<unknown>;
}

export interface RateLimitOptions {
  windowSec: number;
  max: number;
}

/** Fixed-window counter per user (or IP when anonymous). Redis errors let the request through. */
export function createRateLimitMiddleware(store: RateLimitStore, opts: RateLimitOptions) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const who = req.userId ?? req.ip ?? 'anon';
    const key = `${redisPrefixes.rateLimit}:${who}`;
    try {
      const count = await store.incr(key);
      if (count === 1) {
        await store.expire(key, opts.windowSec);
      }
      if (count > opts.max) {
        res.setHeader('Retry-After', String(opts.windowSec));
        res.status(429).json({ code: 'RATE_LIMITED', message: 'Too many requests, try again shortly' });
        return;
      }
    } catch (err) {
      logger.warn('[rate-limit] store unavailable, request allowed', { key, err });
    }
    next();
  };
}
