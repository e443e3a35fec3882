import { Router, type Request, type Response } from 'express';

import { logger } from '@utils/logger.js';
import { snapshotCounters } from '@utils/metrics.js';

export type HealthCheck = () => Promise<unknown>;

export function createHealthRoutes(checks: Record<string, HealthCheck>): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const results: Record<string, 'up' | 'down'> = {};
    for (const [name, check] of Object.entries(checks)) {
      try {
        await check();
        results[name] = 'up';
      } catch (err) {
        logger.warn('[health] dependency down', { name, err });
        results[name] = 'down';
      }
    }
    const healthy = Object.values(results).every((s) => s === 'up');
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      checks: results,
      counters: snapshotCounters(),
    });
  });

  return router;
}
