import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';

import { NotFoundError } from '@core/errors/not-found.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type { SpaceDirectory } from '@core/interfaces/ports.js';
import type { Space } from '@core/interfaces/space.types.js';

import { requireUserId } from '@middleware/auth.middleware.js';

import type { AvailabilityService } from '@services/booking/availability.service.js';
import { issuesOf } from '@services/booking/booking.schemas.js';

import { toInstant, tzOfSpace } from '@utils/time.js';

export interface AvailabilityRoutesDeps {
  availability: AvailabilityService;
  spaces: SpaceDirectory;
  timezone: string;
  clock?: () => Date;
}

const DailyQuery = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be yyyy-MM-dd'),
});

const CheckQuery = z.object({
  spaceId: z.string().min(1),
  startAt: z.string().min(1),
  endAt: z.string().min(1),
  excludeId: z.string().min(1).optional(),
});

const BulkBody = z.object({
  spaceIds: z.array(z.string().min(1)).min(1).max(20),
  dates: z.array(z.string()).min(1).max(31),
  startTime: z.string(),
  endTime: z.string(),
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid request parameters', {
      kind: 'InvalidRequest',
      issues: issuesOf(parsed.error),
    });
  }
  return parsed.data;
}

export function createAvailabilityRoutes(deps: AvailabilityRoutesDeps): Router {
  const { availability, spaces } = deps;
  const clock = deps.clock ?? (() => new Date());
  const router = Router();

  async function activeSpace(spaceId: string): Promise<Space> {
    const space = await spaces.getSpace(spaceId);
    if (!space || !space.active) {
      throw new NotFoundError('Space not found or not accepting bookings', { kind: 'SpaceNotFound' });
    }
    return space;
  }

  router.get('/spaces/:spaceId/availability', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const viewerId = requireUserId(req);
      const { date } = parseOrThrow(DailyQuery, req.query);
      const space = await activeSpace(req.params.spaceId);
      const grid = await availability.getDailyAvailability(space, date, viewerId);
      if (!grid) {
        throw new ValidationError('date is not a valid calendar date', { kind: 'InvalidRequest' });
      }
      res.json(grid);
    } catch (err) {
      next(err);
    }
  });

  router.get('/availability/check', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseOrThrow(CheckQuery, req.query);
      const space = await activeSpace(query.spaceId);
      const tz = tzOfSpace(space, deps.timezone);
      const startAt = toInstant(query.startAt, tz);
      const endAt = toInstant(query.endAt, tz);
      if (!startAt || !endAt) {
        throw new ValidationError('startAt and endAt must be valid ISO datetimes', { kind: 'InvalidRequest' });
      }
      if (endAt <= startAt) {
        throw new ValidationError('The end time must be after the start time', { kind: 'InvalidInterval' });
      }

      const available = await availability.isAvailable(space.id, startAt, endAt, query.excludeId);
      const alternatives = available
        ? []
        : await availability.suggestAlternatives(space, startAt, endAt, clock(), {
            excludeBookingId: query.excludeId,
          });
      res.json({
        spaceId: space.id,
        startAt: startAt.toISOString(),
        endAt: endAt.toISOString(),
        available,
        alternatives,
      });
    } catch (err) {
      next(err);
    }
  });

  router.post('/availability/bulk', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseOrThrow(BulkBody, req.body);
      res.json({ results: await availability.checkBulk(query) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
