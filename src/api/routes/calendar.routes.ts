import { Router, type NextFunction, type Request, type Response } from 'express';

import { ValidationError } from '@core/errors/validation.error.js';

import { requireUserId } from '@middleware/auth.middleware.js';

import type { BookingService } from '@services/booking/booking.service.js';

export interface CalendarRoutesDeps {
  bookings: BookingService;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createCalendarRoutes({ bookings }: CalendarRoutesDeps): Router {
  const router = Router();

  // GET /calendar/bookings?from=yyyy-MM-dd&to=yyyy-MM-dd[&spaceId=...]
  router.get('/calendar/bookings', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const viewerId = requireUserId(req);
      const from = queryString(req.query.from);
      const to = queryString(req.query.to);
      const list =
        from && to
          ? await bookings.listCalendar({ from, to, spaceId: queryString(req.query.spaceId) }, viewerId)
          : null;
      if (!list) {
        throw new ValidationError('from and to must be yyyy-MM-dd dates with from <= to', {
          kind: 'InvalidRequest',
        });
      }
      res.json({ bookings: list });
    } catch (err) {
      next(err);
    }
  });

  router.get('/calendar/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await bookings.getDashboardStats(requireUserId(req)));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
