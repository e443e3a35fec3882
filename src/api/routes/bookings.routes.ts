import { Router, type NextFunction, type Request, type Response } from 'express';

import { toHttpError } from '@core/errors/booking-failure.js';
import type { BookingOutcome } from '@core/interfaces/booking.types.js';

import { requireUserId } from '@middleware/auth.middleware.js';

import type { BookingService } from '@services/booking/booking.service.js';

export interface BookingRoutesDeps {
  bookings: BookingService;
}

function respond(res: Response, outcome: BookingOutcome, status = 200): void {
  if (!outcome.ok) throw toHttpError(outcome.error);
  res.status(status).json({
    booking: outcome.booking,
    sideEffects: outcome.sideEffects,
    warnings: outcome.warnings,
  });
}

function reasonOf(req: Request): string | null {
  const fromBody: unknown = req.body?.reason;
  if (typeof fromBody === 'string') return fromBody;
  const fromQuery = req.query.reason;
  return typeof fromQuery === 'string' ? fromQuery : null;
}

export function createBookingRoutes({ bookings }: BookingRoutesDeps): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireUserId(req);
      const outcome = await bookings.createBooking({ ...req.body, ownerId });
      respond(res, outcome, 201);
    } catch (err) {
      next(err);
    }
  });

  const listOwn = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const list = await bookings.listForOwner(requireUserId(req));
      res.json({ bookings: list });
    } catch (err) {
      next(err);
    }
  };
  router.get('/', listOwn);
  router.get('/history', listOwn);

  router.get('/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await bookings.getStatistics(requireUserId(req)));
    } catch (err) {
      next(err);
    }
  });

  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireUserId(req);
      const outcome = await bookings.updateBooking(req.params.id, ownerId, req.body ?? {});
      respond(res, outcome);
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireUserId(req);
      const outcome = await bookings.cancelBooking(req.params.id, ownerId, reasonOf(req));
      respond(res, outcome);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
