import { Router, type RequestHandler } from 'express';

import { authMiddleware } from '@middleware/auth.middleware.js';

import { createAvailabilityRoutes, type AvailabilityRoutesDeps } from './availability.routes.js';
import { createBookingRoutes, type BookingRoutesDeps } from './bookings.routes.js';
import { createCalendarRoutes } from './calendar.routes.js';

export interface ApiDeps extends BookingRoutesDeps, AvailabilityRoutesDeps {
  rateLimit?: RequestHandler;
}

export function createApiRouter(deps: ApiDeps): Router {
  const v1Router = Router();
  v1Router.use(authMiddleware);
  if (deps.rateLimit) v1Router.use(deps.rateLimit);
  v1Router.use('/bookings', createBookingRoutes(deps));
  v1Router.use(createAvailabilityRoutes(deps));
  v1Router.use(createCalendarRoutes(deps));

  const router = Router();
  router.use('/v1', v1Router);
  return router;
}
