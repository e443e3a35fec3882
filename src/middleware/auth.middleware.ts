import type { NextFunction, Request, Response } from 'express';

import { UnauthorizedError } from '@core/errors/unauthorized.error.js';

/** Identity comes from the `x-user-id` header set by the upstream gateway. */
export const authMiddleware = (req: Request, _res: Response, next: NextFunction) => {
  const userId = req.header('x-user-id')?.trim();
  if (!userId) {
    next(new UnauthorizedError('Missing x-user-id header'));
    return;
  }
  req.userId = userId;
  next();
};

export function requireUserId(req: Request): string {
  if (!req.userId) throw new UnauthorizedError('Missing x-user-id header');
  return req.userId;
}
