import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError } from '../core/errors/base-error.js';
import { logger } from '../utils/logger.js';

interface ErrorPayload {
  code: string;
  message: string;
  traceId: string;
  data?: unknown;
}

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();

  if (err instanceof BaseError) {
    const payload: ErrorPayload = { code: err.code, message: err.message, traceId };
    if (err.data !== undefined) payload.data = err.data;
    res.status(err.status).json(payload);
    return;
  }

  if (isMalformedJson(err)) {
    const payload: ErrorPayload = {
      code: 'VALIDATION_ERROR',
      message: 'Request body is not valid JSON',
      traceId,
      data: { kind: 'InvalidRequest' },
    };
    res.status(400).json(payload);
    return;
  }

  logger.error('[http] unhandled error', { traceId, method: req.method, path: req.path, err });
  const payload: ErrorPayload = { code: 'INTERNAL_ERROR', message: 'Internal server error', traceId };
  res.status(500).json(payload);
};
