import { describe, it, expect } from 'vitest';

import { toHttpError } from '@core/errors/booking-failure.js';
import { ConflictError } from '@core/errors/conflict.error.js';
import { ValidationError } from '@core/errors/validation.error.js';

describe('toHttpError', () => {
  it('maps unavailability to a conflict carrying the alternatives', () => {
    const alternatives = [
      { start: '2030-03-06T11:00:00.000Z', end: '2030-03-06T13:00:00.000Z', reason: 'closest' as const },
    ];
    const err = toHttpError({ kind: 'SpaceUnavailable', message: 'taken', data: { alternatives } });
    expect(err).toBeInstanceOf(ConflictError);
    expect(err.status).toBe(409);
    expect(err.data).toEqual({ kind: 'SpaceUnavailable', alternatives });
  });

  it('maps rule violations to 422', () => {
    const err = toHttpError({ kind: 'OutsideOperatingHours', message: 'closed' });
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.status).toBe(422);
    expect(err.data).toEqual({ kind: 'OutsideOperatingHours' });
  });

  it.each([
    ['SpaceNotFound', 404, 'NOT_FOUND'],
    ['BookingNotFound', 404, 'NOT_FOUND'],
    ['AlreadyStarted', 409, 'BUSINESS_RULE'],
    ['Unauthorized', 401, 'UNAUTHORIZED'],
    ['InvalidRequest', 422, 'VALIDATION_ERROR'],
  ] as const)('maps %s to %i', (kind, status, code) => {
    const err = toHttpError({ kind, message: 'x' });
    expect(err.status).toBe(status);
    expect(err.code).toBe(code);
  });
});
