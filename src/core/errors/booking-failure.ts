import type { BookingFailure } from '@core/interfaces/booking.types.js';

import type { BaseError } from './base-error.js';
import { BusinessRuleError } from './business-rule.error.js';
import { ConflictError } from './conflict.error.js';
import { NotFoundError } from './not-found.error.js';
import { UnauthorizedError } from './unauthorized.error.js';
import { ValidationError } from './validation.error.js';

/** Maps a lifecycle failure onto the HTTP error the middleware renders. */
export function toHttpError(failure: BookingFailure): BaseError {
  const data = { kind: failure.kind, ...failure.data };
  switch (failure.kind) {
    case 'InvalidRequest':
    case 'InvalidInterval':
    case 'PastBooking':
    case 'DurationOutOfBounds':
    case 'InsufficientAdvanceNotice':
    case 'OutsideOperatingHours':
      return new ValidationError(failure.message, data);
    case 'SpaceUnavailable':
      return new ConflictError(failure.message, data);
    case 'SpaceNotFound':
    case 'BookingNotFound':
      return new NotFoundError(failure.message, data);
    case 'AlreadyStarted':
      return new BusinessRuleError(failure.message, data);
    case 'Unauthorized':
      return new UnauthorizedError(failure.message, data);
  }
}
