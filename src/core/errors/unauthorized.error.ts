import { BaseError } from './base-error.js';

export class UnauthorizedError extends BaseError {
  constructor(message = 'Authentication required', data?: unknown) {
    super('UNAUTHORIZED', 401, message, data);
  }
}
