import { BaseError } from './base-error.js';

export class ValidationError extends BaseError {
  constructor(message = 'Validation failed', data?: unknown) {
    super('VALIDATION_ERROR', 422, message, data);
  }
}
