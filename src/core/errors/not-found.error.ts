import { BaseError } from './base-error.js';

export class NotFoundError extends BaseError {
  constructor(message = 'Not found', data?: unknown) {
    super('NOT_FOUND', 404, message, data);
  }
}
