export abstract class BaseError extends Error {
  constructor(
    public code: string,
    public status: number,
    message?: string,
    public data?: unknown,
  ) {
    super(message);
  }
}
