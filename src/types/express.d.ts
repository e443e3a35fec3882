declare global {
  namespace Express {
    interface Request {
      /** Set by the auth middleware from the `x-user-id` header. */
      userId?: string;
    }
  }
}

export {};
