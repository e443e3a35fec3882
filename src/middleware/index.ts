export * from './auth.middleware.js';
export * from './error.middleware.js';
export * from './rate-limit.middleware.js';
