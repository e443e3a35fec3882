export * from './booking.types.js';
export * from './space.types.js';
export * from './ports.js';
