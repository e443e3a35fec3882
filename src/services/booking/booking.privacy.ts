import type { DayBooking, DayBookingView } from '@core/interfaces/booking.types.js';

const PUBLIC_PURPOSE_LENGTH = 50;

/** What other users see of a booking's purpose. */
export function publicPurpose(purpose: string): string {
  return purpose.length > PUBLIC_PURPOSE_LENGTH ? `${purpose.slice(0, PUBLIC_PURPOSE_LENGTH)}...` : purpose;
}

export function dayBookingFor(entry: DayBooking, viewerId: string): DayBookingView {
  const { ownerId, ...rest } = entry;
  if (ownerId === viewerId) return { ...rest, ownerId, isOwnBooking: true };
  return { ...rest, purpose: publicPurpose(rest.purpose), isOwnBooking: false };
}
