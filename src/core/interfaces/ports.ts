import type {
  Booking,
  BookingPatch,
  BookingStatistics,
  BookingStatus,
  DailyGrid,
  NewBooking,
} from './booking.types.js';
import type { Space, UserContact } from './space.types.js';

export interface OverlapQuery {
  excludeId?: string;
  statuses?: readonly BookingStatus[];
}

export interface BookingStore {
  findOverlapping(spaceId: string, startAt: Date, endAt: Date, query?: OverlapQuery): Promise<Booking[]>;
  insert(booking: NewBooking): Promise<Booking>;
  /** With `onlyActive`, returns null when the booking is no longer pending or confirmed. */
  update(id: string, fields: BookingPatch, opts?: { onlyActive?: boolean }): Promise<Booking | null>;
  findByIdAndOwner(id: string, ownerId: string): Promise<Booking | null>;
  findById(id: string): Promise<Booking | null>;
  findByOwner(ownerId: string): Promise<Booking[]>;
  findActiveStartingBetween(from: Date, to: Date, spaceId?: string): Promise<Booking[]>;
  statisticsForOwner(ownerId: string): Promise<BookingStatistics>;
  /** Runs `fn` with exclusive access to the bookings of one space. */
  withSpaceLock<T>(spaceId: string, fn: (store: BookingStore) => Promise<T>): Promise<T>;
}

export interface SpaceDirectory {
  getSpace(id: string): Promise<Space | null>;
}

export interface UserDirectory {
  getContact(userId: string): Promise<UserContact | null>;
}

export type DeliveryStatus = 'sent' | 'skipped';

export interface Notifier {
  notifyCreated(booking: Booking, space: Space, owner: UserContact): Promise<DeliveryStatus>;
  notifyRescheduled(booking: Booking, space: Space, owner: UserContact): Promise<DeliveryStatus>;
  notifyCancelled(
    booking: Booking,
    space: Space,
    owner: UserContact,
    reason: string | null,
  ): Promise<DeliveryStatus>;
  sendReminder(booking: Booking, space: Space, owner: UserContact): Promise<DeliveryStatus>;
}

export type CalendarSyncStatus = 'synced' | 'skipped';

export interface CalendarSync {
  upsertEvent(booking: Booking, space: Space): Promise<CalendarSyncStatus>;
  removeEvent(bookingId: string): Promise<CalendarSyncStatus>;
}

export interface ReminderPayload {
  bookingId: string;
  ownerId: string;
  email: string;
  startAtISO: string;
}

export interface ReminderBackend {
  scheduleOnce(jobKey: string, fireAt: Date, payload: ReminderPayload): Promise<void>;
  /** Resolves true when a pending job was removed. */
  cancel(jobKey: string): Promise<boolean>;
}

export interface AvailabilityCachePort {
  getDailyAvailability(spaceId: string, dateKey: string): Promise<DailyGrid | null>;
  setDailyAvailability(spaceId: string, dateKey: string, payload: DailyGrid): Promise<void>;
  invalidateDailyAvailability(spaceId: string, dateKey: string): Promise<number>;
}
