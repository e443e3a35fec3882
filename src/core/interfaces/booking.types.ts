export type BookingStatus = 'pending' | 'confirmed' | 'cancelled';

export const ACTIVE_STATUSES: readonly BookingStatus[] = ['pending', 'confirmed'];

export interface Booking {
  id: string;
  ownerId: string;
  spaceId: string;
  startAt: Date;
  endAt: Date;
  status: BookingStatus;
  purpose: string;
  materialsRequested: string[];
  notes: string;
  createdAt: Date;
  updatedAt: Date;
  cancellationReason: string | null;
}

export type NewBooking = Omit<Booking, 'id'>;

/** Fields a store write may change. Identity, owner and space never change. */
export type BookingPatch = Partial<
  Pick<
    Booking,
    | 'startAt'
    | 'endAt'
    | 'status'
    | 'purpose'
    | 'materialsRequested'
    | 'notes'
    | 'updatedAt'
    | 'cancellationReason'
  >
>;

export interface TimeInterval {
  startAt: Date;
  endAt: Date;
}

export interface CreateBookingInput {
  ownerId: string;
  spaceId: string;
  startAt: Date | string;
  endAt: Date | string;
  purpose: string;
  materialsRequested?: string[];
  notes?: string;
}

export interface UpdateBookingInput {
  startAt?: Date | string;
  endAt?: Date | string;
  purpose?: string;
  materialsRequested?: string[];
  notes?: string;
}

export type BookingFailureKind =
  | 'InvalidRequest'
  | 'InvalidInterval'
  | 'PastBooking'
  | 'DurationOutOfBounds'
  | 'InsufficientAdvanceNotice'
  | 'OutsideOperatingHours'
  | 'SpaceUnavailable'
  | 'SpaceNotFound'
  | 'BookingNotFound'
  | 'AlreadyStarted'
  | 'Unauthorized';

export type ConstraintViolationKind = Extract<
  BookingFailureKind,
  | 'InvalidInterval'
  | 'PastBooking'
  | 'DurationOutOfBounds'
  | 'InsufficientAdvanceNotice'
  | 'OutsideOperatingHours'
>;

export interface ConstraintViolation {
  kind: ConstraintViolationKind;
  message: string;
}

export type ConstraintResult = { ok: true } | { ok: false; violation: ConstraintViolation };

export interface AlternativeSuggestion {
  start: string; // ISO
  end: string; // ISO
  reason: 'closest' | 'shift_earlier' | 'shift_later';
}

export interface BookingFailure {
  kind: BookingFailureKind;
  message: string;
  data?: {
    alternatives?: AlternativeSuggestion[];
    issues?: string[];
  };
}

export type SideEffectName =
  | 'confirmation_email'
  | 'reschedule_email'
  | 'cancellation_email'
  | 'calendar_upsert'
  | 'calendar_remove'
  | 'reminder_schedule'
  | 'reminder_cancel'
  | 'availability_cache';

export interface SideEffectOutcome {
  effect: SideEffectName;
  status: 'ok' | 'skipped' | 'failed';
  detail?: string;
}

export type BookingOutcome =
  | { ok: true; booking: Booking; sideEffects: SideEffectOutcome[]; warnings: string[] }
  | { ok: false; error: BookingFailure };

export interface OwnerBookingView extends Booking {
  spaceName: string;
}

export interface CalendarBookingView {
  id: string;
  spaceId: string;
  spaceName: string;
  spaceLocation: string;
  ownerId?: string;
  startAt: string;
  endAt: string;
  purpose: string;
  status: BookingStatus;
  materialsRequested: string[];
  notes: string;
  createdAt: string;
  isOwnBooking: boolean;
}

export interface BookingStatistics {
  totalBookings: number;
  confirmedBookings: number;
  cancelledBookings: number;
  totalHours: number;
}

export interface AvailabilitySlotDetail {
  start: string; // ISO
  end: string; // ISO
  available: boolean;
}

/** An active booking on a grid day, as stored in the shared cache. */
export interface DayBooking {
  id: string;
  ownerId: string;
  startAt: string; // ISO
  endAt: string; // ISO
  purpose: string;
  status: BookingStatus;
}

/** Viewer-independent daily grid; this is what gets cached. */
export interface DailyGrid {
  spaceId: string;
  date: string; // yyyy-MM-dd
  operatingHours: { start: string; end: string };
  slots: AvailabilitySlotDetail[];
  bookings: DayBooking[];
}

export interface DayBookingView extends Omit<DayBooking, 'ownerId'> {
  ownerId?: string;
  isOwnBooking: boolean;
}

export interface DailyAvailability extends Omit<DailyGrid, 'bookings'> {
  bookings: DayBookingView[];
}

export interface PopularSpace {
  spaceId: string;
  spaceName: string;
  bookingCount: number;
}

export interface UpcomingBooking {
  id: string;
  spaceId: string;
  spaceName: string;
  startAt: string;
  endAt: string;
  purpose: string;
}

export interface DashboardStats {
  todayBookings: number;
  weekBookings: number;
  monthBookings: number;
  popularSpaces: PopularSpace[];
  nextBookings: UpcomingBooking[];
  generatedAt: string;
}

export interface BulkAvailabilityQuery {
  spaceIds: string[];
  dates: string[];
  startTime: string; // HH:mm
  endTime: string; // HH:mm
}

export interface BulkAvailabilityEntry {
  date: string;
  available: boolean;
  conflictReason: 'occupied' | 'invalid_date' | 'invalid_time' | null;
}

export interface BulkAvailabilityResult {
  spaceId: string;
  spaceName: string;
  spaceLocation: string;
  availability: BulkAvailabilityEntry[];
}
