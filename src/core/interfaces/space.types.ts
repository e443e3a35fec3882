export interface OperatingHours {
  start: string; // "HH:mm"
  end: string; // "HH:mm"
}

export interface SpaceConstraints {
  maxDurationMinutes?: number;
  advanceBookingDays?: number;
}

export interface Space {
  id: string;
  name: string;
  location: string;
  capacity: number;
  active: boolean;
  timezone?: string | null;
  operatingHours?: OperatingHours | null;
  constraints: SpaceConstraints;
}

/** The subset of a space the constraint checks read. */
export type SpacePolicy = Pick<Space, 'operatingHours' | 'constraints' | 'timezone'>;

export interface UserContact {
  id: string;
  email: string;
  fullName: string;
}
