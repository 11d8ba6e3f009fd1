import type { IsoDate } from '../utils/date.js';

/** One member's availability for one sprint. */
export interface AvailabilityRow {
  /** Roster display name. */
  name: string;
  /** Report name; carries a ramping marker while ramp-up is below 100%. */
  displayName: string;
  /** Days counted towards team capacity (after ramp-up). */
  availableDays: number;
  /** Days before the ramp-up multiplier. Equals `availableDays` when not ramping. */
  unrampedDays: number;
  holidayCount: number;
  l1Days: number;
  l2Days: number;
  /** Left before, or joins after, the sprint. Contributes nothing to totals. */
  excluded: boolean;
  /** Present only while the member is ramping up. */
  rampMultiplier?: number;
}

export interface TenureChange {
  name: string;
  date: IsoDate;
}

export interface RampingMember {
  name: string;
  /** Ramp multiplier as a whole percentage. */
  percent: number;
}

/** Inputs for one member's sprint, already narrowed to the sprint window. */
export interface MemberSprintInputs {
  /** Weekday absence dates inside the sprint. */
  absenceDates: ReadonlySet<IsoDate>;
  l1Dates: ReadonlySet<IsoDate>;
  l2Dates: ReadonlySet<IsoDate>;
  /** 1 when a company social falls in the sprint, else 0. */
  socialPenalty: 0 | 1;
}

export interface AvailabilityResult {
  row: AvailabilityRow;
  starter?: TenureChange;
  leaver?: TenureChange;
  ramping?: RampingMember;
}

export interface SprintCapacity {
  /** Sorted by display name; excluded rows are kept but flagged. */
  rows: AvailabilityRow[];
  totalTeamDays: number;
  totalTeamHolidays: number;
  points: number;
  engPoints: number;
  prodPoints: number;
  scheduledEpicTotal: number;
  starters: TenureChange[];
  leavers: TenureChange[];
  ramping: RampingMember[];
}
