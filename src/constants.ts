/**
 * Calendar and capacity constants shared by the planner.
 *
 * NOTE: keep this file free of side-effects.
 */

/** Sprints are two calendar weeks long. */
export const SPRINT_LENGTH_DAYS = 14;

/** Working (week) days in a full sprint. */
export const WORKING_DAYS_PER_SPRINT = 10;

/** Ramp-up gained per completed sprint since joining. */
export const RAMP_UP_STEP_PER_SPRINT = 0.1;

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/** Luxon weekday numbers (1 = Monday, 7 = Sunday). */
export const MONDAY = 1;
export const FRIDAY = 5;

/** Marker appended to a member's name while their ramp-up multiplier is below 100%. */
export const RAMPING_NAME_SUFFIX = ' *';

/** Days shown by the team calendar, starting today. */
export const CALENDAR_LOOKAHEAD_DAYS = 14;

/** Default regions for bank holiday reporting (date-holidays country/state codes). */
export const DEFAULT_BANK_HOLIDAY_REGIONS: readonly BankHolidayRegion[] = [
  { label: 'SCT', country: 'GB', state: 'SCT' },
  { label: 'ENG', country: 'GB', state: 'ENG' },
  { label: 'NIR', country: 'GB', state: 'NIR' },
  { label: 'WLS', country: 'GB', state: 'WLS' },
  { label: 'IE', country: 'IE' },
] as const;

export interface BankHolidayRegion {
  /** Short label used in report output. */
  label: string;
  country: string;
  state?: string;
}
