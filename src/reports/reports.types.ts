import type { DateTime } from 'luxon';
import type { BankHolidayRegion } from '../constants.js';
import type { PublicHolidayProvider } from '../holidays/public-holidays.js';

/** What renderers need besides the sprint report itself. */
export interface ReportContext {
  /** Dates before this are treated as past. */
  today: DateTime;
  holidays: PublicHolidayProvider;
  bankHolidayRegions: readonly BankHolidayRegion[];
}
