import type { DateTime } from 'luxon';
import type { BankHolidayRegion } from '../constants.js';
import type { PublicHolidayProvider } from '../holidays/public-holidays.js';
import { buildAlignedTable, compareCells, formatDateRanges } from './reports.format.js';
import type { ReportContext } from './reports.types.js';

/** Days the bank holiday report looks ahead. */
const BANK_HOLIDAY_LOOKAHEAD_DAYS = 365;

export const NO_BANK_HOLIDAYS = 'No bank holidays found in next 12 months\n';

/** One line per region: its holidays as compact ranges, or `None (<region>)`. */
export function renderBankHolidaysInRange(
  holidays: PublicHolidayProvider,
  regions: readonly BankHolidayRegion[],
  start: DateTime,
  end: DateTime,
): string {
  return regions
    .map((region) => {
      const dates = [...holidays.list(region, start, end).keys()];
      return dates.length > 0
        ? `${region.label} Bank Holidays: ${formatDateRanges(dates)}\n`
        : `None (${region.label})\n`;
    })
    .join('');
}

/**
 * Bank holidays over the next year, one row per date and holiday name with every
 * region observing it.
 */
export function renderNext12MonthsBankHolidays(context: ReportContext): string {
  const start = context.today;
  const end = start.plus({ days: BANK_HOLIDAY_LOOKAHEAD_DAYS });

  const byDate = new Map<string, Map<string, Set<string>>>();
  for (const region of context.bankHolidayRegions) {
    for (const [date, name] of context.holidays.list(region, start, end)) {
      let names = byDate.get(date);
      if (!names) {
        names = new Map();
        byDate.set(date, names);
      }
      let regions = names.get(name);
      if (!regions) {
        regions = new Set();
        names.set(name, regions);
      }
      regions.add(region.label);
    }
  }

  const rows = [...byDate.entries()]
    .sort(([a], [b]) => compareCells(a, b))
    .flatMap(([date, names]) =>
      [...names.entries()]
        .sort(([a], [b]) => compareCells(a, b))
        .map(([name, regions]) => [date, name, [...regions].sort().join(', ')]),
    );

  if (rows.length === 0) {
    return NO_BANK_HOLIDAYS;
  }
  return buildAlignedTable(rows, ['Date', 'Name', 'Regions']);
}
