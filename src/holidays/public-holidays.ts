import Holidays from 'date-holidays';
import type { DateTime } from 'luxon';
import type { BankHolidayRegion } from '../constants.js';
import { type IsoDate, toIsoDate } from '../utils/date.js';

/** Public holidays of one region between two dates (inclusive), by date. */
export interface PublicHolidayProvider {
  list(region: BankHolidayRegion, start: DateTime, end: DateTime): Map<IsoDate, string>;
}

/** Holiday kinds that close offices; school and observance days are skipped. */
const DAY_OFF_TYPES = new Set(['public', 'bank']);

/** Backed by the `date-holidays` rule set. */
export class DateHolidaysProvider implements PublicHolidayProvider {
  private readonly calendars = new Map<string, Holidays>();

  private calendarFor(region: BankHolidayRegion): Holidays {
    const key = `${region.country}/${region.state ?? ''}`;
    let calendar = this.calendars.get(key);
    if (!calendar) {
      calendar = region.state ? new Holidays(region.country, region.state) : new Holidays(region.country);
      this.calendars.set(key, calendar);
    }
    return calendar;
  }

  list(region: BankHolidayRegion, start: DateTime, end: DateTime): Map<IsoDate, string> {
    const calendar = this.calendarFor(region);
    const from = toIsoDate(start);
    const to = toIsoDate(end);
    const holidays = new Map<IsoDate, string>();

    for (let year = start.year; year <= end.year; year++) {
      for (const holiday of calendar.getHolidays(year)) {
        const date = holiday.date.slice(0, 10);
        if (DAY_OFF_TYPES.has(holiday.type) && date >= from && date <= to && !holidays.has(date)) {
          holidays.set(date, holiday.name);
        }
      }
    }

    return new Map([...holidays.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }
}
