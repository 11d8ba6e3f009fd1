import { datesInRange, isWeekday, type IsoDate, parseIsoDate, toIsoDate } from '../utils/date.js';
import { isWithinWindow, overlapsWindow } from './sprint.calendar.js';
import type {
  AbsenceInterval,
  AbsencesByPerson,
  OnCallAssignments,
  ParsedAbsenceInterval,
  SprintWindow,
} from './sprint.types.js';

/**
 * Normalises an absence at the data-source boundary. Parsed intervals pass through;
 * raw ones are parsed, or null when either end is not a date or the absence ends
 * before it starts.
 */
export function parseAbsenceInterval(interval: AbsenceInterval): ParsedAbsenceInterval | null {
  if (interval.kind === 'parsed') {
    return interval;
  }

  const start = parseIsoDate(interval.start);
  const end = parseIsoDate(interval.end);
  if (!start || !end || end < start) {
    return null;
  }
  return { kind: 'parsed', start, end };
}

/** Keeps only the absences that touch the window; people left with none are dropped. */
export function absencesInWindow(absences: AbsencesByPerson, window: SprintWindow): AbsencesByPerson {
  const filtered: AbsencesByPerson = {};
  for (const [name, intervals] of Object.entries(absences)) {
    const overlapping = intervals.filter((interval) => overlapsWindow(interval.start, interval.end, window));
    if (overlapping.length > 0) {
      filtered[name] = overlapping;
    }
  }
  return filtered;
}

/** Weekday dates covered by `intervals` that fall inside the window. */
export function absenceDatesInWindow(intervals: readonly ParsedAbsenceInterval[], window: SprintWindow): Set<IsoDate> {
  const dates = new Set<IsoDate>();
  for (const interval of intervals) {
    for (const date of datesInRange(interval.start, interval.end)) {
      if (isWeekday(date) && isWithinWindow(date, window)) {
        dates.add(toIsoDate(date));
      }
    }
  }
  return dates;
}

/** Every calendar date covered by `intervals`, weekends included. */
export function absenceDates(intervals: readonly ParsedAbsenceInterval[]): Set<IsoDate> {
  const dates = new Set<IsoDate>();
  for (const interval of intervals) {
    for (const date of datesInRange(interval.start, interval.end)) {
      dates.add(toIsoDate(date));
    }
  }
  return dates;
}

/** On-call dates inside the window; people with none left are dropped. */
export function onCallInWindow(assignments: OnCallAssignments, window: SprintWindow): OnCallAssignments {
  const start = toIsoDate(window.startDate);
  const end = toIsoDate(window.endDate);
  const filtered: OnCallAssignments = {};
  for (const [name, dates] of Object.entries(assignments)) {
    const inWindow = dates.filter((d) => d >= start && d <= end);
    if (inWindow.length > 0) {
      filtered[name] = inWindow;
    }
  }
  return filtered;
}
