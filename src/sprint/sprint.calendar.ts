import type { DateTime } from 'luxon';
import { MONDAY, SPRINT_LENGTH_DAYS } from '../constants.js';
import type { SprintAnchor } from '../roster/roster.types.js';
import { daysBetween, type IsoDate, requireIsoDate, toIsoDate } from '../utils/date.js';
import type { SprintWindow } from './sprint.types.js';

/**
 * Start of the sprint that contains `date`.
 *
 * Sprints start on alternate Mondays. Take the next Monday strictly after `date`:
 * if its ISO week number is even the sprint began two weeks earlier, otherwise one
 * week earlier. Either way the resulting window contains `date`.
 */
export function sprintStartFor(date: DateTime): DateTime {
  const day = date.startOf('day');
  let daysAhead = MONDAY - day.weekday;
  if (daysAhead <= 0) {
    daysAhead += 7;
  }
  const nextMonday = day.plus({ days: daysAhead });

  return nextMonday.weekNumber % 2 === 0 ? nextMonday.minus({ days: 14 }) : nextMonday.minus({ days: 7 });
}

/**
 * Sprint number for a sprint start, counted from the configured anchor.
 * Only meaningful for dates produced by `sprintStartFor`; earlier sprints than the
 * anchor get smaller (possibly negative) numbers.
 */
export function sprintNumber(startDate: DateTime, anchor: SprintAnchor): number {
  const anchorDate = requireIsoDate(anchor.date);
  return anchor.number + Math.floor(daysBetween(anchorDate, startDate) / SPRINT_LENGTH_DAYS);
}

export function sprintWindow(startDate: DateTime, anchor: SprintAnchor): SprintWindow {
  const start = startDate.startOf('day');
  return {
    sprintNumber: sprintNumber(start, anchor),
    startDate: start,
    endDate: start.plus({ days: SPRINT_LENGTH_DAYS - 1 }),
  };
}

export function sprintContaining(date: DateTime, anchor: SprintAnchor): SprintWindow {
  return sprintWindow(sprintStartFor(date), anchor);
}

/** `count` back-to-back sprints, the first starting on `firstStart`. */
export function enumerateSprints(firstStart: DateTime, count: number, anchor: SprintAnchor): SprintWindow[] {
  return Array.from({ length: Math.max(0, count) }, (_, index) =>
    sprintWindow(firstStart.plus({ days: index * SPRINT_LENGTH_DAYS }), anchor),
  );
}

export function isWithinWindow(date: DateTime, window: SprintWindow): boolean {
  return date >= window.startDate && date <= window.endDate;
}

/** True when `[start, end]` overlaps the window. */
export function overlapsWindow(start: DateTime, end: DateTime, window: SprintWindow): boolean {
  return end >= window.startDate && start <= window.endDate;
}

/** Configured social dates falling inside the window, in order. */
export function socialDatesInWindow(window: SprintWindow, socialDates: readonly IsoDate[]): IsoDate[] {
  const start = toIsoDate(window.startDate);
  const end = toIsoDate(window.endDate);
  return socialDates.filter((d) => d >= start && d <= end).sort();
}
