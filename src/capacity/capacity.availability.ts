import type { DateTime } from 'luxon';
import {
  RAMP_UP_STEP_PER_SPRINT,
  RAMPING_NAME_SUFFIX,
  SPRINT_LENGTH_DAYS,
  WORKING_DAYS_PER_SPRINT,
} from '../constants.js';
import type { Member } from '../roster/roster.types.js';
import type { SprintWindow } from '../sprint/sprint.types.js';
import {
  countWeekdaysInRange,
  daysBetween,
  type IsoDate,
  requireIsoDate,
  roundHalfEven,
  toIsoDate,
} from '../utils/date.js';
import type { AvailabilityResult, AvailabilityRow, MemberSprintInputs, TenureChange } from './capacity.types.js';

/**
 * Ramp-up multiplier for a member in the sprint starting on `sprintStart`.
 * Starts at `startPct` and gains 0.1 per full sprint since joining, capped at 1.
 */
export function rampMultiplier(startDate: DateTime, startPct: number, sprintStart: DateTime): number {
  const sprintsSinceStart = Math.max(0, Math.floor(daysBetween(startDate, sprintStart) / SPRINT_LENGTH_DAYS));
  return Math.min(startPct + RAMP_UP_STEP_PER_SPRINT * sprintsSinceStart, 1.0);
}

function countInRange(dates: ReadonlySet<IsoDate>, from: IsoDate, to: IsoDate): number {
  let count = 0;
  for (const date of dates) {
    if (date >= from && date <= to) {
      count++;
    }
  }
  return count;
}

function excludedRow(name: string): AvailabilityRow {
  return {
    name,
    displayName: name,
    availableDays: 0,
    unrampedDays: 0,
    holidayCount: 0,
    l1Days: 0,
    l2Days: 0,
    excluded: true,
  };
}

/**
 * Available days for one member in one sprint.
 *
 * Leaving takes precedence over joining: once a leave date falls before or inside
 * the sprint, start date and ramp-up are not considered for that sprint.
 */
export function calculateAvailability(
  member: Member,
  window: SprintWindow,
  inputs: MemberSprintInputs,
): AvailabilityResult {
  const name = member.identity.displayName;
  let activeFrom = window.startDate;
  let activeTo = window.endDate;
  let multiplier = 1.0;
  let starter: TenureChange | undefined;
  let leaver: TenureChange | undefined;

  if (member.leaveDate) {
    const leaveDate = requireIsoDate(member.leaveDate);
    if (leaveDate < window.startDate) {
      return { row: excludedRow(name) };
    }
    if (leaveDate <= window.endDate) {
      activeTo = leaveDate;
      leaver = { name, date: member.leaveDate };
    }
  }

  if (member.startDate && !leaver) {
    const startDate = requireIsoDate(member.startDate);
    if (startDate > window.endDate) {
      return { row: excludedRow(name) };
    }
    multiplier = rampMultiplier(startDate, member.startPct, window.startDate);
    if (startDate >= window.startDate) {
      activeFrom = startDate;
      starter = { name, date: member.startDate };
    }
  }

  const isFullSprint = activeFrom.equals(window.startDate) && activeTo.equals(window.endDate);
  const workingDays = isFullSprint ? WORKING_DAYS_PER_SPRINT : countWeekdaysInRange(activeFrom, activeTo);

  const from = toIsoDate(activeFrom);
  const to = toIsoDate(activeTo);
  const holidayCount = countInRange(inputs.absenceDates, from, to);
  const l1Days = countInRange(inputs.l1Dates, from, to);
  const l2Days = countInRange(inputs.l2Dates, from, to);

  const unrampedDays = Math.max(0, workingDays - holidayCount - l1Days - inputs.socialPenalty);

  const row: AvailabilityRow = {
    name,
    displayName: name,
    availableDays: unrampedDays,
    unrampedDays,
    holidayCount,
    l1Days,
    l2Days,
    excluded: false,
  };

  if (multiplier < 1.0) {
    row.availableDays = roundHalfEven(unrampedDays * multiplier);
    row.displayName = `${name}${RAMPING_NAME_SUFFIX}`;
    row.rampMultiplier = multiplier;
    return { row, starter, leaver, ramping: { name, percent: Math.round(multiplier * 100) } };
  }

  return { row, starter, leaver };
}
