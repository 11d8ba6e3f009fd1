import { sortBy, uniqBy } from 'lodash-es';
import type { Team } from '../roster/roster.types.js';
import type { AvailabilityResult, AvailabilityRow, SprintCapacity, TenureChange } from './capacity.types.js';

/** Code-unit ordering, so names sort the same on every locale. */
function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Rolls member availability up into team totals and story-point capacity.
 * @param scheduledEpicTotal - epics planned for the sprint; 0 when the tracker has none
 */
export function aggregateCapacity(
  results: readonly AvailabilityResult[],
  team: Team,
  scheduledEpicTotal = 0,
): SprintCapacity {
  const rows: AvailabilityRow[] = results.map((r) => r.row).sort((a, b) => compareNames(a.displayName, b.displayName));
  const counted = rows.filter((row) => !row.excluded);

  const totalTeamDays = counted.reduce((sum, row) => sum + row.availableDays, 0);
  const totalTeamHolidays = counted.reduce((sum, row) => sum + row.holidayCount, 0);

  const points = totalTeamDays * team.loadFactor * team.pointCapacityCoefficient;
  const engPoints = points * team.engineeringSplit;
  const prodPoints = points - engPoints;

  const starters = results.flatMap((r): TenureChange[] => (r.starter ? [r.starter] : []));
  const leavers = results.flatMap((r): TenureChange[] => (r.leaver ? [r.leaver] : []));
  const ramping = sortBy(
    uniqBy(
      results.flatMap((r) => (r.ramping ? [r.ramping] : [])),
      (entry) => `${entry.name}\u0000${entry.percent}`,
    ),
    ['name', 'percent'],
  );

  return {
    rows,
    totalTeamDays,
    totalTeamHolidays,
    points,
    engPoints,
    prodPoints,
    scheduledEpicTotal,
    starters,
    leavers,
    ramping,
  };
}

/** Story points the scheduled epics stand for. */
export function scheduledPoints(capacity: SprintCapacity, team: Team): number {
  return capacity.scheduledEpicTotal * team.epicPointValue;
}

export function isOverCapacity(capacity: SprintCapacity, team: Team): boolean {
  return scheduledPoints(capacity, team) > capacity.points;
}

/** Percentage by which scheduled points exceed (or fall short of) capacity; 0 when capacity is 0. */
export function capacityDiffPercent(capacity: SprintCapacity, team: Team): number {
  if (capacity.points <= 0) {
    return 0;
  }
  return (100 * (scheduledPoints(capacity, team) - capacity.points)) / capacity.points;
}
