import { capacityDiffPercent, isOverCapacity, scheduledPoints } from '../capacity/capacity.aggregate.js';
import type { SprintData, SprintReport } from '../sprint/sprint.data.js';
import { toIsoDate } from '../utils/date.js';
import { type Cell, formatDecimal, formatSignedPercent, sortAndRenderTable } from './reports.format.js';

export const CAPACITY_HEADERS = [
  'Sprint',
  'Start Date',
  'Epics',
  'Points',
  'Working Days',
  'Holidays',
  'L1',
  'Capacity',
  '% Diff',
  '',
] as const;

/**
 * L1 days of members who contribute to the sprint. Members with no days left count
 * nothing; ramping members always count.
 */
export function activeL1Days(sprint: SprintData): number {
  return sprint.capacity.rows
    .filter((row) => !row.excluded && (row.rampMultiplier !== undefined || row.availableDays !== 0))
    .reduce((sum, row) => sum + (sprint.l1[row.name]?.length ?? 0), 0);
}

/**
 * Flags column:
 * - `+` scheduled epics exceed capacity
 * - `s` company social
 * - `n` someone joins
 * - `l` someone leaves
 */
export function capacityFlags(sprint: SprintData, report: SprintReport): string {
  const { capacity } = sprint;
  return [
    isOverCapacity(capacity, report.team) ? '+' : '',
    sprint.social ? 's' : '',
    capacity.starters.length > 0 ? 'n' : '',
    capacity.leavers.length > 0 ? 'l' : '',
  ].join('');
}

/** One row per sprint comparing scheduled epic points with point capacity. */
export function renderCapacityTable(report: SprintReport): string {
  const rows = report.sprints.map((sprint): Cell[] => {
    const { capacity } = sprint;
    return [
      sprint.window.sprintNumber,
      toIsoDate(sprint.window.startDate),
      capacity.scheduledEpicTotal,
      formatDecimal(scheduledPoints(capacity, report.team)),
      capacity.totalTeamDays,
      capacity.totalTeamHolidays,
      activeL1Days(sprint),
      formatDecimal(capacity.points),
      formatSignedPercent(capacityDiffPercent(capacity, report.team)),
      capacityFlags(sprint, report),
    ];
  });

  return sortAndRenderTable(rows, { headers: CAPACITY_HEADERS });
}
