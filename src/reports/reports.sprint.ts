import { isOverCapacity, scheduledPoints } from '../capacity/capacity.aggregate.js';
import type { AvailabilityRow, SprintCapacity } from '../capacity/capacity.types.js';
import type { Team } from '../roster/roster.types.js';
import type { SprintReport } from '../sprint/sprint.data.js';
import type { AbsencesByPerson, OnCallAssignments } from '../sprint/sprint.types.js';
import { toIsoDate } from '../utils/date.js';
import { renderBankHolidaysInRange } from './reports.bank-holidays.js';
import {
  type Cell,
  compareCells,
  formatAbsenceRange,
  formatDateRanges,
  formatDecimal,
  sortAndRenderTable,
} from './reports.format.js';
import type { ReportContext } from './reports.types.js';

/** Unique `[name, range]` rows, sorted by name then range. */
export function absenceRows(absences: readonly AbsencesByPerson[]): [string, string][] {
  const seen = new Set<string>();
  const rows: [string, string][] = [];
  for (const byPerson of absences) {
    for (const [name, intervals] of Object.entries(byPerson)) {
      for (const interval of intervals) {
        const range = formatAbsenceRange(interval);
        const key = `${name}\u0000${range}`;
        if (!seen.has(key)) {
          seen.add(key);
          rows.push([name, range]);
        }
      }
    }
  }
  return rows.sort((a, b) => compareCells(a[0], b[0]) || compareCells(a[1], b[1]));
}

function onCallRows(assignments: OnCallAssignments): Cell[][] {
  return Object.keys(assignments)
    .sort()
    .map((name) => {
      const dates = assignments[name];
      return [name, dates.length, formatDateRanges(dates)];
    });
}

/** Days column: `unramped (effective)` while ramping. */
export function formatAvailableDays(row: AvailabilityRow): string {
  return row.rampMultiplier === undefined ? String(row.availableDays) : `${row.unrampedDays} (${row.availableDays})`;
}

export function renderTeamAvailability(capacity: SprintCapacity, team: Team): string {
  const rows = capacity.rows
    .filter((row) => !row.excluded)
    .map((row) => [row.displayName, formatAvailableDays(row), row.holidayCount, row.l1Days, row.l2Days]);

  let output = '\nTeam Availability:\n';
  output += sortAndRenderTable(rows, { headers: ['Name', 'Days', 'Holidays', 'L1', 'L2'] });
  output += `Total available days: ${capacity.totalTeamDays}\n\n`;
  output += `Scheduled Epics:  ${formatDecimal(capacity.scheduledEpicTotal)} (${formatDecimal(scheduledPoints(capacity, team))} points)\n`;
  output += `Estimated point capacity: ${formatDecimal(capacity.points)}\n`;
  output += `  ENG:  ${formatDecimal(capacity.engPoints)}\n`;
  output += `  PROD: ${formatDecimal(capacity.prodPoints)}\n`;
  if (isOverCapacity(capacity, team)) {
    output += '  WARNING: Scheduled epics exceed available point capacity\n';
  }
  for (const { name, date } of capacity.starters) {
    output += `NOTE: ${name} joins the team on ${date}.\n`;
  }
  for (const { name, date } of capacity.leavers) {
    output += `NOTE: ${name} is leaving the team on ${date}.\n`;
  }
  if (capacity.ramping.length > 0) {
    output += 'Ramping up this sprint:\n';
    for (const { name, percent } of capacity.ramping) {
      output += `  ${name} (ramp multiplier: ${percent}%)\n`;
    }
  }
  return output;
}

/** Every sprint in full: absences, bank holidays, on-call and availability. */
export function renderSprintData(report: SprintReport, context: ReportContext): string {
  const { team } = report;
  let output = `Team: ${team.name} | Manager: ${team.manager.displayName} | Team (${report.coreDisplayNames.length}): ${report.coreDisplayNames.join(', ')}\n`;

  for (const sprint of report.sprints) {
    const { window } = sprint;
    output += `\nSprint ${window.sprintNumber}: ${toIsoDate(window.startDate)} to ${toIsoDate(window.endDate)}\n`;
    if (sprint.social) {
      output += `This sprint includes a company social on ${sprint.social} (availability reduced by 1 day for all team members)\n`;
    }

    output += 'Holidays:\n';
    output += sortAndRenderTable(absenceRows([sprint.absences]), { headers: ['Name', 'Holiday'] });
    output += '\nManager/POI Holidays:\n';
    output += sortAndRenderTable(absenceRows([sprint.poiAbsences]), { headers: ['Name', 'Holiday'] });

    output += '\nBank Holidays:\n';
    output += renderBankHolidaysInRange(context.holidays, context.bankHolidayRegions, window.startDate, window.endDate);

    output += '\nOn Call:\n';
    output += 'L1:\n';
    output += sortAndRenderTable(onCallRows(sprint.l1), { headers: ['Name', 'Days', 'Dates'] });
    output += 'L2:\n';
    output += sortAndRenderTable(onCallRows(sprint.l2), { headers: ['Name', 'Days', 'Dates'] });

    output += renderTeamAvailability(sprint.capacity, team);
  }

  return output;
}
