import type { SprintReport } from '../sprint/sprint.data.js';
import { type IsoDate, toIsoDate } from '../utils/date.js';
import { type Cell, formatDateRanges, sortAndRenderTable } from './reports.format.js';
import type { ReportContext } from './reports.types.js';

/** Upcoming (today or later) dates per person for one tier, across every sprint. */
export function upcomingAssignments(
  report: SprintReport,
  tier: 'l1' | 'l2',
  context: Pick<ReportContext, 'today'>,
): Map<string, Set<IsoDate>> {
  const today = toIsoDate(context.today);
  const assignments = new Map<string, Set<IsoDate>>();
  for (const sprint of report.sprints) {
    for (const [name, dates] of Object.entries(sprint[tier])) {
      const upcoming = dates.filter((date) => date >= today);
      if (upcoming.length === 0) {
        continue;
      }
      const existing = assignments.get(name) ?? new Set<IsoDate>();
      upcoming.forEach((date) => existing.add(date));
      assignments.set(name, existing);
    }
  }
  return assignments;
}

/** Name, day count and compact date ranges per person. */
export function renderL1Assignments(report: SprintReport, context: Pick<ReportContext, 'today'>): string {
  const assignments = upcomingAssignments(report, 'l1', context);
  const rows = [...assignments.keys()].sort().map((name): Cell[] => {
    const dates = assignments.get(name) ?? new Set<IsoDate>();
    return [name, dates.size, formatDateRanges(dates)];
  });
  return sortAndRenderTable(rows, { headers: ['Name', 'Days', 'Dates'] });
}

/** One row per shift, in date order. */
export function renderL2Assignments(report: SprintReport, context: Pick<ReportContext, 'today'>): string {
  const assignments = upcomingAssignments(report, 'l2', context);
  const rows = [...assignments.keys()]
    .sort()
    .flatMap((name) => [...(assignments.get(name) ?? [])].sort().map((date): Cell[] => [name, date]));
  return sortAndRenderTable(rows, { headers: ['Name', 'Date'], sortBy: 1 });
}
