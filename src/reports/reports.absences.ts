import { absenceDates } from '../sprint/sprint.absences.js';
import type { SprintReport } from '../sprint/sprint.data.js';
import type { OnCallAssignments } from '../sprint/sprint.types.js';
import { sortAndRenderTable } from './reports.format.js';
import { absenceRows } from './reports.sprint.js';

export const NO_ABSENCE_WARNINGS = 'No L1/L2 absence warnings.';

/** Absences across every sprint, one row per person and absence. */
export function renderAbsences(report: SprintReport): string {
  return sortAndRenderTable(
    absenceRows(report.sprints.map((s) => s.absences)),
    { headers: ['Name', 'Holiday'] },
  );
}

/** Manager and people-of-interest absences across every sprint. */
export function renderPeopleOfInterestAbsences(report: SprintReport): string {
  return sortAndRenderTable(
    absenceRows(report.sprints.map((s) => s.poiAbsences)),
    { headers: ['Name', 'Holiday'] },
  );
}

function conflicts(
  tier: 'L1' | 'L2',
  assignments: OnCallAssignments,
  absentOn: (name: string) => ReadonlySet<string>,
): string[] {
  return Object.keys(assignments)
    .sort()
    .flatMap((name) => {
      const absent = absentOn(name);
      return assignments[name]
        .filter((date) => absent.has(date))
        .map((date) => `WARNING: ${name} is absent on ${date} but scheduled for ${tier} shift.`);
    });
}

/** One line for every on-call shift that lands on a day its member is away. */
export function renderAbsenceWarnings(report: SprintReport): string {
  const warnings = report.sprints.flatMap((sprint) => {
    const absentOn = (name: string) => absenceDates(sprint.absences[name] ?? []);
    return [...conflicts('L1', sprint.l1, absentOn), ...conflicts('L2', sprint.l2, absentOn)];
  });
  return warnings.length > 0 ? warnings.join('\n') : NO_ABSENCE_WARNINGS;
}

/** True when `renderAbsenceWarnings` found something. */
export function hasAbsenceWarnings(warnings: string): boolean {
  return warnings.trim() !== NO_ABSENCE_WARNINGS;
}
