import type { SprintReport } from '../sprint/sprint.data.js';
import { hasAbsenceWarnings, renderAbsences, renderAbsenceWarnings, renderPeopleOfInterestAbsences } from './reports.absences.js';
import { renderNext12MonthsBankHolidays } from './reports.bank-holidays.js';
import { buildCalendarData, renderCalendar } from './reports.calendar.js';
import { renderCapacityTable } from './reports.capacity.js';
import { renderL1Assignments, renderL2Assignments } from './reports.oncall.js';
import type { ReportContext } from './reports.types.js';

/** Warnings followed by a blank line, or nothing when there are none. */
function warningsSection(report: SprintReport): string {
  const warnings = renderAbsenceWarnings(report);
  return hasAbsenceWarnings(warnings) ? `${warnings}\n\n` : '';
}

export function renderCapacityCanvas(report: SprintReport, context: ReportContext): string {
  return `${renderCapacityTable(report)}\n\nCalendar\n\n${renderCalendar(buildCalendarData(report, context))}`;
}

/** Team absences, on-call conflicts, people-of-interest absences and bank holidays. */
export function renderAbsencesAndOnCall(report: SprintReport, context: ReportContext): string {
  let output = `Absences\n\n${renderAbsences(report)}\n`;
  output += warningsSection(report);
  output += `POI Absences\n\n${renderPeopleOfInterestAbsences(report)}\n`;
  output += `Bank Holidays\n\n${renderNext12MonthsBankHolidays(context)}\n`;
  return output;
}

export function renderSupport(report: SprintReport, context: ReportContext): string {
  let output = `L1 Assignments\n\n${renderL1Assignments(report, context)}\n`;
  output += `L2 Assignments\n\n${renderL2Assignments(report, context)}\n`;
  output += warningsSection(report);
  return output;
}
