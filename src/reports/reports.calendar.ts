import type { DateTime } from 'luxon';
import { CALENDAR_LOOKAHEAD_DAYS } from '../constants.js';
import { absenceDates } from '../sprint/sprint.absences.js';
import { peopleOfInterest, type SprintReport } from '../sprint/sprint.data.js';
import { datesInRange, type IsoDate, isWeekday, toIsoDate } from '../utils/date.js';
import { compareCells } from './reports.format.js';
import type { ReportContext } from './reports.types.js';

export interface CalendarData {
  /** Members, then manager and people of interest, without repeats. */
  people: string[];
  absences: Map<string, Set<IsoDate>>;
  l1: Map<string, Set<IsoDate>>;
  l2: Map<string, Set<IsoDate>>;
  start: DateTime;
  end: DateTime;
}

function addAll(map: Map<string, Set<IsoDate>>, name: string, dates: Iterable<IsoDate>): void {
  const existing = map.get(name);
  if (!existing) {
    return;
  }
  for (const date of dates) {
    existing.add(date);
  }
}

/** Who is away or on call each day for the next two weeks, starting today. */
export function buildCalendarData(report: SprintReport, context: Pick<ReportContext, 'today'>): CalendarData {
  const start = context.today;
  const end = start.plus({ days: CALENDAR_LOOKAHEAD_DAYS - 1 });
  const first = toIsoDate(start);
  const last = toIsoDate(end);

  const people = [
    ...new Set([
      ...report.team.members.map((m) => m.identity.displayName),
      ...peopleOfInterest(report.team).map((p) => p.displayName),
    ]),
  ];
  const emptyMap = () => new Map(people.map((name) => [name, new Set<IsoDate>()]));
  const data: CalendarData = { people, absences: emptyMap(), l1: emptyMap(), l2: emptyMap(), start, end };

  for (const sprint of report.sprints) {
    for (const byPerson of [sprint.absences, sprint.poiAbsences]) {
      for (const [name, intervals] of Object.entries(byPerson)) {
        addAll(data.absences, name, absenceDates(intervals));
      }
    }
    for (const tier of ['l1', 'l2'] as const) {
      for (const [name, dates] of Object.entries(sprint[tier])) {
        addAll(
          data[tier],
          name,
          dates.filter((date) => date >= first && date <= last),
        );
      }
    }
  }

  return data;
}

function cellFor(data: CalendarData, person: string, date: IsoDate): string {
  if (data.l1.get(person)?.has(date)) {
    return 'L1';
  }
  if (data.l2.get(person)?.has(date)) {
    return 'L2';
  }
  if (data.absences.get(person)?.has(date)) {
    return 'X';
  }
  return '';
}

/**
 * Weekday grid, one row per person. Each column is headed by the weekday over
 * `dd/MM`; cells read `L1`, `L2` or `X` (away), in that order of precedence.
 */
export function renderCalendar(data: CalendarData): string {
  const days = datesInRange(data.start, data.end).filter(isWeekday);
  const headers: string[][] = [
    ['Name'],
    ...days.map((day) => [day.toFormat('ccc', { locale: 'en-GB' }), day.toFormat('dd/MM')]),
  ];

  const rows = [...data.people]
    .sort(compareCells)
    .map((person) => [person, ...days.map((day) => cellFor(data, person, toIsoDate(day)))]);

  if (rows.length === 0) {
    return 'No data\n';
  }

  const widths = headers.map((lines, col) =>
    Math.max(...lines.map((line) => line.length), ...rows.map((row) => row[col].length)),
  );
  const renderLine = (cells: readonly string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd();

  const headerHeight = Math.max(...headers.map((lines) => lines.length));
  const output: string[] = [];
  for (let line = 0; line < headerHeight; line++) {
    output.push(renderLine(headers.map((lines) => lines[line] ?? '')));
  }
  output.push(
    widths
      .map((w) => '-'.repeat(w))
      .join('  ')
      .trimEnd(),
  );
  for (const row of rows) {
    output.push(renderLine(row));
  }
  return `${output.join('\n')}\n`;
}
