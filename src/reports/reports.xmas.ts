import type { DateTime } from 'luxon';
import type { XmasRotaSettings } from '../roster/roster.types.js';
import { absenceDates } from '../sprint/sprint.absences.js';
import type { AbsenceSource, DirectoryEmployee } from '../sprint/sprint.sources.js';
import type { ParsedAbsenceInterval } from '../sprint/sprint.types.js';
import { datesInRange, type IsoDate, requireIsoDate, toIsoDate } from '../utils/date.js';
import { compareCells } from './reports.format.js';

export interface XmasRota {
  dates: DateTime[];
  /** Absence dates per rota name; people with none have an empty set. */
  absences: Map<string, Set<IsoDate>>;
}

/** Preferred plus last name when both are known, otherwise the directory name. */
export function rotaName(employee: DirectoryEmployee): string {
  if (employee.preferredName && employee.lastName) {
    return `${employee.preferredName} ${employee.lastName}`.trim();
  }
  return employee.displayName.trim() || employee.id;
}

export function rotaEmployees(directory: readonly DirectoryEmployee[], settings: XmasRotaSettings): DirectoryEmployee[] {
  const division = settings.division.trim().toLowerCase();
  const excluded = new Set(settings.exclusions.map((name) => name.trim().toLowerCase()));
  return directory.filter(
    (employee) =>
      (employee.division ?? '').toLowerCase() === division && !excluded.has(rotaName(employee).toLowerCase()),
  );
}

export function buildXmasRota(
  employees: readonly DirectoryEmployee[],
  absencesById: Record<string, ParsedAbsenceInterval[]>,
  settings: XmasRotaSettings,
): XmasRota {
  const dates = datesInRange(requireIsoDate(settings.startDate), requireIsoDate(settings.endDate));
  const absences = new Map<string, Set<IsoDate>>();
  for (const employee of employees) {
    const name = rotaName(employee);
    const existing = absences.get(name) ?? new Set<IsoDate>();
    absenceDates(absencesById[employee.id] ?? []).forEach((date) => existing.add(date));
    absences.set(name, existing);
  }
  return { dates, absences };
}

/** Fetches the division's employees and their absences over the rota period. */
export async function collectXmasRota(source: AbsenceSource, settings: XmasRotaSettings): Promise<XmasRota> {
  const employees = rotaEmployees(await source.fetchDirectory(), settings);
  const range = { start: requireIsoDate(settings.startDate), end: requireIsoDate(settings.endDate) };
  const absencesById = await source.fetchAbsences(
    range,
    employees.map((e) => e.id),
  );
  return buildXmasRota(employees, absencesById, settings);
}

function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('\n') || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** One row per person, one column per day; `1` marks a day off. */
export function renderXmasRotaCsv(rota: XmasRota): string {
  const header = ['Name', ...rota.dates.map((d) => d.toFormat('cccc yyyy-MM-dd', { locale: 'en-GB' }))];
  const rows = [...rota.absences.entries()]
    .sort(([a], [b]) => compareCells(a, b))
    .map(([name, dates]) => [name, ...rota.dates.map((d) => (dates.has(toIsoDate(d)) ? '1' : ''))]);

  return `${[header, ...rows].map((row) => row.map(escapeCsv).join(',')).join('\n')}\n`;
}
