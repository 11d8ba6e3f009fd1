import type { DateTime } from 'luxon';
import type { IsoDate } from '../utils/date.js';

/** A 14-day planning window starting on a Monday. Both ends are inclusive. */
export interface SprintWindow {
  sprintNumber: number;
  startDate: DateTime;
  endDate: DateTime;
}

/** Absence as received from the HR system, before any date parsing. */
export interface RawAbsenceInterval {
  kind: 'raw';
  start: string;
  end: string;
}

/** Absence after parsing at the data-source boundary. */
export interface ParsedAbsenceInterval {
  kind: 'parsed';
  start: DateTime;
  end: DateTime;
}

export type AbsenceInterval = RawAbsenceInterval | ParsedAbsenceInterval;

/** Absences per person, keyed by display name. */
export type AbsencesByPerson = Record<string, ParsedAbsenceInterval[]>;

/** On-call dates per person for one rotation tier, keyed by on-call system name. */
export type OnCallAssignments = Record<string, IsoDate[]>;

/** Scheduled epic totals per issue-tracker key, then per sprint end date. */
export type EpicTotalsByTeam = Record<string, Record<IsoDate, number>>;
