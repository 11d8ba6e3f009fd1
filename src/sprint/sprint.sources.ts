import type { DateTime } from 'luxon';
import type { EpicTotalsByTeam, OnCallAssignments, ParsedAbsenceInterval, SprintWindow } from './sprint.types.js';

/** Inclusive date range a fetch covers. */
export interface DateRange {
  start: DateTime;
  end: DateTime;
}

/** One employee from the HR directory. */
export interface DirectoryEmployee {
  id: string;
  displayName: string;
  preferredName?: string;
  lastName?: string;
  division?: string;
}

/** HR system: who works here and when they are away. */
export interface AbsenceSource {
  fetchDirectory(): Promise<DirectoryEmployee[]>;
  /** Absences overlapping `range`, keyed by employee id. Unknown ids are dropped. */
  fetchAbsences(range: DateRange, employeeIds: readonly string[]): Promise<Record<string, ParsedAbsenceInterval[]>>;
}

/** On-call system: rotation schedules. */
export interface OnCallSource {
  /** Ids of the on-call users whose names are in `names`. */
  resolveUserIds(names: readonly string[]): Promise<string[]>;
  /** Dates each listed user is on call for the rotation, keyed by on-call name. */
  fetchOnCall(rotationId: string, range: DateRange, userIds: readonly string[]): Promise<OnCallAssignments>;
}

/** Issue tracker: epics scheduled per sprint. */
export interface EpicSource {
  /** Epic head count per project and sprint end date, for the given sprints only. */
  fetchEpicTotals(windows: readonly SprintWindow[]): Promise<EpicTotalsByTeam>;
}

export interface SprintSources {
  absences: AbsenceSource;
  onCall: OnCallSource;
  /** Without one, every sprint has 0 scheduled epics. */
  epics?: EpicSource;
}
