/** The reports and actions the CLI can run for a team. */
export enum ReportTask {
  CAPACITY = 'capacity',
  ABSENCES = 'absences',
  L1 = 'l1',
  L2 = 'l2',
  INTEREST = 'interest',
  SLACK = 'slack',
  FULL = 'full',
  XMAS = 'xmas',
  BANK_HOLIDAYS = 'bankhols',
  WARNING = 'warning',
  DEBUG = 'debug',
  CALENDAR = 'calendar',
}

/** Tasks run in this order, whatever order the flags were given in. */
export const REPORT_TASK_ORDER: readonly ReportTask[] = [
  ReportTask.CAPACITY,
  ReportTask.ABSENCES,
  ReportTask.L1,
  ReportTask.L2,
  ReportTask.INTEREST,
  ReportTask.SLACK,
  ReportTask.FULL,
  ReportTask.XMAS,
  ReportTask.BANK_HOLIDAYS,
  ReportTask.WARNING,
  ReportTask.DEBUG,
  ReportTask.CALENDAR,
];

/** Tasks that work from the team's sprint report. */
export const SPRINT_REPORT_TASKS: ReadonlySet<ReportTask> = new Set([
  ReportTask.CAPACITY,
  ReportTask.ABSENCES,
  ReportTask.L1,
  ReportTask.L2,
  ReportTask.INTEREST,
  ReportTask.SLACK,
  ReportTask.FULL,
  ReportTask.WARNING,
  ReportTask.CALENDAR,
]);

/** Tasks that show scheduled epics. */
export const EPIC_TASKS: ReadonlySet<ReportTask> = new Set([ReportTask.CAPACITY, ReportTask.FULL, ReportTask.SLACK]);

export interface RunTeamCommand {
  command: 'run';
  teamName: string;
  tasks: ReportTask[];
}

/** Empties the response cache. */
export interface PurgeCommand {
  command: 'purge';
}

export interface HelpCommand {
  command: 'help';
  /** Why usage is shown, when it was not asked for. */
  reason?: string;
}

export type CliCommand = RunTeamCommand | PurgeCommand | HelpCommand;
