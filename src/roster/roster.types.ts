import type { BankHolidayRegion } from '../constants.js';
import type { IsoDate } from '../utils/date.js';

/**
 * The three names a person goes by. Resolved once when the roster is loaded:
 * - `displayName`: roster and report name
 * - `hrName`: name in the HR directory (absences)
 * - `oncallName`: name in the on-call system (L1/L2 rotations)
 */
export interface MemberIdentity {
  displayName: string;
  hrName: string;
  oncallName: string;
}

export interface Member {
  identity: MemberIdentity;
  /** First day with the team; drives partial sprints and ramp-up. */
  startDate?: IsoDate;
  /** Last day with the team. */
  leaveDate?: IsoDate;
  /** Capacity share in the first sprint, in (0, 1]. */
  startPct: number;
}

/** Someone outside the team whose absences are reported but never counted. */
export interface PersonOfInterest {
  displayName: string;
  hrName: string;
}

/** Slack canvases updated for a team; a missing entry skips that canvas. */
export interface CanvasTargets {
  absences?: string;
  capacity?: string;
  support?: string;
}

export interface Team {
  name: string;
  /** Issue tracker project key used to look up scheduled epics. */
  jiraKey: string;
  /** Story points one scheduled epic stands for. */
  epicPointValue: number;
  manager: PersonOfInterest;
  members: readonly Member[];
  peopleOfInterest: readonly PersonOfInterest[];
  /** Points per available person-day. */
  pointCapacityCoefficient: number;
  loadFactor: number;
  /** Share of points reserved for engineering work, in [0, 1]. */
  engineeringSplit: number;
  canvasTargets: CanvasTargets;
}

export interface SprintAnchor {
  date: IsoDate;
  number: number;
}

export interface OnCallRotations {
  /** On-call system schedule id for the L1 tier. */
  l1: string;
  /** On-call system schedule id for the L2 tier. */
  l2: string;
}

export interface XmasRotaSettings {
  startDate: IsoDate;
  endDate: IsoDate;
  /** HR division whose employees appear on the rota (case-insensitive). */
  division: string;
  /** Display names left off the rota (case-insensitive). */
  exclusions: readonly string[];
}

export interface PlannerSettings {
  /** Company social dates; each costs every member one day in its sprint. */
  socialDates: readonly IsoDate[];
  sprintAnchor: SprintAnchor;
  numberOfSprints: number;
  numberOfSprintsBack: number;
  apiCacheTimeoutSeconds: number;
  onCallRotations: OnCallRotations;
  xmasRota: XmasRotaSettings;
  bankHolidayRegions: readonly BankHolidayRegion[];
}

export interface PlannerConfig {
  settings: PlannerSettings;
  teams: readonly Team[];
}
