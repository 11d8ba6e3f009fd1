import type { DateTime } from 'luxon';
import { aggregateCapacity } from '../capacity/capacity.aggregate.js';
import { calculateAvailability } from '../capacity/capacity.availability.js';
import type { SprintCapacity } from '../capacity/capacity.types.js';
import { SPRINT_LENGTH_DAYS } from '../constants.js';
import { Logger } from '../logger.js';
import type { PersonOfInterest, PlannerSettings, Team } from '../roster/roster.types.js';
import { type IsoDate, toIsoDate } from '../utils/date.js';
import { absenceDatesInWindow, absencesInWindow, onCallInWindow } from './sprint.absences.js';
import { enumerateSprints, socialDatesInWindow, sprintContaining } from './sprint.calendar.js';
import type { DateRange, DirectoryEmployee, SprintSources } from './sprint.sources.js';
import type { AbsencesByPerson, EpicTotalsByTeam, OnCallAssignments, SprintWindow } from './sprint.types.js';

const logger = new Logger('sprint-data');

/** Everything fetched for one team, keyed by display name. */
export interface SprintInputs {
  /** Members found in the HR directory, in roster order. */
  coreDisplayNames: string[];
  memberAbsences: AbsencesByPerson;
  /** Manager and people of interest. */
  poiAbsences: AbsencesByPerson;
  l1: OnCallAssignments;
  l2: OnCallAssignments;
  epicTotals: EpicTotalsByTeam;
}

export interface SprintData {
  window: SprintWindow;
  /** First company social inside the sprint. */
  social: IsoDate | null;
  /** Absences overlapping the sprint, by member. */
  absences: AbsencesByPerson;
  poiAbsences: AbsencesByPerson;
  /** On-call dates inside the sprint, by member display name. */
  l1: OnCallAssignments;
  l2: OnCallAssignments;
  capacity: SprintCapacity;
}

export interface SprintReport {
  team: Team;
  coreDisplayNames: string[];
  sprints: SprintData[];
}

/** The sprints a report covers, starting `numberOfSprintsBack` sprints before today's. */
export function planSprints(settings: PlannerSettings, today: DateTime): SprintWindow[] {
  const current = sprintContaining(today, settings.sprintAnchor);
  const firstStart = current.startDate.minus({ days: SPRINT_LENGTH_DAYS * settings.numberOfSprintsBack });
  return enumerateSprints(firstStart, settings.numberOfSprints, settings.sprintAnchor);
}

/** First day of the first sprint to the last day of the last. */
export function reportRange(windows: readonly SprintWindow[]): DateRange | null {
  const first = windows[0];
  const last = windows[windows.length - 1];
  return first && last ? { start: first.startDate, end: last.endDate } : null;
}

/** The manager plus the people of interest, without repeats. */
export function peopleOfInterest(team: Team): PersonOfInterest[] {
  const seen = new Set<string>();
  return [team.manager, ...team.peopleOfInterest].filter((person) => {
    if (seen.has(person.displayName)) {
      return false;
    }
    seen.add(person.displayName);
    return true;
  });
}

/** HR employee id per display name, for the people whose HR name is in the directory. */
function matchDirectory(
  people: readonly { displayName: string; hrName: string }[],
  directory: readonly DirectoryEmployee[],
): Map<string, string> {
  const idsByHrName = new Map(directory.map((employee) => [employee.displayName, employee.id]));
  const matched = new Map<string, string>();
  for (const person of people) {
    const id = idsByHrName.get(person.hrName);
    if (id) {
      matched.set(person.displayName, id);
    } else {
      logger.warn(`${person.displayName} not found in the HR directory as "${person.hrName}"`);
    }
  }
  return matched;
}

/** Re-keys source data from an external id or name to display name, dropping anyone unknown. */
function rekey<T>(byKey: Record<string, T>, displayNameFor: Map<string, string>): Record<string, T> {
  const rekeyed: Record<string, T> = {};
  for (const [key, value] of Object.entries(byKey)) {
    const displayName = displayNameFor.get(key);
    if (displayName !== undefined) {
      rekeyed[displayName] = value;
    }
  }
  return rekeyed;
}

function invert(map: Map<string, string>): Map<string, string> {
  return new Map([...map.entries()].map(([k, v]) => [v, k]));
}

/**
 * Fetches the absence, on-call and epic data a team's report needs, for the whole
 * span of sprints at once.
 */
export async function collectSprintInputs(
  team: Team,
  settings: PlannerSettings,
  sources: SprintSources,
  today: DateTime,
): Promise<SprintInputs> {
  const windows = planSprints(settings, today);
  const range = reportRange(windows);
  if (!range) {
    return { coreDisplayNames: [], memberAbsences: {}, poiAbsences: {}, l1: {}, l2: {}, epicTotals: {} };
  }

  const directory = await sources.absences.fetchDirectory();
  const memberIds = matchDirectory(
    team.members.map((m) => m.identity),
    directory,
  );
  const poiIds = matchDirectory(peopleOfInterest(team), directory);
  const onCallNames = new Map(team.members.map((m) => [m.identity.oncallName, m.identity.displayName]));

  logger.info(`Collecting ${team.name} data from ${toIsoDate(range.start)} to ${toIsoDate(range.end)}`);

  const fetchOnCall = async (span: DateRange): Promise<[OnCallAssignments, OnCallAssignments]> => {
    const userIds = await sources.onCall.resolveUserIds([...onCallNames.keys()]);
    return Promise.all([
      sources.onCall.fetchOnCall(settings.onCallRotations.l1, span, userIds),
      sources.onCall.fetchOnCall(settings.onCallRotations.l2, span, userIds),
    ]);
  };

  const [absences, [l1, l2], epicTotals] = await Promise.all([
    sources.absences.fetchAbsences(range, [...new Set([...memberIds.values(), ...poiIds.values()])]),
    fetchOnCall(range),
    sources.epics ? sources.epics.fetchEpicTotals(windows) : Promise.resolve<EpicTotalsByTeam>({}),
  ]);

  return {
    coreDisplayNames: team.members.map((m) => m.identity.displayName).filter((name) => memberIds.has(name)),
    memberAbsences: rekey(absences, invert(memberIds)),
    poiAbsences: rekey(absences, invert(poiIds)),
    l1: rekey(l1, onCallNames),
    l2: rekey(l2, onCallNames),
    epicTotals,
  };
}

/** Works out every sprint's availability and capacity from already-fetched inputs. */
export function buildSprintReport(
  team: Team,
  settings: PlannerSettings,
  inputs: SprintInputs,
  today: DateTime,
): SprintReport {
  const epicTotals = inputs.epicTotals[team.jiraKey] ?? {};

  const sprints = planSprints(settings, today).map((window): SprintData => {
    const social = socialDatesInWindow(window, settings.socialDates)[0] ?? null;
    const absences = absencesInWindow(inputs.memberAbsences, window);
    const l1 = onCallInWindow(inputs.l1, window);
    const l2 = onCallInWindow(inputs.l2, window);

    const results = team.members.map((member) => {
      const name = member.identity.displayName;
      return calculateAvailability(member, window, {
        absenceDates: absenceDatesInWindow(absences[name] ?? [], window),
        l1Dates: new Set(l1[name] ?? []),
        l2Dates: new Set(l2[name] ?? []),
        socialPenalty: social ? 1 : 0,
      });
    });

    return {
      window,
      social,
      absences,
      poiAbsences: absencesInWindow(inputs.poiAbsences, window),
      l1,
      l2,
      capacity: aggregateCapacity(results, team, epicTotals[toIsoDate(window.endDate)] ?? 0),
    };
  });

  return { team, coreDisplayNames: inputs.coreDisplayNames, sprints };
}
