import fs from 'fs';
import { DEFAULT_BANK_HOLIDAY_REGIONS, type BankHolidayRegion } from '../constants.js';
import { Logger } from '../logger.js';
import { isObject, type JsonObject } from '../utils/json.js';
import type {
  CanvasTargets,
  Member,
  PersonOfInterest,
  PlannerConfig,
  PlannerSettings,
  Team,
} from './roster.types.js';
import {
  type ValidationResult,
  validateFraction,
  validateIsoDate,
  validateSprintStart,
  validateNonNegative,
  validatePositiveInteger,
  validateStartPct,
  validateTenure,
} from './roster.validation.js';

const logger = new Logger('roster-loader');

export class RosterValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid planner configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'RosterValidationError';
  }
}

/**
 * Walks the raw JSON, collecting every problem instead of stopping at the first,
 * so a broken configuration is reported in one go.
 */
class ConfigReader {
  readonly problems: string[] = [];

  check(result: ValidationResult): void {
    if (!result.isValid && result.error) {
      this.problems.push(result.error);
    }
  }

  object(source: JsonObject, key: string, path: string): JsonObject {
    const value = source[key];
    if (!isObject(value)) {
      this.problems.push(`${path}.${key} must be an object`);
      return {};
    }
    return value;
  }

  array(source: JsonObject, key: string, path: string, optional = false): unknown[] {
    const value = source[key];
    if (value === undefined && optional) {
      return [];
    }
    if (!Array.isArray(value)) {
      this.problems.push(`${path}.${key} must be an array`);
      return [];
    }
    return value;
  }

  string(source: JsonObject, key: string, path: string): string {
    const value = source[key];
    if (typeof value !== 'string' || !value.trim()) {
      this.problems.push(`${path}.${key} must be a non-empty string`);
      return '';
    }
    return value.trim();
  }

  optionalString(source: JsonObject, key: string, path: string): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' || !value.trim()) {
      this.problems.push(`${path}.${key} must be a non-empty string when set`);
      return undefined;
    }
    return value.trim();
  }

  number(source: JsonObject, key: string, path: string, fallback?: number): number {
    const value = source[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.problems.push(`${path}.${key} must be a number`);
      return 0;
    }
    return value;
  }

  date(source: JsonObject, key: string, path: string): string {
    const value = this.string(source, key, path);
    if (value) {
      this.check(validateIsoDate(`${path}.${key}`, value));
    }
    return value;
  }

  optionalDate(source: JsonObject, key: string, path: string): string | undefined {
    const value = this.optionalString(source, key, path);
    if (value) {
      this.check(validateIsoDate(`${path}.${key}`, value));
    }
    return value;
  }

  stringList(source: JsonObject, key: string, path: string, optional = false): string[] {
    return this.array(source, key, path, optional).flatMap((entry, index) => {
      if (typeof entry !== 'string' || !entry.trim()) {
        this.problems.push(`${path}.${key}[${index}] must be a non-empty string`);
        return [];
      }
      return [entry.trim()];
    });
  }
}

function readPerson(reader: ConfigReader, raw: unknown, path: string): PersonOfInterest {
  if (!isObject(raw)) {
    reader.problems.push(`${path} must be an object with a name`);
    return { displayName: '', hrName: '' };
  }
  const displayName = reader.string(raw, 'name', path);
  return {
    displayName,
    hrName: reader.optionalString(raw, 'hr_name', path) ?? displayName,
  };
}

function readMember(reader: ConfigReader, raw: unknown, path: string): Member {
  if (!isObject(raw)) {
    reader.problems.push(`${path} must be an object with a name`);
    return { identity: { displayName: '', hrName: '', oncallName: '' }, startPct: 1 };
  }

  const displayName = reader.string(raw, 'name', path);
  const startDate = reader.optionalDate(raw, 'start_date', path);
  const leaveDate = reader.optionalDate(raw, 'leave_date', path);
  const startPct = reader.number(raw, 'start_pct', path, 1);

  reader.check(validateStartPct(`${path}.start_pct`, startPct));
  reader.check(validateTenure(path, startDate, leaveDate));

  return {
    identity: {
      displayName,
      hrName: reader.optionalString(raw, 'hr_name', path) ?? displayName,
      oncallName: reader.optionalString(raw, 'oncall_name', path) ?? displayName,
    },
    startDate,
    leaveDate,
    startPct,
  };
}

function readCanvases(reader: ConfigReader, raw: JsonObject, path: string): CanvasTargets {
  if (raw.canvases === undefined) {
    return {};
  }
  const canvases = reader.object(raw, 'canvases', path);
  return {
    absences: reader.optionalString(canvases, 'absences', `${path}.canvases`),
    capacity: reader.optionalString(canvases, 'capacity', `${path}.canvases`),
    support: reader.optionalString(canvases, 'support', `${path}.canvases`),
  };
}

function readTeam(reader: ConfigReader, raw: unknown, path: string): Team {
  const source: JsonObject = isObject(raw) ? raw : {};
  if (!isObject(raw)) {
    reader.problems.push(`${path} must be an object`);
  }

  const members = reader.array(source, 'members', path).map((m, i) => readMember(reader, m, `${path}.members[${i}]`));
  const peopleOfInterest = reader
    .array(source, 'people_of_interest', path, true)
    .map((p, i) => readPerson(reader, p, `${path}.people_of_interest[${i}]`));

  const epicPointValue = reader.number(source, 'epic_point_value', path);
  const pointCapacityCoefficient = reader.number(source, 'point_capacity', path);
  const loadFactor = reader.number(source, 'load_factor', path);
  const engineeringSplit = reader.number(source, 'engineering_split', path);

  reader.check(validateNonNegative(`${path}.epic_point_value`, epicPointValue));
  reader.check(validateNonNegative(`${path}.point_capacity`, pointCapacityCoefficient));
  reader.check(validateNonNegative(`${path}.load_factor`, loadFactor));
  reader.check(validateFraction(`${path}.engineering_split`, engineeringSplit));

  const displayNames = members.map((m) => m.identity.displayName);
  const duplicates = displayNames.filter((name, index) => name && displayNames.indexOf(name) !== index);
  for (const name of new Set(duplicates)) {
    reader.problems.push(`${path}.members lists "${name}" more than once`);
  }

  return {
    name: reader.string(source, 'name', path),
    jiraKey: reader.string(source, 'jira_key', path),
    epicPointValue,
    manager: readPerson(reader, source.manager, `${path}.manager`),
    members,
    peopleOfInterest,
    pointCapacityCoefficient,
    loadFactor,
    engineeringSplit,
    canvasTargets: readCanvases(reader, source, path),
  };
}

function readBankHolidayRegions(reader: ConfigReader, raw: JsonObject, path: string): BankHolidayRegion[] {
  if (raw.bank_holiday_regions === undefined) {
    return [...DEFAULT_BANK_HOLIDAY_REGIONS];
  }
  return reader.array(raw, 'bank_holiday_regions', path).map((entry, index) => {
    const entryPath = `${path}.bank_holiday_regions[${index}]`;
    const source: JsonObject = isObject(entry) ? entry : {};
    return {
      label: reader.string(source, 'label', entryPath),
      country: reader.string(source, 'country', entryPath),
      state: reader.optionalString(source, 'state', entryPath),
    };
  });
}

function readSettings(reader: ConfigReader, raw: JsonObject): PlannerSettings {
  const path = 'settings';
  const anchor = reader.object(raw, 'sprint_anchor', path);
  const rotations = reader.object(raw, 'oncall_rotations', path);
  const xmas = reader.object(raw, 'xmas_rota', path);

  const anchorDate = reader.date(anchor, 'date', `${path}.sprint_anchor`);
  if (anchorDate) {
    reader.check(validateSprintStart(`${path}.sprint_anchor.date`, anchorDate));
  }

  const numberOfSprints = reader.number(raw, 'number_of_sprints', path, 8);
  const numberOfSprintsBack = reader.number(raw, 'number_of_sprints_back', path, 0);
  const apiCacheTimeoutSeconds = reader.number(raw, 'api_cache_timeout_seconds', path, 900);
  reader.check(validatePositiveInteger(`${path}.number_of_sprints`, numberOfSprints));
  reader.check(validateNonNegative(`${path}.number_of_sprints_back`, numberOfSprintsBack));
  reader.check(validateNonNegative(`${path}.api_cache_timeout_seconds`, apiCacheTimeoutSeconds));

  const socialDates = reader.stringList(raw, 'social_dates', path, true);
  socialDates.forEach((d, i) => reader.check(validateIsoDate(`${path}.social_dates[${i}]`, d)));

  return {
    socialDates: [...socialDates].sort(),
    sprintAnchor: {
      date: anchorDate,
      number: reader.number(anchor, 'number', `${path}.sprint_anchor`),
    },
    numberOfSprints,
    numberOfSprintsBack: Math.floor(numberOfSprintsBack),
    apiCacheTimeoutSeconds,
    onCallRotations: {
      l1: reader.string(rotations, 'l1', `${path}.oncall_rotations`),
      l2: reader.string(rotations, 'l2', `${path}.oncall_rotations`),
    },
    xmasRota: {
      startDate: reader.date(xmas, 'start_date', `${path}.xmas_rota`),
      endDate: reader.date(xmas, 'end_date', `${path}.xmas_rota`),
      division: reader.optionalString(xmas, 'division', `${path}.xmas_rota`) ?? 'Tech',
      exclusions: reader.stringList(xmas, 'exclusions', `${path}.xmas_rota`, true),
    },
    bankHolidayRegions: readBankHolidayRegions(reader, raw, path),
  };
}

/**
 * Builds a validated planner configuration from parsed JSON.
 * @throws RosterValidationError listing every problem found
 */
export function parsePlannerConfig(raw: unknown): PlannerConfig {
  const reader = new ConfigReader();
  const root: JsonObject = isObject(raw) ? raw : {};
  if (!isObject(raw)) {
    reader.problems.push('configuration must be a JSON object');
  }

  const settings = readSettings(reader, reader.object(root, 'settings', 'config'));
  const teams = reader.array(root, 'teams', 'config').map((t, i) => readTeam(reader, t, `teams[${i}]`));

  const teamNames = teams.map((t) => t.name.toLowerCase());
  const duplicateTeams = teamNames.filter((name, index) => name && teamNames.indexOf(name) !== index);
  for (const name of new Set(duplicateTeams)) {
    reader.problems.push(`team "${name}" is defined more than once`);
  }

  if (reader.problems.length > 0) {
    throw new RosterValidationError(reader.problems);
  }

  return { settings, teams };
}

export function loadPlannerConfig(configPath: string): PlannerConfig {
  logger.debug(`Loading planner configuration from ${configPath}`);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new RosterValidationError([
      `could not read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  const config = parsePlannerConfig(raw);
  logger.info(`Loaded ${config.teams.length} teams from ${configPath}`);
  return config;
}

/** Case-insensitive team lookup. */
export function findTeam(config: PlannerConfig, teamName: string): Team | undefined {
  const wanted = teamName.trim().toLowerCase();
  return config.teams.find((team) => team.name.toLowerCase() === wanted);
}
