import { ApiSource } from '../database/entities.js';
import type { ApiResponseCache } from '../database/api-response-cache.js';
import { Logger } from '../logger.js';
import { parseAbsenceInterval } from '../sprint/sprint.absences.js';
import type { AbsenceSource, DateRange, DirectoryEmployee } from '../sprint/sprint.sources.js';
import type { ParsedAbsenceInterval } from '../sprint/sprint.types.js';
import { buildUrl, parseJsonBody, requestText } from '../utils/http.js';
import { getArray, getNumber, getString, isObject } from '../utils/json.js';
import { toIsoDate } from '../utils/date.js';
import type { BambooHrConfig, WhosOutEntry } from './bamboohr.types.js';

const logger = new Logger('bamboohr-client');

export const DIRECTORY_CACHE_KEY = 'bamboohr_directory';

export function whosOutCacheKey(range: DateRange): string {
  return `bamboohr_whos_out_${range.start.toFormat('yyyyMMdd')}_${range.end.toFormat('yyyyMMdd')}`;
}

function optionalTrimmed(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Ids come back as strings or numbers depending on the endpoint. */
function readId(value: unknown, key: string): string | undefined {
  const asString = getString(value, key);
  if (asString !== undefined) {
    return asString;
  }
  const asNumber = getNumber(value, key);
  return asNumber === undefined ? undefined : String(asNumber);
}

export function parseDirectory(body: unknown): DirectoryEmployee[] {
  const employees: DirectoryEmployee[] = [];
  for (const entry of getArray(body, 'employees')) {
    const id = readId(entry, 'id');
    const displayName = optionalTrimmed(getString(entry, 'displayName'));
    if (!id || !displayName) {
      logger.debug('Skipping directory entry without id or name', { entry });
      continue;
    }
    employees.push({
      id,
      displayName,
      preferredName: optionalTrimmed(getString(entry, 'preferredName')),
      lastName: optionalTrimmed(getString(entry, 'lastName')),
      division: optionalTrimmed(getString(entry, 'division')),
    });
  }
  return employees;
}

export function parseWhosOut(body: unknown): WhosOutEntry[] {
  if (!Array.isArray(body)) {
    return [];
  }
  return body.filter(isObject).flatMap((entry): WhosOutEntry[] => {
    const start = getString(entry, 'start');
    const end = getString(entry, 'end');
    if (!start || !end) {
      return [];
    }
    return [
      {
        type: getString(entry, 'type') === 'holiday' ? 'holiday' : 'timeOff',
        employeeId: readId(entry, 'employeeId'),
        name: getString(entry, 'name') ?? '',
        start,
        end,
      },
    ];
  });
}

/**
 * BambooHR API access through the response cache. Responses are requested as JSON
 * and cached as received.
 */
export class BambooHrClient implements AbsenceSource {
  private readonly baseUrl: string;
  private readonly authorization: string;

  constructor(
    config: BambooHrConfig,
    private readonly cache: ApiResponseCache,
  ) {
    this.baseUrl = config.baseUrl ?? `https://api.bamboohr.com/api/gateway.php/${config.subdomain}/v1/`;
    this.authorization = `Basic ${Buffer.from(`${config.apiKey}:x`).toString('base64')}`;
  }

  private async get(cacheKey: string, path: string, query: Record<string, string> = {}): Promise<unknown> {
    const body = await this.cache.getOrFetch(cacheKey, ApiSource.BambooHr, () =>
      requestText({
        source: 'BambooHR',
        url: buildUrl(this.baseUrl, path, query),
        init: { headers: { Accept: 'application/json', Authorization: this.authorization } },
      }),
    );
    return parseJsonBody('BambooHR', body);
  }

  async fetchDirectory(): Promise<DirectoryEmployee[]> {
    const employees = parseDirectory(await this.get(DIRECTORY_CACHE_KEY, 'employees/directory'));
    logger.debug(`Loaded ${employees.length} employees from the directory`);
    return employees;
  }

  async fetchAbsences(
    range: DateRange,
    employeeIds: readonly string[],
  ): Promise<Record<string, ParsedAbsenceInterval[]>> {
    const wanted = new Set(employeeIds);
    const entries = parseWhosOut(
      await this.get(whosOutCacheKey(range), 'time_off/whos_out', {
        start: toIsoDate(range.start),
        end: toIsoDate(range.end),
      }),
    );

    const absences: Record<string, ParsedAbsenceInterval[]> = {};
    for (const entry of entries) {
      if (entry.type !== 'timeOff' || !entry.employeeId || !wanted.has(entry.employeeId)) {
        continue;
      }
      const parsed = parseAbsenceInterval({ kind: 'raw', start: entry.start, end: entry.end });
      if (!parsed) {
        logger.warn(`Ignoring absence with unreadable dates for employee ${entry.employeeId}`, entry);
        continue;
      }
      (absences[entry.employeeId] ??= []).push(parsed);
    }
    return absences;
  }
}
