import type { DateTime } from 'luxon';
import type { ApiResponseCache } from '../database/api-response-cache.js';
import { ApiSource } from '../database/entities.js';
import { Logger } from '../logger.js';
import { overlapsWindow } from '../sprint/sprint.calendar.js';
import type { EpicSource } from '../sprint/sprint.sources.js';
import type { EpicTotalsByTeam, SprintWindow } from '../sprint/sprint.types.js';
import { parseIsoDate, toIsoDate } from '../utils/date.js';
import { buildUrl, parseJsonBody, requestText } from '../utils/http.js';
import { getArray, getNumber, getPath, getString } from '../utils/json.js';

const logger = new Logger('jira-client');

const SEARCH_PATH = 'rest/api/3/search/jql';
const SEARCH_PAGE_SIZE = 100;

/** Pages stop here even if Jira keeps handing out tokens. */
const MAX_SEARCH_PAGES = 50;

export const OPEN_EPICS_CACHE_KEY = 'jira_open_epics';

export interface JiraConfig {
  baseUrl: string;
  /** `email:api-token` */
  apiKey: string;
  /** Only epics from these projects are fetched. */
  projectKeys: readonly string[];
  /** Field holding an epic's start date. Jira Cloud's built-in "Start date" by default. */
  startDateField?: string;
  /** Numeric field with the people an epic needs; each epic counts as 1 when unset or empty. */
  fteField?: string;
}

/** An open epic with the dates that place it on the sprint calendar. */
export interface ScheduledEpic {
  key: string;
  projectKey: string;
  start: DateTime;
  due: DateTime;
  fte: number;
}

/**
 * Adds each epic's head count to every planned sprint its `[start, due]` range
 * overlaps, keyed by project then by sprint end date.
 */
export function countEpicsPerSprint(
  epics: readonly ScheduledEpic[],
  windows: readonly SprintWindow[],
): EpicTotalsByTeam {
  const totals: EpicTotalsByTeam = {};
  for (const epic of epics) {
    const byEnd = (totals[epic.projectKey] ??= {});
    for (const window of windows) {
      if (overlapsWindow(epic.start, epic.due, window)) {
        const end = toIsoDate(window.endDate);
        byEnd[end] = (byEnd[end] ?? 0) + epic.fte;
      }
    }
  }
  return totals;
}

/** Jira date fields hold `yyyy-MM-dd`, sometimes with a time after it. */
function readDate(issue: unknown, field: string): DateTime | null {
  const value = getString(issue, 'fields', field);
  return value ? parseIsoDate(value.slice(0, 10)) : null;
}

export function toScheduledEpic(issue: unknown, startDateField: string, fteField?: string): ScheduledEpic | null {
  const key = getString(issue, 'key');
  const due = readDate(issue, 'duedate');
  if (!key || !due) {
    return null;
  }
  const start = readDate(issue, startDateField) ?? due;
  const projectKey = getString(issue, 'fields', 'project', 'key') ?? key.split('-')[0];
  const fte = fteField ? (getNumber(issue, 'fields', fteField) ?? 1) : 1;

  return { key, projectKey, start: start <= due ? start : due, due, fte };
}

export class JiraClient implements EpicSource {
  private readonly headers: Record<string, string>;
  private readonly startDateField: string;

  constructor(
    private readonly config: JiraConfig,
    private readonly cache: ApiResponseCache,
  ) {
    this.startDateField = config.startDateField ?? 'customfield_10015';
    this.headers = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      Authorization: `Basic ${Buffer.from(config.apiKey).toString('base64')}`,
    };
  }

  private buildJql(): string {
    const projects = this.config.projectKeys.map((key) => `"${key}"`).join(', ');
    return `project in (${projects}) AND issuetype = Epic AND statusCategory != Done AND duedate is not EMPTY`;
  }

  /** Every open epic, across all result pages. */
  private async searchOpenEpics(): Promise<unknown[]> {
    const fields = ['project', 'duedate', this.startDateField, ...(this.config.fteField ? [this.config.fteField] : [])];
    const issues: unknown[] = [];
    let nextPageToken: string | undefined;

    for (let page = 0; page < MAX_SEARCH_PAGES; page++) {
      const body = await requestText({
        source: 'Jira',
        url: buildUrl(this.config.baseUrl, SEARCH_PATH),
        init: {
          method: 'POST',
          headers: this.headers,
          body: JSON.stringify({ jql: this.buildJql(), fields, maxResults: SEARCH_PAGE_SIZE, nextPageToken }),
        },
      });
      const result = parseJsonBody('Jira', body);
      issues.push(...getArray(result, 'issues'));

      nextPageToken = getString(result, 'nextPageToken');
      if (!nextPageToken || getPath(result, 'isLast') === true) {
        return issues;
      }
    }

    logger.warn(`Stopped reading epics after ${MAX_SEARCH_PAGES} pages`);
    return issues;
  }

  async fetchEpicTotals(windows: readonly SprintWindow[]): Promise<EpicTotalsByTeam> {
    if (this.config.projectKeys.length === 0) {
      return {};
    }

    const body = await this.cache.getOrFetch(OPEN_EPICS_CACHE_KEY, ApiSource.Jira, async () =>
      JSON.stringify({ issues: await this.searchOpenEpics() }),
    );
    const epics = getArray(parseJsonBody('Jira', body), 'issues').flatMap((issue) => {
      const epic = toScheduledEpic(issue, this.startDateField, this.config.fteField);
      return epic ? [epic] : [];
    });

    logger.debug(`Found ${epics.length} scheduled epics`);
    return countEpicsPerSprint(epics, windows);
  }
}
