import { sortBy, uniq } from 'lodash-es';
import type { ApiResponseCache } from '../database/api-response-cache.js';
import { ApiSource } from '../database/entities.js';
import { Logger } from '../logger.js';
import type { DateRange, OnCallSource } from '../sprint/sprint.sources.js';
import type { OnCallAssignments } from '../sprint/sprint.types.js';
import { toIsoDate } from '../utils/date.js';
import { buildUrl, parseJsonBody, requestText } from '../utils/http.js';
import { getArray, getString } from '../utils/json.js';

const logger = new Logger('pagerduty-client');

const DEFAULT_BASE_URL = 'https://api.pagerduty.com/';

/** The users endpoint reports no total, so one large page is requested instead of paginating. */
const USER_PAGE_LIMIT = 1000;

export const USERS_CACHE_KEY = 'pagerduty_users';

export function scheduleCacheKey(rotationId: string, range: DateRange): string {
  return `pagerduty_oncall_${rotationId}_${range.start.toFormat('yyyyMMdd')}_${range.end.toFormat('yyyyMMdd')}`;
}

export interface PagerDutyConfig {
  apiKey: string;
  baseUrl?: string;
}

export interface PagerDutyUser {
  id: string;
  name: string;
}

export interface RenderedScheduleEntry {
  userId: string;
  /** User name as shown on the schedule. */
  userName: string;
  /** ISO timestamp the shift starts. */
  start: string;
}

export function parseUsers(body: unknown): PagerDutyUser[] {
  return getArray(body, 'users').flatMap((user): PagerDutyUser[] => {
    const id = getString(user, 'id');
    const name = getString(user, 'name');
    return id && name ? [{ id, name }] : [];
  });
}

export function parseRenderedSchedule(body: unknown): RenderedScheduleEntry[] {
  return getArray(body, 'schedule', 'final_schedule', 'rendered_schedule_entries').flatMap(
    (entry): RenderedScheduleEntry[] => {
      const userId = getString(entry, 'user', 'id');
      const userName = getString(entry, 'user', 'summary');
      const start = getString(entry, 'start');
      return userId && userName && start ? [{ userId, userName, start }] : [];
    },
  );
}

export class PagerDutyClient implements OnCallSource {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private users?: Promise<PagerDutyUser[]>;

  constructor(
    config: PagerDutyConfig,
    private readonly cache: ApiResponseCache,
  ) {
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.headers = {
      Accept: 'application/vnd.pagerduty+json;version=2',
      'Content-Type': 'application/json',
      Authorization: `Token token=${config.apiKey}`,
    };
  }

  private async get(cacheKey: string, path: string, query: Record<string, string | number>): Promise<unknown> {
    const body = await this.cache.getOrFetch(cacheKey, ApiSource.PagerDuty, () =>
      requestText({ source: 'PagerDuty', url: buildUrl(this.baseUrl, path, query), init: { headers: this.headers } }),
    );
    return parseJsonBody('PagerDuty', body);
  }

  private loadUsers(): Promise<PagerDutyUser[]> {
    this.users ??= this.get(USERS_CACHE_KEY, 'users', { limit: USER_PAGE_LIMIT }).then(parseUsers);
    return this.users;
  }

  async resolveUserIds(names: readonly string[]): Promise<string[]> {
    const wanted = new Set(names);
    const users = await this.loadUsers();
    const ids = users.filter((user) => wanted.has(user.name)).map((user) => user.id);
    logger.debug(`Resolved ${ids.length} of ${wanted.size} on-call users`);
    return ids;
  }

  /**
   * Each rendered entry counts for the date its shift starts. The query starts a day
   * early so a shift that began the evening before the range is still seen, and ends
   * at midnight after the last day so shifts starting on that day are included.
   */
  async fetchOnCall(rotationId: string, range: DateRange, userIds: readonly string[]): Promise<OnCallAssignments> {
    const wanted = new Set(userIds);
    const body = await this.get(scheduleCacheKey(rotationId, range), `schedules/${encodeURIComponent(rotationId)}`, {
      since: toIsoDate(range.start.minus({ days: 1 })),
      until: toIsoDate(range.end.plus({ days: 1 })),
      overflow: 'true',
    });

    const assignments: OnCallAssignments = {};
    for (const entry of parseRenderedSchedule(body)) {
      if (!wanted.has(entry.userId)) {
        continue;
      }
      (assignments[entry.userName] ??= []).push(entry.start.slice(0, 10));
    }

    for (const [name, dates] of Object.entries(assignments)) {
      assignments[name] = sortBy(uniq(dates));
    }
    return assignments;
  }
}
