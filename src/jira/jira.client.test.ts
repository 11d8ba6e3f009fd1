import { afterEach, describe, expect, it, vi } from 'vitest';
import { day, makeSettings } from '../../test/fixtures/planner.js';
import { createTestCache } from '../../test/utils/database.js';
import { jsonResponse, stubFetch } from '../../test/utils/fetch.js';
import { planSprints } from '../sprint/sprint.data.js';
import { toIsoDate } from '../utils/date.js';
import { countEpicsPerSprint, JiraClient, OPEN_EPICS_CACHE_KEY, toScheduledEpic } from './jira.client.js';

const config = { baseUrl: 'https://jira.test', apiKey: 'someone@example.com:test-secret', projectKeys: ['PLAT', 'PAY'] };

// Sprints 73 (2025-03-03 to 03-16) and 74 (03-17 to 03-30)
const windows = planSprints(makeSettings(), day('2025-03-05'));

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('toScheduledEpic', () => {
  it('reads key, project and dates', () => {
    const epic = toScheduledEpic(
      {
        key: 'PLAT-1',
        fields: { project: { key: 'PLAT' }, duedate: '2025-03-20', customfield_10015: '2025-03-05T00:00:00.000Z' },
      },
      'customfield_10015',
    );

    expect(epic && [epic.key, epic.projectKey, toIsoDate(epic.start), toIsoDate(epic.due), epic.fte]).toEqual([
      'PLAT-1',
      'PLAT',
      '2025-03-05',
      '2025-03-20',
      1,
    ]);
  });

  it('falls back to the key prefix and the due date', () => {
    const epic = toScheduledEpic({ key: 'PAY-7', fields: { duedate: '2025-03-12' } }, 'customfield_10015');

    expect(epic?.projectKey).toBe('PAY');
    expect(epic && toIsoDate(epic.start)).toBe('2025-03-12');
  });

  it('moves a start date after the due date back to the due date', () => {
    const epic = toScheduledEpic(
      { key: 'PAY-8', fields: { duedate: '2025-03-12', start: '2025-04-01' } },
      'start',
    );

    expect(epic && toIsoDate(epic.start)).toBe('2025-03-12');
  });

  it('reads head count from the configured field', () => {
    const issue = { key: 'PLAT-2', fields: { duedate: '2025-03-12', headcount: 2.5 } };

    expect(toScheduledEpic(issue, 'start', 'headcount')?.fte).toBe(2.5);
    expect(toScheduledEpic(issue, 'start', 'missing')?.fte).toBe(1);
    expect(toScheduledEpic(issue, 'start')?.fte).toBe(1);
  });

  it('skips epics without a due date', () => {
    expect(toScheduledEpic({ key: 'PLAT-3', fields: {} }, 'start')).toBeNull();
  });
});

describe('countEpicsPerSprint', () => {
  it('adds each epic to every sprint its dates touch', () => {
    const totals = countEpicsPerSprint([
      { key: 'PLAT-1', projectKey: 'PLAT', start: day('2025-03-05'), due: day('2025-03-20'), fte: 1 },
      { key: 'PLAT-2', projectKey: 'PLAT', start: day('2025-03-16'), due: day('2025-03-16'), fte: 2 },
      { key: 'PAY-1', projectKey: 'PAY', start: day('2025-03-17'), due: day('2025-03-17'), fte: 1 },
    ], windows);

    expect(totals).toEqual({
      PLAT: { '2025-03-16': 3, '2025-03-30': 1 },
      PAY: { '2025-03-30': 1 },
    });
  });

  it('keys epics by the planned sprints across an ISO week 53 year end', () => {
    const planned = planSprints(makeSettings({ numberOfSprints: 8 }), day('2026-11-30'));

    const totals = countEpicsPerSprint(
      [
        { key: 'PLAT-1', projectKey: 'PLAT', start: day('2027-01-20'), due: day('2027-01-22'), fte: 1 },
        { key: 'PLAT-2', projectKey: 'PLAT', start: day('2026-12-24'), due: day('2027-01-05'), fte: 2 },
        { key: 'OPS-1', projectKey: 'OPS', start: day('2027-06-01'), due: day('2027-06-04'), fte: 1 },
      ],
      planned,
    );

    expect(planned.map((w) => toIsoDate(w.endDate))).toEqual([
      '2026-12-06',
      '2026-12-20',
      '2027-01-03',
      '2027-01-17',
      '2027-01-31',
      '2027-02-14',
      '2027-02-28',
      '2027-03-14',
    ]);
    expect(totals).toEqual({
      PLAT: { '2027-01-03': 2, '2027-01-17': 2, '2027-01-31': 1 },
      OPS: {},
    });
  });
});

describe('JiraClient', () => {
  it('pages through the search and totals the epics', async () => {
    let page = 0;
    const { requests } = stubFetch(() => {
      page++;
      return page === 1
        ? jsonResponse({
            issues: [
              {
                key: 'PLAT-1',
                fields: { project: { key: 'PLAT' }, duedate: '2025-03-20', customfield_10015: '2025-03-05' },
              },
            ],
            nextPageToken: 'page-2',
          })
        : jsonResponse({
            issues: [{ key: 'PAY-7', fields: { duedate: '2025-03-12' } }, { key: 'PAY-9', fields: {} }],
            isLast: true,
          });
    });
    const cache = createTestCache();

    const totals = await new JiraClient(config, cache).fetchEpicTotals(windows);

    expect(totals).toEqual({
      PLAT: { '2025-03-16': 1, '2025-03-30': 1 },
      PAY: { '2025-03-16': 1 },
    });
    expect(requests.map((r) => r.url)).toEqual([
      'https://jira.test/rest/api/3/search/jql',
      'https://jira.test/rest/api/3/search/jql',
    ]);

    const firstBody: unknown = JSON.parse(String(requests[0]?.init?.body));
    const secondBody: unknown = JSON.parse(String(requests[1]?.init?.body));
    expect(firstBody).toEqual({
      jql: 'project in ("PLAT", "PAY") AND issuetype = Epic AND statusCategory != Done AND duedate is not EMPTY',
      fields: ['project', 'duedate', 'customfield_10015'],
      maxResults: 100,
    });
    expect(secondBody).toMatchObject({ nextPageToken: 'page-2' });
    expect(cache.entries().map((e) => e.cache_key)).toEqual([OPEN_EPICS_CACHE_KEY]);
  });

  it('serves totals from the cache on the next call', async () => {
    const { fetch } = stubFetch(() => jsonResponse({ issues: [] }));
    const client = new JiraClient(config, createTestCache());

    await client.fetchEpicTotals(windows);
    await expect(client.fetchEpicTotals(windows)).resolves.toEqual({});

    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('does not search without project keys', async () => {
    const { fetch } = stubFetch(() => jsonResponse({ issues: [] }));

    const client = new JiraClient({ ...config, projectKeys: [] }, createTestCache());

    await expect(client.fetchEpicTotals(windows)).resolves.toEqual({});
    expect(fetch).not.toHaveBeenCalled();
  });
});
