import { afterEach, describe, expect, it, vi } from 'vitest';
import { day } from '../../test/fixtures/planner.js';
import { createTestCache } from '../../test/utils/database.js';
import { jsonResponse, stubFetch, textResponse } from '../../test/utils/fetch.js';
import { toIsoDate } from '../utils/date.js';
import {
  BambooHrClient,
  DIRECTORY_CACHE_KEY,
  parseDirectory,
  parseWhosOut,
  whosOutCacheKey,
} from './bamboohr.client.js';

const range = { start: day('2025-03-03'), end: day('2025-03-30') };
const config = { apiKey: 'test-secret', subdomain: 'acme', baseUrl: 'https://hr.test/v1' };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('parseDirectory', () => {
  it('reads employees with numeric or string ids and skips incomplete ones', () => {
    const employees = parseDirectory({
      employees: [
        { id: '101', displayName: ' Avery Quinn ', preferredName: 'Avery', lastName: 'Quinn', division: 'Tech' },
        { id: 102, displayName: 'Bea Lindqvist', preferredName: '' },
        { id: '103' },
        { displayName: 'No Id' },
      ],
    });

    expect(employees).toEqual([
      { id: '101', displayName: 'Avery Quinn', preferredName: 'Avery', lastName: 'Quinn', division: 'Tech' },
      { id: '102', displayName: 'Bea Lindqvist', preferredName: undefined, lastName: undefined, division: undefined },
    ]);
  });

  it('returns nothing for an unexpected body', () => {
    expect(parseDirectory({ fields: [] })).toEqual([]);
  });
});

describe('parseWhosOut', () => {
  it('keeps entries with both dates and tells holidays from time off', () => {
    expect(
      parseWhosOut([
        { type: 'timeOff', employeeId: 101, name: 'Avery Quinn', start: '2025-03-04', end: '2025-03-05' },
        { type: 'holiday', name: 'Company day', start: '2025-03-17', end: '2025-03-17' },
        { type: 'timeOff', employeeId: '102', start: '2025-03-10' },
      ]),
    ).toEqual([
      { type: 'timeOff', employeeId: '101', name: 'Avery Quinn', start: '2025-03-04', end: '2025-03-05' },
      { type: 'holiday', employeeId: undefined, name: 'Company day', start: '2025-03-17', end: '2025-03-17' },
    ]);
  });

  it('returns nothing when the body is not a list', () => {
    expect(parseWhosOut({ error: 'nope' })).toEqual([]);
  });
});

describe('whosOutCacheKey', () => {
  it('names the range in compact form', () => {
    expect(whosOutCacheKey(range)).toBe('bamboohr_whos_out_20250303_20250330');
  });
});

describe('BambooHrClient', () => {
  it('requests the directory with basic auth and caches the body', async () => {
    const { requests } = stubFetch(() => jsonResponse({ employees: [{ id: 7, displayName: 'Avery Quinn' }] }));
    const cache = createTestCache();
    const client = new BambooHrClient(config, cache);

    const first = await client.fetchDirectory();
    const second = await client.fetchDirectory();

    expect(first).toEqual(second);
    expect(first.map((e) => e.id)).toEqual(['7']);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('https://hr.test/v1/employees/directory');
    expect(requests[0]?.init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: `Basic ${Buffer.from('test-secret:x').toString('base64')}`,
    });
    expect(cache.entries().map((e) => e.cache_key)).toEqual([DIRECTORY_CACHE_KEY]);
  });

  it('defaults to the company gateway URL', async () => {
    const { requests } = stubFetch(() => jsonResponse({ employees: [] }));

    await new BambooHrClient({ apiKey: 'test-secret', subdomain: 'acme' }, createTestCache()).fetchDirectory();

    expect(requests[0]?.url).toBe('https://api.bamboohr.com/api/gateway.php/acme/v1/employees/directory');
  });

  it('groups time off by employee for the requested ids only', async () => {
    const { requests } = stubFetch(() =>
      jsonResponse([
        { type: 'timeOff', employeeId: 101, start: '2025-03-04', end: '2025-03-05' },
        { type: 'timeOff', employeeId: 101, start: '2025-03-24', end: '2025-03-28' },
        { type: 'timeOff', employeeId: 102, start: '2025-03-10', end: '2025-03-10' },
        { type: 'timeOff', employeeId: 999, start: '2025-03-10', end: '2025-03-10' },
        { type: 'timeOff', employeeId: 102, start: '2025-03-12', end: '2025-03-11' },
        { type: 'holiday', name: 'Company day', start: '2025-03-17', end: '2025-03-17' },
      ]),
    );
    const client = new BambooHrClient(config, createTestCache());

    const absences = await client.fetchAbsences(range, ['101', '102']);

    expect(requests[0]?.url).toBe('https://hr.test/v1/time_off/whos_out?start=2025-03-03&end=2025-03-30');
    expect(Object.keys(absences)).toEqual(['101', '102']);
    expect(absences['101']?.map((a) => [a.kind, toIsoDate(a.start), toIsoDate(a.end)])).toEqual([
      ['parsed', '2025-03-04', '2025-03-05'],
      ['parsed', '2025-03-24', '2025-03-28'],
    ]);
    expect(absences['102']).toHaveLength(1);
  });

  it('surfaces API failures', async () => {
    stubFetch(() => textResponse('denied', 403));
    const client = new BambooHrClient(config, createTestCache());

    await expect(client.fetchDirectory()).rejects.toThrow('BambooHR: 403  - denied');
  });
});
