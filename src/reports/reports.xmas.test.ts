import { describe, expect, it } from 'vitest';
import { makeSettings } from '../../test/fixtures/planner.js';
import { FakeAbsenceSource } from '../../test/fixtures/sources.js';
import type { DirectoryEmployee } from '../sprint/sprint.sources.js';
import { collectXmasRota, renderXmasRotaCsv, rotaEmployees, rotaName } from './reports.xmas.js';

const settings = makeSettings({
  xmasRota: { startDate: '2025-12-22', endDate: '2025-12-26', division: 'Tech', exclusions: ['morgan hale'] },
}).xmasRota;

const directory: DirectoryEmployee[] = [
  { id: '1', displayName: 'Avery Quinn', preferredName: 'Ave', lastName: 'Quinn', division: 'Tech' },
  { id: '2', displayName: 'Bea Lindqvist', division: 'tech' },
  { id: '3', displayName: 'Morgan Hale', division: 'Tech' },
  { id: '4', displayName: 'Gus Whitfield', division: 'Sales' },
  { id: '5', displayName: 'Quote, "Q" Person', division: 'Tech' },
];

describe('rotaName', () => {
  it('prefers preferred plus last name', () => {
    expect(rotaName({ id: '1', displayName: 'Avery Quinn', preferredName: 'Ave', lastName: 'Quinn' })).toBe('Ave Quinn');
    expect(rotaName({ id: '2', displayName: 'Bea Lindqvist', preferredName: 'Bea' })).toBe('Bea Lindqvist');
    expect(rotaName({ id: '9', displayName: ' ' })).toBe('9');
  });
});

describe('rotaEmployees', () => {
  it('keeps the division regardless of case and drops exclusions', () => {
    expect(rotaEmployees(directory, settings).map((e) => e.id)).toEqual(['1', '2', '5']);
  });
});

describe('Christmas rota', () => {
  it('marks days off per person as CSV', async () => {
    const source = new FakeAbsenceSource(directory, {
      '1': [['2025-12-24', '2025-12-26']],
      '4': [['2025-12-22', '2025-12-26']],
      '5': [['2025-12-22', '2025-12-22']],
    });

    const rota = await collectXmasRota(source, settings);

    expect(source.fetchAbsences.mock.calls[0]?.[1]).toEqual(['1', '2', '5']);
    expect(renderXmasRotaCsv(rota)).toBe(
      [
        'Name,Monday 2025-12-22,Tuesday 2025-12-23,Wednesday 2025-12-24,Thursday 2025-12-25,Friday 2025-12-26',
        'Ave Quinn,,,1,1,1',
        'Bea Lindqvist,,,,,',
        '"Quote, ""Q"" Person",1,,,,',
        '',
      ].join('\n'),
    );
  });
});
