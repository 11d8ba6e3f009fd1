import { describe, expect, it } from 'vitest';
import { sampleContext, sampleReport } from '../../test/fixtures/report.js';
import { renderAbsencesAndOnCall, renderCapacityCanvas, renderSupport } from './reports.canvases.js';

const WARNINGS = [
  'WARNING: Avery Quinn is absent on 2025-03-05 but scheduled for L1 shift.',
  'WARNING: Bea Lindqvist is absent on 2025-03-17 but scheduled for L2 shift.',
];

describe('renderCapacityCanvas', () => {
  it('puts the calendar under the capacity table', () => {
    const lines = renderCapacityCanvas(sampleReport(), sampleContext()).split('\n');

    expect(lines.slice(3, 8)).toEqual([
      '74      2025-03-17  0      0.0     27            2         1   27.0      -100.0%  l',
      '',
      '',
      'Calendar',
      '',
    ]);
    expect(lines[8]).toBe('Name            Wed    Thu    Fri    Mon    Tue    Wed    Thu    Fri    Mon    Tue');
  });
});

describe('renderAbsencesAndOnCall', () => {
  it('lists absences, conflicts, people of interest and bank holidays', () => {
    expect(renderAbsencesAndOnCall(sampleReport(), sampleContext())).toBe(
      [
        'Absences',
        '',
        'Name           Holiday',
        '-------------  -----------------------',
        'Avery Quinn    2025-03-04 - 2025-03-05',
        'Bea Lindqvist  2025-03-14 - 2025-03-18',
        '',
        ...WARNINGS,
        '',
        'POI Absences',
        '',
        'Name         Holiday',
        '-----------  ----------',
        'Morgan Hale  2025-03-10',
        '',
        'Bank Holidays',
        '',
        'Date        Name              Regions',
        '----------  ----------------  -------',
        "2025-03-17  St Patrick's Day  IE",
        '',
        '',
      ].join('\n'),
    );
  });
});

describe('renderSupport', () => {
  it('lists upcoming shifts followed by conflicts', () => {
    expect(renderSupport(sampleReport(), sampleContext())).toBe(
      [
        'L1 Assignments',
        '',
        'Name           Days  Dates',
        '-------------  ----  -----------------------',
        'Avery Quinn    2     2025-03-05 - 2025-03-06',
        'Bea Lindqvist  1     2025-03-20',
        '',
        'L2 Assignments',
        '',
        'Name           Date',
        '-------------  ----------',
        'Bea Lindqvist  2025-03-07',
        'Bea Lindqvist  2025-03-17',
        '',
        ...WARNINGS,
        '',
        '',
      ].join('\n'),
    );
  });

  it('leaves the warnings out when there are none', () => {
    const report = sampleReport();
    const sprints = report.sprints.map((sprint) => ({ ...sprint, l1: {}, l2: {} }));

    expect(renderSupport({ ...report, sprints }, sampleContext())).toBe(
      'L1 Assignments\n\n  None\n\nL2 Assignments\n\n  None\n\n',
    );
  });
});
