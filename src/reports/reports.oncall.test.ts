import { describe, expect, it } from 'vitest';
import { day } from '../../test/fixtures/planner.js';
import { REPORT_TODAY, sampleReport } from '../../test/fixtures/report.js';
import { renderL1Assignments, renderL2Assignments, upcomingAssignments } from './reports.oncall.js';

describe('upcomingAssignments', () => {
  it('merges dates from today onwards across sprints', () => {
    const l1 = upcomingAssignments(sampleReport(), 'l1', { today: day('2025-03-06') });

    expect([...l1.entries()].map(([name, dates]) => [name, [...dates]])).toEqual([
      ['Avery Quinn', ['2025-03-06']],
      ['Bea Lindqvist', ['2025-03-20']],
    ]);
  });

  it('drops people whose shifts are all past', () => {
    const l1 = upcomingAssignments(sampleReport(), 'l1', { today: day('2025-03-07') });

    expect([...l1.keys()]).toEqual(['Bea Lindqvist']);
  });
});

describe('renderL1Assignments', () => {
  it('renders day counts and date ranges per person', () => {
    expect(renderL1Assignments(sampleReport(), { today: REPORT_TODAY })).toBe(
      [
        'Name           Days  Dates',
        '-------------  ----  -----------------------',
        'Avery Quinn    2     2025-03-05 - 2025-03-06',
        'Bea Lindqvist  1     2025-03-20',
        '',
      ].join('\n'),
    );
  });

  it('says None when nothing is upcoming', () => {
    expect(renderL1Assignments(sampleReport(), { today: day('2025-04-01') })).toBe('  None\n');
  });
});

describe('renderL2Assignments', () => {
  it('renders one row per shift in date order', () => {
    expect(renderL2Assignments(sampleReport(), { today: REPORT_TODAY })).toBe(
      [
        'Name           Date',
        '-------------  ----------',
        'Bea Lindqvist  2025-03-07',
        'Bea Lindqvist  2025-03-17',
        '',
      ].join('\n'),
    );
  });
});
