import { describe, expect, it } from 'vitest';
import { day, makeMember, TEST_ANCHOR } from '../../test/fixtures/planner.js';
import { sprintContaining } from '../sprint/sprint.calendar.js';
import { roundHalfEven } from '../utils/date.js';
import { calculateAvailability, rampMultiplier } from './capacity.availability.js';
import type { MemberSprintInputs } from './capacity.types.js';

// Sprint 73: Monday 2025-03-03 to Sunday 2025-03-16
const window = sprintContaining(day('2025-03-03'), TEST_ANCHOR);

function inputs(overrides: Partial<MemberSprintInputs> = {}): MemberSprintInputs {
  return {
    absenceDates: new Set(),
    l1Dates: new Set(),
    l2Dates: new Set(),
    socialPenalty: 0,
    ...overrides,
  };
}

describe('calculateAvailability', () => {
  it('gives a full-time member ten days in an empty sprint', () => {
    const { row, starter, leaver, ramping } = calculateAvailability(makeMember('Avery Quinn'), window, inputs());

    expect(row).toEqual({
      name: 'Avery Quinn',
      displayName: 'Avery Quinn',
      availableDays: 10,
      unrampedDays: 10,
      holidayCount: 0,
      l1Days: 0,
      l2Days: 0,
      excluded: false,
    });
    expect(starter).toBeUndefined();
    expect(leaver).toBeUndefined();
    expect(ramping).toBeUndefined();
  });

  it('subtracts absences, L1 days and the social penalty but not L2 days', () => {
    const { row } = calculateAvailability(
      makeMember('Avery Quinn'),
      window,
      inputs({
        absenceDates: new Set(['2025-03-04', '2025-03-05']),
        l1Dates: new Set(['2025-03-06']),
        l2Dates: new Set(['2025-03-07']),
        socialPenalty: 1,
      }),
    );

    expect(row.availableDays).toBe(6);
    expect(row.holidayCount).toBe(2);
    expect(row.l1Days).toBe(1);
    expect(row.l2Days).toBe(1);
  });

  it('never goes below zero', () => {
    const everyWeekday = ['03', '04', '05', '06', '07', '10', '11', '12', '13', '14'].map((d) => `2025-03-${d}`);
    const { row } = calculateAvailability(
      makeMember('Avery Quinn'),
      window,
      inputs({ absenceDates: new Set(everyWeekday), socialPenalty: 1 }),
    );

    expect(row.availableDays).toBe(0);
    expect(row.holidayCount).toBe(10);
  });

  it('counts only weekdays up to a leave date inside the sprint', () => {
    const member = makeMember('Dana Ruiz', { leaveDate: '2025-03-05' });
    const { row, leaver } = calculateAvailability(
      member,
      window,
      inputs({ absenceDates: new Set(['2025-03-10']) }),
    );

    expect(row.availableDays).toBe(3);
    expect(row.holidayCount).toBe(0);
    expect(leaver).toEqual({ name: 'Dana Ruiz', date: '2025-03-05' });
  });

  it('gives one day to a member leaving on the first day of the sprint', () => {
    const member = makeMember('Dana Ruiz', { leaveDate: '2025-03-03' });

    expect(calculateAvailability(member, window, inputs()).row.availableDays).toBe(1);
    expect(
      calculateAvailability(member, window, inputs({ absenceDates: new Set(['2025-03-03']) })).row.availableDays,
    ).toBe(0);
    expect(calculateAvailability(member, window, inputs({ l1Dates: new Set(['2025-03-03']) })).row.availableDays).toBe(
      0,
    );
    expect(calculateAvailability(member, window, inputs()).leaver).toEqual({ name: 'Dana Ruiz', date: '2025-03-03' });
  });

  it('excludes a member who left before the sprint', () => {
    const { row } = calculateAvailability(makeMember('Dana Ruiz', { leaveDate: '2025-02-28' }), window, inputs());

    expect(row.excluded).toBe(true);
    expect(row.availableDays).toBe(0);
  });

  it('excludes a member who joins after the sprint', () => {
    const { row, starter } = calculateAvailability(
      makeMember('Eli Novak', { startDate: '2025-03-17' }),
      window,
      inputs(),
    );

    expect(row.excluded).toBe(true);
    expect(starter).toBeUndefined();
  });

  it('ramps a mid-sprint starter from their start percentage', () => {
    const member = makeMember('Eli Novak', { startDate: '2025-03-10', startPct: 0.5 });
    const { row, starter, ramping } = calculateAvailability(member, window, inputs());

    expect(row.unrampedDays).toBe(5);
    // 5 * 0.5 = 2.5 rounds to the even neighbour
    expect(row.availableDays).toBe(2);
    expect(row.displayName).toBe('Eli Novak *');
    expect(row.rampMultiplier).toBe(0.5);
    expect(starter).toEqual({ name: 'Eli Novak', date: '2025-03-10' });
    expect(ramping).toEqual({ name: 'Eli Novak', percent: 50 });
  });

  it('counts a Wednesday starter from that day and halves it', () => {
    const member = makeMember('Eli Novak', { startDate: '2025-03-05', startPct: 0.5 });
    const { row } = calculateAvailability(member, window, inputs());

    // Wed 5 to Fri 7, then Mon 10 to Fri 14
    expect(row.unrampedDays).toBe(8);
    expect(row.availableDays).toBe(4);
  });

  it('keeps ramping in later sprints without reporting the start again', () => {
    const member = makeMember('Eli Novak', { startDate: '2025-01-06', startPct: 0.5 });
    const { row, starter, ramping } = calculateAvailability(member, window, inputs());

    expect(row.availableDays).toBe(9);
    expect(row.displayName).toBe('Eli Novak *');
    expect(starter).toBeUndefined();
    expect(ramping).toEqual({ name: 'Eli Novak', percent: 90 });
  });

  it('stops ramping once the multiplier reaches 100%', () => {
    const member = makeMember('Eli Novak', { startDate: '2024-12-23', startPct: 0.5 });
    const { row, ramping } = calculateAvailability(member, window, inputs());

    expect(row.availableDays).toBe(10);
    expect(row.displayName).toBe('Eli Novak');
    expect(row.rampMultiplier).toBeUndefined();
    expect(ramping).toBeUndefined();
  });

  it('lets a leave date win over a start date in the same sprint', () => {
    const member = makeMember('Dana Ruiz', { startDate: '2025-03-05', leaveDate: '2025-03-12', startPct: 0.5 });
    const { row, starter, leaver } = calculateAvailability(member, window, inputs());

    expect(row.availableDays).toBe(8);
    expect(row.rampMultiplier).toBeUndefined();
    expect(starter).toBeUndefined();
    expect(leaver).toEqual({ name: 'Dana Ruiz', date: '2025-03-12' });
  });
});

describe('rampMultiplier', () => {
  it('adds ten points per completed sprint and caps at one', () => {
    expect(rampMultiplier(day('2025-03-03'), 0.3, day('2025-03-03'))).toBe(0.3);
    expect(rampMultiplier(day('2025-03-03'), 0.3, day('2025-03-17'))).toBeCloseTo(0.4);
    expect(rampMultiplier(day('2025-03-03'), 0.8, day('2025-04-28'))).toBe(1);
  });

  it('treats a start date after the sprint start as no sprints completed', () => {
    expect(rampMultiplier(day('2025-03-10'), 0.5, day('2025-03-03'))).toBe(0.5);
  });
});

describe('roundHalfEven', () => {
  it.each([
    [2.5, 2],
    [3.5, 4],
    [0.5, 0],
    [2.4, 2],
    [2.6, 3],
    [7, 7],
  ])('rounds %d to %d', (value, expected) => {
    expect(roundHalfEven(value)).toBe(expected);
  });
});
