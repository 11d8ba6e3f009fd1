import { describe, expect, it } from 'vitest';
import { day } from '../../test/fixtures/planner.js';
import { DateHolidaysProvider } from './public-holidays.js';

describe('DateHolidaysProvider', () => {
  const provider = new DateHolidaysProvider();

  it('lists public holidays of a country inside the range', () => {
    const holidays = provider.list({ label: 'IE', country: 'IE' }, day('2026-03-01'), day('2026-03-31'));

    expect([...holidays.keys()]).toEqual(['2026-03-17']);
  });

  it('covers ranges that cross a year end, in date order', () => {
    const holidays = provider.list({ label: 'IE', country: 'IE' }, day('2026-12-20'), day('2027-01-05'));
    const dates = [...holidays.keys()];

    expect(dates).toContain('2026-12-25');
    expect(dates).toContain('2027-01-01');
    expect(dates).toEqual([...dates].sort());
  });

  it('returns nothing for an empty range', () => {
    expect(provider.list({ label: 'IE', country: 'IE' }, day('2026-03-18'), day('2026-03-17')).size).toBe(0);
  });
});
