import {
  calendarDay,
  daysBetween,
  eachCalendarDay,
  isCalendarDay,
  isNewLogicalDay,
  logicalDay,
  parseCalendarDay,
  windowEnding,
} from './dayBoundary';

// Dates are built from local components so the assertions hold in any timezone.
describe('logicalDay', () => {
  test('01:59 belongs to the previous day with the default boundary', () => {
    expect(logicalDay(new Date(2026, 0, 15, 1, 59))).toBe('2026-01-14');
  });

  test('02:00 starts the new day', () => {
    expect(logicalDay(new Date(2026, 0, 15, 2, 0))).toBe('2026-01-15');
  });

  test('crosses month, year and leap-day edges', () => {
    expect(logicalDay(new Date(2026, 0, 1, 0, 30))).toBe('2025-12-31');
    expect(logicalDay(new Date(2024, 2, 1, 1, 0))).toBe('2024-02-29');
  });

  test('honours a custom boundary', () => {
    expect(logicalDay(new Date(2026, 0, 15, 3, 0), 4)).toBe('2026-01-14');
    expect(logicalDay(new Date(2026, 0, 15, 4, 0), 4)).toBe('2026-01-15');
    expect(logicalDay(new Date(2026, 0, 15, 0, 0), 0)).toBe('2026-01-15');
  });
});

test('isNewLogicalDay is inclusive on the boundary hour', () => {
  expect(isNewLogicalDay(new Date(2026, 0, 15, 2, 0))).toBe(true);
  expect(isNewLogicalDay(new Date(2026, 0, 15, 1, 59))).toBe(false);
});

test('isCalendarDay accepts only real YYYY-MM-DD days', () => {
  expect(isCalendarDay('2026-02-28')).toBe(true);
  expect(isCalendarDay('2026-02-30')).toBe(false);
  expect(isCalendarDay('2026-1-5')).toBe(false);
  expect(isCalendarDay(20260105)).toBe(false);
});

test('parseCalendarDay returns local midnight', () => {
  const d = parseCalendarDay('2026-03-05');
  expect([d.getFullYear(), d.getMonth(), d.getDate(), d.getHours()]).toEqual([2026, 2, 5, 0]);
  expect(calendarDay(d)).toBe('2026-03-05');
});

test('day ranges', () => {
  expect(daysBetween('2026-01-30', '2026-02-02')).toBe(3);
  expect(eachCalendarDay('2026-02-27', '2026-03-02')).toEqual(['2026-02-27', '2026-02-28', '2026-03-01', '2026-03-02']);
  expect(eachCalendarDay('2026-03-02', '2026-02-27')).toEqual([]);
  expect(windowEnding('2026-03-02', 7)).toEqual({ from: '2026-02-24', to: '2026-03-02' });
  expect(windowEnding('2026-03-02', 1)).toEqual({ from: '2026-03-02', to: '2026-03-02' });
});
