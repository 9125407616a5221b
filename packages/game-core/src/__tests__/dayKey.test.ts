// packages/game-core/src/__tests__/dayKey.test.ts
//
// Unit tests for the calendar-day helpers. Dates are built from local
// components so the assertions hold in any time zone.

import {
  dayKey,
  daysBetween,
  formatCountdown,
  nextMidnight,
  timeUntilNextPuzzle,
} from '../index.js';

describe('dayKey', () => {
  it('uses the local calendar day', () => {
    expect(dayKey(new Date(2024, 0, 5, 0, 0, 0))).toBe('2024-01-05');
    expect(dayKey(new Date(2024, 0, 5, 23, 59, 59))).toBe('2024-01-05');
    expect(dayKey(new Date(2024, 11, 31, 12))).toBe('2024-12-31');
  });
});

describe('daysBetween', () => {
  it('counts calendar days', () => {
    expect(daysBetween('2024-03-09', '2024-03-09')).toBe(0);
    expect(daysBetween('2024-03-09', '2024-03-10')).toBe(1);
    expect(daysBetween('2024-03-09', '2024-03-11')).toBe(2);
    expect(daysBetween('2023-12-31', '2024-01-01')).toBe(1);
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
  });
});

describe('countdown helpers', () => {
  it('finds the next local midnight', () => {
    expect(nextMidnight(new Date(2024, 2, 9, 10, 30))).toEqual(new Date(2024, 2, 10));
    expect(nextMidnight(new Date(2024, 11, 31, 23))).toEqual(new Date(2025, 0, 1));
  });

  it('measures time until the next puzzle', () => {
    expect(timeUntilNextPuzzle(new Date(2024, 2, 9, 23, 59, 30))).toBe(30_000);
  });

  it('formats hours, minutes and seconds', () => {
    expect(formatCountdown(3_723_000)).toBe('01:02:03');
    expect(formatCountdown(999)).toBe('00:00:00');
    expect(formatCountdown(-5)).toBe('00:00:00');
  });
});
