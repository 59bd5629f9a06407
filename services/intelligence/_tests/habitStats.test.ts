import { describe, it, expect } from 'vitest';
import { calculateCompletionRate, calculateCurrentStreak, computeHabitStats } from '../habitStats';
import { makeCompletion, makeHabit } from '../../../test-utils/fixtures';

describe('calculateCurrentStreak', () => {
  it('should count back from the reference date until a gap', () => {
    const dates = new Set(['2024-06-15', '2024-06-14', '2024-06-12']);

    expect(calculateCurrentStreak(dates, '2024-06-15', '2024-06-15')).toBe(2);
    expect(calculateCurrentStreak(dates, '2024-06-13', '2024-06-15')).toBe(0);
  });

  it('should cross month boundaries', () => {
    const dates = new Set(['2024-05-30', '2024-05-31', '2024-06-01']);

    expect(calculateCurrentStreak(dates, '2024-06-01', '2024-06-01')).toBe(3);
  });

  it('should give an empty log a streak of one only when checked for today', () => {
    expect(calculateCurrentStreak(new Set(), '2024-06-15', '2024-06-15')).toBe(1);
    expect(calculateCurrentStreak(new Set(), '2024-06-14', '2024-06-15')).toBe(0);
  });
});

describe('calculateCompletionRate', () => {
  it('should scale the expectation by the weekly target', () => {
    // 14 inclusive days at 3 per week is 6 expected completions
    const habit = { createdAt: '2024-06-01T09:00:00', targetDaysPerWeek: 3 };

    expect(calculateCompletionRate(habit, 3, '2024-06-14')).toBeCloseTo(50);
  });

  it('should cap the rate at 100', () => {
    const habit = { createdAt: '2024-06-14T09:00:00', targetDaysPerWeek: 7 };

    expect(calculateCompletionRate(habit, 5, '2024-06-14')).toBe(100);
  });

  it('should be zero before the creation date', () => {
    const habit = { createdAt: '2024-06-14T09:00:00', targetDaysPerWeek: 7 };

    expect(calculateCompletionRate(habit, 1, '2024-06-12')).toBe(0);
  });
});

describe('computeHabitStats', () => {
  it('should never lower the longest streak', () => {
    const habit = makeHabit({ longestStreak: 9 });
    const completions = [makeCompletion('2024-06-14'), makeCompletion('2024-06-14', '20:00')];

    expect(computeHabitStats(habit, completions, '2024-06-14', '2024-06-15')).toEqual({
      currentStreak: 1,
      longestStreak: 9,
      totalCompletions: 2,
      completionRate: (2 / 14) * 100,
    });
  });
});
