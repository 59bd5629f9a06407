import { describe, it, expect } from 'vitest';
import {
  analyzeCompletionPattern,
  analyzeSuccessFactors,
  findOptimalTiming,
  optimize,
  successProbability,
  timeOfDayForHour,
} from '../habitIntelligence';
import { Difficulty } from '../../../shared/constants/lifeDomains';
import { makeCompletion, makeHabit } from '../../../test-utils/fixtures';

const TODAY = '2024-06-15';

describe('timeOfDayForHour', () => {
  it('should bucket hour boundaries', () => {
    expect([4, 5, 11, 12, 16, 17, 20, 21].map(timeOfDayForHour)).toEqual([
      'night', 'morning', 'morning', 'afternoon', 'afternoon', 'evening', 'evening', 'night',
    ]);
  });
});

describe('findOptimalTiming', () => {
  it('should rank buckets by completion count and skip untimed or malformed times', () => {
    const completions = [
      makeCompletion('2024-06-10', '18:00'),
      makeCompletion('2024-06-11', '07:30'),
      makeCompletion('2024-06-12', '19:45'),
      makeCompletion('2024-06-13', null),
      makeCompletion('2024-06-14', 'soon'),
    ];

    expect(findOptimalTiming(completions)).toEqual(['evening', 'morning']);
  });

  it('should return nothing for an untimed log', () => {
    expect(findOptimalTiming([makeCompletion('2024-06-10')])).toEqual([]);
  });
});

describe('analyzeCompletionPattern', () => {
  it('should report insufficient data for an empty log', () => {
    expect(analyzeCompletionPattern([])).toEqual({ pattern: 'insufficient_data' });
  });

  it('should rank weekdays and measure their spread', () => {
    // 2024-06-10 and 2024-06-17 are Mondays, 2024-06-12 a Wednesday
    const completions = ['2024-06-10', '2024-06-17', '2024-06-12'].map(date => makeCompletion(date));

    expect(analyzeCompletionPattern(completions)).toEqual({
      pattern: 'day_of_week',
      bestDays: ['Monday', 'Wednesday'],
      consistencyScore: 2 / 7,
    });
  });
});

describe('successProbability', () => {
  it('should give a brand-new habit only its environment credit', () => {
    const habit = makeHabit({ createdAt: '2024-06-15T08:00:00' });

    // rate 0, streak 0, alignment 0, age 0, environment 0.7
    expect(successProbability(habit, TODAY)).toBeCloseTo(0.14);
  });

  it('should reach 1 for an established, well-designed habit', () => {
    const habit = makeHabit({
      createdAt: '2024-01-01T08:00:00',
      difficulty: Difficulty.VeryEasy,
      completionRate: 100,
      currentStreak: 40,
      longestStreak: 40,
      triggerCue: 'After breakfast',
      reward: 'Coffee',
      environmentSetup: 'Mat by the bed',
    });

    expect(successProbability(habit, TODAY)).toBeCloseTo(1);
  });

  it('should stay within [0, 1]', () => {
    const habit = makeHabit({ completionRate: 55, currentStreak: 2, longestStreak: 9 });

    const probability = successProbability(habit, TODAY);
    expect(probability).toBeGreaterThanOrEqual(0);
    expect(probability).toBeLessThanOrEqual(1);
  });
});

describe('optimize', () => {
  it('should shrink a struggling habit and cap the list at four', () => {
    const habit = makeHabit({ completionRate: 10, longestStreak: 2, preferredTime: 'morning' });
    const completions = [makeCompletion('2024-06-10', '21:30')];

    expect(optimize(habit, completions)).toEqual([
      'Start smaller - reduce the habit to just 1-2 minutes',
      'Attach this habit to an existing strong habit (habit stacking)',
      'Remove all friction - make it as easy as possible',
      'Focus on building a 7-day streak before increasing intensity',
    ]);
  });

  it('should suggest the most successful time when it differs from the preferred one', () => {
    const habit = makeHabit({
      completionRate: 90,
      difficulty: Difficulty.Easy,
      currentStreak: 10,
      longestStreak: 12,
      preferredTime: '07:00',
    });
    const completions = [
      makeCompletion('2024-06-10', '21:30'),
      makeCompletion('2024-06-11', '22:00'),
    ];

    expect(optimize(habit, completions)).toEqual(['Consider shifting to night - your most successful time']);
  });

  it('should accept a preferred bucket name that matches the completions', () => {
    const habit = makeHabit({
      completionRate: 90,
      difficulty: Difficulty.Easy,
      currentStreak: 10,
      longestStreak: 12,
      preferredTime: 'Evening',
    });

    expect(optimize(habit, [makeCompletion('2024-06-10', '18:30')])).toEqual([]);
  });

  it('should point back to the longest streak once momentum is lost', () => {
    const habit = makeHabit({ completionRate: 70, difficulty: Difficulty.VeryEasy, currentStreak: 2, longestStreak: 20 });

    expect(optimize(habit, [])).toEqual(['Review what made your longest streak successful and replicate it']);
  });
});

describe('analyzeSuccessFactors', () => {
  it('should list improvements for a habit without momentum', () => {
    const habit = makeHabit({ completionRate: 20, currentStreak: 0, longestStreak: 4 });

    const analysis = analyzeSuccessFactors(habit, []);

    expect(analysis.successFactors).toEqual([]);
    expect(analysis.improvementSuggestions).toEqual([
      'Consider reducing difficulty or frequency',
      'Strengthen the habit trigger/cue',
      'Add a more immediate reward',
      'Focus on consistency over intensity',
      'Start with the minimum viable habit',
      'Define a clear trigger cue',
      'Set up an immediate reward',
    ]);
    expect(analysis.streakConsistency).toBe(0);
    expect(analysis.completionPattern).toEqual({ pattern: 'insufficient_data' });
  });

  it('should credit a good foundation', () => {
    const habit = makeHabit({
      completionRate: 65,
      currentStreak: 3,
      longestStreak: 6,
      triggerCue: 'After lunch',
      reward: 'Tea',
    });

    const analysis = analyzeSuccessFactors(habit, []);

    expect(analysis.successFactors).toEqual(['Good habit foundation']);
    expect(analysis.improvementSuggestions).toEqual([]);
    expect(analysis.streakConsistency).toBe(0.5);
  });
});
