import { daysBetween, hourOf, timestampToDateKey, weekdayName } from '../../utils/dates';
import type {
  CompletionPattern,
  Habit,
  HabitCompletion,
  HabitSuccessAnalysis,
  TimeOfDay,
} from '../../shared/types';

const MAX_OPTIMIZATION_SUGGESTIONS = 4;
// Typical time for a behaviour to become automatic
const HABIT_FORMATION_DAYS = 66;

const TIMES_OF_DAY: readonly TimeOfDay[] = ['morning', 'afternoon', 'evening', 'night'];

function isTimeOfDayBucket(value: string): value is TimeOfDay {
  return TIMES_OF_DAY.some(bucket => bucket === value);
}

/**
 * Bucket for a clock hour: 05-11 morning, 12-16 afternoon, 17-20 evening, otherwise night.
 */
export function timeOfDayForHour(hour: number): TimeOfDay {
  if (hour >= 5 && hour < 12) {
    return 'morning';
  }
  if (hour >= 12 && hour < 17) {
    return 'afternoon';
  }
  if (hour >= 17 && hour < 21) {
    return 'evening';
  }
  return 'night';
}

/** Keys of a count map ordered by count descending; ties keep first-seen order. */
function rankByCount<K>(counts: Map<K, number>): K[] {
  return [...counts.entries()]
    .map(([key, count], index) => ({ key, count, index }))
    .sort((a, b) => b.count - a.count || a.index - b.index)
    .map(entry => entry.key);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Times of day at which the habit was completed, most frequent first.
 * Untimed and malformed completion times are ignored.
 */
export function findOptimalTiming(completions: readonly HabitCompletion[]): TimeOfDay[] {
  const counts = new Map<TimeOfDay, number>();
  for (const completion of completions) {
    if (!completion.completionTime) {
      continue;
    }
    const hour = hourOf(completion.completionTime);
    if (hour === null) {
      continue;
    }
    const bucket = timeOfDayForHour(hour);
    counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }
  return rankByCount(counts);
}

/**
 * Day-of-week distribution of completions.
 */
export function analyzeCompletionPattern(completions: readonly HabitCompletion[]): CompletionPattern {
  if (completions.length === 0) {
    return { pattern: 'insufficient_data' };
  }

  const counts = new Map<string, number>();
  for (const completion of completions) {
    const day = weekdayName(completion.completionDate);
    counts.set(day, (counts.get(day) ?? 0) + 1);
  }

  return {
    pattern: 'day_of_week',
    bestDays: rankByCount(counts).slice(0, 3),
    consistencyScore: counts.size / 7,
  };
}

/**
 * Estimated probability in [0, 1] that the habit sticks: the mean of completion
 * rate, streak momentum, difficulty alignment, habit age and environment design.
 */
export function successProbability(habit: Habit, today: string): number {
  const rateFactor = habit.completionRate / 100;

  const streakFactor = habit.longestStreak > 0
    ? Math.min(1, habit.currentStreak / habit.longestStreak)
    : 0;

  const expectedSuccessRate = Math.max(0.2, 1 - (habit.difficulty - 1) * 0.15);
  const alignmentFactor = Math.min(1, habit.completionRate / (expectedSuccessRate * 100));

  const daysSinceCreation = Math.max(0, daysBetween(timestampToDateKey(habit.createdAt), today));
  const timeFactor = Math.min(1, daysSinceCreation / HABIT_FORMATION_DAYS);

  let environmentFactor = 0.7;
  if (habit.triggerCue) {
    environmentFactor += 0.1;
  }
  if (habit.reward) {
    environmentFactor += 0.1;
  }
  if (habit.environmentSetup) {
    environmentFactor += 0.1;
  }

  return mean([rateFactor, streakFactor, alignmentFactor, timeFactor, Math.min(1, environmentFactor)]);
}

/**
 * The time-of-day bucket a preferred time refers to. Accepts a bucket name or a clock time.
 */
function preferredBucket(preferredTime: string): TimeOfDay | null {
  const normalized = preferredTime.trim().toLowerCase();
  if (isTimeOfDayBucket(normalized)) {
    return normalized;
  }
  const hour = hourOf(normalized);
  return hour === null ? null : timeOfDayForHour(hour);
}

/**
 * Concrete changes likely to improve the habit's consistency.
 */
export function optimize(habit: Habit, completions: readonly HabitCompletion[]): string[] {
  const suggestions: string[] = [];

  if (habit.completionRate < 30) {
    suggestions.push(
      'Start smaller - reduce the habit to just 1-2 minutes',
      'Attach this habit to an existing strong habit (habit stacking)',
      'Remove all friction - make it as easy as possible'
    );
  } else if (habit.completionRate < 60) {
    suggestions.push(
      'Optimize your environment to make the habit obvious',
      'Set up a clear reward system',
      'Track your progress visually (calendar, chart)'
    );
  }

  if (habit.longestStreak < 7) {
    suggestions.push('Focus on building a 7-day streak before increasing intensity');
  } else if (habit.currentStreak < habit.longestStreak * 0.5) {
    suggestions.push('Review what made your longest streak successful and replicate it');
  }

  if (habit.completionRate / (habit.difficulty * 20) < 0.8) {
    suggestions.push('Consider reducing the difficulty level to build consistency first');
  }

  if (habit.preferredTime && completions.length > 0) {
    const bestTimes = findOptimalTiming(completions);
    const preferred = preferredBucket(habit.preferredTime);
    if (bestTimes.length > 0 && (preferred === null || !bestTimes.slice(0, 2).includes(preferred))) {
      suggestions.push(`Consider shifting to ${bestTimes[0]} - your most successful time`);
    }
  }

  return suggestions.slice(0, MAX_OPTIMIZATION_SUGGESTIONS);
}

/**
 * What is working for a habit and what to change.
 */
export function analyzeSuccessFactors(
  habit: Habit,
  completions: readonly HabitCompletion[]
): HabitSuccessAnalysis {
  const successFactors: string[] = [];
  const improvementSuggestions: string[] = [];

  if (habit.completionRate > 80) {
    successFactors.push('Excellent consistency', 'Well-established routine');
  } else if (habit.completionRate > 60) {
    successFactors.push('Good habit foundation');
  }
  if (habit.currentStreak > 7) {
    successFactors.push('Strong current momentum');
  }

  if (habit.completionRate < 50) {
    improvementSuggestions.push(
      'Consider reducing difficulty or frequency',
      'Strengthen the habit trigger/cue',
      'Add a more immediate reward'
    );
  }
  if (habit.currentStreak === 0) {
    improvementSuggestions.push(
      'Focus on consistency over intensity',
      'Start with the minimum viable habit'
    );
  }
  if (!habit.triggerCue) {
    improvementSuggestions.push('Define a clear trigger cue');
  }
  if (!habit.reward) {
    improvementSuggestions.push('Set up an immediate reward');
  }

  return {
    successRate: habit.completionRate,
    streakConsistency: habit.currentStreak / Math.max(1, habit.longestStreak),
    completionPattern: analyzeCompletionPattern(completions),
    optimalTiming: findOptimalTiming(completions),
    successFactors,
    improvementSuggestions,
  };
}
