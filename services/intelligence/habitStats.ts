import { daysBetween, shiftDateKey, timestampToDateKey } from '../../utils/dates';
import type { Habit, HabitCompletion, HabitStats } from '../../shared/types';

/**
 * Consecutive calendar days ending at `asOf` that have at least one completion.
 * With an empty log the streak is 1 when `asOf` is today and 0 otherwise.
 */
export function calculateCurrentStreak(
  completionDates: ReadonlySet<string>,
  asOf: string,
  today: string
): number {
  if (completionDates.size === 0) {
    return asOf === today ? 1 : 0;
  }

  let streak = 0;
  let cursor = asOf;
  while (completionDates.has(cursor)) {
    streak++;
    cursor = shiftDateKey(cursor, -1);
  }
  return streak;
}

/**
 * Actual vs expected completions since creation, as a percentage capped at 100.
 * Expected completions are the inclusive days since creation scaled by the
 * weekly target.
 */
export function calculateCompletionRate(
  habit: Pick<Habit, 'createdAt' | 'targetDaysPerWeek'>,
  totalCompletions: number,
  asOf: string
): number {
  const days = daysBetween(timestampToDateKey(habit.createdAt), asOf) + 1;
  const expected = days * (habit.targetDaysPerWeek / 7);
  if (expected <= 0) {
    return 0;
  }
  return Math.min(100, (totalCompletions / expected) * 100);
}

/**
 * Rebuild the derived counters of a habit from its completion log.
 * `longestStreak` never decreases.
 */
export function computeHabitStats(
  habit: Habit,
  completions: readonly HabitCompletion[],
  asOf: string,
  today: string
): HabitStats {
  const dates = new Set(completions.map(c => c.completionDate));
  const totalCompletions = completions.length;
  const currentStreak = calculateCurrentStreak(dates, asOf, today);

  return {
    currentStreak,
    longestStreak: Math.max(habit.longestStreak, currentStreak),
    totalCompletions,
    completionRate: calculateCompletionRate(habit, totalCompletions, asOf),
  };
}
