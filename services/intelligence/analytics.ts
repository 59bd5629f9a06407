import { DIFFICULTIES, LIFE_CATEGORIES } from '../../shared/constants/lifeDomains';
import {
  daysBetween,
  firstOfMonthKey,
  monthLabel,
  shiftDateKey,
  timestampToDateKey,
} from '../../utils/dates';
import type {
  Difficulty,
  Goal,
  Habit,
  HabitAnalytics,
  LifeAssessment,
  LifeCategory,
  LifeScore,
  LifeTrend,
  MonthlyCompletionPoint,
  ProgressAnalytics,
} from '../../shared/types';

const TREND_MONTHS = 12;
const TREND_BUCKET_DAYS = 30;
const RECENT_ASSESSMENT_DAYS = 90;
const TREND_THRESHOLD = 0.1;

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Sample standard deviation; requires at least two values. */
function sampleStdev(values: readonly number[]): number {
  const avg = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/** Stable descending sort by a numeric key. */
function sortDescending<T>(items: readonly T[], key: (item: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index, value: key(item) }))
    .sort((a, b) => b.value - a.value || a.index - b.index)
    .map(entry => entry.item);
}

function countBy<K>(items: Iterable<K>): Map<K, number> {
  const counts = new Map<K, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return counts;
}

function monthlyCompletionTrend(completedGoals: readonly Goal[], today: string): MonthlyCompletionPoint[] {
  const completionDates: string[] = [];
  for (const goal of completedGoals) {
    if (goal.completedAt) {
      completionDates.push(timestampToDateKey(goal.completedAt));
    }
  }
  const monthStart = firstOfMonthKey(today);

  const trend: MonthlyCompletionPoint[] = [];
  for (let i = 0; i < TREND_MONTHS; i++) {
    const bucketStart = shiftDateKey(monthStart, -TREND_BUCKET_DAYS * i);
    const bucketEnd = shiftDateKey(bucketStart, TREND_BUCKET_DAYS);
    trend.push({
      month: monthLabel(bucketStart),
      completed: completionDates.filter(date => date >= bucketStart && date <= bucketEnd).length,
    });
  }
  return trend;
}

/**
 * Aggregate goal progress: counts, completion rate, time to completion,
 * per-category productivity and a trailing twelve-point completion trend.
 */
export function generateProgressAnalytics(goals: readonly Goal[], today: string): ProgressAnalytics {
  if (goals.length === 0) {
    return {
      totalGoals: 0,
      completedGoals: 0,
      inProgressGoals: 0,
      completionRate: 0,
      averageCompletionDays: null,
      mostProductiveCategory: null,
      leastProductiveCategory: null,
      difficultyDistribution: {},
      monthlyCompletionTrend: [],
    };
  }

  const completed = goals.filter(goal => goal.status === 'completed');
  const inProgressCount = goals.filter(goal => goal.status === 'in_progress').length;

  const completionDays: number[] = [];
  for (const goal of completed) {
    if (goal.completedAt) {
      completionDays.push(
        daysBetween(timestampToDateKey(goal.createdAt), timestampToDateKey(goal.completedAt))
      );
    }
  }

  const totalByCategory = countBy(goals.map(goal => goal.category));
  const completedByCategory = countBy(completed.map(goal => goal.category));

  let mostProductive: { category: LifeCategory; rate: number } | null = null;
  let leastProductive: { category: LifeCategory; rate: number } | null = null;
  for (const category of LIFE_CATEGORIES) {
    const total = totalByCategory.get(category) ?? 0;
    if (total === 0) {
      continue;
    }
    const rate = ((completedByCategory.get(category) ?? 0) / total) * 100;
    if (!mostProductive || rate > mostProductive.rate) {
      mostProductive = { category, rate };
    }
    if (!leastProductive || rate < leastProductive.rate) {
      leastProductive = { category, rate };
    }
  }

  const difficultyCounts = countBy(goals.map(goal => goal.difficulty));
  const difficultyDistribution: Partial<Record<Difficulty, number>> = {};
  for (const difficulty of DIFFICULTIES) {
    const count = difficultyCounts.get(difficulty);
    if (count) {
      difficultyDistribution[difficulty] = count;
    }
  }

  return {
    totalGoals: goals.length,
    completedGoals: completed.length,
    inProgressGoals: inProgressCount,
    completionRate: (completed.length / goals.length) * 100,
    averageCompletionDays: completionDays.length > 0 ? mean(completionDays) : null,
    mostProductiveCategory: mostProductive?.category ?? null,
    leastProductiveCategory: leastProductive?.category ?? null,
    difficultyDistribution,
    monthlyCompletionTrend: monthlyCompletionTrend(completed, today),
  };
}

/**
 * Aggregate habit performance over the active habits.
 */
export function generateHabitAnalytics(habits: readonly Habit[], today: string): HabitAnalytics {
  if (habits.length === 0) {
    return {
      totalHabits: 0,
      activeHabits: 0,
      averageStreak: 0,
      bestPerformingHabits: [],
      strugglingHabits: [],
      completionRateByCategory: {},
      weeklyConsistencyScore: 0,
      difficultyVsSuccess: {},
    };
  }

  const active = habits.filter(habit => habit.isActive);
  const byRate = sortDescending(active, habit => habit.completionRate);

  const completionRateByCategory: Partial<Record<LifeCategory, number>> = {};
  for (const category of LIFE_CATEGORIES) {
    const rates = active.filter(habit => habit.category === category).map(habit => habit.completionRate);
    if (rates.length > 0) {
      completionRateByCategory[category] = mean(rates);
    }
  }

  const difficultyVsSuccess: Partial<Record<Difficulty, number>> = {};
  for (const difficulty of DIFFICULTIES) {
    const rates = active.filter(habit => habit.difficulty === difficulty).map(habit => habit.completionRate);
    if (rates.length > 0) {
      difficultyVsSuccess[difficulty] = mean(rates);
    }
  }

  const consistencies = active
    .filter(habit => habit.completionRate > 0)
    .map(habit => {
      const daysActive = daysBetween(timestampToDateKey(habit.createdAt), today);
      return Math.min(1, habit.currentStreak / Math.max(1, daysActive));
    });

  return {
    totalHabits: habits.length,
    activeHabits: active.length,
    averageStreak: active.length > 0 ? mean(active.map(habit => habit.currentStreak)) : 0,
    bestPerformingHabits: byRate.slice(0, 3).map(habit => habit.title),
    strugglingHabits: byRate
      .slice(-3)
      .filter(habit => habit.completionRate < 60)
      .map(habit => habit.title),
    completionRateByCategory,
    weeklyConsistencyScore: consistencies.length > 0 ? mean(consistencies) * 100 : 0,
    difficultyVsSuccess,
  };
}

/**
 * Evenness of category scores: 1 minus the coefficient of variation, clamped to [0, 1].
 */
export function balanceScore(scores: readonly number[]): number {
  if (scores.length === 0) {
    return 0;
  }
  if (scores.length === 1) {
    return 1;
  }
  const avg = mean(scores);
  if (avg === 0) {
    return 0;
  }
  return Math.max(0, Math.min(1, 1 - sampleStdev(scores) / avg));
}

function ratingValues(assessment: LifeAssessment): number[] {
  const values: number[] = [];
  for (const category of LIFE_CATEGORIES) {
    const rating = assessment.categoryRatings[category];
    if (rating !== undefined) {
      values.push(rating / 10);
    }
  }
  return values;
}

function scoreFromAssessments(recent: readonly LifeAssessment[]): LifeScore {
  const [latest, previous] = recent;
  const categoryScores: Partial<Record<LifeCategory, number>> = {};
  const ranked: { category: LifeCategory; score: number }[] = [];

  for (const category of LIFE_CATEGORIES) {
    const rating = latest.categoryRatings[category];
    if (rating !== undefined) {
      categoryScores[category] = rating / 10;
      ranked.push({ category, score: rating / 10 });
    }
  }

  const scores = ranked.map(entry => entry.score);
  const overallScore = scores.length > 0 ? mean(scores) : 0.5;

  let trend: LifeTrend = 'stable';
  const previousScores = previous ? ratingValues(previous) : [];
  if (previousScores.length > 0) {
    const previousScore = mean(previousScores);
    if (overallScore > previousScore + TREND_THRESHOLD) {
      trend = 'improving';
    } else if (overallScore < previousScore - TREND_THRESHOLD) {
      trend = 'declining';
    }
  }

  const sorted = sortDescending(ranked, entry => entry.score);

  return {
    overallScore,
    categoryScores,
    trend,
    strengths: sorted.slice(0, 3).filter(entry => entry.score > 0.7).map(entry => entry.category),
    focusAreas: sorted.slice(-3).filter(entry => entry.score < 0.6).map(entry => entry.category),
    balanceScore: balanceScore(scores),
    source: 'assessment',
  };
}

function scoreFromPerformance(goals: readonly Goal[], habits: readonly Habit[], today: string): LifeScore {
  const goalScore = generateProgressAnalytics(goals, today).completionRate / 100;
  const habitScore = generateHabitAnalytics(habits, today).weeklyConsistencyScore / 100;
  const overallScore = mean([goalScore, habitScore]);

  const categoryScores: Partial<Record<LifeCategory, number>> = {};
  for (const category of LIFE_CATEGORIES) {
    const categoryGoals = goals.filter(goal => goal.category === category);
    const hasHabits = habits.some(habit => habit.category === category);
    if (categoryGoals.length === 0 && !hasHabits) {
      continue;
    }

    let score = overallScore;
    if (categoryGoals.length > 0) {
      const completedRatio =
        categoryGoals.filter(goal => goal.status === 'completed').length / categoryGoals.length;
      score = mean([score, completedRatio]);
    }
    categoryScores[category] = score;
  }

  return {
    overallScore,
    categoryScores,
    trend: 'stable',
    strengths: [],
    focusAreas: [],
    balanceScore: 0.5,
    source: 'performance',
  };
}

/**
 * Composite life score from the latest assessment of the last 90 days, or
 * derived from goal and habit performance when there is none.
 */
export function calculateLifeScore(
  assessments: readonly LifeAssessment[],
  goals: readonly Goal[],
  habits: readonly Habit[],
  today: string
): LifeScore {
  const cutoff = shiftDateKey(today, -RECENT_ASSESSMENT_DAYS);
  const recent = assessments
    .filter(assessment => assessment.date >= cutoff)
    .map((assessment, index) => ({ assessment, index }))
    .sort((a, b) =>
      b.assessment.date.localeCompare(a.assessment.date) ||
      b.assessment.createdAt.localeCompare(a.assessment.createdAt) ||
      a.index - b.index
    )
    .map(entry => entry.assessment);

  if (recent.length === 0) {
    return scoreFromPerformance(goals, habits, today);
  }
  return scoreFromAssessments(recent);
}
