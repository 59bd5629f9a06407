import type { Difficulty, LifeCategory, Priority } from '../constants/lifeDomains';

/** Kind of generated insight. */
export type InsightKind = 'pattern' | 'recommendation' | 'warning' | 'celebration';

/** A generated, ranked observation about the user's data. */
export interface Insight {
  title: string;
  description: string;
  category: LifeCategory;
  priority: Priority;
  actionItems: string[];
  confidenceScore: number; // 0.0 to 1.0
  kind: InsightKind;
}

/** One point of the trailing monthly completion trend. */
export interface MonthlyCompletionPoint {
  month: string; // yyyy-MM of the bucket start
  completed: number;
}

export interface ProgressAnalytics {
  totalGoals: number;
  completedGoals: number;
  inProgressGoals: number;
  completionRate: number; // percentage
  averageCompletionDays: number | null;
  mostProductiveCategory: LifeCategory | null;
  leastProductiveCategory: LifeCategory | null;
  difficultyDistribution: Partial<Record<Difficulty, number>>;
  monthlyCompletionTrend: MonthlyCompletionPoint[];
}

export interface HabitAnalytics {
  totalHabits: number;
  activeHabits: number;
  averageStreak: number;
  bestPerformingHabits: string[]; // titles
  strugglingHabits: string[]; // titles
  completionRateByCategory: Partial<Record<LifeCategory, number>>;
  weeklyConsistencyScore: number; // 0-100
  difficultyVsSuccess: Partial<Record<Difficulty, number>>;
}

export type LifeTrend = 'improving' | 'declining' | 'stable';

/** Composite life satisfaction, from the latest assessment or derived from performance. */
export interface LifeScore {
  overallScore: number; // 0-1
  categoryScores: Partial<Record<LifeCategory, number>>;
  trend: LifeTrend;
  strengths: LifeCategory[];
  focusAreas: LifeCategory[];
  balanceScore: number; // 0-1
  source: 'assessment' | 'performance';
}

export type TimeOfDay = 'morning' | 'afternoon' | 'evening' | 'night';

export type CompletionPattern =
  | { pattern: 'insufficient_data' }
  | {
      pattern: 'day_of_week';
      bestDays: string[]; // weekday names, most completions first
      consistencyScore: number; // distinct weekdays / 7
    };

export interface HabitSuccessAnalysis {
  successRate: number;
  streakConsistency: number;
  completionPattern: CompletionPattern;
  optimalTiming: TimeOfDay[];
  successFactors: string[];
  improvementSuggestions: string[];
}
