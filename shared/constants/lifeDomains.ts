/**
 * Closed value sets shared by the entity model, the SQLite schema and the
 * intelligence engine. Stored keys must match the CHECK constraints in
 * models/migrations.
 */

/**
 * Life areas in declared order. Analytics that iterate categories (most/least
 * productive, per-category rates) follow this order.
 */
export const LIFE_CATEGORIES = [
  'health_fitness',
  'career_education',
  'relationships',
  'finances',
  'personal_growth',
  'hobbies_recreation',
  'spirituality',
  'home_environment',
  'family',
  'creativity',
  'community',
  'travel_adventure',
] as const;

export type LifeCategory = (typeof LIFE_CATEGORIES)[number];

export const LIFE_CATEGORY_LABELS: Record<LifeCategory, string> = {
  health_fitness: 'Health & Fitness',
  career_education: 'Career & Education',
  relationships: 'Relationships & Social',
  finances: 'Finances & Money',
  personal_growth: 'Personal Growth & Learning',
  hobbies_recreation: 'Hobbies & Recreation',
  spirituality: 'Spirituality & Mindfulness',
  home_environment: 'Home & Environment',
  family: 'Family & Parenting',
  creativity: 'Creativity & Arts',
  community: 'Community & Service',
  travel_adventure: 'Travel & Adventure',
};

/**
 * Get human-readable display name for a life category
 */
export function getLifeCategoryLabel(category: LifeCategory): string {
  return LIFE_CATEGORY_LABELS[category];
}

/** Ordinal priority. Scoring formulas use the numeric values directly. */
export enum Priority {
  Low = 1,
  Medium = 2,
  High = 3,
  Urgent = 4,
}

/** Ordinal difficulty. Scoring formulas use the numeric values directly. */
export enum Difficulty {
  VeryEasy = 1,
  Easy = 2,
  Moderate = 3,
  Hard = 4,
  VeryHard = 5,
}

export const DIFFICULTIES: readonly Difficulty[] = [
  Difficulty.VeryEasy,
  Difficulty.Easy,
  Difficulty.Moderate,
  Difficulty.Hard,
  Difficulty.VeryHard,
];

export const GOAL_STATUSES = [
  'not_started',
  'in_progress',
  'completed',
  'on_hold',
  'cancelled',
] as const;

export type GoalStatus = (typeof GOAL_STATUSES)[number];

export const HABIT_FREQUENCIES = ['daily', 'weekly', 'monthly', 'custom'] as const;

export type HabitFrequency = (typeof HABIT_FREQUENCIES)[number];

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Profile limit on primary life focuses. */
export const MAX_PRIMARY_LIFE_FOCUSES = 5;
