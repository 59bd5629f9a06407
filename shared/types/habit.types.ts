import type { Difficulty, HabitFrequency, LifeCategory, Priority } from '../constants/lifeDomains';

/** A tracked habit. The streak and rate fields are derived from its completion log. */
export interface Habit {
  id: string; // UUID v4
  title: string;
  description: string;
  category: LifeCategory;
  priority: Priority;
  difficulty: Difficulty;
  frequency: HabitFrequency;

  // Scheduling
  targetDaysPerWeek: number; // 1-7
  targetTimesPerDay: number;
  preferredTime: string | null;
  durationMinutes: number | null;

  // Derived tracking, written only by completion recording
  createdAt: string; // ISO 8601 timestamp
  currentStreak: number;
  longestStreak: number;
  totalCompletions: number;
  completionRate: number; // 0-100

  // Motivation and context
  whyImportant: string;
  triggerCue: string;
  reward: string;
  environmentSetup: string;

  isActive: boolean;
  reminderEnabled: boolean;
  tags: string[];
  notes: string;
}

/** Derived counters recomputed from the completion log. */
export type HabitStats = Pick<
  Habit,
  'currentStreak' | 'longestStreak' | 'totalCompletions' | 'completionRate'
>;

/** One row of a habit's append-only completion log. */
export interface HabitCompletion {
  id: number;
  habitId: string;
  completionDate: string; // yyyy-MM-dd
  completionTime: string | null; // HH:mm, null when untimed
  note: string;
  recordedAt: string; // ISO 8601 timestamp
}
