import { Difficulty, Priority } from '../shared/constants/lifeDomains';
import type { Goal, Habit, HabitCompletion } from '../shared/types';

/**
 * In-memory entity builders for the pure scoring functions.
 */

export function makeGoal(overrides: Partial<Goal> = {}): Goal {
  return {
    id: 'goal-1',
    title: 'Run a half marathon',
    description: '',
    category: 'health_fitness',
    priority: Priority.Medium,
    difficulty: Difficulty.Moderate,
    status: 'not_started',
    createdAt: '2024-06-01T09:00:00',
    targetDate: null,
    completedAt: null,
    progressPercentage: 0,
    milestones: [],
    actionSteps: [],
    requiredResources: [],
    potentialObstacles: [],
    whyImportant: '',
    successMetrics: [],
    rewards: [],
    estimatedHours: null,
    tags: [],
    notes: '',
    ...overrides,
  };
}

export function makeHabit(overrides: Partial<Habit> = {}): Habit {
  return {
    id: 'habit-1',
    title: 'Morning stretch',
    description: '',
    category: 'health_fitness',
    priority: Priority.Medium,
    difficulty: Difficulty.Moderate,
    frequency: 'daily',
    targetDaysPerWeek: 7,
    targetTimesPerDay: 1,
    preferredTime: null,
    durationMinutes: null,
    createdAt: '2024-06-01T09:00:00',
    currentStreak: 0,
    longestStreak: 0,
    totalCompletions: 0,
    completionRate: 0,
    whyImportant: '',
    triggerCue: '',
    reward: '',
    environmentSetup: '',
    isActive: true,
    reminderEnabled: true,
    tags: [],
    notes: '',
    ...overrides,
  };
}

let nextCompletionId = 1;

export function makeCompletion(
  completionDate: string,
  completionTime: string | null = null,
  habitId = 'habit-1'
): HabitCompletion {
  return {
    id: nextCompletionId++,
    habitId,
    completionDate,
    completionTime,
    note: '',
    recordedAt: `${completionDate}T12:00:00`,
  };
}
