import type { Difficulty, GoalStatus, LifeCategory, Priority } from '../constants/lifeDomains';

/** A user goal with its planning breakdown. */
export interface Goal {
  id: string; // UUID v4
  title: string;
  description: string;
  category: LifeCategory;
  priority: Priority;
  difficulty: Difficulty;
  status: GoalStatus;
  createdAt: string; // ISO 8601 timestamp
  targetDate: string | null; // yyyy-MM-dd
  completedAt: string | null; // ISO 8601 timestamp
  progressPercentage: number; // 0-100

  // Breakdown and planning
  milestones: string[];
  actionSteps: string[];
  requiredResources: string[];
  potentialObstacles: string[];

  // Motivation and tracking
  whyImportant: string;
  successMetrics: string[];
  rewards: string[];

  estimatedHours: number | null;
  tags: string[];
  notes: string;
}
