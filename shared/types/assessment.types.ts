import type { LifeCategory } from '../constants/lifeDomains';

/** A periodic life review with 1-10 satisfaction ratings per category. */
export interface LifeAssessment {
  id: string; // UUID v4
  date: string; // yyyy-MM-dd
  assessmentType: string; // e.g. "weekly", "monthly"

  categoryRatings: Partial<Record<LifeCategory, number>>;
  overallSatisfaction: number | null;

  biggestWins: string[];
  mainChallenges: string[];
  keyLearnings: string[];

  focusAreas: LifeCategory[];
  newGoalIdeas: string[];
  habitsToStart: string[];
  habitsToStop: string[];

  goalsCompleted: string[];
  goalsAbandoned: string[];

  notes: string;
  createdAt: string; // ISO 8601 timestamp
}
