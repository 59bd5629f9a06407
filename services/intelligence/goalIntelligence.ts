import { z } from 'zod';
import { Difficulty } from '../../shared/constants/lifeDomains';
import { LifeCategorySchema } from '../../shared/schemas/commonSchemas';
import { daysBetween, timestampToDateKey } from '../../utils/dates';
import type { Goal } from '../../shared/types';
import categoryTipsData from './data/categoryTips.json';

const MAX_BREAKDOWN_SUGGESTIONS = 5;
const CATEGORY_TIPS_PER_GOAL = 2;

const categoryTips = z.record(LifeCategorySchema, z.array(z.string())).parse(categoryTipsData);

function daysUntilTarget(goal: Pick<Goal, 'targetDate'>, today: string): number | null {
  return goal.targetDate ? daysBetween(today, goal.targetDate) : null;
}

/**
 * Effective difficulty in [0, 1]: the declared difficulty raised by deadline
 * pressure, the number of action steps and the resources required.
 */
export function difficultyScore(goal: Goal, today: string): number {
  let score = goal.difficulty * 0.2;

  const daysRemaining = daysUntilTarget(goal, today);
  if (daysRemaining !== null) {
    if (daysRemaining < 7) {
      score += 0.3;
    } else if (daysRemaining < 30) {
      score += 0.2;
    } else if (daysRemaining < 90) {
      score += 0.1;
    }
  }

  const stepCount = goal.actionSteps.length;
  if (stepCount > 10) {
    score += 0.2;
  } else if (stepCount > 5) {
    score += 0.1;
  }

  if (goal.requiredResources.length > 3) {
    score += 0.1;
  }

  return Math.max(0, Math.min(1, score));
}

/**
 * Suggested ways to break a goal down, most general first.
 */
export function suggestBreakdown(goal: Goal, today: string): string[] {
  const suggestions: string[] = [];

  const daysRemaining = daysUntilTarget(goal, today);
  if (daysRemaining !== null) {
    if (daysRemaining > 90) {
      suggestions.push('Break this long-term goal into quarterly milestones');
    } else if (daysRemaining > 30) {
      suggestions.push('Create weekly checkpoints to track progress');
    } else {
      suggestions.push('Define daily actions to achieve this goal');
    }
  }

  if (goal.difficulty === Difficulty.VeryHard) {
    suggestions.push(
      'Start with the smallest possible step to build momentum',
      'Identify potential obstacles and create contingency plans',
      'Consider finding an accountability partner or mentor'
    );
  } else if (goal.difficulty === Difficulty.Hard) {
    suggestions.push(
      'Break into 3-5 major milestones',
      'Allocate buffer time for unexpected challenges'
    );
  }

  suggestions.push(...(categoryTips[goal.category] ?? []).slice(0, CATEGORY_TIPS_PER_GOAL));

  return suggestions.slice(0, MAX_BREAKDOWN_SUGGESTIONS);
}

/**
 * Ranking score used by `prioritize`. Higher means work on it sooner.
 */
export function priorityScore(goal: Goal, today: string): number {
  let score = goal.priority * 25;

  const daysRemaining = daysUntilTarget(goal, today);
  if (daysRemaining !== null) {
    if (daysRemaining <= 7) {
      score += 50;
    } else if (daysRemaining <= 30) {
      score += 30;
    } else if (daysRemaining <= 90) {
      score += 15;
    }
  }

  // Momentum
  if (goal.progressPercentage > 50) {
    score += 20;
  } else if (goal.progressPercentage > 0) {
    score += 10;
  }

  // Easier goals get a slight boost
  score += (6 - goal.difficulty) * 5;

  if (goal.status === 'on_hold') {
    score -= 30;
  } else if (
    goal.status === 'not_started' &&
    daysBetween(timestampToDateKey(goal.createdAt), today) > 30
  ) {
    score -= 20;
  }

  return score;
}

/**
 * Goals ordered by descending priority score. Equal scores keep their input order.
 */
export function prioritize(goals: readonly Goal[], today: string): Goal[] {
  return goals
    .map((goal, index) => ({ goal, index, score: priorityScore(goal, today) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(entry => entry.goal);
}

