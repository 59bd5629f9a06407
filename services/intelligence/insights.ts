import { getLifeCategoryLabel, Priority } from '../../shared/constants/lifeDomains';
import { daysBetween, shiftDateKey, timestampToDateKey } from '../../utils/dates';
import type { DailyEntry, Goal, Habit, Insight, LifeScore } from '../../shared/types';

const MAX_INSIGHTS = 10;
const ENERGY_WINDOW_DAYS = 30;
const MIN_ENTRIES_FOR_ENERGY = 7;

export interface InsightInputs {
  goals: readonly Goal[];
  habits: readonly Habit[];
  lifeScore: LifeScore;
  dailyEntries: readonly DailyEntry[];
  today: string;
}

function goalInsights(goals: readonly Goal[], today: string): Insight[] {
  const insights: Insight[] = [];

  const stalled = goals.filter(goal =>
    goal.status === 'in_progress' &&
    daysBetween(timestampToDateKey(goal.createdAt), today) > 30 &&
    goal.progressPercentage < 20
  );
  if (stalled.length > 0) {
    insights.push({
      title: 'Stalled Goals Detected',
      description: `You have ${stalled.length} goals that haven't progressed much in 30+ days`,
      category: 'personal_growth',
      priority: Priority.High,
      actionItems: [
        'Review and break down stalled goals into smaller steps',
        'Consider if these goals are still relevant',
        'Set weekly progress checkpoints',
      ],
      confidenceScore: 0.9,
      kind: 'warning',
    });
  }

  const highPriorityOpen = goals.filter(goal =>
    goal.priority === Priority.High &&
    (goal.status === 'not_started' || goal.status === 'in_progress')
  );
  if (highPriorityOpen.length > 5) {
    insights.push({
      title: 'Potential Overcommitment',
      description: `You have ${highPriorityOpen.length} high-priority goals active`,
      category: 'personal_growth',
      priority: Priority.Medium,
      actionItems: [
        'Consider reducing to 3-5 high-priority goals',
        'Move some goals to medium priority',
        'Focus on completing current goals before adding new ones',
      ],
      confidenceScore: 0.8,
      kind: 'recommendation',
    });
  }

  return insights;
}

function habitInsights(habits: readonly Habit[]): Insight[] {
  const insights: Insight[] = [];
  const active = habits.filter(habit => habit.isActive);

  const struggling = active.filter(habit => habit.completionRate < 40);
  if (struggling.length > 0) {
    insights.push({
      title: 'Struggling Habits Need Attention',
      description: `${struggling.length} habits have completion rates below 40%`,
      category: 'personal_growth',
      priority: Priority.High,
      actionItems: [
        'Reduce difficulty of struggling habits',
        'Strengthen habit cues and rewards',
        'Consider habit stacking with existing routines',
      ],
      confidenceScore: 0.85,
      kind: 'recommendation',
    });
  }

  const excellent = active.filter(habit => habit.completionRate > 85);
  if (excellent.length > 0) {
    insights.push({
      title: 'Excellent Habit Performance!',
      description: `You're crushing it with ${excellent.length} habits above 85% completion`,
      category: 'personal_growth',
      priority: Priority.Low,
      actionItems: [
        'Consider adding complementary habits to successful ones',
        'Share your success strategies',
        'Gradually increase difficulty if desired',
      ],
      confidenceScore: 0.9,
      kind: 'celebration',
    });
  }

  return insights;
}

function lifeBalanceInsights(lifeScore: LifeScore): Insight[] {
  const insights: Insight[] = [];

  if (lifeScore.balanceScore < 0.6) {
    insights.push({
      title: 'Life Balance Opportunity',
      description: 'Your life satisfaction varies significantly across different areas',
      category: 'personal_growth',
      priority: Priority.Medium,
      actionItems: [
        'Focus more attention on neglected life areas',
        'Set goals in your lowest-scoring categories',
        'Consider reducing time in over-developed areas',
      ],
      confidenceScore: 0.7,
      kind: 'recommendation',
    });
  }

  const [primaryFocus] = lifeScore.focusAreas;
  if (primaryFocus !== undefined) {
    insights.push({
      title: 'Areas Needing Focus',
      description: `These life areas could use more attention: ${lifeScore.focusAreas.map(getLifeCategoryLabel).join(', ')}`,
      category: primaryFocus,
      priority: Priority.Medium,
      actionItems: [
        'Set specific goals in these areas',
        'Create habits to support these life domains',
        'Schedule regular time for these areas',
      ],
      confidenceScore: 0.8,
      kind: 'recommendation',
    });
  }

  return insights;
}

function energyInsights(entries: readonly DailyEntry[], today: string): Insight[] {
  const windowStart = shiftDateKey(today, -ENERGY_WINDOW_DAYS);
  const recent = entries.filter(entry => entry.date >= windowStart && entry.date <= today);
  if (recent.length < MIN_ENTRIES_FOR_ENERGY) {
    return [];
  }

  const levels: number[] = [];
  for (const entry of recent) {
    if (entry.energyLevel !== null) {
      levels.push(entry.energyLevel);
    }
  }
  if (levels.length === 0) {
    return [];
  }

  const average = levels.reduce((sum, level) => sum + level, 0) / levels.length;
  if (average >= 6) {
    return [];
  }

  return [{
    title: 'Low Energy Levels Detected',
    description: `Your average energy level is ${average.toFixed(1)}/10 over the last 30 days`,
    category: 'health_fitness',
    priority: Priority.High,
    actionItems: [
      'Review sleep quality and duration',
      'Assess nutrition and exercise habits',
      'Consider stress management techniques',
      'Schedule energy-boosting activities',
    ],
    confidenceScore: 0.8,
    kind: 'warning',
  }];
}

/**
 * Evaluate every insight rule independently, then rank by priority and
 * confidence (ties keep rule order) and keep the top ten.
 */
export function generateInsights({ goals, habits, lifeScore, dailyEntries, today }: InsightInputs): Insight[] {
  const insights = [
    ...goalInsights(goals, today),
    ...habitInsights(habits),
    ...lifeBalanceInsights(lifeScore),
    ...energyInsights(dailyEntries, today),
  ];

  return insights
    .map((insight, index) => ({ insight, index }))
    .sort((a, b) =>
      b.insight.priority - a.insight.priority ||
      b.insight.confidenceScore - a.insight.confidenceScore ||
      a.index - b.index
    )
    .map(entry => entry.insight)
    .slice(0, MAX_INSIGHTS);
}
