import { BaseService } from './base/BaseService';
import { NotFoundError } from './base/ServiceError';
import { GoalModel } from '../models/GoalModel';
import { HabitModel } from '../models/HabitModel';
import { HabitCompletionModel } from '../models/HabitCompletionModel';
import { DailyEntryModel } from '../models/DailyEntryModel';
import { LifeAssessmentModel } from '../models/LifeAssessmentModel';
import * as goalIntelligence from './intelligence/goalIntelligence';
import * as habitIntelligence from './intelligence/habitIntelligence';
import {
  calculateLifeScore,
  generateHabitAnalytics,
  generateProgressAnalytics,
} from './intelligence/analytics';
import { generateInsights } from './intelligence/insights';
import { shiftDateKey, systemClock, toDateKey } from '../utils/dates';
import type { Clock } from '../utils/dates';
import type {
  Goal,
  Habit,
  HabitAnalytics,
  HabitSuccessAnalysis,
  Insight,
  LifeScore,
  ProgressAnalytics,
} from '../shared/types';

interface IntelligenceServiceDeps {
  goalModel: GoalModel;
  habitModel: HabitModel;
  habitCompletionModel: HabitCompletionModel;
  dailyEntryModel: DailyEntryModel;
  lifeAssessmentModel: LifeAssessmentModel;
  clock?: Clock;
}

const ENERGY_WINDOW_DAYS = 30;

/**
 * Read-only analytics over the store. Every call reads current data; nothing
 * is cached and nothing is written.
 */
export class IntelligenceService extends BaseService<IntelligenceServiceDeps> {
  private readonly clock: Clock;

  constructor(deps: IntelligenceServiceDeps) {
    super('IntelligenceService', deps);
    this.clock = deps.clock ?? systemClock;
    this.logInfo('Initialized.');
  }

  private today(): string {
    return toDateKey(this.clock());
  }

  private requireGoal(goalId: string): Goal {
    const goal = this.deps.goalModel.getById(goalId);
    if (!goal) {
      throw new NotFoundError('Goal', goalId);
    }
    return goal;
  }

  private requireHabit(habitId: string): Habit {
    const habit = this.deps.habitModel.getById(habitId);
    if (!habit) {
      throw new NotFoundError('Habit', habitId);
    }
    return habit;
  }

  async difficultyScore(goalId: string): Promise<number> {
    return this.execute('difficultyScore', async () =>
      goalIntelligence.difficultyScore(this.requireGoal(goalId), this.today()), { goalId });
  }

  async suggestBreakdown(goalId: string): Promise<string[]> {
    return this.execute('suggestBreakdown', async () =>
      goalIntelligence.suggestBreakdown(this.requireGoal(goalId), this.today()), { goalId });
  }

  /**
   * Open goals (not completed or cancelled) in recommended working order.
   */
  async prioritize(): Promise<Goal[]> {
    return this.execute('prioritize', async () => {
      const open = this.deps.goalModel
        .getAll()
        .filter(goal => goal.status !== 'completed' && goal.status !== 'cancelled');
      return goalIntelligence.prioritize(open, this.today());
    });
  }

  async successProbability(habitId: string): Promise<number> {
    return this.execute('successProbability', async () =>
      habitIntelligence.successProbability(this.requireHabit(habitId), this.today()), { habitId });
  }

  async optimize(habitId: string): Promise<string[]> {
    return this.execute('optimize', async () => {
      const habit = this.requireHabit(habitId);
      const completions = this.deps.habitCompletionModel.getForHabit(habitId);
      return habitIntelligence.optimize(habit, completions);
    }, { habitId });
  }

  async analyzeHabitSuccessFactors(habitId: string): Promise<HabitSuccessAnalysis> {
    return this.execute('analyzeHabitSuccessFactors', async () => {
      const habit = this.requireHabit(habitId);
      const completions = this.deps.habitCompletionModel.getForHabit(habitId);
      return habitIntelligence.analyzeSuccessFactors(habit, completions);
    }, { habitId });
  }

  async generateProgressAnalytics(): Promise<ProgressAnalytics> {
    return this.execute('generateProgressAnalytics', async () =>
      generateProgressAnalytics(this.deps.goalModel.getAll(), this.today()));
  }

  async generateHabitAnalytics(): Promise<HabitAnalytics> {
    return this.execute('generateHabitAnalytics', async () =>
      generateHabitAnalytics(this.deps.habitModel.getAll(), this.today()));
  }

  async calculateLifeScore(): Promise<LifeScore> {
    return this.execute('calculateLifeScore', async () =>
      calculateLifeScore(
        this.deps.lifeAssessmentModel.list(),
        this.deps.goalModel.getAll(),
        this.deps.habitModel.getAll(),
        this.today()
      ));
  }

  /**
   * Ranked insights across goals, habits, life balance and recent energy levels.
   */
  async generateIntelligentInsights(): Promise<Insight[]> {
    return this.execute('generateIntelligentInsights', async () => {
      const today = this.today();
      const goals = this.deps.goalModel.getAll();
      const habits = this.deps.habitModel.getAll();
      const lifeScore = calculateLifeScore(this.deps.lifeAssessmentModel.list(), goals, habits, today);
      const dailyEntries = this.deps.dailyEntryModel.getRange(shiftDateKey(today, -ENERGY_WINDOW_DAYS), today);

      const insights = generateInsights({ goals, habits, lifeScore, dailyEntries, today });
      this.logDebug('Generated insights:', { count: insights.length });
      return insights;
    });
  }
}
