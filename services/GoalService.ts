import Database from 'better-sqlite3';
import { BaseService } from './base/BaseService';
import { NotFoundError, ValidationError } from './base/ServiceError';
import { GoalModel } from '../models/GoalModel';
import { validatePayload } from '../shared/schemas/validatePayload';
import { GoalCreateSchema, GoalUpdateSchema } from '../shared/schemas/goalSchemas';
import type { GoalCreatePayload, GoalUpdatePayload } from '../shared/schemas/goalSchemas';
import { systemClock } from '../utils/dates';
import type { Clock } from '../utils/dates';
import type { Goal, GoalStatus, LifeCategory, StoreResult } from '../shared/types';

interface GoalServiceDeps {
  db: Database.Database;
  goalModel: GoalModel;
  clock?: Clock;
}

export class GoalService extends BaseService<GoalServiceDeps> {
  private readonly clock: Clock;

  constructor(deps: GoalServiceDeps) {
    super('GoalService', deps);
    this.clock = deps.clock ?? systemClock;
    this.logInfo('Initialized.');
  }

  async createGoal(payload: GoalCreatePayload): Promise<StoreResult<Goal>> {
    return this.executeWrite('createGoal', 'goal', async () => {
      const data = validatePayload(GoalCreateSchema, payload, 'goal');
      const goal = this.deps.goalModel.create({
        ...data,
        createdAt: data.createdAt ?? this.clock().toISOString(),
      });
      this.logInfo('Goal created:', { id: goal.id, title: goal.title });
      return goal;
    });
  }

  async getGoal(id: string): Promise<Goal | null> {
    return this.execute('getGoal', async () => this.deps.goalModel.getById(id), { id });
  }

  async getAllGoals(): Promise<Goal[]> {
    return this.execute('getAllGoals', async () => this.deps.goalModel.getAll());
  }

  async getGoalsByCategory(category: LifeCategory): Promise<Goal[]> {
    return this.execute('getGoalsByCategory', async () => this.deps.goalModel.getByCategory(category), { category });
  }

  async getGoalsByStatus(status: GoalStatus): Promise<Goal[]> {
    return this.execute('getGoalsByStatus', async () => this.deps.goalModel.getByStatus(status), { status });
  }

  async updateGoal(id: string, payload: GoalUpdatePayload): Promise<StoreResult<Goal>> {
    return this.executeWrite('updateGoal', 'goal', async () => {
      const changes = validatePayload(GoalUpdateSchema, payload, 'goal update');
      const updated = this.deps.goalModel.update(id, changes);
      if (!updated) {
        throw new NotFoundError('Goal', id);
      }
      return updated;
    }, { id });
  }

  async deleteGoal(id: string): Promise<StoreResult<void>> {
    return this.executeWrite('deleteGoal', 'goal', async () => {
      if (!this.deps.goalModel.delete(id)) {
        throw new NotFoundError('Goal', id);
      }
    }, { id });
  }

  /**
   * Set progress, clamped to [0, 100]. Leaving zero starts a not-started goal;
   * reaching 100 completes it.
   */
  async updateProgress(id: string, percentage: number): Promise<StoreResult<Goal>> {
    return this.executeWrite('updateProgress', 'goal', async () => {
      if (!Number.isFinite(percentage)) {
        throw new ValidationError(`Invalid progress percentage: ${percentage}`);
      }
      const progress = Math.max(0, Math.min(100, percentage));

      return this.withTransaction(this.deps.db, () => {
        const goal = this.deps.goalModel.getById(id);
        if (!goal) {
          throw new NotFoundError('Goal', id);
        }

        let status = goal.status;
        let completedAt = goal.completedAt;
        if (progress >= 100) {
          status = 'completed';
          completedAt = completedAt ?? this.clock().toISOString();
        } else if (progress > 0 && status === 'not_started') {
          status = 'in_progress';
        }

        const updated = this.deps.goalModel.update(id, { progressPercentage: progress, status, completedAt });
        if (!updated) {
          throw new NotFoundError('Goal', id);
        }
        return updated;
      });
    }, { id, percentage });
  }

  /**
   * Mark a goal completed at 100% progress.
   */
  async completeGoal(id: string): Promise<StoreResult<Goal>> {
    return this.executeWrite('completeGoal', 'goal', async () => {
      const updated = this.deps.goalModel.update(id, {
        status: 'completed',
        progressPercentage: 100,
        completedAt: this.clock().toISOString(),
      });
      if (!updated) {
        throw new NotFoundError('Goal', id);
      }
      this.logInfo('Goal completed:', { id });
      return updated;
    }, { id });
  }
}
