import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { GoalService } from '../GoalService';
import { GoalModel } from '../../models/GoalModel';
import { NotFoundError, ValidationError } from '../base/ServiceError';
import { Difficulty, Priority } from '../../shared/constants/lifeDomains';
import { setupTestDatabase, fixedClock } from '../../test-utils/setupDatabase';
import { expectFailure, expectSuccess } from '../../test-utils/storeResult';
import type { GoalCreatePayload } from '../../shared/schemas/goalSchemas';

const NOW = '2024-06-15T12:00:00';

const payload: GoalCreatePayload = {
  title: 'Learn Spanish',
  category: 'personal_growth',
  priority: Priority.High,
  difficulty: Difficulty.Hard,
};

describe('GoalService', () => {
  let db: Database.Database;
  let service: GoalService;

  beforeEach(async () => {
    db = setupTestDatabase();
    service = new GoalService({ db, goalModel: new GoalModel(db), clock: fixedClock(NOW) });
    await service.initialize();
  });

  afterEach(async () => {
    await service.cleanup();
    db.close();
  });

  describe('createGoal', () => {
    it('should apply defaults and stamp the creation time', async () => {
      const goal = expectSuccess(await service.createGoal(payload));

      expect(goal.status).toBe('not_started');
      expect(goal.progressPercentage).toBe(0);
      expect(goal.targetDate).toBeNull();
      expect(goal.milestones).toEqual([]);
      expect(goal.createdAt).toBe(new Date(NOW).toISOString());
      expect(await service.getGoal(goal.id)).toEqual(goal);
    });

    it('should keep a supplied creation time', async () => {
      const goal = expectSuccess(await service.createGoal({ ...payload, createdAt: '2023-01-01T08:00:00.000Z' }));

      expect(goal.createdAt).toBe('2023-01-01T08:00:00.000Z');
    });

    it('should reject a blank title without writing anything', async () => {
      const error = expectFailure(await service.createGoal({ ...payload, title: '   ' }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe('Invalid goal: title: Goal title cannot be empty');
      expect(await service.getAllGoals()).toEqual([]);
    });

    it('should reject negative estimated hours', async () => {
      const error = expectFailure(await service.createGoal({ ...payload, estimatedHours: -1 }));

      expect(error.code).toBe('VALIDATION_ERROR');
    });

    it('should reject infinite estimated hours without storing the goal', async () => {
      const error = expectFailure(await service.createGoal({ ...payload, estimatedHours: Infinity }));

      expect(error.code).toBe('VALIDATION_ERROR');
      expect(await service.getAllGoals()).toEqual([]);
    });

    it('should reject a malformed target date', async () => {
      const error = expectFailure(await service.createGoal({ ...payload, targetDate: '31/12/2024' }));

      expect(error).toBeInstanceOf(ValidationError);
    });
  });

  describe('updateGoal', () => {
    it('should change only the supplied fields', async () => {
      const goal = expectSuccess(await service.createGoal({ ...payload, tags: ['language'] }));

      const updated = expectSuccess(await service.updateGoal(goal.id, { title: 'Learn Portuguese' }));

      expect(updated).toEqual({ ...goal, title: 'Learn Portuguese' });
    });

    it('should fail with NotFoundError for an unknown id', async () => {
      const error = expectFailure(await service.updateGoal('missing', { title: 'x' }));

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe("Goal with id 'missing' not found");
    });
  });

  describe('updateProgress', () => {
    it('should move a not-started goal into progress', async () => {
      const goal = expectSuccess(await service.createGoal(payload));

      const updated = expectSuccess(await service.updateProgress(goal.id, 40));

      expect(updated.progressPercentage).toBe(40);
      expect(updated.status).toBe('in_progress');
      expect(updated.completedAt).toBeNull();
    });

    it('should clamp above 100 and complete the goal', async () => {
      const goal = expectSuccess(await service.createGoal(payload));

      const updated = expectSuccess(await service.updateProgress(goal.id, 150));

      expect(updated.progressPercentage).toBe(100);
      expect(updated.status).toBe('completed');
      expect(updated.completedAt).toBe(new Date(NOW).toISOString());
    });

    it('should clamp below zero and leave the status alone', async () => {
      const goal = expectSuccess(await service.createGoal(payload));

      const updated = expectSuccess(await service.updateProgress(goal.id, -5));

      expect(updated.progressPercentage).toBe(0);
      expect(updated.status).toBe('not_started');
    });

    it('should not restart an on-hold goal', async () => {
      const goal = expectSuccess(await service.createGoal({ ...payload, status: 'on_hold' }));

      const updated = expectSuccess(await service.updateProgress(goal.id, 30));

      expect(updated.status).toBe('on_hold');
    });

    it('should reject a non-finite percentage', async () => {
      const goal = expectSuccess(await service.createGoal(payload));

      const error = expectFailure(await service.updateProgress(goal.id, Number.NaN));

      expect(error).toBeInstanceOf(ValidationError);
      expect((await service.getGoal(goal.id))?.progressPercentage).toBe(0);
    });

    it('should fail for an unknown goal', async () => {
      expect(expectFailure(await service.updateProgress('missing', 10))).toBeInstanceOf(NotFoundError);
    });
  });

  describe('completeGoal', () => {
    it('should set full progress and the completion time', async () => {
      const goal = expectSuccess(await service.createGoal(payload));

      const completed = expectSuccess(await service.completeGoal(goal.id));

      expect(completed.status).toBe('completed');
      expect(completed.progressPercentage).toBe(100);
      expect(completed.completedAt).toBe(new Date(NOW).toISOString());
      expect((await service.getGoalsByStatus('completed')).map(g => g.id)).toEqual([goal.id]);
    });
  });

  describe('queries', () => {
    it('should filter by category', async () => {
      const growth = expectSuccess(await service.createGoal(payload));
      expectSuccess(await service.createGoal({ ...payload, title: 'Save a buffer', category: 'finances' }));

      expect((await service.getGoalsByCategory('personal_growth')).map(g => g.id)).toEqual([growth.id]);
      expect(await service.getGoalsByCategory('travel_adventure')).toEqual([]);
    });
  });

  describe('deleteGoal', () => {
    it('should remove the goal and fail on a second delete', async () => {
      const goal = expectSuccess(await service.createGoal(payload));

      expect(await service.deleteGoal(goal.id)).toEqual({ success: true, data: undefined });
      expect(await service.getGoal(goal.id)).toBeNull();
      expect(expectFailure(await service.deleteGoal(goal.id))).toBeInstanceOf(NotFoundError);
    });
  });
});
