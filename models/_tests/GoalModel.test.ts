import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { GoalModel } from '../GoalModel';
import type { NewGoal } from '../GoalModel';
import { setupTestDatabase } from '../../test-utils/setupDatabase';
import { Difficulty, Priority } from '../../shared/constants/lifeDomains';

function newGoal(overrides: Partial<NewGoal> = {}): NewGoal {
  return {
    title: 'Learn Spanish',
    description: 'Conversational level',
    category: 'personal_growth',
    priority: Priority.Medium,
    difficulty: Difficulty.Hard,
    status: 'not_started',
    createdAt: '2024-05-01T10:00:00.000Z',
    targetDate: '2024-12-31',
    completedAt: null,
    progressPercentage: 0,
    milestones: ['A1', 'A2'],
    actionSteps: ['Daily app lesson'],
    requiredResources: ['Textbook'],
    potentialObstacles: [],
    whyImportant: 'Travel',
    successMetrics: ['Hold a 10 minute conversation'],
    rewards: ['Trip to Madrid'],
    estimatedHours: 120,
    tags: ['language'],
    notes: '',
    ...overrides,
  };
}

describe('GoalModel', () => {
  let db: Database.Database;
  let model: GoalModel;

  beforeEach(() => {
    db = setupTestDatabase();
    model = new GoalModel(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('create', () => {
    it('should assign an id and round-trip every field', () => {
      const input = newGoal();
      const goal = model.create(input);

      expect(goal.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(goal).toEqual({ ...input, id: goal.id });
    });

    it('should reject an unknown category at the storage layer', () => {
      const row = { ...newGoal(), category: 'gardening' };
      expect(() =>
        db.prepare(`INSERT INTO goals (id, title, category, priority, difficulty, created_at)
          VALUES ('x', $title, $category, 2, 3, $createdAt)`).run({
          title: row.title,
          category: row.category,
          createdAt: row.createdAt,
        })
      ).toThrow();
    });
  });

  describe('queries', () => {
    it('should order by priority then newest first', () => {
      const low = model.create(newGoal({ title: 'low', priority: Priority.Low }));
      const olderHigh = model.create(newGoal({ title: 'older high', priority: Priority.High, createdAt: '2024-01-01T00:00:00.000Z' }));
      const newerHigh = model.create(newGoal({ title: 'newer high', priority: Priority.High, createdAt: '2024-03-01T00:00:00.000Z' }));

      expect(model.getAll().map(g => g.id)).toEqual([newerHigh.id, olderHigh.id, low.id]);
    });

    it('should filter by category and status', () => {
      model.create(newGoal({ title: 'a', category: 'finances' }));
      const b = model.create(newGoal({ title: 'b', category: 'family', status: 'in_progress' }));

      expect(model.getByCategory('finances').map(g => g.title)).toEqual(['a']);
      expect(model.getByStatus('in_progress').map(g => g.id)).toEqual([b.id]);
      expect(model.getByStatus('completed')).toEqual([]);
    });

    it('should return null for an unknown id', () => {
      expect(model.getById('missing')).toBeNull();
    });
  });

  describe('update', () => {
    it('should change only the supplied fields', () => {
      const goal = model.create(newGoal());
      const updated = model.update(goal.id, { progressPercentage: 40, tags: ['language', 'travel'] });

      expect(updated).toEqual({ ...goal, progressPercentage: 40, tags: ['language', 'travel'] });
    });

    it('should return null when the goal does not exist', () => {
      expect(model.update('missing', { title: 'x' })).toBeNull();
    });
  });

  describe('delete', () => {
    it('should report whether a row was removed', () => {
      const goal = model.create(newGoal());

      expect(model.delete(goal.id)).toBe(true);
      expect(model.delete(goal.id)).toBe(false);
      expect(model.getById(goal.id)).toBeNull();
    });
  });
});
