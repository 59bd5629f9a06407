import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { LifeAssessmentModel } from '../LifeAssessmentModel';
import type { NewLifeAssessment } from '../LifeAssessmentModel';
import { setupTestDatabase } from '../../test-utils/setupDatabase';

function assessment(overrides: Partial<NewLifeAssessment> = {}): NewLifeAssessment {
  return {
    date: '2024-06-30',
    assessmentType: 'monthly',
    categoryRatings: { health_fitness: 6, finances: 4, family: 9 },
    overallSatisfaction: 7,
    biggestWins: ['New job'],
    mainChallenges: ['Sleep'],
    keyLearnings: [],
    focusAreas: ['finances'],
    newGoalIdeas: [],
    habitsToStart: ['Budget review'],
    habitsToStop: [],
    goalsCompleted: [],
    goalsAbandoned: [],
    notes: '',
    createdAt: '2024-06-30T18:00:00.000Z',
    ...overrides,
  };
}

describe('LifeAssessmentModel', () => {
  let db: Database.Database;
  let model: LifeAssessmentModel;

  beforeEach(() => {
    db = setupTestDatabase();
    model = new LifeAssessmentModel(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should round-trip category ratings and focus areas', () => {
    const created = model.create(assessment());

    expect(model.getById(created.id)).toEqual({ ...assessment(), id: created.id });
  });

  it('should list newest first and filter by type', () => {
    const may = model.create(assessment({ date: '2024-05-31' }));
    const june = model.create(assessment({ date: '2024-06-30' }));
    const weekly = model.create(assessment({ date: '2024-06-23', assessmentType: 'weekly' }));

    expect(model.list().map(a => a.id)).toEqual([june.id, weekly.id, may.id]);
    expect(model.list('weekly').map(a => a.id)).toEqual([weekly.id]);
  });
});
