import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { AssessmentService } from '../AssessmentService';
import { LifeAssessmentModel } from '../../models/LifeAssessmentModel';
import { ValidationError } from '../base/ServiceError';
import { setupTestDatabase, fixedClock } from '../../test-utils/setupDatabase';
import { expectFailure, expectSuccess } from '../../test-utils/storeResult';

describe('AssessmentService', () => {
  let db: Database.Database;
  let service: AssessmentService;

  beforeEach(() => {
    db = setupTestDatabase();
    service = new AssessmentService({
      lifeAssessmentModel: new LifeAssessmentModel(db),
      clock: fixedClock('2024-06-30T18:00:00'),
    });
  });

  afterEach(() => {
    db.close();
  });

  it('should store ratings and default the remaining fields', async () => {
    const created = expectSuccess(await service.createAssessment({
      date: '2024-06-30',
      assessmentType: 'monthly',
      categoryRatings: { finances: 4, family: 9 },
      focusAreas: ['finances'],
    }));

    expect(created.categoryRatings).toEqual({ finances: 4, family: 9 });
    expect(created.focusAreas).toEqual(['finances']);
    expect(created.overallSatisfaction).toBeNull();
    expect(created.biggestWins).toEqual([]);
    expect(created.createdAt).toBe(new Date('2024-06-30T18:00:00').toISOString());
    expect(await service.getAssessment(created.id)).toEqual(created);
  });

  it('should reject a rating above 10', async () => {
    const error = expectFailure(await service.createAssessment({
      date: '2024-06-30',
      assessmentType: 'monthly',
      categoryRatings: { finances: 11 },
    }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(await service.getAssessments()).toEqual([]);
  });

  it('should reject a blank assessment type', async () => {
    const error = expectFailure(await service.createAssessment({ date: '2024-06-30', assessmentType: ' ' }));

    expect(error.message).toBe('Invalid life assessment: assessmentType: Assessment type cannot be empty');
  });

  it('should list by type, newest first', async () => {
    const first = expectSuccess(await service.createAssessment({ date: '2024-06-09', assessmentType: 'weekly' }));
    const second = expectSuccess(await service.createAssessment({ date: '2024-06-16', assessmentType: 'weekly' }));
    expectSuccess(await service.createAssessment({ date: '2024-06-30', assessmentType: 'monthly' }));

    expect((await service.getAssessments('weekly')).map(a => a.id)).toEqual([second.id, first.id]);
    expect(await service.getAssessments()).toHaveLength(3);
  });
});
