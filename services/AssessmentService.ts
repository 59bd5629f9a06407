import { BaseService } from './base/BaseService';
import { LifeAssessmentModel } from '../models/LifeAssessmentModel';
import { validatePayload } from '../shared/schemas/validatePayload';
import { LifeAssessmentCreateSchema } from '../shared/schemas/assessmentSchemas';
import type { LifeAssessmentPayload } from '../shared/schemas/assessmentSchemas';
import { systemClock } from '../utils/dates';
import type { Clock } from '../utils/dates';
import type { LifeAssessment, StoreResult } from '../shared/types';

interface AssessmentServiceDeps {
  lifeAssessmentModel: LifeAssessmentModel;
  clock?: Clock;
}

export class AssessmentService extends BaseService<AssessmentServiceDeps> {
  private readonly clock: Clock;

  constructor(deps: AssessmentServiceDeps) {
    super('AssessmentService', deps);
    this.clock = deps.clock ?? systemClock;
    this.logInfo('Initialized.');
  }

  async createAssessment(payload: LifeAssessmentPayload): Promise<StoreResult<LifeAssessment>> {
    return this.executeWrite('createAssessment', 'life assessment', async () => {
      const data = validatePayload(LifeAssessmentCreateSchema, payload, 'life assessment');
      const assessment = this.deps.lifeAssessmentModel.create({
        ...data,
        createdAt: data.createdAt ?? this.clock().toISOString(),
      });
      this.logInfo('Assessment created:', { id: assessment.id, date: assessment.date });
      return assessment;
    });
  }

  async getAssessment(id: string): Promise<LifeAssessment | null> {
    return this.execute('getAssessment', async () => this.deps.lifeAssessmentModel.getById(id), { id });
  }

  /**
   * Assessments newest first, optionally of one type only.
   */
  async getAssessments(assessmentType?: string): Promise<LifeAssessment[]> {
    return this.execute(
      'getAssessments',
      async () => this.deps.lifeAssessmentModel.list(assessmentType),
      { assessmentType }
    );
  }
}
