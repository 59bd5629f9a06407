import { v4 as uuidv4 } from 'uuid';
import Database from 'better-sqlite3';
import { BaseModel } from './BaseModel';
import { logger } from '../utils/logger';
import { readCategoryList, readCategoryRatings, readStringList, writeJson } from './columnCodecs';
import type { LifeAssessment } from '../shared/types';

interface LifeAssessmentRecord {
  id: string;
  date: string;
  assessment_type: string;
  category_ratings_json: string;
  overall_satisfaction: number | null;
  biggest_wins_json: string;
  main_challenges_json: string;
  key_learnings_json: string;
  focus_areas_json: string;
  new_goal_ideas_json: string;
  habits_to_start_json: string;
  habits_to_stop_json: string;
  goals_completed_json: string;
  goals_abandoned_json: string;
  notes: string;
  created_at: string;
}

export type NewLifeAssessment = Omit<LifeAssessment, 'id'>;

function mapRecordToAssessment(record: LifeAssessmentRecord): LifeAssessment {
  return {
    id: record.id,
    date: record.date,
    assessmentType: record.assessment_type,
    categoryRatings: readCategoryRatings(record.category_ratings_json),
    overallSatisfaction: record.overall_satisfaction,
    biggestWins: readStringList(record.biggest_wins_json),
    mainChallenges: readStringList(record.main_challenges_json),
    keyLearnings: readStringList(record.key_learnings_json),
    focusAreas: readCategoryList(record.focus_areas_json),
    newGoalIdeas: readStringList(record.new_goal_ideas_json),
    habitsToStart: readStringList(record.habits_to_start_json),
    habitsToStop: readStringList(record.habits_to_stop_json),
    goalsCompleted: readStringList(record.goals_completed_json),
    goalsAbandoned: readStringList(record.goals_abandoned_json),
    notes: record.notes,
    createdAt: record.created_at,
  };
}

export class LifeAssessmentModel extends BaseModel {
  protected readonly modelName = 'LifeAssessmentModel';

  constructor(db: Database.Database) {
    super(db);
    logger.debug('[LifeAssessmentModel] Initialized.');
  }

  create(data: NewLifeAssessment): LifeAssessment {
    return this.db.transaction((): LifeAssessment => {
      const id = uuidv4();

      try {
        this.db.prepare<LifeAssessmentRecord>(`
          INSERT INTO life_assessments (
            id, date, assessment_type, category_ratings_json, overall_satisfaction,
            biggest_wins_json, main_challenges_json, key_learnings_json, focus_areas_json,
            new_goal_ideas_json, habits_to_start_json, habits_to_stop_json,
            goals_completed_json, goals_abandoned_json, notes, created_at
          ) VALUES (
            $id, $date, $assessment_type, $category_ratings_json, $overall_satisfaction,
            $biggest_wins_json, $main_challenges_json, $key_learnings_json, $focus_areas_json,
            $new_goal_ideas_json, $habits_to_start_json, $habits_to_stop_json,
            $goals_completed_json, $goals_abandoned_json, $notes, $created_at
          )
        `).run({
          id,
          date: data.date,
          assessment_type: data.assessmentType,
          category_ratings_json: writeJson(data.categoryRatings),
          overall_satisfaction: data.overallSatisfaction,
          biggest_wins_json: writeJson(data.biggestWins),
          main_challenges_json: writeJson(data.mainChallenges),
          key_learnings_json: writeJson(data.keyLearnings),
          focus_areas_json: writeJson(data.focusAreas),
          new_goal_ideas_json: writeJson(data.newGoalIdeas),
          habits_to_start_json: writeJson(data.habitsToStart),
          habits_to_stop_json: writeJson(data.habitsToStop),
          goals_completed_json: writeJson(data.goalsCompleted),
          goals_abandoned_json: writeJson(data.goalsAbandoned),
          notes: data.notes,
          created_at: data.createdAt,
        });

        logger.debug('[LifeAssessmentModel] Created assessment:', { id, date: data.date });
      } catch (error) {
        this.handleDbError(error, 'create');
      }

      const created = this.getById(id);
      if (!created) {
        throw new Error(`Failed to retrieve created assessment: ${id}`);
      }
      return created;
    })();
  }

  getById(id: string): LifeAssessment | null {
    try {
      const record = this.db
        .prepare<{ id: string }, LifeAssessmentRecord>('SELECT * FROM life_assessments WHERE id = $id')
        .get({ id });
      return record ? mapRecordToAssessment(record) : null;
    } catch (error) {
      this.handleDbError(error, 'getById');
    }
  }

  /**
   * Assessments newest first, optionally restricted to one assessment type.
   */
  list(assessmentType?: string): LifeAssessment[] {
    try {
      if (assessmentType) {
        return this.db
          .prepare<{ assessmentType: string }, LifeAssessmentRecord>(`
            SELECT * FROM life_assessments
            WHERE assessment_type = $assessmentType
            ORDER BY date DESC, created_at DESC
          `)
          .all({ assessmentType })
          .map(mapRecordToAssessment);
      }
      return this.db
        .prepare<[], LifeAssessmentRecord>('SELECT * FROM life_assessments ORDER BY date DESC, created_at DESC')
        .all()
        .map(mapRecordToAssessment);
    } catch (error) {
      this.handleDbError(error, 'list');
    }
  }
}
