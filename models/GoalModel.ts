import { v4 as uuidv4 } from 'uuid';
import Database from 'better-sqlite3';
import { BaseModel } from './BaseModel';
import { logger } from '../utils/logger';
import { readStringList, writeJson } from './columnCodecs';
import {
  DifficultySchema,
  GoalStatusSchema,
  LifeCategorySchema,
  PrioritySchema,
} from '../shared/schemas/commonSchemas';
import type { Goal, GoalStatus, LifeCategory } from '../shared/types';

interface GoalRecord {
  id: string;
  title: string;
  description: string;
  category: string;
  priority: number;
  difficulty: number;
  status: string;
  created_at: string;
  target_date: string | null;
  completed_at: string | null;
  progress_percentage: number;
  milestones_json: string;
  action_steps_json: string;
  required_resources_json: string;
  potential_obstacles_json: string;
  why_important: string;
  success_metrics_json: string;
  rewards_json: string;
  estimated_hours: number | null;
  tags_json: string;
  notes: string;
}

/** Goal fields as written; the model assigns the id. */
export type NewGoal = Omit<Goal, 'id'>;
export type GoalChanges = Partial<Omit<Goal, 'id' | 'createdAt'>>;

function mapRecordToGoal(record: GoalRecord): Goal {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    category: LifeCategorySchema.parse(record.category),
    priority: PrioritySchema.parse(record.priority),
    difficulty: DifficultySchema.parse(record.difficulty),
    status: GoalStatusSchema.parse(record.status),
    createdAt: record.created_at,
    targetDate: record.target_date || null,
    completedAt: record.completed_at || null,
    progressPercentage: record.progress_percentage,
    milestones: readStringList(record.milestones_json),
    actionSteps: readStringList(record.action_steps_json),
    requiredResources: readStringList(record.required_resources_json),
    potentialObstacles: readStringList(record.potential_obstacles_json),
    whyImportant: record.why_important,
    successMetrics: readStringList(record.success_metrics_json),
    rewards: readStringList(record.rewards_json),
    estimatedHours: record.estimated_hours,
    tags: readStringList(record.tags_json),
    notes: record.notes,
  };
}

function goalToParams(goal: Goal): GoalRecord {
  return {
    id: goal.id,
    title: goal.title,
    description: goal.description,
    category: goal.category,
    priority: goal.priority,
    difficulty: goal.difficulty,
    status: goal.status,
    created_at: goal.createdAt,
    target_date: goal.targetDate,
    completed_at: goal.completedAt,
    progress_percentage: goal.progressPercentage,
    milestones_json: writeJson(goal.milestones),
    action_steps_json: writeJson(goal.actionSteps),
    required_resources_json: writeJson(goal.requiredResources),
    potential_obstacles_json: writeJson(goal.potentialObstacles),
    why_important: goal.whyImportant,
    success_metrics_json: writeJson(goal.successMetrics),
    rewards_json: writeJson(goal.rewards),
    estimated_hours: goal.estimatedHours,
    tags_json: writeJson(goal.tags),
    notes: goal.notes,
  };
}

const GOAL_ORDER = 'ORDER BY priority DESC, created_at DESC';

export class GoalModel extends BaseModel {
  protected readonly modelName = 'GoalModel';

  constructor(db: Database.Database) {
    super(db);
    logger.debug('[GoalModel] Initialized.');
  }

  /**
   * Insert a new goal and return it as stored.
   */
  create(data: NewGoal): Goal {
    return this.db.transaction((): Goal => {
      const goal: Goal = { ...data, id: uuidv4() };

      try {
        this.db.prepare<GoalRecord>(`
          INSERT INTO goals (
            id, title, description, category, priority, difficulty, status,
            created_at, target_date, completed_at, progress_percentage,
            milestones_json, action_steps_json, required_resources_json,
            potential_obstacles_json, why_important, success_metrics_json,
            rewards_json, estimated_hours, tags_json, notes
          ) VALUES (
            $id, $title, $description, $category, $priority, $difficulty, $status,
            $created_at, $target_date, $completed_at, $progress_percentage,
            $milestones_json, $action_steps_json, $required_resources_json,
            $potential_obstacles_json, $why_important, $success_metrics_json,
            $rewards_json, $estimated_hours, $tags_json, $notes
          )
        `).run(goalToParams(goal));

        logger.debug('[GoalModel] Created goal:', { id: goal.id, title: goal.title });
      } catch (error) {
        this.handleDbError(error, 'create');
      }

      const created = this.getById(goal.id);
      if (!created) {
        throw new Error(`Failed to retrieve created goal: ${goal.id}`);
      }
      return created;
    })();
  }

  getById(id: string): Goal | null {
    try {
      const record = this.db
        .prepare<{ id: string }, GoalRecord>('SELECT * FROM goals WHERE id = $id')
        .get({ id });

      if (!record) {
        logger.debug('[GoalModel] Goal not found:', { id });
        return null;
      }
      return mapRecordToGoal(record);
    } catch (error) {
      this.handleDbError(error, 'getById');
    }
  }

  /**
   * All goals, highest priority first, newest first within a priority.
   */
  getAll(): Goal[] {
    try {
      return this.db
        .prepare<[], GoalRecord>(`SELECT * FROM goals ${GOAL_ORDER}`)
        .all()
        .map(mapRecordToGoal);
    } catch (error) {
      this.handleDbError(error, 'getAll');
    }
  }

  getByCategory(category: LifeCategory): Goal[] {
    try {
      return this.db
        .prepare<{ category: string }, GoalRecord>(`SELECT * FROM goals WHERE category = $category ${GOAL_ORDER}`)
        .all({ category })
        .map(mapRecordToGoal);
    } catch (error) {
      this.handleDbError(error, 'getByCategory');
    }
  }

  getByStatus(status: GoalStatus): Goal[] {
    try {
      return this.db
        .prepare<{ status: string }, GoalRecord>(`SELECT * FROM goals WHERE status = $status ${GOAL_ORDER}`)
        .all({ status })
        .map(mapRecordToGoal);
    } catch (error) {
      this.handleDbError(error, 'getByStatus');
    }
  }

  /**
   * Apply a partial update. Returns null when the goal does not exist.
   */
  update(id: string, changes: GoalChanges): Goal | null {
    return this.db.transaction((): Goal | null => {
      const existing = this.getById(id);
      if (!existing) {
        return null;
      }

      const merged: Goal = { ...existing, ...changes, id, createdAt: existing.createdAt };

      try {
        this.db.prepare<GoalRecord>(`
          UPDATE goals SET
            title = $title,
            description = $description,
            category = $category,
            priority = $priority,
            difficulty = $difficulty,
            status = $status,
            created_at = $created_at,
            target_date = $target_date,
            completed_at = $completed_at,
            progress_percentage = $progress_percentage,
            milestones_json = $milestones_json,
            action_steps_json = $action_steps_json,
            required_resources_json = $required_resources_json,
            potential_obstacles_json = $potential_obstacles_json,
            why_important = $why_important,
            success_metrics_json = $success_metrics_json,
            rewards_json = $rewards_json,
            estimated_hours = $estimated_hours,
            tags_json = $tags_json,
            notes = $notes
          WHERE id = $id
        `).run(goalToParams(merged));

        logger.debug('[GoalModel] Goal updated:', { id, fields: Object.keys(changes) });
      } catch (error) {
        this.handleDbError(error, 'update');
      }

      return this.getById(id);
    })();
  }

  delete(id: string): boolean {
    try {
      const result = this.db
        .prepare<{ id: string }>('DELETE FROM goals WHERE id = $id')
        .run({ id });

      logger.info('[GoalModel] Goal deleted:', { id, deleted: result.changes > 0 });
      return result.changes > 0;
    } catch (error) {
      this.handleDbError(error, 'delete');
    }
  }
}
