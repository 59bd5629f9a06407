import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { GoalModel } from '../models/GoalModel';
import { HabitModel } from '../models/HabitModel';
import { HabitCompletionModel } from '../models/HabitCompletionModel';
import { DailyEntryModel } from '../models/DailyEntryModel';
import { LifeAssessmentModel } from '../models/LifeAssessmentModel';
import { UserProfileModel } from '../models/UserProfileModel';

/**
 * Registry of all database models
 */
export interface ModelRegistry {
  goalModel: GoalModel;
  habitModel: HabitModel;
  habitCompletionModel: HabitCompletionModel;
  dailyEntryModel: DailyEntryModel;
  lifeAssessmentModel: LifeAssessmentModel;
  userProfileModel: UserProfileModel;
}

/**
 * Initialize all database models.
 * This is the single source of truth for model instantiation.
 * @param db Migrated database connection
 */
export default function initModels(db: Database.Database): ModelRegistry {
  logger.info('[ModelBootstrap] Initializing models...');

  const registry: ModelRegistry = {
    goalModel: new GoalModel(db),
    habitModel: new HabitModel(db),
    habitCompletionModel: new HabitCompletionModel(db),
    dailyEntryModel: new DailyEntryModel(db),
    lifeAssessmentModel: new LifeAssessmentModel(db),
    userProfileModel: new UserProfileModel(db),
  };

  logger.info('[ModelBootstrap] All models initialized.');
  return registry;
}

export { initModels };
