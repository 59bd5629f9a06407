import dotenv from 'dotenv';
import { closeDb, initDb } from './models/db';
import { runMigrations } from './models/runMigrations';
import initModels from './bootstrap/modelBootstrap';
import { cleanupServices, initializeServices } from './bootstrap/serviceBootstrap';
import type { ServiceRegistry } from './bootstrap/serviceBootstrap';
import type { Clock } from './utils/dates';
import { logger } from './utils/logger';

export * from './shared/types';
export * from './shared/schemas/goalSchemas';
export * from './shared/schemas/habitSchemas';
export * from './shared/schemas/journalSchemas';
export * from './shared/schemas/assessmentSchemas';
export * from './shared/schemas/profileSchemas';
export * from './services/base';
export { GoalService } from './services/GoalService';
export { HabitService } from './services/HabitService';
export type { CompletionRecorded } from './services/HabitService';
export { JournalService } from './services/JournalService';
export { AssessmentService } from './services/AssessmentService';
export { ProfileService } from './services/ProfileService';
export { IntelligenceService } from './services/IntelligenceService';
export * from './services/intelligence/goalIntelligence';
export * from './services/intelligence/habitIntelligence';
export * from './services/intelligence/analytics';
export { generateInsights } from './services/intelligence/insights';
export type { ServiceRegistry } from './bootstrap/serviceBootstrap';
export type { Clock } from './utils/dates';

export interface LifePlannerOptions {
  /** Database file path or ':memory:'. Defaults to LIFEPLAN_DB_PATH, then ./data/lifeplan.db. */
  dbPath?: string;
  /** Source of the current time for stamping records and scoring. */
  now?: Clock;
}

export interface LifePlanner extends ServiceRegistry {
  close(): Promise<void>;
}

/**
 * Open (and migrate) the planner database and wire up the services.
 */
export async function createLifePlanner(options: LifePlannerOptions = {}): Promise<LifePlanner> {
  dotenv.config();

  const db = initDb(options.dbPath);
  runMigrations(db);
  const models = initModels(db);
  const services = await initializeServices({ db, models, clock: options.now });

  return {
    ...services,
    close: async () => {
      await cleanupServices(services);
      if (options.dbPath === undefined) {
        closeDb();
      } else if (db.open) {
        db.close();
      }
      logger.info('[LifePlanner] Closed.');
    },
  };
}
