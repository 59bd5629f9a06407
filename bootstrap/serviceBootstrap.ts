import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import type { IService } from '../services/interfaces';
import type { Clock } from '../utils/dates';
import type { ModelRegistry } from './modelBootstrap';
import { GoalService } from '../services/GoalService';
import { HabitService } from '../services/HabitService';
import { JournalService } from '../services/JournalService';
import { AssessmentService } from '../services/AssessmentService';
import { ProfileService } from '../services/ProfileService';
import { IntelligenceService } from '../services/IntelligenceService';

/**
 * Service registry for the planner
 */
export interface ServiceRegistry {
  goals: GoalService;
  habits: HabitService;
  journal: JournalService;
  assessments: AssessmentService;
  profile: ProfileService;
  intelligence: IntelligenceService;
}

/**
 * Dependencies required to initialize services
 */
export interface ServiceInitDependencies {
  db: Database.Database;
  models: ModelRegistry;
  clock?: Clock;
}

/**
 * Create a service and run its initialize hook with consistent logging
 */
async function createService<T extends IService>(name: string, create: () => T): Promise<T> {
  logger.info(`[ServiceBootstrap] Creating ${name}...`);
  const service = create();
  await service.initialize();
  logger.info(`[ServiceBootstrap] ${name} initialized`);
  return service;
}

export async function initializeServices({ db, models, clock }: ServiceInitDependencies): Promise<ServiceRegistry> {
  logger.info('[ServiceBootstrap] Initializing services...');

  try {
    const registry: ServiceRegistry = {
      goals: await createService('GoalService', () =>
        new GoalService({ db, goalModel: models.goalModel, clock })),
      habits: await createService('HabitService', () =>
        new HabitService({
          db,
          habitModel: models.habitModel,
          habitCompletionModel: models.habitCompletionModel,
          clock,
        })),
      journal: await createService('JournalService', () =>
        new JournalService({ dailyEntryModel: models.dailyEntryModel, clock })),
      assessments: await createService('AssessmentService', () =>
        new AssessmentService({ lifeAssessmentModel: models.lifeAssessmentModel, clock })),
      profile: await createService('ProfileService', () =>
        new ProfileService({ userProfileModel: models.userProfileModel, clock })),
      intelligence: await createService('IntelligenceService', () =>
        new IntelligenceService({
          goalModel: models.goalModel,
          habitModel: models.habitModel,
          habitCompletionModel: models.habitCompletionModel,
          dailyEntryModel: models.dailyEntryModel,
          lifeAssessmentModel: models.lifeAssessmentModel,
          clock,
        })),
    };

    logger.info('[ServiceBootstrap] All services initialized.');
    return registry;
  } catch (error) {
    logger.error('[ServiceBootstrap] Failed to initialize services:', error);
    throw error;
  }
}

/**
 * Cleanup all services in the registry, dependents first
 */
export async function cleanupServices(registry: ServiceRegistry): Promise<void> {
  logger.info('[ServiceBootstrap] Starting service cleanup...');

  const servicesToCleanup: IService[] = [
    registry.intelligence,
    registry.profile,
    registry.assessments,
    registry.journal,
    registry.habits,
    registry.goals,
  ];

  for (const service of servicesToCleanup) {
    try {
      await service.cleanup();
      logger.debug(`[ServiceBootstrap] Cleaned up ${service.constructor.name}`);
    } catch (error) {
      logger.error(`[ServiceBootstrap] Failed to cleanup ${service.constructor.name}:`, error);
    }
  }

  logger.info('[ServiceBootstrap] Service cleanup completed');
}
