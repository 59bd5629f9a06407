import Database from 'better-sqlite3';
import { getDb } from './db';
import { logger } from '../utils/logger';
import { isUniqueConstraintError } from '../services/base/ServiceError';

/**
 * Base class for the store models, providing common database handling and error management
 */
export abstract class BaseModel {
  protected readonly db: Database.Database;
  protected abstract readonly modelName: string;

  constructor(db?: Database.Database) {
    this.db = db || getDb();
  }

  /**
   * Handle database errors consistently across all models
   * @param context - Description of the operation that failed
   * @throws Error with formatted message
   */
  protected handleDbError(error: unknown, context: string): never {
    const message = error instanceof Error ? error.message : 'Unknown database error';
    logger.error(`[${this.modelName}] DB error in ${context}: ${message}`, error);

    // Let the service layer map unique violations to conflicts
    if (isUniqueConstraintError(error)) {
      throw error;
    }

    throw new Error(`Database operation failed in ${context}: ${message}`);
  }
}
