import { logger } from '../../utils/logger';
import type Database from 'better-sqlite3';
import type { StoreResult } from '../../shared/types/store.types';
import { toServiceError } from './ServiceError';

/**
 * Abstract base class for all services in the planner.
 * Provides common functionality like logging, error handling, and lifecycle management.
 */
export abstract class BaseService<TDeps = {}> {
  protected readonly logger = logger;
  protected readonly serviceName: string;
  protected readonly deps: TDeps;

  constructor(serviceName: string, deps: TDeps) {
    this.serviceName = serviceName;
    this.deps = deps;
  }

  /**
   * Initialize the service. Override this method to perform any async initialization.
   * Called during bootstrap.
   */
  async initialize(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Cleanup resources used by the service. Override this method to perform cleanup.
   * Called on close.
   */
  async cleanup(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Health check for the service. Override to implement custom health checks.
   * @returns true if the service is healthy, false otherwise
   */
  async healthCheck(): Promise<boolean> {
    return true;
  }

  /**
   * Execute an async operation with automatic logging and error handling.
   * @param operation The operation name for logging
   * @param fn The async function to execute
   * @param context Optional context object for logging
   */
  protected async execute<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const startTime = Date.now();
    const logContext = context ? `, context: ${JSON.stringify(context)}` : '';

    this.logger.debug(`[${this.serviceName}] ${operation} started${logContext}`);

    try {
      const result = await fn();
      const duration = Date.now() - startTime;

      this.logger.debug(`[${this.serviceName}] ${operation} completed in ${duration}ms`);

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      this.logger.error(`[${this.serviceName}] ${operation} failed after ${duration}ms:`, error);
      throw error;
    }
  }

  /**
   * Like `execute`, but for writes: the outcome is reported as a StoreResult
   * instead of a rejection. Anything thrown is normalized to a ServiceError.
   * @param resource Entity name used in conflict messages
   */
  protected async executeWrite<T>(
    operation: string,
    resource: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<StoreResult<T>> {
    try {
      const data = await this.execute(operation, fn, context);
      return { success: true, data };
    } catch (error) {
      return { success: false, error: toServiceError(error, operation, resource) };
    }
  }

  /**
   * Log an info message with service context
   */
  protected logInfo(message: string, ...args: unknown[]): void {
    this.logger.info(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Log a debug message with service context
   */
  protected logDebug(message: string, ...args: unknown[]): void {
    this.logger.debug(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Log a warning message with service context
   */
  protected logWarn(message: string, ...args: unknown[]): void {
    this.logger.warn(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Log an error message with service context
   */
  protected logError(message: string, error?: unknown, ...args: unknown[]): void {
    if (error) {
      this.logger.error(`[${this.serviceName}] ${message}`, error, ...args);
    } else {
      this.logger.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  /**
   * Execute a function within a database transaction.
   * Note: The callback MUST be synchronous as better-sqlite3 doesn't support async transactions.
   * @param db The database instance
   * @param fn The synchronous function to execute within the transaction
   * @returns The result of the function
   */
  protected withTransaction<T>(
    db: Database.Database,
    fn: () => T
  ): T {
    const transaction = db.transaction(fn);

    try {
      const result = transaction();
      this.logDebug('Transaction completed successfully');
      return result;
    } catch (error) {
      this.logError('Transaction failed:', error);
      throw error;
    }
  }
}
