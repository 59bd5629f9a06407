/**
 * Base interface for all services
 */
export interface IService {
  /**
   * Initialize the service during bootstrap
   */
  initialize(): Promise<void>;

  /**
   * Cleanup resources before the database is closed
   */
  cleanup(): Promise<void>;

  /**
   * Check if the service is healthy
   */
  healthCheck(): Promise<boolean>;
}
