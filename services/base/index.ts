/**
 * Base service infrastructure exports
 */

export { BaseService } from './BaseService';

export {
  ServiceError,
  NotFoundError,
  ValidationError,
  DatabaseError,
  ConflictError,
  isUniqueConstraintError,
  toServiceError,
} from './ServiceError';
