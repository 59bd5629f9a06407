import type { ServiceError } from '../services/base/ServiceError';
import type { StoreResult } from '../shared/types';

/**
 * Unwrap a successful write, rethrowing the carried error otherwise.
 */
export function expectSuccess<T>(result: StoreResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

export function expectFailure<T>(result: StoreResult<T>): ServiceError {
  if (result.success) {
    throw new Error('Expected the write to fail');
  }
  return result.error;
}
