import type { ServiceError } from '../../services/base/ServiceError';

/**
 * Outcome of a store write. Failed writes leave prior state untouched and
 * carry the reason instead of throwing.
 */
export type StoreResult<TData> =
  | { success: true; data: TData }
  | { success: false; error: ServiceError };

