import type { StorageError } from './errors.js';
import type { Result } from './result.js';

/**
 * Returned when a computation succeeded but writing its outcome did not.
 *
 * The computed state travels with the error so the caller can show it, and `retry`
 * re-attempts only the write.
 */
export interface PersistenceFailure<T> {
  readonly error: StorageError;
  readonly state: T;
  retry(): Promise<Result<T, PersistenceFailure<T>>>;
}
