import { logger } from '../config/logger.config';
import { AppException, DatabaseException } from './exceptions';

/**
 * Wraps a database operation and converts raw database errors to sanitized DatabaseException.
 * Logs the original error for debugging while returning a safe message to clients.
 *
 * @param operation - Description of the operation for logging
 * @param fn - The async function to execute
 * @throws DatabaseException if the operation fails with a non-application error
 */
export async function withDbErrorHandling<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    // Already translated (conflicts, not-found, corrupt data): rethrow as-is
    if (error instanceof AppException) {
      throw error;
    }

    logger.error(`Database error during ${operation}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    throw DatabaseException.fromError(error, operation);
  }
}

/**
 * PostgreSQL unique_violation (SQLSTATE 23505)
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === '23505'
  );
}
