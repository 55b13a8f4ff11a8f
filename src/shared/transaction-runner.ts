/**
 * Transaction Runner Utility
 *
 * Reusable transaction wrapper that removes the connect/BEGIN/COMMIT/ROLLBACK
 * boilerplate from repositories.
 */

import type { PoolClient } from 'pg';

/**
 * Pool interface for dependency injection.
 */
export interface PoolLike {
  connect(): Promise<PoolClient>;
}

/**
 * Run a function within a database transaction.
 * Handles connect, BEGIN, COMMIT/ROLLBACK, and release automatically.
 *
 * @example
 * const result = await runInTransaction(pool, async (client) => {
 *   await client.query('UPDATE tournaments SET current_round = $1 WHERE id = $2', [2, id]);
 *   await client.query('UPDATE tournament_participants SET score = $1 WHERE ...', [...]);
 *   return { success: true };
 * });
 */
export async function runInTransaction<T>(
  pool: PoolLike,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
