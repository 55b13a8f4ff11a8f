import { Pool } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';

// Create database connection pool
export const pool = new Pool(getDatabaseConfig());

export function getPoolMetrics() {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}

pool.on('connect', () => {
  logger.debug('Database client connected');
});

pool.on('error', (err) => {
  logger.error('Unexpected database error', { error: err.message });
});

export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    const result = await pool.query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows[0]?.health_check === 1;
  } catch (error) {
    logger.error('Database health check failed', { error: String(error) });
    return false;
  }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
  pool.removeAllListeners();
  await pool.end();
  logger.info('Database pool closed');
}
