import { PoolConfig } from 'pg';
import { env } from './env.config';

export function getDatabaseConfig(): PoolConfig {
  const config: PoolConfig = {
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_SIZE,
    idleTimeoutMillis: 30000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
  };

  if (env.NODE_ENV === 'production') {
    config.ssl = {
      rejectUnauthorized: process.env.DATABASE_SSL_REJECT_UNAUTHORIZED === 'true',
    };
  }

  return config;
}
