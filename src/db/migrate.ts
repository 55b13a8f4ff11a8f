import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';
import { runInTransaction } from '../shared/transaction-runner';

const pool = new Pool(getDatabaseConfig());

const MIGRATIONS_TABLE = 'migrations';

async function ensureMigrationsTable() {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      run_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(): Promise<Set<string>> {
  const res = await pool.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE};`);
  return new Set(res.rows.map((row) => row.name));
}

function getMigrationsDir(): string {
  return path.join(__dirname, '..', '..', 'migrations');
}

function loadMigrationFiles(): string[] {
  const migrationsDir = getMigrationsDir();

  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && /^\d+_/.test(file))
    .sort();
}

async function runMigrationFile(fileName: string) {
  const sql = fs.readFileSync(path.join(getMigrationsDir(), fileName), 'utf8');

  logger.info(`Running migration: ${fileName}`);
  await runInTransaction(pool, async (client) => {
    await client.query(sql);
    await client.query(
      `INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1) ON CONFLICT (name) DO NOTHING;`,
      [fileName]
    );
  });
  logger.info(`Migration completed: ${fileName}`);
}

async function runMigrations() {
  try {
    await ensureMigrationsTable();

    const applied = await getAppliedMigrations();
    const files = loadMigrationFiles();
    logger.info(`Found ${files.length} migration(s), ${applied.size} already applied`);

    for (const file of files) {
      if (applied.has(file)) {
        continue;
      }
      await runMigrationFile(file);
    }

    logger.info('All migrations completed');
  } finally {
    await pool.end();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('Migration process failed', {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
