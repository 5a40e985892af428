import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { Pool } from 'pg';
import dotenv from 'dotenv';
import { createPool } from './pool.js';
import { createLogger, type Logger } from '../logging/logger.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

export async function getMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
  const sqlFiles = files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);

  return sqlFiles;
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(
  pool: Pool,
  logger: Logger,
  migration: Migration
): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    logger.info({ version: migration.version }, `Applied migration ${migration.filename}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Applies every pending migration, each in its own transaction.
 */
export async function migrate(pool: Pool, logger: Logger): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations();
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));

  if (pending.length === 0) {
    logger.info('No pending migrations.');
    return 0;
  }

  logger.info(`Found ${pending.length} pending migration(s)`);

  for (const migration of pending) {
    await applyMigration(pool, logger, migration);
  }

  return pending.length;
}

async function main(): Promise<void> {
  dotenv.config();
  const logger = createLogger({ level: process.env.LOG_LEVEL === 'debug' ? 'debug' : 'info' });
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.fatal('DATABASE_URL environment variable is required');
    process.exit(1);
  }

  const pool = createPool(databaseUrl, logger);
  try {
    await migrate(pool, logger);
    logger.info('All migrations applied successfully.');
  } catch (error) {
    logger.fatal({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, '/'))) {
  void main();
}
