import pg from 'pg';
import type { ClientBase, DatabaseError as PgDatabaseError, Pool as PgPool } from 'pg';
import type { Logger } from '../logging/logger.js';

const { Pool, DatabaseError } = pg;

/**
 * Anything that can run a query: a pooled client inside a transaction.
 */
export type Queryable = Pick<ClientBase, 'query'>;

/**
 * Creates the connection pool. Connections are opened lazily, so building a pool
 * with a bad URL only fails on first use.
 */
export function createPool(connectionString: string, logger: Logger): PgPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}

/**
 * Postgres unique_violation.
 */
export function isUniqueViolation(error: unknown): error is PgDatabaseError {
  return error instanceof DatabaseError && error.code === '23505';
}
