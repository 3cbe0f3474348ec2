import pg from 'pg';
import type { Logger } from '../logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

/**
 * Bind a connection pool to the configured connection string.
 * Nothing is checked here: the first query surfaces any connection fault.
 */
export function createPool(connectionString: string, logger: Logger): DbPool {
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
