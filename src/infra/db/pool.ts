import pg from 'pg';
import { logger as sharedLogger, type Logger } from '../logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

export function createPool(connectionString: string | undefined, logger: Logger = sharedLogger): DbPool {
  // Do not throw here: a missing URL surfaces on first query
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
    logger.error('Unexpected database error', { err });
  });

  return pool;
}
