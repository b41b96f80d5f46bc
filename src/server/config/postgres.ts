/**
 * PostgreSQL Connection Configuration
 *
 * Manages the connection pool used by the pgvector similarity index.
 */

import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import { validateEnv } from './env.js';
import { logger } from '../utils/logger.js';

let pool: Pool | null = null;

/**
 * Get PostgreSQL connection pool
 *
 * Creates a singleton pool instance if it doesn't exist.
 */
export function getPostgresPool(): Pool {
  if (pool) {
    return pool;
  }

  const env = validateEnv();

  const config: PoolConfig = {
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    database: env.POSTGRES_DB,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    max: parseInt(process.env.POSTGRES_POOL_MAX || '10', 10),
    idleTimeoutMillis: parseInt(process.env.POSTGRES_POOL_IDLE_TIMEOUT || '30000', 10),
    connectionTimeoutMillis: parseInt(process.env.POSTGRES_POOL_CONNECTION_TIMEOUT || '10000', 10),
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,
  };

  pool = new Pool(config);

  pool.on('error', (err) => {
    logger.error({ error: err }, 'Unexpected error on idle PostgreSQL client');
  });

  pool.on('connect', () => {
    logger.debug('PostgreSQL client connected to pool');
  });

  logger.info(
    { host: env.POSTGRES_HOST, port: env.POSTGRES_PORT, database: env.POSTGRES_DB },
    'PostgreSQL connection pool created'
  );

  return pool;
}

/**
 * Close PostgreSQL connection pool
 *
 * Should be called during application shutdown.
 */
export async function closePostgresPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('PostgreSQL connection pool closed');
  }
}

/**
 * Execute a parameterized query against the shared pool
 *
 * @param text - SQL query text
 * @param params - Query parameters
 */
export async function queryPostgres<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const startTime = Date.now();
  try {
    const result = await getPostgresPool().query<T>(text, params);
    logger.debug({ duration: Date.now() - startTime, rowCount: result.rowCount }, 'PostgreSQL query completed');
    return result.rows;
  } catch (error) {
    logger.error(
      { error: error instanceof Error ? error.message : String(error), duration: Date.now() - startTime },
      'PostgreSQL query failed'
    );
    throw error;
  }
}
