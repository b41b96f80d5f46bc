import { MongoClient, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../utils/logger.js';
import { withTimeout, DEFAULT_TIMEOUTS } from '../utils/withTimeout.js';
import { getEnv } from './env.js';

// Re-export Db type for use in other modules
export type { Db };

let client: MongoClient | null = null;
let db: Db | null = null;

/**
 * Mask credentials in a connection string before it reaches the logs
 */
export function maskMongoUri(uri: string): string {
  return uri.replace(/:\/\/([^:@/]+):([^@]+)@/, '://$1:****@');
}

/**
 * Connect to MongoDB and cache the database handle.
 * Calling it again while connected returns the cached handle.
 */
export async function connectDB(): Promise<Db> {
  if (db) {
    return db;
  }

  const env = getEnv();
  const clientOptions: MongoClientOptions = {
    maxPoolSize: env.DB_MAX_POOL_SIZE,
    serverSelectionTimeoutMS: env.DB_SERVER_SELECTION_TIMEOUT_MS,
    retryWrites: true,
  };

  const newClient = new MongoClient(env.MONGODB_URI, clientOptions);
  try {
    await newClient.connect();
  } catch (error) {
    logger.error({ error, uri: maskMongoUri(env.MONGODB_URI) }, 'Failed to connect to MongoDB');
    await newClient.close().catch((closeError: unknown) => {
      logger.debug({ error: closeError }, 'Error closing MongoDB client after failed connect');
    });
    throw error;
  }

  client = newClient;
  db = newClient.db(env.DB_NAME);
  logger.info({ dbName: env.DB_NAME, uri: maskMongoUri(env.MONGODB_URI) }, 'Connected to MongoDB');
  return db;
}

/**
 * Get database instance
 *
 * @throws {Error} If database is not initialized. Call connectDB() first.
 */
export function getDB(): Db {
  if (!db) {
    throw new Error('Database not initialized. Call connectDB() first.');
  }
  return db;
}

export async function closeDB(): Promise<void> {
  try {
    if (client) {
      await client.close();
    }
    logger.info('MongoDB connection closed');
  } catch (error) {
    logger.error({ error }, 'Error closing MongoDB connection');
    throw error;
  } finally {
    client = null;
    db = null;
  }
}

/**
 * Check database health by performing a ping
 */
export async function checkDatabaseHealth(
  timeoutMs: number = DEFAULT_TIMEOUTS.HEALTH_CHECK
): Promise<{ healthy: boolean; latency?: number; error?: string }> {
  if (!db) {
    return { healthy: false, error: 'Database not initialized' };
  }

  const startTime = Date.now();
  try {
    await withTimeout(db.command({ ping: 1 }), timeoutMs, 'MongoDB health check');
    return { healthy: true, latency: Date.now() - startTime };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn({ error: errorMessage }, 'Database health check failed');
    return { healthy: false, error: errorMessage };
  }
}
