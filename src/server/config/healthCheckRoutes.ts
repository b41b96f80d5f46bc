/**
 * Health Check Routes
 *
 * Liveness plus dependency checks for monitoring and container health probes.
 */

import type { Express } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { checkDatabaseHealth } from './database.js';
import { withTimeout, DEFAULT_TIMEOUTS } from '../utils/withTimeout.js';
import { logger } from '../utils/logger.js';
import type { SimilarityIndex } from '../vector/SimilarityIndex.js';

export interface ComponentHealth {
  healthy: boolean;
  latency?: number;
  error?: string;
}

export interface HealthCheckDependencies {
  similarityIndex: Pick<SimilarityIndex, 'isAvailable' | 'getName'>;
  checkDatabase?: () => Promise<ComponentHealth>;
}

/**
 * Check similarity index reachability within the health-check timeout
 */
export async function checkSimilarityIndexHealth(
  index: Pick<SimilarityIndex, 'isAvailable'>
): Promise<ComponentHealth> {
  const startTime = Date.now();
  try {
    const available = await withTimeout(index.isAvailable(), DEFAULT_TIMEOUTS.HEALTH_CHECK, 'Similarity index health check');
    return available
      ? { healthy: true, latency: Date.now() - startTime }
      : { healthy: false, error: 'Similarity index unreachable' };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn({ error: errorMessage }, 'Similarity index health check failed');
    return { healthy: false, error: errorMessage };
  }
}

export function setupHealthCheckRoutes(app: Express, deps: HealthCheckDependencies): void {
  const checkDatabase = deps.checkDatabase ?? (() => checkDatabaseHealth());

  app.get('/health', asyncHandler(async (_req, res) => {
    const [database, similarityIndex] = await Promise.all([
      checkDatabase(),
      checkSimilarityIndexHealth(deps.similarityIndex),
    ]);
    const healthy = database.healthy && similarityIndex.healthy;

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      components: {
        database,
        similarityIndex: { provider: deps.similarityIndex.getName(), ...similarityIndex },
      },
    });
  }));
}
