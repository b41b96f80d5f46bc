import express from 'express';
import type { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { Env } from './config/env.js';
import { getCorsOptions } from './config/corsConfig.js';
import { setupHealthCheckRoutes } from './config/healthCheckRoutes.js';
import type { HealthCheckDependencies } from './config/healthCheckRoutes.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createQaRouter } from './routes/qaRoutes.js';
import type { QaRouterDeps } from './routes/qaRoutes.js';

export interface AppDependencies {
  env: Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV' | 'JWT_SECRET'>;
  orchestrator: QaRouterDeps['orchestrator'];
  similaritySearch: QaRouterDeps['similaritySearch'];
  health: HealthCheckDependencies;
}

/**
 * Assemble the Express application. Does not listen.
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors(getCorsOptions(deps.env)));
  app.use(express.json({ limit: '100kb' }));
  app.use(requestIdMiddleware);
  app.use('/api', apiLimiter);

  setupHealthCheckRoutes(app, deps.health);
  app.use(
    '/api/ai',
    createQaRouter({
      orchestrator: deps.orchestrator,
      similaritySearch: deps.similaritySearch,
      jwtSecret: deps.env.JWT_SECRET,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
