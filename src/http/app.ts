/**
 * Express application factory for the dashboard API.
 *
 * Separated from the listener so tests can build an app around a fake
 * host and serve it on an ephemeral port.
 *
 * Middleware stack, in order: helmet, cors, JSON bodies, request logging, the
 * unauthenticated health route, Basic auth on the rest of /api, routes,
 * the JSON 404, and the error handler last.
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { HostCapabilities } from '../capabilities/host-capabilities.js';
import { HealthManager } from '../health/index.js';
import type { Logger } from '../logger/index.js';
import type { StatsAggregator } from '../stats/aggregator.js';
import type { CredentialChecker } from './credentials.js';
import { createBasicAuthMiddleware } from './middleware/auth.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createRequestLogger } from './middleware/request-logger.js';
import { createHostRouter } from './routes/host.js';
import { createStatsRouter } from './routes/stats.js';

export interface AppDeps {
  capabilities: HostCapabilities;
  aggregator: StatsAggregator;
  health: HealthManager;
  logger: Logger;
  /** null disables authentication */
  credentials: CredentialChecker | null;
  realm: string;
  isProduction: boolean;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const logger = deps.logger.child({ component: 'http' });

  app.disable('x-powered-by');
  app.use(helmet());
  // Dashboard page and API share an origin
  app.use(cors({ origin: false }));
  app.use(express.json({ limit: '16kb' }));
  app.use(createRequestLogger(logger));

  app.get('/api/health', (_req, res, next) => {
    deps.health
      .check()
      .then((health) => {
        res.status(HealthManager.httpStatus(health)).json(health);
      })
      .catch(next);
  });

  if (deps.credentials) {
    app.use('/api', createBasicAuthMiddleware(deps.credentials, deps.realm, logger));
  }

  app.use('/api', createHostRouter({ capabilities: deps.capabilities }));
  app.use('/api', createStatsRouter({ aggregator: deps.aggregator }));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found', path: req.path });
  });

  app.use(createErrorHandler(logger, deps.isProduction));

  return app;
}
