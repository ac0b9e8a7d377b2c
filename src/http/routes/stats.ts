/**
 * Dashboard statistics endpoints:
 *   - GET /stats                           : aggregated host statistics
 *   - GET /containers                      : container runtime stats
 *   - GET /container/logs?container=NAME   : tail of one container's log
 *   - POST /container/:action              : start, stop or restart the container named in the body
 */

import { Router } from 'express';
import { z } from 'zod';
import type { StatsAggregator } from '../../stats/aggregator.js';
import { CONTAINER_ACTIONS } from '../../stats/containers.js';
import { jsonRoute } from '../json-route.js';

const MAX_LOG_LINES = 10000;

const LogsQuerySchema = z.object({
  container: z.string().min(1),
  lines: z.coerce.number().int().min(1).max(MAX_LOG_LINES).optional(),
});

const ControlParamsSchema = z.object({ action: z.enum(CONTAINER_ACTIONS) });
const ControlBodySchema = z.object({ container: z.string().min(1) });

export interface StatsRouterDeps {
  aggregator: StatsAggregator;
}

export function createStatsRouter(deps: StatsRouterDeps): Router {
  const { aggregator } = deps;
  const router = Router();

  router.get(
    '/stats',
    jsonRoute(() => aggregator.collect())
  );

  router.get(
    '/containers',
    jsonRoute(() => aggregator.containerStats())
  );

  router.get(
    '/container/logs',
    jsonRoute(async (req) => {
      const query = LogsQuerySchema.parse(req.query);
      return aggregator.containerLogs(query.container, query.lines);
    })
  );

  router.post(
    '/container/:action',
    jsonRoute(async (req) => {
      const { action } = ControlParamsSchema.parse(req.params);
      const { container } = ControlBodySchema.parse(req.body);
      return aggregator.controlContainer(container, action);
    })
  );

  return router;
}
