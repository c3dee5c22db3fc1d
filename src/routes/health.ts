import { Router, Request, Response } from 'express';

import { getDatabaseStatus } from '../config/database';
import { isRedisConnected } from '../config/redis';

export interface HealthChecks {
  database: () => boolean;
  redis: () => boolean;
  gatewayConfigured: () => boolean;
}

export const defaultHealthChecks = (gatewayConfigured: () => boolean): HealthChecks => ({
  database: () => getDatabaseStatus().connected,
  redis: isRedisConnected,
  gatewayConfigured,
});

/**
 * The ledger needs its database; Redis only backs rate limits and
 * idempotency replay, and the gateway only deposits, so both are reported
 * without failing the check.
 */
export const createHealthRoutes = (checks: HealthChecks): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const database = checks.database();
    const redis = checks.redis();

    const isHealthy = database;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? (redis ? 'healthy' : 'degraded') : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: { connected: database },
        redis: { connected: redis },
        stripe: { configured: checks.gatewayConfigured() },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = checks.database();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
