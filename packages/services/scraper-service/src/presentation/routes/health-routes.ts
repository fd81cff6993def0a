/**
 * Health Routes
 *
 * - GET /health - scheduler, worker pool and database status
 * - GET /health/live - liveness check
 */

import { Router } from 'express';
import { serializeError, type SchedulerHealthReport } from '@songharvest/platform-core';
import type { SongWorkerPool } from '../../application/services/SongWorkerPool';
import { getLogger } from '../../config/logger';

const logger = getLogger('scraper-service:health');

export interface HealthRouteDeps {
  serviceName: string;
  version: string;
  schedulers: { getHealthReport(): SchedulerHealthReport };
  pool: SongWorkerPool;
  checkDatabase?: () => Promise<void>;
}

export function createHealthRoutes(deps: HealthRouteDeps): Router {
  const router = Router();
  const startTime = Date.now();
  const uptime = () => Math.floor((Date.now() - startTime) / 1000);

  router.get('/health/live', (_req, res) => {
    res.status(200).json({ alive: true, service: deps.serviceName, uptime: uptime() });
  });

  router.get('/health', (_req, res, next) => {
    const database = async (): Promise<{ healthy: boolean; message?: string }> => {
      if (!deps.checkDatabase) return { healthy: true, message: 'not configured' };
      try {
        await deps.checkDatabase();
        return { healthy: true };
      } catch (error) {
        logger.warn('Database health check failed', { error: serializeError(error) });
        return { healthy: false, message: error instanceof Error ? error.message : 'Connection failed' };
      }
    };

    database()
      .then(db => {
        const schedulers = deps.schedulers.getHealthReport();
        const healthy = db.healthy && schedulers.healthy;
        res.status(healthy ? 200 : 503).json({
          status: healthy ? 'healthy' : 'degraded',
          service: deps.serviceName,
          version: deps.version,
          uptime: uptime(),
          database: db,
          schedulers,
          workers: {
            concurrency: deps.pool.concurrency,
            active: deps.pool.activeCount,
            pending: deps.pool.pendingCount,
          },
        });
      })
      .catch(next);
  });

  return router;
}
