import { Router } from 'express';
import type { Router as RouterType, Request, Response } from 'express';
import type { Container } from '../../container.js';
import { checkDatabaseHealth } from '../../database/client.js';
import { checkRedisHealth } from '../../database/redis.js';
import type { HealthStatus } from '../../types/index.js';

const VERSION = '1.0.0';
const startedAt = Date.now();

export function createHealthRoutes(container: Container): RouterType {
  const router: RouterType = Router();

  /**
   * GET /health
   * Postgres and Redis reachability, the providers this instance can connect
   * and the state of their circuits
   */
  router.get('/', async (_req: Request, res: Response) => {
    const [database, redis] = await Promise.all([checkDatabaseHealth(), checkRedisHealth()]);
    const reachable = [database, redis].filter((service) => service.status === 'connected').length;

    const health: HealthStatus = {
      status: reachable === 2 ? 'healthy' : reachable === 1 ? 'degraded' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: VERSION,
      services: { database, redis },
      providers: container.providers.listConfigured(),
      circuits: container.breakers.getStatuses(),
      uptime: Math.floor((Date.now() - startedAt) / 1000),
    };

    res.status(health.status === 'healthy' ? 200 : 503).json(health);
  });

  /**
   * GET /health/live
   */
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'alive', timestamp: new Date().toISOString() });
  });

  return router;
}
