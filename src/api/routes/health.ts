import { Router, type Request, type Response } from 'express';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import { asyncRoute } from './route-utils.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(healthMonitor: HealthMonitor, version: string): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (_req: Request, res: Response): Promise<void> => {
      const health = await healthMonitor.getServiceHealth();
      res.status(health.status === 'unhealthy' ? 503 : 200).json({
        service: 'encyclopedia-gateway',
        version,
        ...health,
      });
    })
  );

  /**
   * Reachability of the upstream LLM backend
   */
  router.get(
    '/upstreams',
    asyncRoute(async (_req: Request, res: Response): Promise<void> => {
      const report = await healthMonitor.checkUpstreams();
      res.status(report.status === 'unhealthy' ? 503 : 200).json(report);
    })
  );

  router.get('/live', (_req: Request, res: Response): void => {
    res.json({ status: 'alive', timestamp: new Date().toISOString(), uptime: process.uptime() });
  });

  return router;
}
