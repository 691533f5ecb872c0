import type { Application, Request, Response } from 'express';
import type { Container } from '../../core/container.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import { createLogger } from '../../utils/logger.js';
import { createEncyclopediaRoutes } from './encyclopedia.js';
import { createHealthRoutes } from './health.js';
import { createLLMRoutes } from './llm.js';

const log = createLogger('Routes');

export const SERVICE_VERSION = '1.0.0';

/**
 * Setup all API routes for the gateway
 * @param urlPrefix - URL prefix for all routes, e.g. `/api/v1`
 */
export function setupRoutes(
  app: Application,
  urlPrefix: string,
  container: Container,
  healthMonitor: HealthMonitor
): void {
  const endpoints = {
    health: `${urlPrefix}/health`,
    upstreams: `${urlPrefix}/health/upstreams`,
    llama: `${urlPrefix}/llama`,
    encyclopedia: `${urlPrefix}/encyclopedia`,
  };

  app.use(endpoints.health, createHealthRoutes(healthMonitor, SERVICE_VERSION));
  const routeOptions = { requestTimeoutMs: container.config.server.requestTimeoutMs };
  app.use(endpoints.llama, createLLMRoutes(container.llm, routeOptions));
  app.use(endpoints.encyclopedia, createEncyclopediaRoutes(container.encyclopedia, routeOptions));

  const banner = (_req: Request, res: Response): void => {
    res.json({
      service: 'Encyclopedia Gateway',
      version: SERVICE_VERSION,
      status: 'running',
      description: 'LLM and encyclopedia gateway with parallel multi-source search',
      endpoints,
      timestamp: new Date().toISOString(),
    });
  };
  app.get('/', banner);
  if (urlPrefix) {
    app.get(urlPrefix, banner);
  }

  // 404 handler for undefined routes
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: `Route ${req.method} ${req.originalUrl} not found`,
      code: 'NOT_FOUND',
      availableEndpoints: Object.values(endpoints),
      timestamp: new Date().toISOString(),
    });
  });

  log.info('API routes configured', { urlPrefix: urlPrefix || '/' });
}
