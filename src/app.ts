import cors from 'cors';
import express, { type Express } from 'express';
import { setupRoutes } from './api/routes/index.js';
import type { Container } from './core/container.js';
import { requestLogger } from './middleware/request-logger.js';
import { ErrorHandler } from './monitoring/error-handler.js';
import { HealthMonitor } from './monitoring/health-monitor.js';

export interface GatewayApp {
  app: Express;
  errorHandler: ErrorHandler;
  healthMonitor: HealthMonitor;
}

export function createApp(container: Container): GatewayApp {
  const app = express();
  const errorHandler = new ErrorHandler();
  const healthMonitor = new HealthMonitor(container.cache, errorHandler, [container.llm]);

  app.disable('x-powered-by');
  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Origin', 'Content-Type', 'Accept', 'Authorization'],
      optionsSuccessStatus: 204,
    })
  );
  app.use(requestLogger());
  app.use(express.json({ limit: '10mb' }));

  setupRoutes(app, container.config.server.urlPrefix, container, healthMonitor);

  // Error handling middleware (must be last)
  app.use(errorHandler.middleware());

  return { app, errorHandler, healthMonitor };
}
