import dotenv from 'dotenv';
import { createApp } from './src/app.js';
import { loadConfig } from './src/config/index.js';
import { buildContainer } from './src/core/container.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { describeError } from './src/utils/errors.js';
import { createLogger, setLogLevel } from './src/utils/logger.js';

dotenv.config();

const log = createLogger('Gateway');

function startService(): void {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  log.info('🚀 Starting Encyclopedia Gateway...');
  log.info(`Environment: ${config.server.nodeEnv}`);
  log.info(`LLM backend: ${config.llm.baseUrl} (default model ${config.llm.defaultModel})`);

  const container = buildContainer(config);
  const { app, healthMonitor } = createApp(container);

  const server = app.listen(config.server.port, config.server.host, () => {
    log.info(`🌐 Gateway listening on ${config.server.host}:${config.server.port}`);
    log.info(`📡 API endpoints available at: http://localhost:${config.server.port}${config.server.urlPrefix}`);
  });

  const gracefulShutdown = new GracefulShutdown(server, container.cache, healthMonitor, {
    timeout: config.server.shutdownTimeoutMs,
  });
  gracefulShutdown.install();
}

try {
  startService();
} catch (error) {
  log.error('❌ Failed to start service', { error: describeError(error) });
  process.exit(1);
}
