import type { Server } from 'node:http';
import type { ICache } from '../utils/cache-layer.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { HealthMonitor } from './health-monitor.js';

const log = createLogger('GracefulShutdown');

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  cleanupTasks: Array<() => Promise<void>>;
  exit: (code: number) => void;
}

export class GracefulShutdown {
  private isShuttingDown = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private options: ShutdownOptions;

  constructor(
    private readonly server: Server,
    private readonly cache: ICache,
    private readonly healthMonitor: HealthMonitor,
    options: Partial<ShutdownOptions> = {}
  ) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      cleanupTasks: [],
      exit: (code) => process.exit(code),
      ...options,
    };
  }

  /**
   * Register process signal handlers. Separate from construction so tests
   * can drive `shutdown` directly.
   */
  install(): void {
    process.on('SIGTERM', () => {
      log.info('Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });

    process.on('SIGINT', () => {
      log.info('Received SIGINT signal');
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      log.error('Uncaught exception', { error: describeError(error), stack: error.stack });
      void this.shutdown('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      log.error('Unhandled rejection', { reason: describeError(reason) });
      void this.shutdown('unhandledRejection', reason);
    });
  }

  addCleanupTask(task: () => Promise<void>): void {
    this.options.cleanupTasks.push(task);
  }

  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      log.info(`Shutdown already in progress, ignoring ${signal}`);
      return;
    }

    this.isShuttingDown = true;
    log.info(`Initiating graceful shutdown due to: ${signal}`);

    this.shutdownTimeout = setTimeout(() => {
      log.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    try {
      // 1. Stop accepting new requests and let in-flight ones finish
      await this.closeServer();

      // 2. Release the cache backend
      await this.cache.close();
      log.info('Cache closed');

      // 3. Custom cleanup tasks
      await this.executeCleanupTasks();

      const finalHealth = this.healthMonitor.getHealthMetrics();
      log.info('Graceful shutdown completed', { uptimeSeconds: finalHealth.uptimeSeconds });

      this.clearShutdownTimeout();
      this.options.exit(error === undefined ? 0 : 1);
    } catch (shutdownError) {
      log.error('Error during graceful shutdown', { error: describeError(shutdownError) });
      this.clearShutdownTimeout();
      this.options.exit(1);
    }
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }

  private closeServer(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((closeError) => {
        if (closeError) {
          reject(closeError);
          return;
        }
        log.info('HTTP server closed');
        resolve();
      });
    });
  }

  private async executeCleanupTasks(): Promise<void> {
    const tasks = this.options.cleanupTasks;

    for (let i = 0; i < tasks.length; i++) {
      try {
        await tasks[i]();
        log.info(`Cleanup task ${i + 1}/${tasks.length} completed`);
      } catch (error) {
        // Remaining tasks still run
        log.error(`Cleanup task ${i + 1} failed`, { error: describeError(error) });
      }
    }
  }

  private clearShutdownTimeout(): void {
    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }
  }
}
