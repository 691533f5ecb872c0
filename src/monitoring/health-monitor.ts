import type { UpstreamHealth } from '../types/index.js';
import type { ICache } from '../utils/cache-layer.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ErrorHandler, ErrorStats } from './error-handler.js';

const log = createLogger('HealthMonitor');

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthMetrics {
  status: HealthStatus;
  timestamp: string;
  uptimeSeconds: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  issues: string[];
}

export interface ServiceHealth extends HealthMetrics {
  cache: Record<string, number> | { error: string };
  errors: Omit<ErrorStats, 'recent'>;
}

export interface UpstreamReport {
  status: HealthStatus;
  timestamp: string;
  upstreams: UpstreamHealth[];
}

/** Anything whose reachability can be probed. */
export interface HealthCheckable {
  checkHealth(): Promise<UpstreamHealth>;
}

export class HealthMonitor {
  private startTime: number;
  private memoryThreshold = 0.9;

  constructor(
    private readonly cache: ICache,
    private readonly errorHandler: ErrorHandler,
    private readonly upstreams: readonly HealthCheckable[] = []
  ) {
    this.startTime = Date.now();
  }

  getHealthMetrics(): HealthMetrics {
    const memory = this.getMemoryUsageMB();
    const issues: string[] = [];
    if (memory.percentage > this.memoryThreshold) {
      issues.push(`High memory usage: ${(memory.percentage * 100).toFixed(1)}%`);
    }

    return {
      status: issues.length === 0 ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      memory,
      issues,
    };
  }

  /**
   * Process metrics plus cache and error statistics. A cache that cannot
   * report its stats marks the service degraded.
   */
  async getServiceHealth(): Promise<ServiceHealth> {
    const metrics = this.getHealthMetrics();
    const { total, byCode } = this.errorHandler.getErrorStats();

    try {
      const cache = await this.cache.getStats();
      return { ...metrics, cache, errors: { total, byCode } };
    } catch (error) {
      const message = describeError(error);
      log.warn('cache stats unavailable', { error: message });
      return {
        ...metrics,
        status: 'degraded',
        issues: [...metrics.issues, `Cache unavailable: ${message}`],
        cache: { error: message },
        errors: { total, byCode },
      };
    }
  }

  async checkUpstreams(): Promise<UpstreamReport> {
    const upstreams = await Promise.all(this.upstreams.map((upstream) => upstream.checkHealth()));
    const reachable = upstreams.filter((upstream) => upstream.reachable).length;

    let status: HealthStatus = 'healthy';
    if (reachable === 0 && upstreams.length > 0) {
      status = 'unhealthy';
    } else if (reachable < upstreams.length) {
      status = 'degraded';
    }
    return { status, timestamp: new Date().toISOString(), upstreams };
  }

  getMemoryUsageMB(): { used: number; total: number; percentage: number } {
    const memoryUsage = process.memoryUsage();
    return {
      used: Math.round(memoryUsage.heapUsed / 1024 / 1024),
      total: Math.round(memoryUsage.heapTotal / 1024 / 1024),
      percentage: memoryUsage.heapUsed / memoryUsage.heapTotal,
    };
  }
}
