/**
 * Health Monitor
 *
 * Periodically checks every live adapter, logs a metrics overview and warns
 * about circuits that are not closed. One tick at a time: a tick still running
 * when the interval fires again is not overlapped.
 *
 * @module services/health-monitor
 */

import { logger, errorMessage } from '../utils/logger';
import { CircuitState } from '../utils/circuit-breaker';
import type { AdapterRegistry, HealthReport } from './integrations/adapter-registry';
import type { MetricsCollector } from './metrics';

export interface HealthMonitorOptions {
  registry: AdapterRegistry;
  metrics: MetricsCollector;
  intervalMs: number;
}

export class HealthMonitor {
  private readonly registry: AdapterRegistry;
  private readonly metrics: MetricsCollector;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;

  constructor(options: HealthMonitorOptions) {
    this.registry = options.registry;
    this.metrics = options.metrics;
    this.intervalMs = options.intervalMs;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        logger.error('Health monitor tick failed', { error: errorMessage(err) });
      });
    }, this.intervalMs);

    // Allow the process to exit even if the timer is still active
    this.timer.unref();

    logger.info('Health monitor started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Health monitor stopped');
    }
  }

  /**
   * One monitoring pass. Returns null when a previous pass is still running.
   */
  async tick(): Promise<HealthReport[] | null> {
    if (this.ticking) {
      return null;
    }
    this.ticking = true;

    try {
      const reports = await this.registry.healthCheckAll();
      const failing = reports.filter((report) => !report.healthy);
      if (failing.length > 0) {
        logger.warn('Integrations failed health check', { integrations: failing.map((r) => r.name) });
      }

      for (const runtime of this.registry.activeRuntimes()) {
        const snapshot = runtime.breaker.getSnapshot();
        if (snapshot.state !== CircuitState.CLOSED) {
          logger.warn('Circuit breaker not closed', {
            integrationId: runtime.config.id,
            integration: runtime.config.name,
            state: snapshot.state,
            failureCount: snapshot.failureCount,
          });
        }
      }

      const { global } = this.metrics.getSnapshot();
      logger.info('Integration metrics overview', {
        integrations: global.integrations,
        totalRequests: global.totalRequests,
        errorRate: Number(global.errorRate.toFixed(2)),
        averageResponseTimeMs: Math.round(global.averageResponseTimeMs),
        checked: reports.length,
        unhealthy: failing.length,
      });

      return reports;
    } finally {
      this.ticking = false;
    }
  }
}
