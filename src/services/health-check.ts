/**
 * Service Health Check
 *
 * Reports on the service's own dependencies: the integration store and the
 * live adapters' circuit breakers.
 *
 * @module services/health-check
 */

import { errorMessage } from '../utils/logger';
import { CircuitState } from '../utils/circuit-breaker';
import type { IntegrationStore } from './integration-store';
import type { AdapterRegistry } from './integrations/adapter-registry';

export type HealthLevel = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthLevel;
  message: string;
  latencyMs?: number;
  details?: Record<string, unknown>;
}

export interface HealthStatus {
  status: HealthLevel;
  timestamp: number;
  checks: {
    storage: ComponentHealth;
    integrations: ComponentHealth;
  };
  overall: Record<HealthLevel, number>;
}

export interface HealthDependencies {
  store: IntegrationStore;
  registry: AdapterRegistry;
}

/**
 * Check the integration store
 */
async function checkStorageHealth(store: IntegrationStore): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    const reachable = await store.ping();
    const latencyMs = Date.now() - start;

    if (!reachable) {
      return { status: 'unhealthy', message: 'Integration store unreachable', latencyMs, details: { backend: store.backend } };
    }

    if (store.backend === 'memory') {
      return {
        status: 'degraded',
        message: 'Using in-memory store (state is lost on restart)',
        latencyMs,
        details: { backend: store.backend }
      };
    }

    return { status: 'healthy', message: 'Redis connected and operational', latencyMs, details: { backend: store.backend } };
  } catch (error) {
    return {
      status: 'unhealthy',
      message: `Storage check failed: ${errorMessage(error)}`,
      latencyMs: Date.now() - start
    };
  }
}

/**
 * Summarize live adapters. Never calls remotes; the health monitor does that.
 */
function checkIntegrationsHealth(registry: AdapterRegistry): ComponentHealth {
  const runtimes = registry.activeRuntimes();
  const openCircuits = runtimes
    .filter((runtime) => runtime.breaker.getState() !== CircuitState.CLOSED)
    .map((runtime) => runtime.config.name);
  const unhealthy = runtimes.filter((runtime) => !runtime.config.healthy).map((runtime) => runtime.config.name);

  const details = { active: runtimes.length, openCircuits, unhealthy };

  if (runtimes.length > 0 && openCircuits.length === runtimes.length) {
    return { status: 'unhealthy', message: 'Every active integration has an open circuit', details };
  }
  if (openCircuits.length > 0 || unhealthy.length > 0) {
    return { status: 'degraded', message: 'Some integrations are failing', details };
  }
  return { status: 'healthy', message: `${runtimes.length} active integrations`, details };
}

/**
 * Perform the full health check
 */
export async function performHealthCheck(deps: HealthDependencies): Promise<HealthStatus> {
  const checks = {
    storage: await checkStorageHealth(deps.store),
    integrations: checkIntegrationsHealth(deps.registry)
  };

  const overall: Record<HealthLevel, number> = { healthy: 0, degraded: 0, unhealthy: 0 };
  for (const check of Object.values(checks)) {
    overall[check.status]++;
  }

  let status: HealthLevel = 'healthy';
  if (checks.storage.status === 'unhealthy') {
    status = 'unhealthy';
  } else if (overall.unhealthy > 0 || overall.degraded > 0) {
    status = 'degraded';
  }

  return { status, timestamp: Date.now(), checks, overall };
}
