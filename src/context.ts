/**
 * Application context
 *
 * Builds and owns every long-lived service. Nothing here runs at import time;
 * the hosting process calls `init()` and `shutdown()`.
 */

import { config as defaultConfig } from './config/env';
import { logger } from './utils/logger';
import { SyncCache } from './services/cache';
import { CredentialVault } from './services/credential-vault';
import { HealthMonitor } from './services/health-monitor';
import { createIntegrationStore } from './services/integration-store';
import { MetricsCollector } from './services/metrics';
import { AdapterRegistry } from './services/integrations/adapter-registry';
import { createDefaultAdapterFactories } from './services/integrations/adapter-factory';
import { SyncOrchestrator } from './services/integrations/sync-orchestrator';
import type { AppConfig } from './config/env';
import type { IntegrationStore } from './services/integration-store';
import type { AdapterFactoryRegistry } from './services/integrations/adapter-factory';
import type { CachedListing } from './services/integrations/sync-orchestrator';

export interface AppContextOverrides {
  store?: IntegrationStore;
  factories?: AdapterFactoryRegistry;
}

export class AppContext {
  readonly cache: SyncCache<CachedListing>;
  readonly metrics: MetricsCollector;
  readonly registry: AdapterRegistry;
  readonly orchestrator: SyncOrchestrator;
  readonly monitor: HealthMonitor;
  private initialised = false;

  constructor(
    readonly config: AppConfig,
    readonly store: IntegrationStore,
    factories: AdapterFactoryRegistry
  ) {
    this.metrics = new MetricsCollector();
    this.cache = new SyncCache<CachedListing>({
      maxEntries: config.cache.maxEntries,
      defaultTtlMs: config.sync.cacheTtlMs,
      stats: this.metrics,
    });
    this.registry = new AdapterRegistry({
      store,
      vault: new CredentialVault(config.security.encryptionKey),
      factories,
      defaults: config.sync,
      metrics: this.metrics,
      cache: this.cache,
    });
    this.orchestrator = new SyncOrchestrator({
      registry: this.registry,
      store,
      cache: this.cache,
      metrics: this.metrics,
      runTimeoutMs: config.sync.runTimeoutMs,
    });
    this.monitor = new HealthMonitor({
      registry: this.registry,
      metrics: this.metrics,
      intervalMs: config.monitoring.intervalMs,
    });
  }

  /** Restore active integrations and start monitoring. */
  async init(): Promise<void> {
    if (this.initialised) {
      return;
    }
    this.initialised = true;

    const restored = await this.registry.init();
    if (this.config.monitoring.enabled) {
      this.monitor.start();
    }
    logger.info('Application context ready', { store: this.store.backend, restoredIntegrations: restored });
  }

  async shutdown(): Promise<void> {
    this.monitor.stop();
    await this.registry.shutdown();
    this.cache.clear();
    await this.store.close();
    this.initialised = false;
    logger.info('Application context shut down');
  }
}

export async function createAppContext(
  appConfig: AppConfig = defaultConfig,
  overrides: AppContextOverrides = {}
): Promise<AppContext> {
  const store = overrides.store ?? (await createIntegrationStore(appConfig.redis));
  const factories = overrides.factories ?? createDefaultAdapterFactories();
  return new AppContext(appConfig, store, factories);
}
