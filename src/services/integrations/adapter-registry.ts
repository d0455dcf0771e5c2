/**
 * Adapter Registry
 *
 * Owns integration configs (through the store) and the live adapter instances
 * created from them. Each live adapter gets its own circuit breaker and rate
 * limiter; nothing is shared between two integrations.
 *
 * `activate`, `deactivate`, `remove` and `shutdown` serialize through one
 * lock. Listing reads the live map without taking it.
 *
 * @module integrations/adapter-registry
 */

import { randomUUID } from 'crypto';
import { logger, errorMessage } from '../../utils/logger';
import { AsyncLock } from '../../utils/async-lock';
import { CircuitBreaker } from '../../utils/circuit-breaker';
import { withTimeout } from '../../utils/timeout';
import { SlidingWindowRateLimiter } from '../../core/rate-limiter';
import {
  DuplicateIntegrationError,
  IntegrationNotFoundError,
  ValidationError,
  classifyError,
} from '../../core/errors';
import { catalogEntryFor } from './adapter-factory';
import { toPublicConfig } from './adapter-contract';
import type { SyncDefaults } from '../../config/env';
import type { CredentialVault } from '../credential-vault';
import type { IntegrationRecord, IntegrationStore } from '../integration-store';
import type { IntegrationIdentity, MetricsCollector } from '../metrics';
import type { AdapterFactoryRegistry } from './adapter-factory';
import type {
  AdapterCategory,
  AdapterConfig,
  AdapterContract,
  AdapterTunables,
  Credentials,
  IntegrationPriority,
  IntegrationStatus,
  PublicAdapterConfig,
} from './adapter-contract';

export interface RegisterIntegrationInput {
  userId: string;
  /** Adapter name, e.g. `trendyol` */
  name: string;
  /** Required for names missing from the catalog */
  category?: AdapterCategory;
  /** Overrides the catalog priority */
  priority?: IntegrationPriority;
  displayName?: string;
  apiEndpoint?: string;
  credentials: Credentials;
  tunables?: Partial<AdapterTunables>;
  features?: string[];
}

/** A live integration: its config plus the per-integration resilience state. */
export interface AdapterRuntime {
  config: AdapterConfig;
  adapter: AdapterContract;
  breaker: CircuitBreaker;
  limiter: SlidingWindowRateLimiter;
}

export interface ActiveFilter {
  userId?: string;
  categories?: readonly AdapterCategory[];
}

export interface HealthReport {
  integrationId: string;
  name: string;
  healthy: boolean;
  durationMs: number;
}

export interface CacheNamespace {
  deleteByPrefix(prefix: string): number;
}

export interface AdapterRegistryOptions {
  store: IntegrationStore;
  vault: CredentialVault;
  factories: AdapterFactoryRegistry;
  defaults: SyncDefaults;
  metrics?: MetricsCollector;
  cache?: CacheNamespace;
}

type ConfigPatch = Partial<Omit<AdapterConfig, 'id' | 'userId' | 'credentials' | 'createdAt'>>;

type OperatorStatus = Extract<IntegrationStatus, 'maintenance' | 'suspended'>;

export class AdapterRegistry {
  private readonly store: IntegrationStore;
  private readonly vault: CredentialVault;
  private readonly factories: AdapterFactoryRegistry;
  private readonly defaults: SyncDefaults;
  private readonly metrics?: MetricsCollector;
  private readonly cache?: CacheNamespace;
  private readonly lock = new AsyncLock();
  /** Separate from `lock` so registering never queues behind a slow connect */
  private readonly registration = new AsyncLock();
  private readonly live = new Map<string, AdapterRuntime>();

  constructor(options: AdapterRegistryOptions) {
    this.store = options.store;
    this.vault = options.vault;
    this.factories = options.factories;
    this.defaults = options.defaults;
    this.metrics = options.metrics;
    this.cache = options.cache;
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Registrations run one at a time so the duplicate check and the write
   * cannot interleave with another registration.
   */
  register(input: RegisterIntegrationInput): Promise<string> {
    return this.registration.run(() => this.registerUnlocked(input));
  }

  private async registerUnlocked(input: RegisterIntegrationInput): Promise<string> {
    const catalog = catalogEntryFor(input.name);
    const category = input.category ?? catalog?.category;
    if (!category) {
      throw new ValidationError(`Unknown integration '${input.name}': a category is required`);
    }

    const existing = await this.store.listIntegrations({ userId: input.userId });
    if (existing.some((r) => r.category === category && r.name === input.name)) {
      throw new DuplicateIntegrationError(`Integration ${category}/${input.name} is already registered`, {
        details: { category, name: input.name },
      });
    }

    const now = new Date().toISOString();
    const record: IntegrationRecord = {
      id: randomUUID(),
      userId: input.userId,
      name: input.name,
      displayName: input.displayName ?? catalog?.displayName ?? input.name,
      category,
      priority: input.priority ?? catalog?.priority ?? 'medium',
      apiEndpoint: input.apiEndpoint ?? catalog?.apiEndpoint,
      sealedCredentials: this.vault.seal(input.credentials),
      tunables: this.resolveTunables(input.tunables, catalog?.rateLimit),
      status: 'inactive',
      features: input.features ?? catalog?.features ?? [],
      healthy: true,
      createdAt: now,
      updatedAt: now,
    };

    await this.store.saveIntegration(record);
    logger.info('Integration registered', {
      integrationId: record.id,
      integration: record.name,
      category,
      keyCount: Object.keys(input.credentials).length,
    });
    return record.id;
  }

  async get(id: string): Promise<PublicAdapterConfig | null> {
    const record = await this.store.getIntegration(id);
    return record && !record.deletedAt ? this.toPublic(record) : null;
  }

  async list(userId: string): Promise<PublicAdapterConfig[]> {
    const records = await this.store.listIntegrations({ userId });
    return records.map((record) => this.toPublic(record));
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Instantiate and connect. Returns false, leaving the status as it was,
   * when `connect` reports failure or throws.
   */
  activate(id: string): Promise<boolean> {
    return this.lock.run(() => this.activateUnlocked(id));
  }

  deactivate(id: string): Promise<boolean> {
    return this.lock.run(async () => {
      const record = await this.requireRecord(id);
      const runtime = this.live.get(id);
      if (!runtime && record.status === 'inactive') {
        return true;
      }

      await this.teardown(id);
      await this.update(id, { status: 'inactive' });
      logger.info('Integration deactivated', { integrationId: id, integration: record.name });
      return true;
    });
  }

  /** Soft delete: the record stays for audit with `deletedAt` set. */
  remove(id: string): Promise<boolean> {
    return this.lock.run(async () => {
      const record = await this.requireRecord(id);
      await this.teardown(id);
      await this.update(id, { status: 'inactive', deletedAt: new Date().toISOString() });
      logger.info('Integration removed', { integrationId: id, integration: record.name });
      return true;
    });
  }

  /**
   * Restore integrations persisted as active. One that fails to reconnect is
   * marked `error` rather than blocking startup.
   */
  async init(): Promise<number> {
    const records = await this.store.listIntegrations({ status: 'active' });
    let restored = 0;

    for (const record of records) {
      const ok = await this.lock.run(() => this.activateUnlocked(record.id));
      if (ok) {
        restored++;
      } else {
        await this.markError(record.id, 'Reconnect failed during startup');
      }
    }

    logger.info('AdapterRegistry initialised', { persisted: records.length, restored });
    return restored;
  }

  /** Tear down every live adapter; persisted statuses are left for the next `init`. */
  shutdown(): Promise<void> {
    return this.lock.run(async () => {
      for (const id of [...this.live.keys()]) {
        await this.teardown(id);
      }
      logger.info('AdapterRegistry shut down');
    });
  }

  // ---------------------------------------------------------------------------
  // Live lookups (lock-free)
  // ---------------------------------------------------------------------------

  listActive(filter: ActiveFilter = {}): PublicAdapterConfig[] {
    return this.activeRuntimes(filter).map((runtime) => toPublicConfig(runtime.config));
  }

  activeRuntimes(filter: ActiveFilter = {}): AdapterRuntime[] {
    return [...this.live.values()].filter(({ config }) => {
      if (config.status !== 'active') return false;
      if (filter.userId && config.userId !== filter.userId) return false;
      if (filter.categories && !filter.categories.includes(config.category)) return false;
      return true;
    });
  }

  getRuntime(id: string): AdapterRuntime | undefined {
    return this.live.get(id);
  }

  // ---------------------------------------------------------------------------
  // Status updates
  // ---------------------------------------------------------------------------

  async markError(id: string, message: string): Promise<void> {
    await this.update(id, { status: 'error', lastError: message });
    logger.warn('Integration marked as error', { integrationId: id, error: message });
  }

  async markUnhealthy(id: string, message: string): Promise<void> {
    await this.update(id, { healthy: false, lastError: message });
    logger.warn('Integration marked unhealthy', { integrationId: id, error: message });
  }

  async recordSync(id: string): Promise<void> {
    await this.update(id, { lastSyncAt: new Date().toISOString() });
  }

  async setStatus(id: string, status: OperatorStatus): Promise<void> {
    await this.requireRecord(id);
    await this.update(id, { status });
    logger.info('Integration status changed', { integrationId: id, status });
  }

  /**
   * Probe every live adapter concurrently under the health-check timeout.
   */
  async healthCheckAll(): Promise<HealthReport[]> {
    const runtimes = [...this.live.values()];
    return Promise.all(runtimes.map((runtime) => this.checkHealth(runtime)));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async activateUnlocked(id: string): Promise<boolean> {
    const record = await this.requireRecord(id);
    const existing = this.live.get(id);
    if (existing && record.status === 'active') {
      return true;
    }
    if (existing) {
      await this.teardown(id);
    }

    const config = this.decrypt(record);
    let adapter: AdapterContract;
    try {
      adapter = this.factories.create(config);
    } catch (error) {
      logger.error('Adapter construction failed', { integrationId: id, integration: config.name, error: errorMessage(error) });
      return false;
    }

    try {
      const connected = await withTimeout((signal) => adapter.connect({ signal }), config.tunables.timeoutMs, {
        label: `${config.name} connect`,
      });
      if (!connected) {
        await this.update(id, { lastError: 'Connection refused by remote' });
        logger.warn('Integration connect returned false', { integrationId: id, integration: config.name });
        return false;
      }
    } catch (error) {
      const failure = classifyError(error);
      await this.update(id, { lastError: failure.message });
      logger.warn('Integration connect failed', {
        integrationId: id,
        integration: config.name,
        kind: failure.kind,
        error: failure.message,
      });
      return false;
    }

    const now = new Date().toISOString();
    const patch: ConfigPatch = { status: 'active', healthy: true, lastError: undefined, lastConnectedAt: now };
    await this.update(id, patch);

    const identity = this.identityOf(config);
    this.live.set(id, {
      config: { ...config, ...patch, updatedAt: now },
      adapter,
      breaker: new CircuitBreaker({
        name: `${config.name}:${id}`,
        failureThreshold: config.tunables.circuitBreakerThreshold,
        coolDownMs: config.tunables.circuitBreakerCoolDownMs,
        onTrip: () => this.metrics?.recordCircuitTrip(identity),
      }),
      limiter: new SlidingWindowRateLimiter({
        name: `${config.name}:${id}`,
        maxRequests: config.tunables.rateLimit,
        windowMs: config.tunables.rateLimitWindowMs,
      }),
    });

    logger.info('Integration activated', { integrationId: id, integration: config.name, category: config.category });
    return true;
  }

  private async teardown(id: string): Promise<void> {
    const runtime = this.live.get(id);
    if (!runtime) {
      return;
    }
    this.live.delete(id);
    this.cache?.deleteByPrefix(`${id}:`);

    if (runtime.adapter.disconnect) {
      try {
        await runtime.adapter.disconnect();
      } catch (error) {
        logger.warn('Adapter disconnect failed', { integrationId: id, error: errorMessage(error) });
      }
    }
  }

  private async checkHealth(runtime: AdapterRuntime): Promise<HealthReport> {
    const { config, adapter } = runtime;
    const started = Date.now();
    let healthy: boolean;
    try {
      healthy = await withTimeout((signal) => adapter.healthCheck({ signal }), this.defaults.healthCheckTimeoutMs, {
        label: `${config.name} health check`,
      });
    } catch (error) {
      logger.debug('Health check failed', { integrationId: config.id, error: errorMessage(error) });
      healthy = false;
    }

    const durationMs = Date.now() - started;
    this.metrics?.recordHealthCheck(this.identityOf(config), healthy);
    try {
      await this.update(config.id, { healthy, lastHealthCheckAt: new Date().toISOString() });
    } catch (error) {
      logger.error('Failed to persist health check result', { integrationId: config.id, error: errorMessage(error) });
    }

    return { integrationId: config.id, name: config.name, healthy, durationMs };
  }

  private identityOf(config: AdapterConfig): IntegrationIdentity {
    return { integrationId: config.id, name: config.name, category: config.category, priority: config.priority };
  }

  private async update(id: string, patch: ConfigPatch): Promise<void> {
    const record = await this.requireRecord(id, true);
    const updatedAt = new Date().toISOString();
    await this.store.saveIntegration({ ...record, ...patch, updatedAt });

    const runtime = this.live.get(id);
    if (runtime) {
      runtime.config = { ...runtime.config, ...patch, updatedAt };
    }
  }

  private async requireRecord(id: string, includeDeleted = false): Promise<IntegrationRecord> {
    const record = await this.store.getIntegration(id);
    if (!record || (record.deletedAt && !includeDeleted)) {
      throw new IntegrationNotFoundError(`Integration ${id} not found`, { details: { id } });
    }
    return record;
  }

  private decrypt(record: IntegrationRecord): AdapterConfig {
    const { sealedCredentials, ...rest } = record;
    return { ...rest, credentials: this.vault.open(sealedCredentials) };
  }

  private toPublic(record: IntegrationRecord): PublicAdapterConfig {
    const { sealedCredentials, ...rest } = record;
    let credentialKeys: string[] = [];
    try {
      credentialKeys = Object.keys(this.vault.open(sealedCredentials)).sort();
    } catch (error) {
      logger.warn('Stored credentials unreadable', { integrationId: record.id, error: errorMessage(error) });
    }
    return { ...rest, credentialKeys };
  }

  private resolveTunables(overrides: Partial<AdapterTunables> | undefined, catalogRateLimit?: number): AdapterTunables {
    const d = this.defaults;
    return {
      timeoutMs: overrides?.timeoutMs ?? d.timeoutMs,
      retryCount: overrides?.retryCount ?? d.retryCount,
      retryDelayMs: overrides?.retryDelayMs ?? d.retryDelayMs,
      rateLimit: overrides?.rateLimit ?? catalogRateLimit ?? d.rateLimit,
      rateLimitWindowMs: overrides?.rateLimitWindowMs ?? d.rateLimitWindowMs,
      circuitBreakerThreshold: overrides?.circuitBreakerThreshold ?? d.circuitBreakerThreshold,
      circuitBreakerCoolDownMs: overrides?.circuitBreakerCoolDownMs ?? d.circuitBreakerCoolDownMs,
      cacheTtlMs: overrides?.cacheTtlMs ?? d.cacheTtlMs,
    };
  }
}
