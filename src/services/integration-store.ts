/**
 * Integration Store
 *
 * Persists integration configs, sync logs and product mappings. Redis-backed
 * when enabled and reachable, otherwise an in-memory Map.
 *
 * Redis key patterns (prefix from config, default `hub:`):
 * - `{prefix}integration:{id}`: integration record (JSON string)
 * - `{prefix}integrations`: set of every integration id
 * - `{prefix}integrations:user:{userId}`: set of a user's integration ids
 * - `{prefix}synclog:{id}`: sync log (JSON string, written once)
 * - `{prefix}synclogs:user:{userId}`: sorted set of log ids scored by start time
 * - `{prefix}mapping:{integrationId}:{productId}`: product mapping (JSON string)
 *
 * @module services/integration-store
 */

import { createClient } from 'redis';
import { z } from 'zod';
import { config } from '../config/env';
import { logger, errorMessage, redactUrl } from '../utils/logger';
import { ADAPTER_CATEGORIES, INTEGRATION_PRIORITIES, INTEGRATION_STATUSES } from './integrations/adapter-contract';
import { productMappingSchema, syncLogSchema } from './integrations/sync-types';
import type { AdapterConfig, IntegrationStatus } from './integrations/adapter-contract';
import type {
  ProductMapping,
  ProductMappingInput,
  SyncLog,
  SyncLogFilter,
} from './integrations/sync-types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** AdapterConfig as persisted: credentials sealed by the CredentialVault. */
export type IntegrationRecord = Omit<AdapterConfig, 'credentials'> & { sealedCredentials: string };

export interface IntegrationFilter {
  userId?: string;
  status?: IntegrationStatus;
  includeDeleted?: boolean;
}

export interface IntegrationStore {
  readonly backend: 'redis' | 'memory';
  saveIntegration(record: IntegrationRecord): Promise<void>;
  getIntegration(id: string): Promise<IntegrationRecord | null>;
  listIntegrations(filter?: IntegrationFilter): Promise<IntegrationRecord[]>;
  /** Append-only: a second write of the same log id is rejected. */
  appendSyncLog(log: SyncLog): Promise<void>;
  listSyncLogs(userId: string, filter?: SyncLogFilter): Promise<SyncLog[]>;
  upsertProductMapping(input: ProductMappingInput): Promise<ProductMapping>;
  getProductMapping(productId: string, integrationId: string): Promise<ProductMapping | null>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export class DuplicateSyncLogError extends Error {
  constructor(id: string) {
    super(`Sync log ${id} already exists`);
    this.name = 'DuplicateSyncLogError';
  }
}

const integrationRecordSchema: z.ZodType<IntegrationRecord> = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  displayName: z.string(),
  category: z.enum(ADAPTER_CATEGORIES),
  priority: z.enum(INTEGRATION_PRIORITIES),
  apiEndpoint: z.string().optional(),
  sealedCredentials: z.string(),
  tunables: z.object({
    timeoutMs: z.number(),
    retryCount: z.number(),
    retryDelayMs: z.number(),
    rateLimit: z.number(),
    rateLimitWindowMs: z.number(),
    circuitBreakerThreshold: z.number(),
    circuitBreakerCoolDownMs: z.number(),
    cacheTtlMs: z.number(),
  }),
  status: z.enum(INTEGRATION_STATUSES),
  features: z.array(z.string()),
  healthy: z.boolean(),
  lastError: z.string().optional(),
  lastConnectedAt: z.string().optional(),
  lastSyncAt: z.string().optional(),
  lastHealthCheckAt: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  deletedAt: z.string().optional(),
});

const matchesIntegration = (record: IntegrationRecord, filter?: IntegrationFilter): boolean => {
  if (!filter?.includeDeleted && record.deletedAt) return false;
  if (filter?.userId && record.userId !== filter.userId) return false;
  if (filter?.status && record.status !== filter.status) return false;
  return true;
};

const matchesLog = (log: SyncLog, filter?: SyncLogFilter): boolean => {
  if (filter?.operation && log.operation !== filter.operation) return false;
  if (filter?.integrationId && !log.results.some((r) => r.integrationId === filter.integrationId)) return false;
  return true;
};

const paginate = <T>(items: T[], filter?: { limit?: number; offset?: number }): T[] => {
  const offset = filter?.offset ?? 0;
  const limit = filter?.limit ?? items.length;
  return items.slice(offset, offset + limit);
};

const mergeMapping = (input: ProductMappingInput, existing: ProductMapping | null): ProductMapping => {
  const now = new Date().toISOString();
  return {
    ...input,
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
    lastSyncedAt: now,
  };
};

// ---------------------------------------------------------------------------
// RedisIntegrationStore
// ---------------------------------------------------------------------------

export type HubRedisClient = ReturnType<typeof createClient>;

export class RedisIntegrationStore implements IntegrationStore {
  readonly backend = 'redis' as const;
  private readonly client: HubRedisClient;
  private readonly prefix: string;

  constructor(client: HubRedisClient, options?: { keyPrefix?: string }) {
    this.client = client;
    this.prefix = options?.keyPrefix ?? 'hub:';
  }

  async saveIntegration(record: IntegrationRecord): Promise<void> {
    await this.client
      .multi()
      .set(this.key('integration', record.id), JSON.stringify(record))
      .sAdd(this.key('integrations'), record.id)
      .sAdd(this.key('integrations', 'user', record.userId), record.id)
      .exec();
  }

  async getIntegration(id: string): Promise<IntegrationRecord | null> {
    const data = await this.client.get(this.key('integration', id));
    return data ? this.decode(integrationRecordSchema, data, id) : null;
  }

  async listIntegrations(filter?: IntegrationFilter): Promise<IntegrationRecord[]> {
    const ids = filter?.userId
      ? await this.client.sMembers(this.key('integrations', 'user', filter.userId))
      : await this.client.sMembers(this.key('integrations'));
    if (ids.length === 0) return [];

    const values = await this.client.mGet(ids.map((id) => this.key('integration', id)));
    const records: IntegrationRecord[] = [];
    values.forEach((value, index) => {
      const record = value ? this.decode(integrationRecordSchema, value, ids[index]) : null;
      if (record && matchesIntegration(record, filter)) {
        records.push(record);
      }
    });

    return records.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async appendSyncLog(log: SyncLog): Promise<void> {
    const written = await this.client.set(this.key('synclog', log.id), JSON.stringify(log), { NX: true });
    if (written === null) {
      throw new DuplicateSyncLogError(log.id);
    }
    await this.client.zAdd(this.key('synclogs', 'user', log.userId), {
      score: Date.parse(log.startedAt),
      value: log.id,
    });
  }

  async listSyncLogs(userId: string, filter?: SyncLogFilter): Promise<SyncLog[]> {
    const ids = await this.client.zRange(this.key('synclogs', 'user', userId), 0, -1, { REV: true });
    if (ids.length === 0) return [];

    const values = await this.client.mGet(ids.map((id) => this.key('synclog', id)));
    const logs: SyncLog[] = [];
    values.forEach((value, index) => {
      const log = value ? this.decode(syncLogSchema, value, ids[index]) : null;
      if (log && matchesLog(log, filter)) {
        logs.push(log);
      }
    });

    return paginate(logs, filter);
  }

  async upsertProductMapping(input: ProductMappingInput): Promise<ProductMapping> {
    const existing = await this.getProductMapping(input.productId, input.integrationId);
    const mapping = mergeMapping(input, existing);
    await this.client.set(this.key('mapping', input.integrationId, input.productId), JSON.stringify(mapping));
    return mapping;
  }

  async getProductMapping(productId: string, integrationId: string): Promise<ProductMapping | null> {
    const data = await this.client.get(this.key('mapping', integrationId, productId));
    return data ? this.decode(productMappingSchema, data, `${integrationId}:${productId}`) : null;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      logger.warn('IntegrationStore: Redis ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  private key(...parts: string[]): string {
    return this.prefix + parts.join(':');
  }

  private decode<T>(schema: z.ZodType<T>, data: string, id: string | undefined): T | null {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      logger.warn('IntegrationStore: skipping unreadable record', { id, error: errorMessage(error) });
      return null;
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      logger.warn('IntegrationStore: skipping malformed record', { id, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }
}

// ---------------------------------------------------------------------------
// InMemoryIntegrationStore
// ---------------------------------------------------------------------------

export class InMemoryIntegrationStore implements IntegrationStore {
  readonly backend = 'memory' as const;
  private integrations = new Map<string, IntegrationRecord>();
  private logs = new Map<string, SyncLog>();
  private mappings = new Map<string, ProductMapping>();

  async saveIntegration(record: IntegrationRecord): Promise<void> {
    this.integrations.set(record.id, structuredClone(record));
  }

  async getIntegration(id: string): Promise<IntegrationRecord | null> {
    const record = this.integrations.get(id);
    return record ? structuredClone(record) : null;
  }

  async listIntegrations(filter?: IntegrationFilter): Promise<IntegrationRecord[]> {
    return [...this.integrations.values()]
      .filter((record) => matchesIntegration(record, filter))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((record) => structuredClone(record));
  }

  async appendSyncLog(log: SyncLog): Promise<void> {
    if (this.logs.has(log.id)) {
      throw new DuplicateSyncLogError(log.id);
    }
    this.logs.set(log.id, structuredClone(log));
  }

  async listSyncLogs(userId: string, filter?: SyncLogFilter): Promise<SyncLog[]> {
    const logs = [...this.logs.values()]
      .filter((log) => log.userId === userId && matchesLog(log, filter))
      // Newest first; insertion order breaks ties
      .reverse()
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .map((log) => structuredClone(log));
    return paginate(logs, filter);
  }

  async upsertProductMapping(input: ProductMappingInput): Promise<ProductMapping> {
    const key = `${input.integrationId}:${input.productId}`;
    const mapping = mergeMapping(input, this.mappings.get(key) ?? null);
    this.mappings.set(key, mapping);
    return { ...mapping };
  }

  async getProductMapping(productId: string, integrationId: string): Promise<ProductMapping | null> {
    const mapping = this.mappings.get(`${integrationId}:${productId}`);
    return mapping ? { ...mapping } : null;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.integrations.clear();
    this.logs.clear();
    this.mappings.clear();
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create an IntegrationStore. Attempts to use Redis if enabled and reachable;
 * falls back to InMemoryIntegrationStore otherwise.
 */
export async function createIntegrationStore(redis = config.redis): Promise<IntegrationStore> {
  if (!redis.enabled) {
    logger.info('IntegrationStore: Redis disabled, using in-memory store');
    return new InMemoryIntegrationStore();
  }

  try {
    const client = createClient({
      url: redis.url,
      socket: {
        connectTimeout: 5000,
        reconnectStrategy: (retries) => {
          if (retries > 3) {
            logger.error('IntegrationStore: Redis max reconnection attempts reached');
            return false;
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    client.on('error', (err: unknown) => {
      logger.error('IntegrationStore Redis client error', { error: errorMessage(err) });
    });

    await client.connect();
    await client.ping();

    logger.info('IntegrationStore: Using Redis-backed persistent store', { url: redactUrl(redis.url) });
    return new RedisIntegrationStore(client, { keyPrefix: redis.keyPrefix });
  } catch (error: unknown) {
    logger.warn('IntegrationStore: Redis unavailable, falling back to in-memory store', {
      error: errorMessage(error),
    });
    return new InMemoryIntegrationStore();
  }
}
