/**
 * Sync Orchestrator
 *
 * Fans one sync operation out to every eligible adapter of a user and folds
 * the per-adapter outcomes into a single persisted SyncLog. Adapter failures
 * stay inside their own SyncResult; only payload validation (before fan-out)
 * and persisting the log can fail a run.
 *
 * @module integrations/sync-orchestrator
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { logger, errorMessage, runWithContext } from '../../utils/logger';
import { linkAbortSignal } from '../../utils/async-lock';
import { withRetry } from '../../utils/retry';
import { withTimeout } from '../../utils/timeout';
import {
  AuthenticationError,
  CircuitOpenError,
  NetworkError,
  UnknownError,
  ValidationError,
  classifyError,
} from '../../core/errors';
import { cacheKey } from '../cache';
import { OPERATION_CATEGORIES } from './adapter-contract';
import { toAuditRecord } from './sync-types';
import type { SyncCache } from '../cache';
import type { IntegrationStore } from '../integration-store';
import type { IntegrationIdentity, MetricsCollector } from '../metrics';
import type { AdapterRegistry, AdapterRuntime } from './adapter-registry';
import type {
  DateRange,
  Pagination,
  ProductPayload,
  RawOrder,
  RawProduct,
  SyncOperation,
} from './adapter-contract';
import type {
  ProductMapping,
  ProductMappingInput,
  SkipReason,
  SyncedOrder,
  SyncLog,
  SyncLogFilter,
  SyncLogStatus,
  SyncResult,
} from './sync-types';
import type { IntegrationError } from '../../core/errors';

// ============================================================================
// Payloads
// ============================================================================

const DEFAULT_ORDER_WINDOW_MS = 24 * 60 * 60 * 1000;

const paginationSchema = z.object({
  page: z.number().int().min(0).default(0),
  size: z.number().int().min(1).max(200).default(50),
});

const productPayloadSchema = z.object({
  productId: z.string().min(1),
  sku: z.string().min(1),
  title: z.string().min(1),
  price: z.number().positive(),
  stock: z.number().int().min(0),
  currency: z.string().length(3).optional(),
  description: z.string().optional(),
  attributes: z.record(z.string()).optional(),
});

export const syncPayloadSchemas = {
  products: z.object({
    /** Products to publish; without it the run pulls the remote listing */
    products: z.array(productPayloadSchema).min(1).optional(),
    pagination: paginationSchema.optional(),
  }),
  orders: z.object({
    dateRange: z
      .object({ from: z.string().datetime(), to: z.string().datetime() })
      .refine((range) => Date.parse(range.from) <= Date.parse(range.to), {
        message: 'dateRange.from must not be after dateRange.to',
      })
      .optional(),
    pagination: paginationSchema.optional(),
  }),
  stock: z.object({
    productId: z.string().min(1),
    quantity: z.number().int().min(0),
  }),
  price: z.object({
    productId: z.string().min(1),
    price: z.number().positive(),
  }),
} satisfies Record<SyncOperation, z.ZodTypeAny>;

type SyncJob =
  | { operation: 'products'; mode: 'push'; products: ProductPayload[] }
  | { operation: 'products'; mode: 'pull'; pagination: Pagination }
  | { operation: 'orders'; dateRange: DateRange; pagination: Pagination }
  | { operation: 'stock'; productId: string; quantity: number }
  | { operation: 'price'; productId: string; price: number };

const DEFAULT_PAGINATION: Pagination = { page: 0, size: 50 };

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, operation: SyncOperation, payload: unknown): T {
  const result = schema.safeParse(payload ?? {});
  if (!result.success) {
    throw new ValidationError(`Invalid ${operation} sync payload`, { details: result.error.flatten() });
  }
  return result.data;
}

/**
 * Validate a caller payload into a job. Throws ValidationError before any
 * adapter is touched.
 */
export function parseSyncJob(operation: SyncOperation, payload: unknown): SyncJob {
  switch (operation) {
    case 'products': {
      const data = parseWith(syncPayloadSchemas.products, operation, payload);
      return data.products
        ? { operation, mode: 'push', products: data.products }
        : { operation, mode: 'pull', pagination: data.pagination ?? DEFAULT_PAGINATION };
    }
    case 'orders': {
      const data = parseWith(syncPayloadSchemas.orders, operation, payload);
      const now = Date.now();
      return {
        operation,
        dateRange: data.dateRange ?? {
          from: new Date(now - DEFAULT_ORDER_WINDOW_MS).toISOString(),
          to: new Date(now).toISOString(),
        },
        pagination: data.pagination ?? DEFAULT_PAGINATION,
      };
    }
    case 'stock':
      return { operation, ...parseWith(syncPayloadSchemas.stock, operation, payload) };
    case 'price':
      return { operation, ...parseWith(syncPayloadSchemas.price, operation, payload) };
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

/** What the read cache holds: one listing page. */
export type CachedListing =
  | { kind: 'products'; items: RawProduct[] }
  | { kind: 'orders'; items: RawOrder[] };

export interface SyncOrchestratorOptions {
  registry: AdapterRegistry;
  store: IntegrationStore;
  cache: SyncCache<CachedListing>;
  metrics: MetricsCollector;
  /** Bound on a whole run unless the caller passes its own */
  runTimeoutMs: number;
  /** Cap on the backoff between retries */
  maxRetryDelayMs?: number;
}

export interface RunSyncOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** Items processed by one adapter within a run. */
interface AdapterOutcome {
  itemsTotal: number;
  itemsSucceeded: number;
  itemsFailed: number;
  error?: IntegrationError;
  cached?: boolean;
  orders?: SyncedOrder[];
  products?: RawProduct[];
}

/** Adapter call with timeout and retries; `signal` defaults to the run's. */
type Call = <T>(label: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal) => Promise<T>;

type ListingRead =
  | { ok: true; value: CachedListing; cached: boolean }
  | { ok: false; outcome: AdapterOutcome };

export class SyncOrchestrator {
  private readonly registry: AdapterRegistry;
  private readonly store: IntegrationStore;
  private readonly cache: SyncCache<CachedListing>;
  private readonly metrics: MetricsCollector;
  private readonly runTimeoutMs: number;
  private readonly maxRetryDelayMs: number;

  constructor(options: SyncOrchestratorOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.cache = options.cache;
    this.metrics = options.metrics;
    this.runTimeoutMs = options.runTimeoutMs;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 30_000;
  }

  async runSync(
    userId: string,
    operation: SyncOperation,
    payload: unknown,
    options: RunSyncOptions = {}
  ): Promise<SyncLog> {
    const job = parseSyncJob(operation, payload);
    const syncId = randomUUID();
    return runWithContext({ syncId, userId }, () => this.run(syncId, userId, job, options));
  }

  listLogs(userId: string, filter?: SyncLogFilter): Promise<SyncLog[]> {
    return this.store.listSyncLogs(userId, filter);
  }

  private async run(syncId: string, userId: string, job: SyncJob, options: RunSyncOptions): Promise<SyncLog> {
    const startedAt = Date.now();
    const runtimes = this.registry.activeRuntimes({ userId, categories: OPERATION_CATEGORIES[job.operation] });

    logger.info('Sync run started', { operation: job.operation, integrations: runtimes.length });

    const timeoutMs = options.timeoutMs ?? this.runTimeoutMs;
    const { controller, dispose } = linkAbortSignal(options.signal);
    const timer = setTimeout(() => {
      controller.abort(new NetworkError(`Sync run timed out after ${timeoutMs}ms`, { timedOut: true }));
    }, timeoutMs);

    let results: SyncResult[];
    try {
      results = await Promise.all(runtimes.map((runtime) => this.settle(runtime, job, userId, controller.signal)));
    } finally {
      clearTimeout(timer);
      dispose();
    }

    const completedAt = Date.now();
    const log = buildLog({
      id: syncId,
      userId,
      operation: job.operation,
      results,
      cancelled: controller.signal.aborted,
      startedAt,
      completedAt,
    });

    // Append-only; a failure here fails the run
    await this.store.appendSyncLog(toAuditRecord(log));
    this.metrics.recordSyncRun(job.operation, log.durationMs);

    logger.info('Sync run completed', {
      operation: log.operation,
      status: log.status,
      total: log.total,
      successful: log.successful,
      failed: log.failed,
      skipped: log.skipped,
      cancelled: log.cancelled,
      durationMs: log.durationMs,
    });

    return log;
  }

  /**
   * Resolve with the adapter's result, or with a `cancelled` result as soon as
   * the run is aborted. Never rejects.
   */
  private settle(runtime: AdapterRuntime, job: SyncJob, userId: string, signal: AbortSignal): Promise<SyncResult> {
    const started = Date.now();
    if (signal.aborted) {
      return Promise.resolve(cancelledResult(runtime, started));
    }

    return new Promise<SyncResult>((resolve) => {
      const onAbort = (): void => resolve(cancelledResult(runtime, started));
      signal.addEventListener('abort', onAbort, { once: true });

      void this.runAdapter(runtime, job, userId, signal)
        .catch((error: unknown) => {
          const failure = classifyError(error);
          logger.error('Unexpected failure while running adapter', {
            integrationId: runtime.config.id,
            integration: runtime.config.name,
            error: failure.message,
            stack: error instanceof Error ? error.stack : undefined,
          });
          return failedResult(runtime, started, failure, 0);
        })
        .then((result) => {
          signal.removeEventListener('abort', onAbort);
          resolve(result);
        });
    });
  }

  private async runAdapter(runtime: AdapterRuntime, job: SyncJob, userId: string, signal: AbortSignal): Promise<SyncResult> {
    const { config, breaker, limiter } = runtime;
    const identity: IntegrationIdentity = {
      integrationId: config.id,
      name: config.name,
      category: config.category,
      priority: config.priority,
    };
    const started = Date.now();

    let mapping: ProductMapping | null = null;
    if (job.operation === 'stock' || job.operation === 'price') {
      mapping = await this.store.getProductMapping(job.productId, config.id);
      if (!mapping) {
        this.metrics.recordSkip(identity, 'no_mapping');
        return skippedResult(runtime, started, 'no_mapping', `No product mapping for ${job.productId}`);
      }
    }

    if (!breaker.shouldAllowRequest()) {
      this.metrics.recordSkip(identity, 'circuit_open');
      return skippedResult(runtime, started, 'circuit_open', new CircuitOpenError(config.name).message);
    }

    if (!limiter.isAllowed()) {
      breaker.releaseTrial();
      this.metrics.recordSkip(identity, 'rate_limited');
      return skippedResult(runtime, started, 'rate_limited', `Local rate limit of ${config.tunables.rateLimit} requests reached`);
    }

    let attempts = 0;
    const call: Call = (label, fn, callSignal = signal) =>
      withRetry(
        () => {
          attempts++;
          return withTimeout(fn, config.tunables.timeoutMs, { signal: callSignal, label: `${config.name} ${label}` });
        },
        {
          maxRetries: Math.max(0, config.tunables.retryCount - 1),
          baseDelayMs: config.tunables.retryDelayMs,
          maxDelayMs: this.maxRetryDelayMs,
          signal: callSignal,
          label: `${config.name} ${label}`,
        }
      );

    const outcome = await this.perform(runtime, job, userId, mapping, call, signal);
    const durationMs = Date.now() - started;

    if (signal.aborted) {
      // Result is discarded; leave breaker and metrics untouched
      breaker.releaseTrial();
      return cancelledResult(runtime, started);
    }

    if (outcome.cached) {
      breaker.releaseTrial();
    } else if (outcome.itemsFailed === 0) {
      breaker.recordSuccess();
      this.metrics.recordSuccess(identity, durationMs);
    } else {
      // A payload the remote rejected as invalid says nothing about its health
      if (outcome.error?.kind === 'validation') {
        breaker.recordSuccess();
      } else {
        breaker.recordFailure();
      }
      this.metrics.recordFailure(identity, durationMs, outcome.error?.kind ?? 'unknown');
    }

    await this.afterOutcome(runtime, outcome);

    const base = {
      integrationId: config.id,
      integrationName: config.name,
      category: config.category,
      itemsTotal: outcome.itemsTotal,
      itemsSucceeded: outcome.itemsSucceeded,
      itemsFailed: outcome.itemsFailed,
      attempts,
      durationMs,
      ...(outcome.cached !== undefined ? { cached: outcome.cached } : {}),
      ...(outcome.orders ? { orders: outcome.orders } : {}),
      ...(outcome.products ? { products: outcome.products } : {}),
    };

    if (outcome.itemsFailed === 0) {
      return { ...base, status: 'success', success: true };
    }
    const error = outcome.error ?? new UnknownError(`${config.name} reported a failure`);
    return { ...base, status: 'failed', success: false, error: { kind: error.kind, message: error.message } };
  }

  private async perform(
    runtime: AdapterRuntime,
    job: SyncJob,
    userId: string,
    mapping: ProductMapping | null,
    call: Call,
    signal: AbortSignal
  ): Promise<AdapterOutcome> {
    const { adapter, config } = runtime;

    try {
      switch (job.operation) {
        case 'products':
          return job.mode === 'push'
            ? await this.pushProducts(runtime, job.products, userId, call)
            : await this.pullProducts(runtime, job.pagination, call, signal);

        case 'orders': {
          const { dateRange, pagination } = job;
          const read = await this.readListing(
            runtime,
            cacheKey(config.id, 'orders', { dateRange, pagination }),
            signal,
            async (fetchSignal) => ({
              kind: 'orders',
              items: await call(
                'fetchOrders',
                (callSignal) => adapter.fetchOrders(dateRange, pagination, { signal: callSignal }),
                fetchSignal
              ),
            })
          );
          if (!read.ok) {
            return read.outcome;
          }
          const { value, cached } = read;
          if (value.kind !== 'orders') {
            throw new UnknownError(`Cache entry for ${config.name} orders holds ${value.kind}`);
          }
          const syncedAt = new Date().toISOString();
          const orders = value.items.map((order) => ({ ...order, source: config.name, integrationId: config.id, syncedAt }));
          return { itemsTotal: orders.length, itemsSucceeded: orders.length, itemsFailed: 0, cached, orders };
        }

        case 'stock': {
          const { quantity } = job;
          const externalId = requireMapping(mapping, job.productId).externalId;
          const accepted = await call('pushStockUpdate', (signal) => adapter.pushStockUpdate(externalId, quantity, { signal }));
          return acceptedOutcome(accepted, `${config.name} rejected the stock update for ${externalId}`);
        }

        case 'price': {
          const { price } = job;
          const externalId = requireMapping(mapping, job.productId).externalId;
          const accepted = await call('pushPriceUpdate', (signal) => adapter.pushPriceUpdate(externalId, price, { signal }));
          return acceptedOutcome(accepted, `${config.name} rejected the price update for ${externalId}`);
        }
      }
    } catch (error) {
      const itemsTotal = job.operation === 'products' && job.mode === 'push' ? job.products.length : 1;
      return { itemsTotal, itemsSucceeded: 0, itemsFailed: itemsTotal, error: classifyError(error) };
    }
  }

  /**
   * Push products one at a time. A product the remote rejects as invalid does
   * not stop the rest; any other failure ends this adapter's run and counts
   * the remaining products as failed.
   */
  private async pushProducts(
    runtime: AdapterRuntime,
    products: ProductPayload[],
    userId: string,
    call: Call
  ): Promise<AdapterOutcome> {
    const { adapter, config } = runtime;
    let itemsSucceeded = 0;
    let itemsFailed = 0;
    let firstError: IntegrationError | undefined;

    for (const [index, product] of products.entries()) {
      try {
        const { externalId } = await call('pushProduct', (signal) => adapter.pushProduct(product, { signal }));
        itemsSucceeded++;
        await this.recordMapping({
          productId: product.productId,
          integrationId: config.id,
          integrationName: config.name,
          userId,
          externalId,
        });
      } catch (error) {
        const failure = classifyError(error);
        firstError ??= failure;
        itemsFailed++;
        if (failure.kind !== 'validation') {
          itemsFailed += products.length - index - 1;
          break;
        }
      }
    }

    return { itemsTotal: products.length, itemsSucceeded, itemsFailed, error: firstError };
  }

  private async pullProducts(
    runtime: AdapterRuntime,
    pagination: Pagination,
    call: Call,
    signal: AbortSignal
  ): Promise<AdapterOutcome> {
    const { adapter, config } = runtime;
    const read = await this.readListing(runtime, cacheKey(config.id, 'products', pagination), signal, async (fetchSignal) => ({
      kind: 'products',
      items: await call('fetchProducts', (callSignal) => adapter.fetchProducts(pagination, { signal: callSignal }), fetchSignal),
    }));
    if (!read.ok) {
      return read.outcome;
    }
    const { value, cached } = read;
    if (value.kind !== 'products') {
      throw new UnknownError(`Cache entry for ${config.name} products holds ${value.kind}`);
    }
    return {
      itemsTotal: value.items.length,
      itemsSucceeded: value.items.length,
      itemsFailed: 0,
      cached,
      products: value.items,
    };
  }

  /**
   * Read a listing through the cache, joining a fetch another run already has
   * in flight. The shared fetch runs under the cache's signal, so cancelling
   * the run that started it does not fail the others. A failure this run only
   * observed comes back as a cached outcome; the run whose fetcher ran is
   * charged for it.
   */
  private async readListing(
    runtime: AdapterRuntime,
    key: string,
    signal: AbortSignal,
    fetchListing: (fetchSignal: AbortSignal) => Promise<CachedListing>
  ): Promise<ListingRead> {
    let ran = false;
    try {
      const { value, cached } = await this.cache.getOrFetch(
        key,
        runtime.config.tunables.cacheTtlMs,
        (fetchSignal) => {
          ran = true;
          return fetchListing(fetchSignal);
        },
        signal
      );
      return { ok: true, value, cached };
    } catch (error) {
      if (ran || signal.aborted) {
        throw error;
      }
      return {
        ok: false,
        outcome: { itemsTotal: 1, itemsSucceeded: 0, itemsFailed: 1, error: classifyError(error), cached: true },
      };
    }
  }

  private async recordMapping(input: ProductMappingInput): Promise<void> {
    try {
      await this.store.upsertProductMapping(input);
    } catch (error) {
      // The push itself succeeded; the next product sync rewrites the mapping
      logger.error('Failed to upsert product mapping', {
        integrationId: input.integrationId,
        productId: input.productId,
        error: errorMessage(error),
      });
    }
  }

  private async afterOutcome(runtime: AdapterRuntime, outcome: AdapterOutcome): Promise<void> {
    const { config } = runtime;
    try {
      if (outcome.error instanceof AuthenticationError) {
        await this.registry.markUnhealthy(config.id, outcome.error.message);
      } else if (outcome.itemsSucceeded > 0 && !outcome.cached) {
        await this.registry.recordSync(config.id);
      }
    } catch (error) {
      logger.error('Failed to update integration after sync', { integrationId: config.id, error: errorMessage(error) });
    }

    if (!outcome.error) {
      return;
    }
    const meta = {
      integrationId: config.id,
      integration: config.name,
      kind: outcome.error.kind,
      error: outcome.error.message,
      itemsFailed: outcome.itemsFailed,
    };
    if (outcome.error.kind === 'unknown') {
      logger.error('Adapter call failed with an unexpected error', {
        ...meta,
        details: outcome.error.details,
        cause: outcome.error.cause instanceof Error ? outcome.error.cause.stack : undefined,
      });
    } else {
      logger.warn('Adapter call failed', meta);
    }
  }
}

// ============================================================================
// Result builders
// ============================================================================

function requireMapping(mapping: ProductMapping | null, productId: string): ProductMapping {
  if (!mapping) {
    throw new UnknownError(`Missing product mapping for ${productId}`);
  }
  return mapping;
}

function acceptedOutcome(accepted: boolean, rejection: string): AdapterOutcome {
  if (!accepted) {
    throw new UnknownError(rejection);
  }
  return { itemsTotal: 1, itemsSucceeded: 1, itemsFailed: 0 };
}

const identityOf = (runtime: AdapterRuntime): Pick<SyncResult, 'integrationId' | 'integrationName' | 'category'> => ({
  integrationId: runtime.config.id,
  integrationName: runtime.config.name,
  category: runtime.config.category,
});

function skippedResult(runtime: AdapterRuntime, started: number, reason: SkipReason, message: string): SyncResult {
  return {
    ...identityOf(runtime),
    status: 'skipped',
    success: false,
    skipReason: reason,
    itemsTotal: 0,
    itemsSucceeded: 0,
    itemsFailed: 0,
    attempts: 0,
    durationMs: Date.now() - started,
    error: { kind: reason === 'no_mapping' ? 'not_found' : reason, message },
  };
}

function failedResult(runtime: AdapterRuntime, started: number, error: IntegrationError, attempts: number): SyncResult {
  return {
    ...identityOf(runtime),
    status: 'failed',
    success: false,
    itemsTotal: 0,
    itemsSucceeded: 0,
    itemsFailed: 0,
    attempts,
    durationMs: Date.now() - started,
    error: { kind: error.kind, message: error.message },
  };
}

function cancelledResult(runtime: AdapterRuntime, started: number): SyncResult {
  return {
    ...identityOf(runtime),
    status: 'failed',
    success: false,
    itemsTotal: 0,
    itemsSucceeded: 0,
    itemsFailed: 0,
    attempts: 0,
    durationMs: Date.now() - started,
    error: { kind: 'cancelled', message: 'Sync run was cancelled before this integration finished' },
  };
}

interface LogInput {
  id: string;
  userId: string;
  operation: SyncOperation;
  results: SyncResult[];
  cancelled: boolean;
  startedAt: number;
  completedAt: number;
}

export function buildLog(input: LogInput): SyncLog {
  const successful = input.results.filter((r) => r.status === 'success').length;
  const failed = input.results.filter((r) => r.status === 'failed').length;
  const skipped = input.results.filter((r) => r.status === 'skipped').length;

  let status: SyncLogStatus;
  if (input.results.length === 0) {
    status = 'empty';
  } else if (failed === 0 && successful > 0) {
    status = 'success';
  } else if (failed > 0 && successful > 0) {
    status = 'partial';
  } else if (failed > 0) {
    status = 'failed';
  } else {
    status = 'skipped';
  }

  return {
    id: input.id,
    userId: input.userId,
    operation: input.operation,
    status,
    total: input.results.length,
    successful,
    failed,
    skipped,
    cancelled: input.cancelled,
    results: input.results,
    startedAt: new Date(input.startedAt).toISOString(),
    completedAt: new Date(input.completedAt).toISOString(),
    durationMs: input.completedAt - input.startedAt,
  };
}
