/**
 * Integrations API Routes
 *
 * Endpoints (all scoped to the `x-user-id` caller):
 *   POST   /v1/integrations                  Register an integration
 *   GET    /v1/integrations                  List the caller's integrations
 *   GET    /v1/integrations/status           Live status, breaker state and rate budget
 *   GET    /v1/integrations/sync-logs        Past sync runs
 *   POST   /v1/integrations/sync/products    Push or pull products
 *   POST   /v1/integrations/sync/orders      Pull orders
 *   POST   /v1/integrations/update/stock     Push a stock level
 *   POST   /v1/integrations/update/price     Push a price
 *   GET    /v1/integrations/:id              One integration
 *   POST   /v1/integrations/:id/activate     Connect and go live
 *   POST   /v1/integrations/:id/deactivate   Tear down
 *   DELETE /v1/integrations/:id              Soft delete
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, AppError, ErrorCode } from '../../middleware/error-handler';
import { currentUser, requireUser } from '../../middleware/auth';
import { logger } from '../../utils/logger';
import { ADAPTER_CATEGORIES, INTEGRATION_PRIORITIES, SYNC_OPERATIONS } from '../../services/integrations/adapter-contract';
import type { AppContext } from '../../context';
import type { PublicAdapterConfig, SyncOperation } from '../../services/integrations/adapter-contract';
import type { SyncLog } from '../../services/integrations/sync-types';

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

const registerSchema = z.object({
  integration_type: z.enum(ADAPTER_CATEGORIES).optional(),
  integration_name: z.string().trim().min(1).max(64).regex(/^[a-z0-9_-]+$/, 'lowercase letters, digits, _ and - only'),
  config: z.object({
    display_name: z.string().min(1).max(128).optional(),
    priority: z.enum(INTEGRATION_PRIORITIES).optional(),
    api_endpoint: z.string().url().optional(),
    credentials: z.record(z.string()).default({}),
    features: z.array(z.string()).optional(),
    timeout_ms: z.number().int().min(100).max(300_000).optional(),
    retry_count: z.number().int().min(1).max(10).optional(),
    retry_delay_ms: z.number().int().min(0).max(60_000).optional(),
    rate_limit: z.number().int().min(1).optional(),
    rate_limit_window_ms: z.number().int().min(1000).optional(),
    circuit_breaker_threshold: z.number().int().min(1).max(100).optional(),
    circuit_breaker_cooldown_ms: z.number().int().min(1000).optional(),
    cache_ttl_ms: z.number().int().min(0).optional(),
  }).default({}),
});

const stockSchema = z.object({
  product_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  new_stock: z.number().int().min(0),
});

const priceSchema = z.object({
  product_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  new_price: z.number().positive(),
});

const syncLogQuerySchema = z.object({
  operation: z.enum(SYNC_OPERATIONS).optional(),
  integration_id: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export function createIntegrationsRouter(context: AppContext): Router {
  const router = Router();
  const { registry, orchestrator, metrics } = context;

  router.use(requireUser);

  /**
   * Load an integration owned by the caller; other users' ids read as missing.
   */
  const loadOwned = async (req: Request): Promise<PublicAdapterConfig> => {
    const integration = await registry.get(req.params.id);
    if (!integration || integration.userId !== currentUser(req)) {
      throw new AppError(ErrorCode.NOT_FOUND, `Integration ${req.params.id} not found`, 404);
    }
    return integration;
  };

  /**
   * Run a sync bound to the request: a client that disconnects cancels it.
   */
  const runBoundSync = async (req: Request, res: Response, operation: SyncOperation, payload: unknown): Promise<SyncLog> => {
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        controller.abort(new Error('Client disconnected'));
      }
    };
    res.on('close', onClose);
    try {
      return await orchestrator.runSync(currentUser(req), operation, payload, { signal: controller.signal });
    } finally {
      res.off('close', onClose);
    }
  };

  const sendSyncLog = (res: Response, log: SyncLog): void => {
    res.json({ success: log.failed === 0 && !log.cancelled, syncLog: log });
  };

  // -------------------------------------------------------------------------
  // Registration & listing
  // -------------------------------------------------------------------------

  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const { integration_type, integration_name, config } = registerSchema.parse(req.body);

    const id = await registry.register({
      userId: currentUser(req),
      name: integration_name,
      category: integration_type,
      priority: config.priority,
      displayName: config.display_name,
      apiEndpoint: config.api_endpoint,
      credentials: config.credentials,
      features: config.features,
      tunables: {
        timeoutMs: config.timeout_ms,
        retryCount: config.retry_count,
        retryDelayMs: config.retry_delay_ms,
        rateLimit: config.rate_limit,
        rateLimitWindowMs: config.rate_limit_window_ms,
        circuitBreakerThreshold: config.circuit_breaker_threshold,
        circuitBreakerCoolDownMs: config.circuit_breaker_cooldown_ms,
        cacheTtlMs: config.cache_ttl_ms,
      },
    });

    res.status(201).json({ success: true, integration: await registry.get(id) });
  }));

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const integrations = await registry.list(currentUser(req));
    res.json({ integrations, total: integrations.length });
  }));

  router.get('/status', asyncHandler(async (req: Request, res: Response) => {
    const integrations = await registry.list(currentUser(req));
    const statuses = integrations.map((integration) => {
      const runtime = registry.getRuntime(integration.id);
      return {
        id: integration.id,
        name: integration.name,
        displayName: integration.displayName,
        category: integration.category,
        status: integration.status,
        healthy: integration.healthy,
        live: runtime !== undefined,
        lastError: integration.lastError ?? null,
        lastSyncAt: integration.lastSyncAt ?? null,
        lastHealthCheckAt: integration.lastHealthCheckAt ?? null,
        circuitBreaker: runtime ? runtime.breaker.getSnapshot() : null,
        rateLimit: runtime ? runtime.limiter.getStatus() : null,
        metrics: metrics.getIntegrationMetrics(integration.id),
      };
    });
    res.json({ integrations: statuses, timestamp: Date.now() });
  }));

  router.get('/sync-logs', asyncHandler(async (req: Request, res: Response) => {
    const query = syncLogQuerySchema.parse(req.query);
    const logs = await orchestrator.listLogs(currentUser(req), {
      operation: query.operation,
      integrationId: query.integration_id,
      limit: query.limit,
      offset: query.offset,
    });
    res.json({ logs, limit: query.limit, offset: query.offset });
  }));

  // -------------------------------------------------------------------------
  // Sync triggers
  // -------------------------------------------------------------------------

  router.post('/sync/products', asyncHandler(async (req: Request, res: Response) => {
    sendSyncLog(res, await runBoundSync(req, res, 'products', req.body));
  }));

  router.post('/sync/orders', asyncHandler(async (req: Request, res: Response) => {
    sendSyncLog(res, await runBoundSync(req, res, 'orders', req.body));
  }));

  router.post('/update/stock', asyncHandler(async (req: Request, res: Response) => {
    const { product_id, new_stock } = stockSchema.parse(req.body);
    sendSyncLog(res, await runBoundSync(req, res, 'stock', { productId: product_id, quantity: new_stock }));
  }));

  router.post('/update/price', asyncHandler(async (req: Request, res: Response) => {
    const { product_id, new_price } = priceSchema.parse(req.body);
    sendSyncLog(res, await runBoundSync(req, res, 'price', { productId: product_id, price: new_price }));
  }));

  // -------------------------------------------------------------------------
  // Single integration
  // -------------------------------------------------------------------------

  router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    res.json({ integration: await loadOwned(req) });
  }));

  router.post('/:id/activate', asyncHandler(async (req: Request, res: Response) => {
    const { id } = await loadOwned(req);
    const activated = await registry.activate(id);
    if (!activated) {
      logger.warn('Activation failed', { integrationId: id });
    }
    res.json({ success: activated, integration: await registry.get(id) });
  }));

  router.post('/:id/deactivate', asyncHandler(async (req: Request, res: Response) => {
    const { id } = await loadOwned(req);
    const deactivated = await registry.deactivate(id);
    res.json({ success: deactivated, integration: await registry.get(id) });
  }));

  router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = await loadOwned(req);
    await registry.remove(id);
    res.status(204).end();
  }));

  return router;
}
