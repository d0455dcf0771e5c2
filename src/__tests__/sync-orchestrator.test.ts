/**
 * Tests for src/services/integrations/sync-orchestrator.ts
 *
 * Runs against the real registry, store and cache with fake adapters, so
 * breaker, limiter and metrics accounting are exercised end to end.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildLog, parseSyncJob } from '../services/integrations/sync-orchestrator';
import { AuthenticationError, NetworkError, ValidationError } from '../core/errors';
import { logger } from '../utils/logger';
import { createHarness, type Harness } from './helpers/harness';
import type { SyncResult } from '../services/integrations/sync-types';

vi.mock('../utils/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../utils/logger')>()),
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function mapProduct(h: Harness, integrationId: string, name: string, productId = 'p-1'): Promise<void> {
  await h.store.upsertProductMapping({
    productId,
    integrationId,
    integrationName: name,
    userId: 'user-1',
    externalId: `ext-${name}`,
  });
}

const mug = { productId: 'p-1', sku: 'SKU-1', title: 'Mug', price: 10, stock: 3 };
const plate = { productId: 'p-2', sku: 'SKU-2', title: 'Plate', price: 12, stock: 5 };

function result(overrides: Partial<SyncResult>): SyncResult {
  return {
    integrationId: 'int',
    integrationName: 'fake',
    category: 'marketplace',
    status: 'success',
    success: true,
    itemsTotal: 1,
    itemsSucceeded: 1,
    itemsFailed: 0,
    attempts: 1,
    durationMs: 1,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('SyncOrchestrator', () => {
  let h: Harness;

  beforeEach(() => {
    vi.clearAllMocks();
    h = createHarness();
  });

  describe('stock updates', () => {
    it('isolates one failing adapter from the others', async () => {
      const trendyol = await h.addActive('trendyol');
      const hepsiburada = await h.addActive('hepsiburada');
      const n11 = await h.addActive('n11');
      await mapProduct(h, trendyol, 'trendyol');
      await mapProduct(h, hepsiburada, 'hepsiburada');
      await mapProduct(h, n11, 'n11');
      h.pool.get('hepsiburada').failAlways('pushStockUpdate', new AuthenticationError('Token expired'));

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 7 });

      expect(log).toMatchObject({
        userId: 'user-1',
        operation: 'stock',
        status: 'partial',
        total: 3,
        successful: 2,
        failed: 1,
        skipped: 0,
        cancelled: false,
      });
      expect(log.results.map((r) => r.integrationName)).toEqual(['trendyol', 'hepsiburada', 'n11']);
      expect(log.results[1]).toMatchObject({
        status: 'failed',
        success: false,
        itemsTotal: 1,
        itemsFailed: 1,
        attempts: 1,
        error: { kind: 'authentication', message: 'Token expired' },
      });
      expect(h.pool.get('trendyol').stock.get('ext-trendyol')).toBe(7);
      expect(h.pool.get('n11').stock.get('ext-n11')).toBe(7);
    });

    it('charges a failure to the failing integration only', async () => {
      const a = await h.addActive('trendyol');
      const b = await h.addActive('hepsiburada');
      await mapProduct(h, a, 'trendyol');
      await mapProduct(h, b, 'hepsiburada');
      h.pool.get('hepsiburada').failAlways('pushStockUpdate', new AuthenticationError('Token expired'));

      await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 4 });

      expect(h.registry.getRuntime(a)?.breaker.getFailureCount()).toBe(0);
      expect(h.registry.getRuntime(b)?.breaker.getFailureCount()).toBe(1);
      expect(h.metrics.getIntegrationMetrics(a)).toMatchObject({ successfulRequests: 1, failedRequests: 0 });
      expect(h.metrics.getIntegrationMetrics(b)).toMatchObject({
        successfulRequests: 0,
        failedRequests: 1,
        failuresByKind: { authentication: 1 },
      });
    });

    it('marks an integration unhealthy on an authentication failure', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');
      h.pool.get('trendyol').failNext('pushStockUpdate', new AuthenticationError('Token expired'));

      await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 1 });

      expect(await h.registry.get(id)).toMatchObject({ healthy: false, lastError: 'Token expired', status: 'active' });
    });

    it('retries a network failure within the retry budget', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');
      h.pool.get('trendyol').failNext('pushStockUpdate', new NetworkError('HTTP 502: Bad gateway', { status: 502 }));

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 2 });

      expect(log.status).toBe('success');
      expect(log.results[0]).toMatchObject({ status: 'success', attempts: 2 });
      expect(h.pool.get('trendyol').calls.pushStockUpdate).toBe(2);
    });

    it('gives up after retryCount attempts', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');
      h.pool.get('trendyol').failAlways('pushStockUpdate', new NetworkError('HTTP 503: Unavailable', { status: 503 }));

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 2 });

      expect(log.status).toBe('failed');
      expect(log.results[0]).toMatchObject({
        attempts: 3,
        error: { kind: 'network', message: 'HTTP 503: Unavailable' },
      });
      expect(h.pool.get('trendyol').calls.pushStockUpdate).toBe(3);
    });

    it('bounds each adapter call by the integration timeout', async () => {
      const id = await h.addActive('trendyol', { tunables: { timeoutMs: 20, retryCount: 1 } });
      await mapProduct(h, id, 'trendyol');
      h.pool.get('trendyol').hanging.add('pushStockUpdate');

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 2 });

      expect(log.cancelled).toBe(false);
      expect(log.results[0].error).toEqual({
        kind: 'network',
        message: 'trendyol pushStockUpdate timed out after 20ms',
      });
    });

    it('leaves the same remote state when repeated', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');

      const first = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 9 });
      const second = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 9 });

      expect(first.status).toBe('success');
      expect(second.status).toBe('success');
      expect(second.id).not.toBe(first.id);
      expect(h.pool.get('trendyol').stock.get('ext-trendyol')).toBe(9);
      expect(await h.orchestrator.listLogs('user-1')).toHaveLength(2);
    });

    it('records the sync time on success', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');

      await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 1 });

      expect((await h.registry.get(id))?.lastSyncAt).toEqual(expect.any(String));
    });
  });

  describe('price updates', () => {
    it('pushes the new price to the mapped external id', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');

      const log = await h.orchestrator.runSync('user-1', 'price', { productId: 'p-1', price: 19.9 });

      expect(log.status).toBe('success');
      expect(h.pool.get('trendyol').prices.get('ext-trendyol')).toBe(19.9);
    });
  });

  describe('skips', () => {
    it('skips an integration without a product mapping', async () => {
      const mapped = await h.addActive('trendyol');
      const unmapped = await h.addActive('hepsiburada');
      await mapProduct(h, mapped, 'trendyol');

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 1 });

      expect(log).toMatchObject({ status: 'success', successful: 1, failed: 0, skipped: 1 });
      expect(log.results[1]).toMatchObject({
        status: 'skipped',
        skipReason: 'no_mapping',
        attempts: 0,
        error: { kind: 'not_found', message: 'No product mapping for p-1' },
      });
      expect(h.metrics.getIntegrationMetrics(unmapped)?.skipped.no_mapping).toBe(1);
      expect(h.registry.getRuntime(unmapped)?.breaker.getFailureCount()).toBe(0);
    });

    it('skips an integration whose circuit is open', async () => {
      const id = await h.addActive('trendyol', { tunables: { circuitBreakerThreshold: 1 } });
      await mapProduct(h, id, 'trendyol');
      h.registry.getRuntime(id)?.breaker.recordFailure();

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 1 });

      expect(log).toMatchObject({ status: 'skipped', successful: 0, failed: 0, skipped: 1 });
      expect(log.results[0]).toMatchObject({
        skipReason: 'circuit_open',
        error: { kind: 'circuit_open', message: "Circuit breaker 'trendyol' is OPEN: requests are being rejected" },
      });
      expect(h.pool.get('trendyol').calls.pushStockUpdate).toBe(0);
      expect(h.metrics.getIntegrationMetrics(id)?.skipped.circuit_open).toBe(1);
    });

    it('skips once the local rate limit is used up', async () => {
      const id = await h.addActive('trendyol', { tunables: { rateLimit: 1 } });
      await mapProduct(h, id, 'trendyol');

      await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 1 });
      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 2 });

      expect(log.results[0]).toMatchObject({
        status: 'skipped',
        skipReason: 'rate_limited',
        error: { kind: 'rate_limited', message: 'Local rate limit of 1 requests reached' },
      });
      expect(h.pool.get('trendyol').stock.get('ext-trendyol')).toBe(1);
      expect(h.registry.getRuntime(id)?.breaker.getFailureCount()).toBe(0);
    });
  });

  describe('fan-out scope', () => {
    it('only reaches active integrations of the caller in eligible categories', async () => {
      const mine = await h.addActive('trendyol');
      const other = await h.addActive('hepsiburada', { userId: 'user-2' });
      await h.addActive('aras', { category: 'cargo' });
      const parked = await h.addActive('n11');
      await h.registry.setStatus(parked, 'maintenance');
      await mapProduct(h, mine, 'trendyol');
      await mapProduct(h, other, 'hepsiburada');

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 1 });

      expect(log.results.map((r) => r.integrationId)).toEqual([mine]);
      expect(h.pool.get('hepsiburada').calls.pushStockUpdate).toBe(0);
    });

    it('returns an empty log when nothing is eligible', async () => {
      const log = await h.orchestrator.runSync('user-1', 'orders', {});

      expect(log).toMatchObject({ status: 'empty', total: 0, successful: 0, failed: 0, skipped: 0, results: [] });
    });

    it('rejects an invalid payload before any adapter is called', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');

      await expect(h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: -1 })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(h.pool.get('trendyol').calls.pushStockUpdate).toBe(0);
      expect(await h.orchestrator.listLogs('user-1')).toEqual([]);
    });
  });

  describe('product sync', () => {
    it('pushes products and writes a mapping per accepted product', async () => {
      const trendyol = await h.addActive('trendyol');
      const hepsiburada = await h.addActive('hepsiburada');
      h.pool.get('trendyol').rejectSkus.set('SKU-1', new ValidationError('Invalid barcode'));

      const log = await h.orchestrator.runSync('user-1', 'products', { products: [mug, plate] });

      expect(log.status).toBe('partial');
      expect(log.results[0]).toMatchObject({
        status: 'failed',
        itemsTotal: 2,
        itemsSucceeded: 1,
        itemsFailed: 1,
        error: { kind: 'validation', message: 'Invalid barcode' },
      });
      expect(log.results[1]).toMatchObject({ status: 'success', itemsTotal: 2, itemsSucceeded: 2, itemsFailed: 0 });

      expect(await h.store.getProductMapping('p-1', trendyol)).toBeNull();
      expect((await h.store.getProductMapping('p-2', trendyol))?.externalId).toBe('trendyol-SKU-2');
      expect((await h.store.getProductMapping('p-1', hepsiburada))?.externalId).toBe('hepsiburada-SKU-1');
    });

    it('does not trip the breaker for products the remote rejects as invalid', async () => {
      const id = await h.addActive('trendyol', { tunables: { circuitBreakerThreshold: 2 } });
      h.pool.get('trendyol').rejectSkus.set('SKU-1', new ValidationError('Invalid barcode'));

      await h.orchestrator.runSync('user-1', 'products', { products: [mug, plate] });
      await h.orchestrator.runSync('user-1', 'products', { products: [mug, plate] });
      const third = await h.orchestrator.runSync('user-1', 'products', { products: [mug, plate] });

      expect(third.results[0]).toMatchObject({ status: 'failed', itemsSucceeded: 1, itemsFailed: 1 });
      expect(h.registry.getRuntime(id)?.breaker.getSnapshot()).toMatchObject({ state: 'closed', failureCount: 0 });
      expect(h.metrics.getIntegrationMetrics(id)).toMatchObject({ totalRequests: 3, failedRequests: 3 });
    });

    it('stops an adapter at the first non-validation failure', async () => {
      await h.addActive('trendyol');
      h.pool.get('trendyol').failNext('pushProduct', new AuthenticationError('Token expired'));

      const log = await h.orchestrator.runSync('user-1', 'products', { products: [mug, plate] });

      expect(log.results[0]).toMatchObject({ itemsTotal: 2, itemsSucceeded: 0, itemsFailed: 2 });
      expect(h.pool.get('trendyol').calls.pushProduct).toBe(1);
    });

    it('keeps a successful push when the mapping write fails', async () => {
      await h.addActive('trendyol');
      vi.spyOn(h.store, 'upsertProductMapping').mockRejectedValueOnce(new Error('store unavailable'));

      const log = await h.orchestrator.runSync('user-1', 'products', { products: [mug] });

      expect(log.results[0].status).toBe('success');
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to upsert product mapping',
        expect.objectContaining({ productId: 'p-1', error: 'store unavailable' })
      );
    });

    it('pulls listings through the cache', async () => {
      const id = await h.addActive('trendyol');
      h.pool.get('trendyol').products = [{ externalId: 'e-1', sku: 'SKU-1', stock: 4 }];

      const first = await h.orchestrator.runSync('user-1', 'products', {});
      const second = await h.orchestrator.runSync('user-1', 'products', {});

      expect(first.results[0]).toMatchObject({
        status: 'success',
        cached: false,
        itemsTotal: 1,
        products: [{ externalId: 'e-1', sku: 'SKU-1', stock: 4 }],
      });
      expect(second.results[0]).toMatchObject({ status: 'success', cached: true, attempts: 0 });
      expect(h.pool.get('trendyol').calls.fetchProducts).toBe(1);
      expect(h.metrics.getIntegrationMetrics(id)?.totalRequests).toBe(1);
      expect(h.metrics.getSnapshot().cache).toEqual({ hits: 1, misses: 1, hitRate: 0.5 });
    });

    it('persists the log without the fetched listing', async () => {
      await h.addActive('trendyol');
      h.pool.get('trendyol').products = [{ externalId: 'e-1' }];

      const log = await h.orchestrator.runSync('user-1', 'products', {});
      const [stored] = await h.orchestrator.listLogs('user-1');

      expect(stored.id).toBe(log.id);
      expect(stored.results[0]).not.toHaveProperty('products');
      expect(stored.results[0].itemsTotal).toBe(1);
    });
  });

  describe('order sync', () => {
    it('tags orders with their source', async () => {
      const trendyol = await h.addActive('trendyol');
      const shopify = await h.addActive('shopify', { category: 'ecommerce' });
      h.pool.get('trendyol').orders = [{ externalOrderId: 'o-1', totalAmount: 50 }];
      h.pool.get('shopify').orders = [{ externalOrderId: 'o-2' }];

      const log = await h.orchestrator.runSync('user-1', 'orders', {
        dateRange: { from: '2026-01-01T00:00:00.000Z', to: '2026-01-02T00:00:00.000Z' },
      });

      expect(log.status).toBe('success');
      expect(log.results[0].orders).toEqual([
        { externalOrderId: 'o-1', totalAmount: 50, source: 'trendyol', integrationId: trendyol, syncedAt: expect.any(String) },
      ]);
      expect(log.results[1].orders).toEqual([
        { externalOrderId: 'o-2', source: 'shopify', integrationId: shopify, syncedAt: expect.any(String) },
      ]);
    });

    it('rejects a reversed date range', async () => {
      await expect(
        h.orchestrator.runSync('user-1', 'orders', {
          dateRange: { from: '2026-01-02T00:00:00.000Z', to: '2026-01-01T00:00:00.000Z' },
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('overlapping runs', () => {
    const window = { dateRange: { from: '2026-01-01T00:00:00.000Z', to: '2026-01-02T00:00:00.000Z' } };

    it('keeps a shared order fetch alive for the run that is still waiting', async () => {
      const id = await h.addActive('trendyol');
      const adapter = h.pool.get('trendyol');
      adapter.orders = [{ externalOrderId: 'o-1' }];
      const release = adapter.hold('fetchOrders');

      const controller = new AbortController();
      const first = h.orchestrator.runSync('user-1', 'orders', window, { signal: controller.signal });
      const second = h.orchestrator.runSync('user-1', 'orders', window);
      await vi.waitFor(() => expect(adapter.calls.fetchOrders).toBe(1));

      controller.abort(new Error('Client disconnected'));
      const cancelled = await first;
      release();
      const completed = await second;

      expect(cancelled.results[0]).toMatchObject({ status: 'failed', error: { kind: 'cancelled' } });
      expect(completed.results[0]).toMatchObject({
        status: 'success',
        cached: true,
        orders: [{ externalOrderId: 'o-1', source: 'trendyol' }],
      });
      expect(adapter.calls.fetchOrders).toBe(1);
      expect(h.registry.getRuntime(id)?.breaker.getFailureCount()).toBe(0);
      expect(h.metrics.getIntegrationMetrics(id)).toBeNull();
    });

    it('abandons the shared fetch once every waiting run is cancelled', async () => {
      await h.addActive('trendyol');
      const adapter = h.pool.get('trendyol');
      adapter.hanging.add('fetchOrders');

      const a = new AbortController();
      const b = new AbortController();
      const first = h.orchestrator.runSync('user-1', 'orders', window, { signal: a.signal });
      const second = h.orchestrator.runSync('user-1', 'orders', window, { signal: b.signal });
      await vi.waitFor(() => expect(adapter.calls.fetchOrders).toBe(1));

      a.abort();
      expect(h.cache.getStats().inFlight).toBe(1);
      b.abort();
      expect(h.cache.getStats().inFlight).toBe(0);

      expect((await first).cancelled).toBe(true);
      expect((await second).cancelled).toBe(true);
    });

    it('charges a shared fetch failure to the run that made the call', async () => {
      const id = await h.addActive('trendyol');
      const adapter = h.pool.get('trendyol');
      const release = adapter.hold('fetchOrders');
      adapter.failAlways('fetchOrders', new AuthenticationError('Token expired'));

      const first = h.orchestrator.runSync('user-1', 'orders', window);
      const second = h.orchestrator.runSync('user-1', 'orders', window);
      await vi.waitFor(() => expect(adapter.calls.fetchOrders).toBe(1));
      release();

      expect((await first).results[0]).toMatchObject({ status: 'failed', error: { kind: 'authentication' } });
      expect((await second).results[0]).toMatchObject({
        status: 'failed',
        cached: true,
        error: { kind: 'authentication', message: 'Token expired' },
      });
      expect(adapter.calls.fetchOrders).toBe(1);
      expect(h.registry.getRuntime(id)?.breaker.getFailureCount()).toBe(1);
      expect(h.metrics.getIntegrationMetrics(id)).toMatchObject({ totalRequests: 1, failedRequests: 1 });
    });

    it('runs overlapping stock updates against one adapter independently', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');
      const adapter = h.pool.get('trendyol');
      const release = adapter.hold('pushStockUpdate');

      const first = h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 4 });
      const second = h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 4 });
      await vi.waitFor(() => expect(adapter.calls.pushStockUpdate).toBe(2));
      release();

      expect((await first).successful).toBe(1);
      expect((await second).successful).toBe(1);
      expect(adapter.stock.get('ext-trendyol')).toBe(4);
      expect(h.metrics.getIntegrationMetrics(id)).toMatchObject({ totalRequests: 2, successfulRequests: 2 });
    });
  });

  describe('cancellation', () => {
    it('reports unfinished integrations as cancelled when the caller aborts', async () => {
      const fast = await h.addActive('trendyol');
      const slow = await h.addActive('hepsiburada');
      await mapProduct(h, fast, 'trendyol');
      await mapProduct(h, slow, 'hepsiburada');
      h.pool.get('hepsiburada').hanging.add('pushStockUpdate');

      const controller = new AbortController();
      setTimeout(() => controller.abort(), 20);
      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 5 }, { signal: controller.signal });

      expect(log).toMatchObject({ cancelled: true, status: 'partial', successful: 1, failed: 1 });
      expect(log.results[1]).toMatchObject({
        integrationId: slow,
        status: 'failed',
        error: { kind: 'cancelled', message: 'Sync run was cancelled before this integration finished' },
      });
      expect(h.registry.getRuntime(slow)?.breaker.getFailureCount()).toBe(0);
      expect(h.metrics.getIntegrationMetrics(slow)).toBeNull();
    });

    it('cancels every integration when the signal is already aborted', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');
      const controller = new AbortController();
      controller.abort();

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 5 }, { signal: controller.signal });

      expect(log).toMatchObject({ cancelled: true, status: 'failed', failed: 1 });
      expect(h.pool.get('trendyol').calls.pushStockUpdate).toBe(0);
    });

    it('cancels the run when it outlives its timeout', async () => {
      const id = await h.addActive('trendyol');
      await mapProduct(h, id, 'trendyol');
      h.pool.get('trendyol').hanging.add('pushStockUpdate');

      const log = await h.orchestrator.runSync('user-1', 'stock', { productId: 'p-1', quantity: 5 }, { timeoutMs: 30 });

      expect(log.cancelled).toBe(true);
      expect(log.results[0].error?.kind).toBe('cancelled');
    });
  });

  it('fails the run when the log cannot be persisted', async () => {
    await h.addActive('trendyol');
    vi.spyOn(h.store, 'appendSyncLog').mockRejectedValueOnce(new Error('store unavailable'));

    await expect(h.orchestrator.runSync('user-1', 'products', {})).rejects.toThrow('store unavailable');
  });
});

describe('parseSyncJob', () => {
  it('chooses push or pull for products', () => {
    expect(parseSyncJob('products', { products: [mug] })).toEqual({ operation: 'products', mode: 'push', products: [mug] });
    expect(parseSyncJob('products', undefined)).toEqual({
      operation: 'products',
      mode: 'pull',
      pagination: { page: 0, size: 50 },
    });
  });

  it('defaults orders to the last day', () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(new Date('2026-03-02T12:00:00.000Z'));
      expect(parseSyncJob('orders', {})).toEqual({
        operation: 'orders',
        dateRange: { from: '2026-03-01T12:00:00.000Z', to: '2026-03-02T12:00:00.000Z' },
        pagination: { page: 0, size: 50 },
      });
    } finally {
      vi.useRealTimers();
    }
  });

  it('rejects a non-positive price', () => {
    expect(() => parseSyncJob('price', { productId: 'p-1', price: 0 })).toThrow('Invalid price sync payload');
  });
});

describe('buildLog', () => {
  const base = { id: 'log-1', userId: 'user-1', operation: 'stock' as const, cancelled: false, startedAt: 1000, completedAt: 1250 };
  const skipped = result({ status: 'skipped', success: false, skipReason: 'rate_limited' });
  const failed = result({ status: 'failed', success: false });

  it.each([
    ['empty', []],
    ['success', [result({}), skipped]],
    ['partial', [result({}), failed]],
    ['failed', [failed, skipped]],
    ['skipped', [skipped, skipped]],
  ] as const)('derives %s', (status, results) => {
    expect(buildLog({ ...base, results: [...results] }).status).toBe(status);
  });

  it('counts outcomes and timestamps the run', () => {
    const log = buildLog({ ...base, results: [result({}), failed, skipped] });

    expect(log).toMatchObject({
      total: 3,
      successful: 1,
      failed: 1,
      skipped: 1,
      startedAt: '1970-01-01T00:00:01.000Z',
      completedAt: '1970-01-01T00:00:01.250Z',
      durationMs: 250,
    });
  });
});
