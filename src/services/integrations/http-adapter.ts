/**
 * HTTP adapter base
 *
 * Shared plumbing for adapters that speak JSON over HTTP: per-call timeout,
 * caller cancellation, and mapping of HTTP failures onto the integration
 * error taxonomy. `RestMarketplaceAdapter` is the generic implementation used
 * for any integration without a dedicated adapter.
 *
 * @module integrations/http-adapter
 */

import { z } from 'zod';
import { logger } from '../../utils/logger';
import { linkAbortSignal } from '../../utils/async-lock';
import {
  AuthenticationError,
  NetworkError,
  RateLimitedError,
  UnknownError,
  ValidationError,
  classifyError,
} from '../../core/errors';
import type {
  AdapterCategory,
  AdapterConfig,
  AdapterContract,
  CallOptions,
  DateRange,
  Pagination,
  ProductPayload,
  PushProductResult,
  RawOrder,
  RawProduct,
} from './adapter-contract';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpAdapterOptions {
  /** Override the transport (tests, proxies). Defaults to global fetch. */
  fetchImpl?: FetchLike;
  userAgent?: string;
}

export interface RequestInitOptions {
  query?: Record<string, string | number | undefined>;
  body?: unknown;
  signal?: AbortSignal;
  /** Overrides the adapter's configured timeout */
  timeoutMs?: number;
}

const HEALTH_TIMEOUT_MS = 5000;

const errorBodySchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
  detail: z.string().optional(),
  errors: z.array(z.unknown()).optional(),
}).passthrough();

/**
 * Pull a human-readable message out of a JSON error body, falling back to the
 * raw text.
 */
export function extractErrorMessage(text: string): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const body = parsed.data;
      const first = body.errors?.[0];
      return body.message ?? body.error ?? body.detail ?? (first !== undefined ? String(first) : text);
    }
  } catch {
    // not JSON
  }
  return text;
}

/**
 * Map a non-2xx response onto the error taxonomy.
 */
export function errorForStatus(status: number, message: string, retryAfterHeader?: string | null): Error {
  if (status === 401 || status === 403) {
    return new AuthenticationError(message, { details: { status } });
  }
  if (status === 429) {
    const seconds = retryAfterHeader ? Number.parseInt(retryAfterHeader, 10) : Number.NaN;
    return new RateLimitedError(message, {
      details: { status },
      retryAfterMs: Number.isNaN(seconds) ? undefined : seconds * 1000,
    });
  }
  if (status === 400 || status === 422) {
    return new ValidationError(message, { details: { status } });
  }
  if (status >= 500) {
    return new NetworkError(`HTTP ${status}: ${message}`, { status });
  }
  return new UnknownError(`HTTP ${status}: ${message}`, { details: { status } });
}

export abstract class HttpIntegrationAdapter implements AdapterContract {
  readonly name: string;
  readonly category: AdapterCategory;
  protected readonly config: AdapterConfig;
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string;
  private lastUsed: number | null = null;

  constructor(config: AdapterConfig, options?: HttpAdapterOptions) {
    this.name = config.name;
    this.category = config.category;
    this.config = config;
    this.fetchImpl = options?.fetchImpl ?? ((input, init) => fetch(input, init));
    this.userAgent = options?.userAgent ?? 'integration-hub/1.0';
  }

  get lastUsedAt(): number | null {
    return this.lastUsed;
  }

  abstract connect(options?: CallOptions): Promise<boolean>;
  abstract fetchProducts(pagination: Pagination, options?: CallOptions): Promise<RawProduct[]>;
  abstract pushProduct(product: ProductPayload, options?: CallOptions): Promise<PushProductResult>;
  abstract pushStockUpdate(externalId: string, quantity: number, options?: CallOptions): Promise<boolean>;
  abstract pushPriceUpdate(externalId: string, price: number, options?: CallOptions): Promise<boolean>;
  abstract fetchOrders(dateRange: DateRange, pagination: Pagination, options?: CallOptions): Promise<RawOrder[]>;

  async healthCheck(options?: CallOptions): Promise<boolean> {
    try {
      await this.request('GET', this.healthPath(), { signal: options?.signal, timeoutMs: HEALTH_TIMEOUT_MS });
      return true;
    } catch (error) {
      logger.debug('Health check request failed', { integration: this.name, error: classifyError(error).message });
      return false;
    }
  }

  protected healthPath(): string {
    return '/health';
  }

  protected abstract baseUrl(): string;

  protected abstract authHeaders(): Record<string, string>;

  /** Read a credential or fail with AuthenticationError. */
  protected credential(key: string): string {
    const value = this.config.credentials[key];
    if (!value) {
      throw new AuthenticationError(`Missing credential '${key}' for ${this.name}`);
    }
    return value;
  }

  /**
   * Perform one HTTP exchange and return the parsed JSON body (or null for an
   * empty body). Throws a classified IntegrationError on failure.
   */
  protected async request(method: HttpMethod, path: string, init: RequestInitOptions = {}): Promise<unknown> {
    const url = new URL(this.baseUrl().replace(/\/$/, '') + path);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    // Before the timer is armed: a missing credential throws here
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
      ...this.authHeaders(),
    };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const timeoutMs = init.timeoutMs ?? this.config.tunables.timeoutMs;
    const { controller, dispose } = linkAbortSignal(init.signal);
    const timer = setTimeout(() => {
      controller.abort(new NetworkError(`${this.name} ${method} ${path} timed out after ${timeoutMs}ms`, { timedOut: true }));
    }, timeoutMs);

    this.lastUsed = Date.now();
    const startTime = Date.now();

    try {
      const response = await this.fetchImpl(url.toString(), {
        method,
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: controller.signal,
      });
      const text = await response.text();

      logger.debug('Integration HTTP exchange', {
        integration: this.name,
        method,
        path,
        status: response.status,
        durationMs: Date.now() - startTime,
      });

      if (!response.ok) {
        throw errorForStatus(response.status, extractErrorMessage(text) || response.statusText, response.headers.get('retry-after'));
      }

      if (!text) {
        return null;
      }
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new UnknownError(`${this.name} returned a non-JSON body`, { cause: error });
      }
    } catch (error) {
      if (controller.signal.aborted && controller.signal.reason instanceof Error) {
        throw classifyError(controller.signal.reason);
      }
      if (error instanceof TypeError) {
        // fetch() reports connection failures as TypeError('fetch failed')
        throw new NetworkError(`${this.name} unreachable: ${error.message}`, { cause: error });
      }
      throw classifyError(error);
    } finally {
      clearTimeout(timer);
      dispose();
    }
  }

  /**
   * Validate a response body, turning schema mismatches into UnknownError so
   * a changed remote format is reported rather than silently mis-read.
   */
  protected parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new UnknownError(`${this.name} returned an unexpected ${what} payload`, {
        details: result.error.flatten(),
      });
    }
    return result.data;
  }
}

// ============================================================================
// Generic REST marketplace
// ============================================================================

const idSchema = z.union([z.string(), z.number()]).transform(String);

const restProductSchema = z.object({
  id: idSchema,
  sku: z.string().optional(),
  title: z.string().optional(),
  price: z.number().optional(),
  stock: z.number().optional(),
}).passthrough();

const restOrderSchema = z.object({
  id: idSchema,
  number: z.string().optional(),
  status: z.string().optional(),
  total: z.number().optional(),
  currency: z.string().optional(),
  createdAt: z.string().optional(),
}).passthrough();

const restListSchema = <T extends z.ZodTypeAny>(item: T) => z.object({ items: z.array(item) });

/**
 * Generic JSON/REST adapter for integrations configured with an `apiEndpoint`
 * and a bearer `api_key`.
 */
export class RestMarketplaceAdapter extends HttpIntegrationAdapter {
  protected baseUrl(): string {
    if (!this.config.apiEndpoint) {
      throw new ValidationError(`Integration ${this.name} has no apiEndpoint configured`);
    }
    return this.config.apiEndpoint;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.credential('api_key')}` };
  }

  async connect(options?: CallOptions): Promise<boolean> {
    await this.request('GET', '/auth/check', { signal: options?.signal });
    return true;
  }

  async fetchProducts(pagination: Pagination, options?: CallOptions): Promise<RawProduct[]> {
    const body = await this.request('GET', '/products', {
      query: { page: pagination.page, size: pagination.size },
      signal: options?.signal,
    });
    const { items } = this.parse(restListSchema(restProductSchema), body, 'product list');
    return items.map(({ id, sku, title, price, stock, ...raw }) => ({ externalId: id, sku, title, price, stock, raw }));
  }

  async pushProduct(product: ProductPayload, options?: CallOptions): Promise<PushProductResult> {
    const body = await this.request('POST', '/products', {
      body: {
        sku: product.sku,
        title: product.title,
        price: product.price,
        stock: product.stock,
        currency: product.currency,
        description: product.description,
        attributes: product.attributes,
      },
      signal: options?.signal,
    });
    const { id } = this.parse(z.object({ id: idSchema }), body, 'product create');
    return { externalId: id };
  }

  async pushStockUpdate(externalId: string, quantity: number, options?: CallOptions): Promise<boolean> {
    // PUT with the absolute quantity keeps repeated pushes idempotent
    await this.request('PUT', `/products/${encodeURIComponent(externalId)}/stock`, {
      body: { quantity },
      signal: options?.signal,
    });
    return true;
  }

  async pushPriceUpdate(externalId: string, price: number, options?: CallOptions): Promise<boolean> {
    await this.request('PUT', `/products/${encodeURIComponent(externalId)}/price`, {
      body: { price },
      signal: options?.signal,
    });
    return true;
  }

  async fetchOrders(dateRange: DateRange, pagination: Pagination, options?: CallOptions): Promise<RawOrder[]> {
    const body = await this.request('GET', '/orders', {
      query: { from: dateRange.from, to: dateRange.to, page: pagination.page, size: pagination.size },
      signal: options?.signal,
    });
    const { items } = this.parse(restListSchema(restOrderSchema), body, 'order list');
    return items.map(({ id, number, status, total, currency, createdAt, ...raw }) => ({
      externalOrderId: id,
      orderNumber: number,
      status,
      totalAmount: total,
      currency,
      orderDate: createdAt,
      raw,
    }));
  }
}
