/**
 * Integration Adapter System - Core Types & Interfaces
 *
 * Every external system (marketplace, storefront, carrier, accounting,
 * payment or social platform) is reached through an object satisfying
 * `AdapterContract`. The orchestrator only ever talks to this interface;
 * each adapter's wire format stays private to it.
 *
 * @module integrations/adapter-contract
 */

// ============================================================================
// Identity & Status
// ============================================================================

export const ADAPTER_CATEGORIES = [
  'marketplace',
  'ecommerce',
  'cargo',
  'accounting',
  'invoice',
  'payment',
  'social',
] as const;

export type AdapterCategory = (typeof ADAPTER_CATEGORIES)[number];

export const INTEGRATION_STATUSES = ['inactive', 'active', 'error', 'maintenance', 'suspended'] as const;

export type IntegrationStatus = (typeof INTEGRATION_STATUSES)[number];

/** Operator-assigned importance; reported in metrics, never used for scheduling. */
export const INTEGRATION_PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;

export type IntegrationPriority = (typeof INTEGRATION_PRIORITIES)[number];

export const SYNC_OPERATIONS = ['products', 'orders', 'stock', 'price'] as const;

export type SyncOperation = (typeof SYNC_OPERATIONS)[number];

/**
 * Which categories receive each operation. Stock and price pushes only make
 * sense where products are listed for sale.
 */
export const OPERATION_CATEGORIES: Record<SyncOperation, readonly AdapterCategory[]> = {
  products: ['marketplace', 'ecommerce'],
  orders: ['marketplace', 'ecommerce'],
  stock: ['marketplace', 'ecommerce'],
  price: ['marketplace', 'ecommerce'],
};

/** Opaque credential map; values are secrets and never logged. */
export type Credentials = Record<string, string>;

// ============================================================================
// Configuration
// ============================================================================

/**
 * Operational tunables. All durations are milliseconds.
 */
export interface AdapterTunables {
  timeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
  /** Requests admitted per rate-limit window */
  rateLimit: number;
  rateLimitWindowMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerCoolDownMs: number;
  cacheTtlMs: number;
}

export interface AdapterConfig {
  id: string;
  userId: string;
  /** Adapter name, e.g. `trendyol`; selects the factory */
  name: string;
  displayName: string;
  category: AdapterCategory;
  priority: IntegrationPriority;
  apiEndpoint?: string;
  credentials: Credentials;
  tunables: AdapterTunables;
  status: IntegrationStatus;
  features: string[];
  healthy: boolean;
  lastError?: string;
  lastConnectedAt?: string;
  lastSyncAt?: string;
  lastHealthCheckAt?: string;
  createdAt: string;
  updatedAt: string;
  deletedAt?: string;
}

/** AdapterConfig as returned to callers outside the registry (no credentials). */
export type PublicAdapterConfig = Omit<AdapterConfig, 'credentials'> & { credentialKeys: string[] };

export function toPublicConfig(config: AdapterConfig): PublicAdapterConfig {
  const { credentials, ...rest } = config;
  return { ...rest, credentialKeys: Object.keys(credentials).sort() };
}

// ============================================================================
// Wire-agnostic payloads
// ============================================================================

export interface Pagination {
  page: number;
  size: number;
}

export interface DateRange {
  from: string;
  to: string;
}

export interface RawProduct {
  externalId: string;
  sku?: string;
  title?: string;
  price?: number;
  stock?: number;
  /** Adapter-specific fields passed through untouched */
  raw?: Record<string, unknown>;
}

export interface RawOrder {
  externalOrderId: string;
  orderNumber?: string;
  status?: string;
  totalAmount?: number;
  currency?: string;
  orderDate?: string;
  raw?: Record<string, unknown>;
}

/** Internal product as handed to `pushProduct`. */
export interface ProductPayload {
  productId: string;
  sku: string;
  title: string;
  price: number;
  stock: number;
  currency?: string;
  description?: string;
  attributes?: Record<string, string>;
}

export interface PushProductResult {
  externalId: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

// ============================================================================
// Contract
// ============================================================================

/**
 * Capability set every concrete adapter implements. Every method performs
 * network I/O; the only local state a call may touch is `lastUsedAt`.
 */
export interface AdapterContract {
  readonly name: string;
  readonly category: AdapterCategory;
  readonly lastUsedAt: number | null;

  /** Validate credentials. Throws AuthenticationError or NetworkError. */
  connect(options?: CallOptions): Promise<boolean>;

  fetchProducts(pagination: Pagination, options?: CallOptions): Promise<RawProduct[]>;

  /** Publish an internal product; returns the adapter-specific id. */
  pushProduct(product: ProductPayload, options?: CallOptions): Promise<PushProductResult>;

  /** Idempotent: pushing the same quantity twice leaves the same remote state. */
  pushStockUpdate(externalId: string, quantity: number, options?: CallOptions): Promise<boolean>;

  /** Idempotent, like `pushStockUpdate`. */
  pushPriceUpdate(externalId: string, price: number, options?: CallOptions): Promise<boolean>;

  fetchOrders(dateRange: DateRange, pagination: Pagination, options?: CallOptions): Promise<RawOrder[]>;

  /** Cheap liveness check; callers bound it with a short fixed timeout. */
  healthCheck(options?: CallOptions): Promise<boolean>;

  /** Optional teardown, called on deactivate. */
  disconnect?(): Promise<void>;
}

export type AdapterFactory = (config: AdapterConfig) => AdapterContract;
