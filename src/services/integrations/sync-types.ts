/**
 * Sync outcome records: the per-adapter SyncResult, the persisted SyncLog and
 * the ProductMapping written after successful product pushes.
 *
 * @module integrations/sync-types
 */

import { z } from 'zod';
import { INTEGRATION_ERROR_KINDS } from '../../core/errors';
import { ADAPTER_CATEGORIES, SYNC_OPERATIONS } from './adapter-contract';
import type { AdapterCategory, RawOrder, RawProduct, SyncOperation } from './adapter-contract';

export const SKIP_REASONS = ['circuit_open', 'rate_limited', 'no_mapping'] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export const SYNC_FAILURE_KINDS = [...INTEGRATION_ERROR_KINDS, 'cancelled'] as const;

export type SyncFailureKind = (typeof SYNC_FAILURE_KINDS)[number];

export type SyncResultStatus = 'success' | 'failed' | 'skipped';

/** An order as returned by an order sync, tagged with where it came from. */
export interface SyncedOrder extends RawOrder {
  source: string;
  integrationId: string;
  syncedAt: string;
}

export interface SyncResult {
  integrationId: string;
  integrationName: string;
  category: AdapterCategory;
  status: SyncResultStatus;
  success: boolean;
  skipReason?: SkipReason;
  itemsTotal: number;
  itemsSucceeded: number;
  itemsFailed: number;
  /** Adapter calls made, retries included */
  attempts: number;
  durationMs: number;
  /** Listing served from the read cache */
  cached?: boolean;
  error?: { kind: SyncFailureKind; message: string };
  orders?: SyncedOrder[];
  products?: RawProduct[];
}

/**
 * - `success`: every dispatched adapter succeeded
 * - `partial`: at least one success and one failure
 * - `failed`: nothing succeeded and at least one adapter failed
 * - `skipped`: every adapter was skipped
 * - `empty`: no adapter was eligible
 */
export type SyncLogStatus = 'success' | 'partial' | 'failed' | 'skipped' | 'empty';

export interface SyncLog {
  id: string;
  userId: string;
  operation: SyncOperation;
  status: SyncLogStatus;
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
  results: SyncResult[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface SyncLogFilter {
  operation?: SyncOperation;
  integrationId?: string;
  limit?: number;
  offset?: number;
}

export interface ProductMapping {
  productId: string;
  integrationId: string;
  integrationName: string;
  userId: string;
  externalId: string;
  createdAt: string;
  updatedAt: string;
  lastSyncedAt: string;
}

export type ProductMappingInput = Pick<ProductMapping, 'productId' | 'integrationId' | 'integrationName' | 'userId' | 'externalId'>;

// ============================================================================
// Stored shapes
// ============================================================================

const syncResultSchema = z.object({
  integrationId: z.string(),
  integrationName: z.string(),
  category: z.enum(ADAPTER_CATEGORIES),
  status: z.enum(['success', 'failed', 'skipped']),
  success: z.boolean(),
  skipReason: z.enum(SKIP_REASONS).optional(),
  itemsTotal: z.number(),
  itemsSucceeded: z.number(),
  itemsFailed: z.number(),
  attempts: z.number(),
  durationMs: z.number(),
  cached: z.boolean().optional(),
  error: z.object({
    kind: z.enum(SYNC_FAILURE_KINDS),
    message: z.string(),
  }).optional(),
});

export const syncLogSchema: z.ZodType<SyncLog> = z.object({
  id: z.string(),
  userId: z.string(),
  operation: z.enum(SYNC_OPERATIONS),
  status: z.enum(['success', 'partial', 'failed', 'skipped', 'empty']),
  total: z.number(),
  successful: z.number(),
  failed: z.number(),
  skipped: z.number(),
  cancelled: z.boolean(),
  results: z.array(syncResultSchema),
  startedAt: z.string(),
  completedAt: z.string(),
  durationMs: z.number(),
});

export const productMappingSchema: z.ZodType<ProductMapping> = z.object({
  productId: z.string(),
  integrationId: z.string(),
  integrationName: z.string(),
  userId: z.string(),
  externalId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  lastSyncedAt: z.string(),
});

/**
 * The audit copy of a log: fetched listings are returned to the caller but
 * not persisted.
 */
export function toAuditRecord(log: SyncLog): SyncLog {
  return {
    ...log,
    results: log.results.map(({ orders: _orders, products: _products, ...result }) => result),
  };
}
