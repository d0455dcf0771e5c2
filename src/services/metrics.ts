/**
 * Integration metrics
 *
 * Per-integration counters plus global, per-category and per-priority
 * aggregation.
 * Snapshots are plain copies: safe to take while syncs are in flight, but
 * not transactionally consistent with them.
 *
 * @module services/metrics
 */

import type { AdapterCategory, IntegrationPriority, SyncOperation } from './integrations/adapter-contract';
import type { IntegrationErrorKind } from '../core/errors';
import type { SkipReason } from './integrations/sync-types';

export interface IntegrationIdentity {
  integrationId: string;
  name: string;
  category: AdapterCategory;
  priority: IntegrationPriority;
}

interface IntegrationMetricsState extends IntegrationIdentity {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  skipped: Record<SkipReason, number>;
  averageResponseTimeMs: number;
  lastRequestAt: number | null;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  lastErrorKind: IntegrationErrorKind | null;
  failuresByKind: Partial<Record<IntegrationErrorKind, number>>;
  circuitBreakerTrips: number;
  healthChecks: number;
  healthyChecks: number;
}

export interface IntegrationMetrics extends IntegrationMetricsState {
  /** Percentage of failed requests, 0–100 */
  errorRate: number;
  /** Share of health checks that passed, 0–100; 100 before the first check */
  uptimePercentage: number;
}

export interface AggregateMetrics {
  integrations: number;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  skippedRequests: number;
  averageResponseTimeMs: number;
  errorRate: number;
  successRate: number;
}

export interface MetricsSnapshot {
  generatedAt: number;
  global: AggregateMetrics;
  byIntegration: IntegrationMetrics[];
  byCategory: Partial<Record<AdapterCategory, AggregateMetrics>>;
  byPriority: Partial<Record<IntegrationPriority, AggregateMetrics>>;
  cache: { hits: number; misses: number; hitRate: number };
  syncRuns: {
    total: number;
    byOperation: Record<SyncOperation, number>;
    averageDurationMs: number;
  };
}

const createState = (identity: IntegrationIdentity): IntegrationMetricsState => ({
  ...identity,
  totalRequests: 0,
  successfulRequests: 0,
  failedRequests: 0,
  skipped: { circuit_open: 0, rate_limited: 0, no_mapping: 0 },
  averageResponseTimeMs: 0,
  lastRequestAt: null,
  lastSuccessAt: null,
  lastFailureAt: null,
  lastErrorKind: null,
  failuresByKind: {},
  circuitBreakerTrips: 0,
  healthChecks: 0,
  healthyChecks: 0,
});

const percent = (part: number, whole: number): number => (whole > 0 ? (part / whole) * 100 : 0);

export class MetricsCollector {
  private readonly integrations = new Map<string, IntegrationMetricsState>();
  private cacheHits = 0;
  private cacheMisses = 0;
  private syncRunCount = 0;
  private syncRunDurationTotal = 0;
  private runsByOperation: Record<SyncOperation, number> = { products: 0, orders: 0, stock: 0, price: 0 };

  recordSuccess(identity: IntegrationIdentity, durationMs: number): void {
    const state = this.stateFor(identity);
    this.recordRequest(state, durationMs);
    state.successfulRequests++;
    state.lastSuccessAt = Date.now();
  }

  recordFailure(identity: IntegrationIdentity, durationMs: number, kind: IntegrationErrorKind): void {
    const state = this.stateFor(identity);
    this.recordRequest(state, durationMs);
    state.failedRequests++;
    state.lastFailureAt = Date.now();
    state.lastErrorKind = kind;
    state.failuresByKind[kind] = (state.failuresByKind[kind] ?? 0) + 1;
  }

  /** Calls that were never attempted; they do not count as requests. */
  recordSkip(identity: IntegrationIdentity, reason: SkipReason): void {
    this.stateFor(identity).skipped[reason]++;
  }

  recordCircuitTrip(identity: IntegrationIdentity): void {
    this.stateFor(identity).circuitBreakerTrips++;
  }

  recordHealthCheck(identity: IntegrationIdentity, healthy: boolean): void {
    const state = this.stateFor(identity);
    state.healthChecks++;
    if (healthy) {
      state.healthyChecks++;
    }
  }

  recordSyncRun(operation: SyncOperation, durationMs: number): void {
    this.syncRunCount++;
    this.syncRunDurationTotal += durationMs;
    this.runsByOperation[operation]++;
  }

  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordCacheMiss(): void {
    this.cacheMisses++;
  }

  getIntegrationMetrics(integrationId: string): IntegrationMetrics | null {
    const state = this.integrations.get(integrationId);
    return state ? this.toPublic(state) : null;
  }

  forget(integrationId: string): void {
    this.integrations.delete(integrationId);
  }

  getSnapshot(): MetricsSnapshot {
    const byIntegration = [...this.integrations.values()].map((state) => this.toPublic(state));

    const byCategory: Partial<Record<AdapterCategory, AggregateMetrics>> = {};
    for (const category of new Set(byIntegration.map((m) => m.category))) {
      byCategory[category] = aggregate(byIntegration.filter((m) => m.category === category));
    }

    const byPriority: Partial<Record<IntegrationPriority, AggregateMetrics>> = {};
    for (const priority of new Set(byIntegration.map((m) => m.priority))) {
      byPriority[priority] = aggregate(byIntegration.filter((m) => m.priority === priority));
    }

    const lookups = this.cacheHits + this.cacheMisses;

    return {
      generatedAt: Date.now(),
      global: aggregate(byIntegration),
      byIntegration,
      byCategory,
      byPriority,
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        hitRate: lookups > 0 ? this.cacheHits / lookups : 0,
      },
      syncRuns: {
        total: this.syncRunCount,
        byOperation: { ...this.runsByOperation },
        averageDurationMs: this.syncRunCount > 0 ? this.syncRunDurationTotal / this.syncRunCount : 0,
      },
    };
  }

  reset(): void {
    this.integrations.clear();
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.syncRunCount = 0;
    this.syncRunDurationTotal = 0;
    this.runsByOperation = { products: 0, orders: 0, stock: 0, price: 0 };
  }

  private recordRequest(state: IntegrationMetricsState, durationMs: number): void {
    const n = state.totalRequests;
    state.averageResponseTimeMs = (state.averageResponseTimeMs * n + durationMs) / (n + 1);
    state.totalRequests = n + 1;
    state.lastRequestAt = Date.now();
  }

  private stateFor(identity: IntegrationIdentity): IntegrationMetricsState {
    let state = this.integrations.get(identity.integrationId);
    if (!state) {
      state = createState(identity);
      this.integrations.set(identity.integrationId, state);
    }
    return state;
  }

  private toPublic(state: IntegrationMetricsState): IntegrationMetrics {
    return {
      ...state,
      skipped: { ...state.skipped },
      failuresByKind: { ...state.failuresByKind },
      errorRate: percent(state.failedRequests, state.totalRequests),
      uptimePercentage: state.healthChecks > 0 ? percent(state.healthyChecks, state.healthChecks) : 100,
    };
  }
}

function aggregate(metrics: IntegrationMetrics[]): AggregateMetrics {
  let totalRequests = 0;
  let successfulRequests = 0;
  let failedRequests = 0;
  let skippedRequests = 0;
  let weightedLatency = 0;

  for (const m of metrics) {
    totalRequests += m.totalRequests;
    successfulRequests += m.successfulRequests;
    failedRequests += m.failedRequests;
    skippedRequests += m.skipped.circuit_open + m.skipped.rate_limited + m.skipped.no_mapping;
    weightedLatency += m.averageResponseTimeMs * m.totalRequests;
  }

  return {
    integrations: metrics.length,
    totalRequests,
    successfulRequests,
    failedRequests,
    skippedRequests,
    averageResponseTimeMs: totalRequests > 0 ? weightedLatency / totalRequests : 0,
    errorRate: percent(failedRequests, totalRequests),
    successRate: percent(successfulRequests, totalRequests),
  };
}

const escapeLabel = (value: string): string => value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');

/**
 * Render a snapshot in the Prometheus text exposition format.
 */
export function renderPrometheusMetrics(snapshot: MetricsSnapshot): string {
  const lines: string[] = [];
  const counter = (name: string, help: string, type: 'counter' | 'gauge' = 'counter'): void => {
    lines.push(`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`);
  };
  const labels = (m: IntegrationIdentity): string =>
    `integration="${escapeLabel(m.name)}",id="${escapeLabel(m.integrationId)}",category="${m.category}",priority="${m.priority}"`;

  counter('hub_integration_requests_total', 'Adapter calls attempted');
  for (const m of snapshot.byIntegration) {
    lines.push(`hub_integration_requests_total{${labels(m)},outcome="success"} ${m.successfulRequests}`);
    lines.push(`hub_integration_requests_total{${labels(m)},outcome="failure"} ${m.failedRequests}`);
  }

  counter('hub_integration_skipped_total', 'Adapter calls skipped before dispatch');
  for (const m of snapshot.byIntegration) {
    for (const [reason, count] of Object.entries(m.skipped)) {
      lines.push(`hub_integration_skipped_total{${labels(m)},reason="${reason}"} ${count}`);
    }
  }

  counter('hub_integration_response_time_ms', 'Rolling average adapter response time', 'gauge');
  for (const m of snapshot.byIntegration) {
    lines.push(`hub_integration_response_time_ms{${labels(m)}} ${m.averageResponseTimeMs.toFixed(2)}`);
  }

  counter('hub_circuit_breaker_trips_total', 'Circuit breaker open transitions');
  for (const m of snapshot.byIntegration) {
    lines.push(`hub_circuit_breaker_trips_total{${labels(m)}} ${m.circuitBreakerTrips}`);
  }

  counter('hub_integration_uptime_percent', 'Share of passing health checks', 'gauge');
  for (const m of snapshot.byIntegration) {
    lines.push(`hub_integration_uptime_percent{${labels(m)}} ${m.uptimePercentage.toFixed(2)}`);
  }

  counter('hub_sync_runs_total', 'Orchestrated sync runs');
  for (const [operation, count] of Object.entries(snapshot.syncRuns.byOperation)) {
    lines.push(`hub_sync_runs_total{operation="${operation}"} ${count}`);
  }

  counter('hub_cache_lookups_total', 'Read cache lookups');
  lines.push(`hub_cache_lookups_total{result="hit"} ${snapshot.cache.hits}`);
  lines.push(`hub_cache_lookups_total{result="miss"} ${snapshot.cache.misses}`);

  return lines.join('\n') + '\n';
}
