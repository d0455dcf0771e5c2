/**
 * Sync read cache
 *
 * Short-TTL memoization of idempotent adapter reads (product and order
 * listings) within and across sync cycles. Size is bounded by an LRU and
 * lru-cache checks each entry's TTL on read, so there is no background sweep.
 *
 * @module cache
 */

import { createHash } from 'crypto';
import { LRUCache } from 'lru-cache';
import { logger } from '../utils/logger';

export interface CacheStatsSink {
  recordCacheHit(): void;
  recordCacheMiss(): void;
}

export interface SyncCacheOptions {
  maxEntries: number;
  defaultTtlMs: number;
  stats?: CacheStatsSink;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  inFlight: number;
}

/** One shared fetch and the callers still waiting on it. */
interface Flight<V> {
  promise: Promise<V>;
  controller: AbortController;
  waiters: number;
}

export interface FetchResult<V> {
  value: V;
  /** False only for the caller whose fetcher ran */
  cached: boolean;
}

/**
 * Build an adapter-scoped cache key. Arguments are hashed so pagination and
 * date ranges produce stable, bounded keys.
 */
export function cacheKey(integrationId: string, operation: string, args?: unknown): string {
  const digest = createHash('sha256')
    .update(JSON.stringify(args ?? null))
    .digest('hex')
    .slice(0, 16);
  return `${integrationId}:${operation}:${digest}`;
}

export class SyncCache<V extends {}> {
  private readonly entries: LRUCache<string, V>;
  private readonly inFlight = new Map<string, Flight<V>>();
  private readonly defaultTtlMs: number;
  private readonly stats?: CacheStatsSink;
  private hits = 0;
  private misses = 0;

  constructor(options: SyncCacheOptions) {
    this.entries = new LRUCache<string, V>({
      max: Math.max(1, options.maxEntries),
      ttl: Math.max(1, options.defaultTtlMs),
    });
    this.defaultTtlMs = options.defaultTtlMs;
    this.stats = options.stats;
  }

  get(key: string): V | undefined {
    const status: LRUCache.Status<V> = {};
    const value = this.entries.get(key, { status });
    if (value === undefined) {
      if (status.get === 'stale') {
        logger.debug('Cache EXPIRED', { key });
      }
      this.recordMiss();
      return undefined;
    }

    this.recordHit();
    return value;
  }

  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    if (ttlMs <= 0) {
      return;
    }
    this.entries.set(key, value, { ttl: ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every key under a prefix (an integration's namespace).
   */
  deleteByPrefix(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    for (const flight of this.inFlight.values()) {
      flight.controller.abort(new Error('Cache cleared'));
    }
    this.inFlight.clear();
  }

  /**
   * Return the cached value or run `fetcher` once for all concurrent callers
   * asking for the same key. Rejections are not cached.
   *
   * The fetcher gets a signal of its own, not the first caller's. A caller
   * whose `signal` aborts stops waiting with that signal's reason; the shared
   * fetch is aborted only once no caller is left waiting on it.
   */
  async getOrFetch(
    key: string,
    ttlMs: number,
    fetcher: (signal: AbortSignal) => Promise<V>,
    signal?: AbortSignal
  ): Promise<FetchResult<V>> {
    signal?.throwIfAborted();

    const cached = this.get(key);
    if (cached !== undefined) {
      return { value: cached, cached: true };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return { value: await this.wait(key, pending, signal), cached: true };
    }

    const controller = new AbortController();
    const flight: Flight<V> = {
      controller,
      waiters: 0,
      promise: Promise.resolve()
        .then(() => fetcher(controller.signal))
        .then((value) => {
          if (this.inFlight.get(key) === flight) {
            this.set(key, value, ttlMs);
          }
          return value;
        })
        .finally(() => {
          if (this.inFlight.get(key) === flight) {
            this.inFlight.delete(key);
          }
        }),
    };
    this.inFlight.set(key, flight);

    return { value: await this.wait(key, flight, signal), cached: false };
  }

  getStats(): CacheStats {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      inFlight: this.inFlight.size,
    };
  }

  private wait(key: string, flight: Flight<V>, signal?: AbortSignal): Promise<V> {
    flight.waiters++;
    let waiting = true;

    return new Promise<V>((resolve, reject) => {
      const leave = (): void => {
        waiting = false;
        flight.waiters--;
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = (): void => {
        leave();
        if (flight.waiters === 0 && !flight.controller.signal.aborted) {
          if (this.inFlight.get(key) === flight) {
            this.inFlight.delete(key);
          }
          flight.controller.abort(signal?.reason);
          logger.debug('Cache fetch abandoned', { key });
        }
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      flight.promise.then(
        (value) => {
          if (waiting) {
            leave();
            resolve(value);
          }
        },
        (error: unknown) => {
          if (waiting) {
            leave();
            reject(error);
          }
        }
      );
    });
  }

  private recordHit(): void {
    this.hits++;
    this.stats?.recordCacheHit();
  }

  private recordMiss(): void {
    this.misses++;
    this.stats?.recordCacheMiss();
  }
}
