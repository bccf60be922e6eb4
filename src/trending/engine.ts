/**
 * Trendwire — Trending Engine
 *
 * Orchestrates one aggregation cycle:
 * 1. Fan out to every configured source concurrently
 * 2. Weight scores per source, annotate raw scores
 * 3. Deduplicate by URL and rank by weighted score
 * 4. Cache the ranked list for the refresh interval
 *
 * Also owns per-source health and the background refresh loop.
 * Construct one per deployment and pass it to whatever needs it.
 */

import type { EngineSnapshot, SourceHealth, TrendingItem } from '../types';
import type { TrendingSource } from './sources/base';
import { TrendingCache, type Clock } from './cache';
import { SourceHealthRegistry, serializeHealth } from './health';
import { applyWeight, mergeResults } from './merge';
import { RefreshScheduler } from './scheduler';
import { errorMessage } from '../lib/errors';
import { logger as rootLogger, timeOperation, type Logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface TrendingEngineOptions {
  /** Page size used when callers give no limit; also the minimum fetch size */
  defaultLimit: number;
  /** Cache TTL and background refresh period */
  refreshIntervalSeconds: number;
  /** Epoch-ms clock, injectable for tests */
  clock?: Clock;
  logger?: Logger;
}

export interface FetchTrendingOptions {
  limit?: number;
  forceRefresh?: boolean;
}

// ============================================================
// ENGINE
// ============================================================

export class TrendingEngine {
  readonly defaultLimit: number;
  readonly refreshIntervalSeconds: number;

  private readonly sources: readonly TrendingSource[];
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly cache: TrendingCache;
  private readonly health: SourceHealthRegistry;
  private readonly scheduler: RefreshScheduler;
  private lastRefreshAt: number | null = null;

  constructor(sources: Iterable<TrendingSource>, options: TrendingEngineOptions) {
    if (!Number.isInteger(options.defaultLimit) || options.defaultLimit < 1) {
      throw new RangeError(`defaultLimit must be a positive integer, got ${options.defaultLimit}`);
    }
    if (!(options.refreshIntervalSeconds > 0)) {
      throw new RangeError(`refreshIntervalSeconds must be positive, got ${options.refreshIntervalSeconds}`);
    }

    this.sources = [...sources];
    this.defaultLimit = options.defaultLimit;
    this.refreshIntervalSeconds = options.refreshIntervalSeconds;
    this.clock = options.clock ?? Date.now;
    this.logger = (options.logger ?? rootLogger).child({ component: 'trending-engine' });
    this.cache = new TrendingCache(this.clock);
    this.health = new SourceHealthRegistry(
      this.sources.map(s => s.name),
      () => new Date(this.clock())
    );
    this.scheduler = new RefreshScheduler(() => this.fetchTrending({ forceRefresh: true }), {
      intervalMs: this.refreshIntervalSeconds * 1000,
      name: 'trending',
      logger: this.logger,
    });
  }

  get sourceNames(): string[] {
    return this.sources.map(s => s.name);
  }

  /**
   * Ranked trending items, at most `limit` long.
   * Serves from cache when a valid entry exists for exactly `limit`.
   * Never rejects: failures degrade to stale or empty results.
   */
  async fetchTrending(options: FetchTrendingOptions = {}): Promise<TrendingItem[]> {
    const limit = this.resolveLimit(options.limit);

    try {
      if (!options.forceRefresh) {
        const entry = await this.cache.getValid(limit);
        if (entry) {
          this.logger.debug('Cache hit', { limit });
          return entry.items.slice(0, limit);
        }
      }

      const items = await this.refresh(limit);
      return items.slice(0, limit);
    } catch (error) {
      const stale = this.cache.peek(limit);
      this.logger.error('Trending refresh failed, serving last known result', {
        limit,
        staleItems: stale?.items.length ?? 0,
        error: errorMessage(error),
      });
      return stale ? stale.items.slice(0, limit) : [];
    }
  }

  getSourceHealth(): SourceHealth[] {
    return this.health.snapshot();
  }

  /**
   * Status metadata for observability endpoints.
   */
  snapshot(): EngineSnapshot {
    return {
      defaultLimit: this.defaultLimit,
      refreshIntervalSeconds: this.refreshIntervalSeconds,
      lastRefreshAt: this.lastRefreshAt === null ? null : new Date(this.lastRefreshAt).toISOString(),
      sources: this.health.snapshot().map(serializeHealth),
      cachedLimits: this.cache.keys(),
      backgroundRefresh: this.scheduler.isRunning,
    };
  }

  /** Epoch ms of the last completed refresh, or null */
  get lastRefreshTime(): number | null {
    return this.lastRefreshAt;
  }

  /**
   * Ensure the periodic refresher is running.
   */
  registerBackgroundRefresh(): void {
    this.scheduler.start();
  }

  /**
   * Stop the periodic refresher and wait for it to exit.
   */
  async shutdown(): Promise<void> {
    await this.scheduler.stop();
  }

  // ============================================================
  // REFRESH
  // ============================================================

  private resolveLimit(limit: number | undefined): number {
    if (limit === undefined || !Number.isFinite(limit)) return this.defaultLimit;
    const whole = Math.floor(limit);
    return whole >= 1 ? whole : this.defaultLimit;
  }

  private async refresh(limit: number): Promise<readonly TrendingItem[]> {
    const fetchLimit = Math.max(limit, this.defaultLimit);
    this.logger.debug('Refreshing trending cache', { limit, fetchLimit });

    // Promise.all keeps configuration order regardless of completion order
    const results = await timeOperation(
      'Source fan-out',
      () => Promise.all(this.sources.map(source => this.fetchSource(source, fetchLimit))),
      this.logger
    );

    const merged = mergeResults(results);
    const entry = await this.cache.store([fetchLimit, limit], merged, this.refreshIntervalSeconds * 1000);
    this.lastRefreshAt = this.clock();

    this.logger.info('Trending cache refreshed', {
      fetchLimit,
      items: merged.length,
      failing: this.health.failing(),
    });

    return entry.items;
  }

  private async fetchSource(source: TrendingSource, limit: number): Promise<TrendingItem[]> {
    try {
      const items = await source.fetch(limit);
      this.health.markOk(source.name);
      return applyWeight(items, source.weight);
    } catch (error) {
      const message = `${source.name} fetch failed: ${errorMessage(error)}`;
      this.logger.warn(message, { source: source.name });
      this.health.markError(source.name, message);
      return [];
    }
  }
}
