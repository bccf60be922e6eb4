/**
 * Trendwire — Trending Types v1.0
 *
 * Normalized items produced by every source adapter, plus the
 * per-source health record the engine keeps for observability.
 */

import { z } from 'zod';

// ============================================================
// TRENDING ITEM
// ============================================================

export const TrendingItemSchema = z.object({
  title: z.string().min(1, 'Title cannot be empty'),
  url: z.string().min(1, 'URL cannot be empty'),
  source: z.string().min(1),
  score: z.number().finite(),
  metadata: z.record(z.unknown()).default({}),
});
export type TrendingItem = Readonly<z.infer<typeof TrendingItemSchema>>;

// ============================================================
// SOURCE HEALTH
// ============================================================

export const SourceHealthStatusSchema = z.enum(['unknown', 'ok', 'error']);
export type SourceHealthStatus = z.infer<typeof SourceHealthStatusSchema>;

export interface SourceHealth {
  source: string;
  status: SourceHealthStatus;
  message?: string;
  lastSuccessAt?: Date;
  lastErrorAt?: Date;
}

/**
 * JSON form of SourceHealth, as exposed by observability endpoints.
 */
export interface SourceHealthRecord {
  source: string;
  status: SourceHealthStatus;
  message: string | null;
  lastSuccessAt: string | null;
  lastErrorAt: string | null;
}

// ============================================================
// CACHE & SNAPSHOT
// ============================================================

export interface CacheEntry {
  readonly items: readonly TrendingItem[];
  /** Epoch milliseconds */
  readonly expiresAt: number;
}

export interface EngineSnapshot {
  defaultLimit: number;
  refreshIntervalSeconds: number;
  lastRefreshAt: string | null;
  sources: SourceHealthRecord[];
  cachedLimits: number[];
  backgroundRefresh: boolean;
}
