/**
 * Trendwire — Trending Module
 *
 * Aggregation engine, its collaborators, and the settings-driven factory.
 */

import type { Settings } from '../config/settings';
import { TrendingEngine } from './engine';
import { createSources } from './sources';

/**
 * Build a fresh engine from process settings.
 */
export function createTrendingEngine(
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env
): TrendingEngine {
  const sources = createSources(settings.trendingSources, {
    timeoutMs: settings.httpTimeoutSeconds * 1000,
    githubToken: env.GITHUB_TOKEN || undefined,
  });

  return new TrendingEngine(sources, {
    defaultLimit: settings.trendingDefaultLimit,
    refreshIntervalSeconds: settings.trendingRefreshSeconds,
  });
}

export { TrendingEngine, type TrendingEngineOptions, type FetchTrendingOptions } from './engine';
export { TrendingCache, type Clock } from './cache';
export { SourceHealthRegistry, serializeHealth } from './health';
export { applyWeight, dedupeByUrl, rankByScore, mergeResults, dedupKey } from './merge';
export { RefreshScheduler, waitForAbort, type RefreshSchedulerOptions } from './scheduler';
export {
  runHealthCycle,
  createEngineComponent,
  type HealableComponent,
  type Diagnostics,
  type MonitorResult,
} from './self-healing';
export * from './sources';
