/**
 * Trendwire — Weighting & Merge
 *
 * Pure functions that turn per-source item lists into one ranked list.
 * Input lists must be ordered by source configuration order; that order
 * is the only tie-break, so results do not depend on fetch completion.
 */

import type { TrendingItem } from '../types';

/**
 * Scale scores by the source weight and keep the raw score in metadata.
 */
export function applyWeight(items: readonly TrendingItem[], weight: number): TrendingItem[] {
  return items.map(item => ({
    ...item,
    score: item.score * weight,
    metadata: { ...item.metadata, raw_score: item.score },
  }));
}

/**
 * Canonical dedup key: URLs compare case-insensitively.
 */
export function dedupKey(item: TrendingItem): string {
  return item.url.toLowerCase();
}

/**
 * Deduplicate by URL, keeping the highest (weighted) score.
 * Equal scores keep the first-seen item.
 */
export function dedupeByUrl(results: readonly (readonly TrendingItem[])[]): TrendingItem[] {
  const aggregated = new Map<string, TrendingItem>();

  for (const items of results) {
    for (const item of items) {
      const key = dedupKey(item);
      const existing = aggregated.get(key);
      if (existing && existing.score >= item.score) continue;
      // Replacing keeps the key's original insertion slot
      aggregated.set(key, item);
    }
  }

  return [...aggregated.values()];
}

/**
 * Stable sort by score, descending.
 */
export function rankByScore(items: readonly TrendingItem[]): TrendingItem[] {
  return [...items].sort((a, b) => b.score - a.score);
}

/**
 * Dedupe then rank: the full merge step of a refresh.
 */
export function mergeResults(results: readonly (readonly TrendingItem[])[]): TrendingItem[] {
  return rankByScore(dedupeByUrl(results));
}
