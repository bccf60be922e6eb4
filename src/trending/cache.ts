/**
 * Trendwire — Trending Cache
 *
 * TTL cache keyed by requested result size. Entries are only ever
 * replaced whole; every access runs under one mutex so a check-then-write
 * sequence cannot interleave with another writer.
 */

import type { CacheEntry, TrendingItem } from '../types';
import { Mutex } from '../lib/mutex';

export type Clock = () => number;

export class TrendingCache {
  private readonly entries = new Map<number, CacheEntry>();
  private readonly lock = new Mutex();

  constructor(private readonly clock: Clock = Date.now) {}

  /**
   * Valid entry for exactly `limit`, or undefined when absent or expired.
   */
  async getValid(limit: number): Promise<CacheEntry | undefined> {
    return this.lock.runExclusive(() => {
      const entry = this.entries.get(limit);
      if (!entry || !this.isValid(entry)) return undefined;
      return entry;
    });
  }

  /**
   * Entry for `limit` regardless of expiry. Used to serve stale data.
   */
  peek(limit: number): CacheEntry | undefined {
    return this.entries.get(limit);
  }

  /**
   * Store one entry under every given key in a single critical section.
   * Items and their metadata are frozen copies; callers share them read-only.
   */
  async store(keys: readonly number[], items: readonly TrendingItem[], ttlMs: number): Promise<CacheEntry> {
    return this.lock.runExclusive(() => {
      const entry: CacheEntry = {
        items: Object.freeze(items.map(freezeItem)),
        expiresAt: this.clock() + ttlMs,
      };
      for (const key of keys) {
        this.entries.set(key, entry);
      }
      return entry;
    });
  }

  isValid(entry: CacheEntry): boolean {
    return this.clock() < entry.expiresAt;
  }

  /**
   * Populated keys, ascending. Includes expired entries.
   */
  keys(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }
}

function freezeItem(item: TrendingItem): TrendingItem {
  return Object.freeze({ ...item, metadata: Object.freeze({ ...item.metadata }) });
}
