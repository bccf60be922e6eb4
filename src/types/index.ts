/**
 * Trendwire — Type Exports
 *
 * Re-exports all types from the types module.
 */

export {
  TrendingItemSchema,
  SourceHealthStatusSchema,
  type TrendingItem,
  type SourceHealthStatus,
  type SourceHealth,
  type SourceHealthRecord,
  type CacheEntry,
  type EngineSnapshot,
} from './trending';
