/**
 * Trendwire — Source Health Registry
 *
 * Last-known outcome per source. Every update replaces the whole record,
 * so an `ok` wipes a previous error and vice versa; no history is kept.
 */

import type { SourceHealth, SourceHealthRecord } from '../types';

export class SourceHealthRegistry {
  private readonly records = new Map<string, SourceHealth>();

  constructor(sourceNames: readonly string[], private readonly now: () => Date = () => new Date()) {
    for (const source of sourceNames) {
      this.records.set(source, { source, status: 'unknown' });
    }
  }

  markOk(source: string): SourceHealth {
    const record: SourceHealth = { source, status: 'ok', lastSuccessAt: this.now() };
    this.records.set(source, record);
    return record;
  }

  markError(source: string, message: string): SourceHealth {
    const record: SourceHealth = { source, status: 'error', message, lastErrorAt: this.now() };
    this.records.set(source, record);
    return record;
  }

  /**
   * Copies of every record, in configuration order.
   */
  snapshot(): SourceHealth[] {
    return [...this.records.values()].map(record => ({ ...record }));
  }

  /**
   * Names of sources whose last attempt failed.
   */
  failing(): string[] {
    return [...this.records.values()].filter(r => r.status === 'error').map(r => r.source);
  }
}

export function serializeHealth(health: SourceHealth): SourceHealthRecord {
  return {
    source: health.source,
    status: health.status,
    message: health.message ?? null,
    lastSuccessAt: health.lastSuccessAt?.toISOString() ?? null,
    lastErrorAt: health.lastErrorAt?.toISOString() ?? null,
  };
}
