/**
 * In-process stand-ins for trending sources.
 */

import type { TrendingItem } from '../../src/types';
import type { TrendingSource } from '../../src/trending/sources/base';

export function item(
  title: string,
  url: string,
  source: string,
  score: number,
  metadata: Record<string, unknown> = {}
): TrendingItem {
  return { title, url, source, score, metadata };
}

export interface StubSourceOptions {
  weight?: number;
  /** Delay before resolving, in ms */
  delayMs?: number;
  /** Reject every fetch with this error */
  error?: Error;
}

export class StubSource implements TrendingSource {
  readonly weight: number;
  calls = 0;
  limits: number[] = [];
  error: Error | undefined;
  private readonly delayMs: number;

  constructor(
    readonly name: string,
    public items: TrendingItem[],
    options: StubSourceOptions = {}
  ) {
    this.weight = options.weight ?? 1.0;
    this.delayMs = options.delayMs ?? 0;
    this.error = options.error;
  }

  async fetch(limit: number): Promise<TrendingItem[]> {
    this.calls++;
    this.limits.push(limit);
    await new Promise(resolve => setTimeout(resolve, this.delayMs));
    if (this.error) throw this.error;
    return this.items.slice(0, limit);
  }
}
