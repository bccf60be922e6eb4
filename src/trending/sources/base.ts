/**
 * Trendwire — Trending Source Base
 *
 * The adapter contract every provider implements, plus a base class for
 * adapters that talk JSON over HTTP.
 */

import type { z } from 'zod';
import type { TrendingItem } from '../../types';
import { TrendingItemSchema } from '../../types';
import { SourceFetchError, errorMessage } from '../../lib/errors';
import { logger, type Logger } from '../../lib/logger';

/**
 * One upstream provider of trending items.
 */
export interface TrendingSource {
  /** Stable identity: health, weighting and merge key */
  readonly name: string;
  /** Positive multiplier applied to raw scores before merging */
  readonly weight: number;
  /**
   * Fetch at most `limit` items. Rejects with SourceFetchError.
   */
  fetch(limit: number): Promise<TrendingItem[]>;
}

export interface HttpSourceOptions {
  /** Request timeout in ms */
  timeoutMs: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
}

/**
 * Loosely-typed fields pulled out of a provider payload.
 */
export interface ItemFields {
  title: string | null | undefined;
  url: string | null | undefined;
  score: number | null | undefined;
  metadata?: Record<string, unknown>;
}

export const USER_AGENT = 'Trendwire/0.2';

/**
 * Base class for adapters backed by a JSON HTTP API.
 */
export abstract class HttpTrendingSource implements TrendingSource {
  abstract readonly name: string;
  abstract readonly weight: number;

  protected readonly timeoutMs: number;
  protected readonly headers: Record<string, string>;
  protected readonly logger: Logger;

  constructor(options: HttpSourceOptions) {
    this.timeoutMs = options.timeoutMs;
    this.headers = { 'User-Agent': USER_AGENT, ...options.headers };
    this.logger = logger.child({ adapter: this.constructor.name });
  }

  abstract fetch(limit: number): Promise<TrendingItem[]>;

  /**
   * GET a JSON document and validate it against the provider schema.
   */
  protected async fetchJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: Record<string, string | number> = {}
  ): Promise<T> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(params)) {
      target.searchParams.set(key, String(value));
    }

    let res: Response;
    try {
      res = await fetch(target, {
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SourceFetchError(this.name, `request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      throw new SourceFetchError(this.name, `upstream responded ${res.status}`, { status: res.status });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new SourceFetchError(this.name, 'response body is not JSON', { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SourceFetchError(this.name, 'malformed payload', { cause: parsed.error });
    }

    this.logger.debug('Fetched upstream payload', { url: target.origin + target.pathname });
    return parsed.data;
  }

  /**
   * Build an item, or null when title or URL is missing.
   */
  protected toItem(fields: ItemFields): TrendingItem | null {
    if (!fields.title || !fields.url) return null;

    const parsed = TrendingItemSchema.safeParse({
      title: fields.title,
      url: fields.url,
      source: this.name,
      score: fields.score ?? 0,
      metadata: fields.metadata ?? {},
    });
    return parsed.success ? parsed.data : null;
  }
}

/**
 * Narrow away the nulls `toItem` returns for skipped entries.
 */
export function isItem(item: TrendingItem | null): item is TrendingItem {
  return item !== null;
}
