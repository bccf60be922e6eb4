/**
 * Trendwire — Source Registry
 *
 * Maps configured source names to adapter factories.
 */

import { UnknownSourceConfigured } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { TrendingSource } from './base';
import { GitHubTrendingSource } from './github';
import { HackerNewsTrendingSource } from './hacker-news';
import { RedditTrendingSource } from './reddit';

export interface SourceFactoryOptions {
  timeoutMs: number;
  githubToken?: string;
}

export type SourceFactory = (options: SourceFactoryOptions) => TrendingSource;

export const SOURCE_FACTORIES: Readonly<Record<string, SourceFactory>> = {
  reddit: ({ timeoutMs }) => new RedditTrendingSource({ timeoutMs }),
  hackernews: ({ timeoutMs }) => new HackerNewsTrendingSource({ timeoutMs }),
  github: ({ timeoutMs, githubToken }) => new GitHubTrendingSource({ timeoutMs, token: githubToken }),
};

/**
 * Instantiate adapters in configuration order.
 * Unknown names are skipped with a single warning; repeats are built once.
 */
export function createSources(
  names: readonly string[],
  options: SourceFactoryOptions,
  factories: Readonly<Record<string, SourceFactory>> = SOURCE_FACTORIES
): TrendingSource[] {
  const sources: TrendingSource[] = [];
  const seen = new Set<string>();
  const missing = new Set<string>();

  for (const name of names) {
    if (seen.has(name)) continue;
    seen.add(name);

    const factory = Object.hasOwn(factories, name) ? factories[name] : undefined;
    if (!factory) {
      missing.add(name);
      continue;
    }
    sources.push(factory(options));
  }

  if (missing.size > 0) {
    const warning = new UnknownSourceConfigured([...missing].sort());
    logger.warn(warning.message, { code: warning.code, names: warning.names });
  }

  return sources;
}

export { HttpTrendingSource, isItem, type TrendingSource, type HttpSourceOptions } from './base';
export { GitHubTrendingSource, type GitHubSourceOptions } from './github';
export { HackerNewsTrendingSource } from './hacker-news';
export { RedditTrendingSource } from './reddit';
