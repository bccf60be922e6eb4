/**
 * Trendwire — GitHub Source
 *
 * Most-starred repositories via the GitHub Search API.
 * Scores are star counts.
 */

import { z } from 'zod';
import { HttpTrendingSource, isItem, type HttpSourceOptions } from './base';
import type { TrendingItem } from '../../types';

const GITHUB_SEARCH_API = 'https://api.github.com/search/repositories';

const GitHubRepoSchema = z.object({
  full_name: z.string().nullish(),
  html_url: z.string().nullish(),
  description: z.string().nullish(),
  language: z.string().nullish(),
  stargazers_count: z.number().nullish(),
});

const GitHubSearchSchema = z.object({
  items: z.array(GitHubRepoSchema).default([]),
});

export interface GitHubSourceOptions extends HttpSourceOptions {
  /** Personal access token; raises the search rate limit */
  token?: string;
}

/**
 * GitHub repository search feed.
 */
export class GitHubTrendingSource extends HttpTrendingSource {
  readonly name = 'github';
  readonly weight = 1.2;

  constructor(options: GitHubSourceOptions) {
    super({
      ...options,
      headers: {
        Accept: 'application/vnd.github+json',
        ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
        ...options.headers,
      },
    });
  }

  async fetch(limit: number): Promise<TrendingItem[]> {
    const { items } = await this.fetchJson(GITHUB_SEARCH_API, GitHubSearchSchema, {
      q: 'stars:>1',
      sort: 'stars',
      order: 'desc',
      per_page: limit,
    });

    return items
      .map(repo =>
        this.toItem({
          title: repo.full_name,
          url: repo.html_url,
          score: repo.stargazers_count,
          metadata: {
            description: repo.description ?? null,
            language: repo.language ?? null,
            stars: repo.stargazers_count ?? null,
          },
        })
      )
      .filter(isItem)
      .slice(0, limit);
  }
}
