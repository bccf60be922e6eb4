/**
 * Trendwire — Hacker News Source
 *
 * Fetches the current front page through the Algolia HN Search API.
 * Scores are story points.
 */

import { z } from 'zod';
import { HttpTrendingSource, isItem } from './base';
import type { TrendingItem } from '../../types';

const HN_SEARCH_API = 'https://hn.algolia.com/api/v1/search';

const HNHitSchema = z.object({
  title: z.string().nullish(),
  story_title: z.string().nullish(),
  url: z.string().nullish(),
  story_url: z.string().nullish(),
  points: z.number().nullish(),
  author: z.string().nullish(),
  num_comments: z.number().nullish(),
});

const HNSearchSchema = z.object({
  hits: z.array(HNHitSchema).default([]),
});

/**
 * Hacker News front page feed.
 */
export class HackerNewsTrendingSource extends HttpTrendingSource {
  readonly name = 'hackernews';
  readonly weight = 1.0;

  async fetch(limit: number): Promise<TrendingItem[]> {
    const { hits } = await this.fetchJson(HN_SEARCH_API, HNSearchSchema, {
      tags: 'front_page',
      hitsPerPage: limit,
    });

    // Ask HN and comment hits carry the story fields instead
    return hits
      .map(hit =>
        this.toItem({
          title: hit.title || hit.story_title,
          url: hit.url || hit.story_url,
          score: hit.points,
          metadata: {
            author: hit.author ?? null,
            comments: hit.num_comments ?? null,
          },
        })
      )
      .filter(isItem)
      .slice(0, limit);
  }
}
