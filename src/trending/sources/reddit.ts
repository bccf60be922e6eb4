/**
 * Trendwire — Reddit Source
 *
 * Popular posts across all subreddits, from the public r/popular listing.
 * Scores are upvote counts.
 */

import { z } from 'zod';
import { HttpTrendingSource, isItem } from './base';
import type { TrendingItem } from '../../types';

const REDDIT_BASE = 'https://www.reddit.com';

const RedditListingSchema = z.object({
  data: z
    .object({
      children: z
        .array(
          z.object({
            data: z
              .object({
                title: z.string().nullish(),
                permalink: z.string().nullish(),
                score: z.number().nullish(),
                subreddit: z.string().nullish(),
                num_comments: z.number().nullish(),
              })
              .default({}),
          })
        )
        .default([]),
    })
    .default({}),
});

export class RedditTrendingSource extends HttpTrendingSource {
  readonly name = 'reddit';
  readonly weight = 1.1;

  async fetch(limit: number): Promise<TrendingItem[]> {
    const listing = await this.fetchJson(`${REDDIT_BASE}/r/popular.json`, RedditListingSchema, { limit });

    return listing.data.children
      .map(({ data: post }) =>
        this.toItem({
          title: post.title,
          url: post.permalink ? `${REDDIT_BASE}${post.permalink}` : null,
          score: post.score,
          metadata: {
            subreddit: post.subreddit ?? null,
            comments: post.num_comments ?? null,
          },
        })
      )
      .filter(isItem)
      .slice(0, limit);
  }
}
