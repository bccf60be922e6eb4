/**
 * Tests for upstream source adapters
 *
 * All HTTP is served by a stubbed global fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  GitHubTrendingSource,
  HackerNewsTrendingSource,
  RedditTrendingSource,
  createSources,
  type SourceFactory,
} from '../../src/trending/sources';
import { SourceFetchError } from '../../src/lib/errors';
import { StubSource } from '../fixtures/sources';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestedUrl(call = 0): string {
  return String(mockFetch.mock.calls[call][0]);
}

function requestedHeaders(call = 0): Record<string, string> {
  return mockFetch.mock.calls[call][1].headers;
}

describe('source adapters', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ============================================================
  // REDDIT
  // ============================================================

  describe('RedditTrendingSource', () => {
    it('should map popular posts to items', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          data: {
            children: [
              { data: { title: 'A cat', permalink: '/r/cats/comments/1/a_cat/', score: 4200, subreddit: 'cats', num_comments: 12 } },
              { data: { title: null, permalink: '/r/x/comments/2/', score: 10 } },
              { data: { title: 'No link', score: 10 } },
            ],
          },
        })
      );

      const source = new RedditTrendingSource({ timeoutMs: 1000 });
      const items = await source.fetch(5);

      expect(requestedUrl()).toBe('https://www.reddit.com/r/popular.json?limit=5');
      expect(items).toEqual([
        {
          title: 'A cat',
          url: 'https://www.reddit.com/r/cats/comments/1/a_cat/',
          source: 'reddit',
          score: 4200,
          metadata: { subreddit: 'cats', comments: 12 },
        },
      ]);
      expect(source.weight).toBe(1.1);
    });

    it('should treat a missing listing as empty', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      const items = await new RedditTrendingSource({ timeoutMs: 1000 }).fetch(5);

      expect(items).toEqual([]);
    });

    it('should send the service user agent', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ data: { children: [] } }));

      await new RedditTrendingSource({ timeoutMs: 1000 }).fetch(1);

      expect(requestedHeaders()['User-Agent']).toBe('Trendwire/0.2');
    });
  });

  // ============================================================
  // HACKER NEWS
  // ============================================================

  describe('HackerNewsTrendingSource', () => {
    it('should map front page hits and fall back to story fields', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          hits: [
            { title: 'Show HN: A thing', url: 'https://thing.dev', points: 321, author: 'pg', num_comments: 40 },
            { title: null, story_title: 'Story', story_url: 'https://story.dev', points: null },
            { title: 'Ask HN: no url', url: null, points: 50 },
          ],
        })
      );

      const items = await new HackerNewsTrendingSource({ timeoutMs: 1000 }).fetch(3);

      expect(requestedUrl()).toBe('https://hn.algolia.com/api/v1/search?tags=front_page&hitsPerPage=3');
      expect(items).toEqual([
        {
          title: 'Show HN: A thing',
          url: 'https://thing.dev',
          source: 'hackernews',
          score: 321,
          metadata: { author: 'pg', comments: 40 },
        },
        {
          title: 'Story',
          url: 'https://story.dev',
          source: 'hackernews',
          score: 0,
          metadata: { author: null, comments: null },
        },
      ]);
    });

    it('should not return more hits than the limit', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          hits: [
            { title: 'One', url: 'https://1', points: 1 },
            { title: 'Two', url: 'https://2', points: 2 },
          ],
        })
      );

      const items = await new HackerNewsTrendingSource({ timeoutMs: 1000 }).fetch(1);

      expect(items.map(i => i.title)).toEqual(['One']);
    });

    it('should fill the limit with usable hits after skipping incomplete ones', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          hits: [
            { title: 'No link', url: null, points: 9 },
            { title: 'One', url: 'https://1', points: 1 },
            { title: 'Two', url: 'https://2', points: 2 },
          ],
        })
      );

      const items = await new HackerNewsTrendingSource({ timeoutMs: 1000 }).fetch(1);

      expect(items.map(i => i.title)).toEqual(['One']);
    });
  });

  // ============================================================
  // GITHUB
  // ============================================================

  describe('GitHubTrendingSource', () => {
    it('should map repositories by star count', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          items: [
            {
              full_name: 'acme/rocket',
              html_url: 'https://github.com/acme/rocket',
              description: 'Fast',
              language: 'TypeScript',
              stargazers_count: 9000,
            },
            { full_name: null, html_url: 'https://github.com/x/y', stargazers_count: 1 },
          ],
        })
      );

      const items = await new GitHubTrendingSource({ timeoutMs: 1000 }).fetch(2);

      expect(requestedUrl()).toBe(
        'https://api.github.com/search/repositories?q=stars%3A%3E1&sort=stars&order=desc&per_page=2'
      );
      expect(items).toEqual([
        {
          title: 'acme/rocket',
          url: 'https://github.com/acme/rocket',
          source: 'github',
          score: 9000,
          metadata: { description: 'Fast', language: 'TypeScript', stars: 9000 },
        },
      ]);
    });

    it('should send the token as a bearer header when configured', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ items: [] }));

      await new GitHubTrendingSource({ timeoutMs: 1000, token: 'test-token' }).fetch(1);

      const headers = requestedHeaders();
      expect(headers.Authorization).toBe('Bearer test-token');
      expect(headers.Accept).toBe('application/vnd.github+json');
    });

    it('should omit the authorization header without a token', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ items: [] }));

      await new GitHubTrendingSource({ timeoutMs: 1000 }).fetch(1);

      expect(requestedHeaders().Authorization).toBeUndefined();
    });
  });

  // ============================================================
  // FAILURES
  // ============================================================

  describe('fetch failures', () => {
    it('should raise SourceFetchError on a non-success status', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'rate limited' }, 503));

      const error = await new GitHubTrendingSource({ timeoutMs: 1000 }).fetch(1).catch(e => e);

      expect(error).toBeInstanceOf(SourceFetchError);
      expect(error.source).toBe('github');
      expect(error.status).toBe(503);
      expect(error.message).toBe('upstream responded 503');
    });

    it('should raise SourceFetchError on a malformed payload', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ hits: 'nope' }));

      await expect(new HackerNewsTrendingSource({ timeoutMs: 1000 }).fetch(1)).rejects.toThrow('malformed payload');
    });

    it('should raise SourceFetchError on a non-JSON body', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>down</html>', { status: 200 }));

      await expect(new RedditTrendingSource({ timeoutMs: 1000 }).fetch(1)).rejects.toThrow('response body is not JSON');
    });

    it('should raise SourceFetchError on a transport error', async () => {
      mockFetch.mockRejectedValueOnce(new Error('ECONNRESET'));

      const error = await new RedditTrendingSource({ timeoutMs: 1000 }).fetch(1).catch(e => e);

      expect(error).toBeInstanceOf(SourceFetchError);
      expect(error.message).toBe('request failed: ECONNRESET');
      expect(error.cause).toBeInstanceOf(Error);
    });
  });
});

// ============================================================
// REGISTRY
// ============================================================

describe('createSources', () => {
  const factories: Record<string, SourceFactory> = {
    alpha: () => new StubSource('alpha', []),
    beta: () => new StubSource('beta', []),
  };

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should build sources in configuration order', () => {
    const sources = createSources(['beta', 'alpha'], { timeoutMs: 1000 }, factories);

    expect(sources.map(s => s.name)).toEqual(['beta', 'alpha']);
  });

  it('should skip unknown names with one warning', () => {
    const sources = createSources(['gamma', 'alpha', 'delta'], { timeoutMs: 1000 }, factories);

    expect(sources.map(s => s.name)).toEqual(['alpha']);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(String(vi.mocked(console.warn).mock.calls[0][0])).toContain(
      'Unknown trending sources skipped: delta, gamma'
    );
  });

  it('should build a repeated name once', () => {
    const sources = createSources(['alpha', 'alpha'], { timeoutMs: 1000 }, factories);

    expect(sources).toHaveLength(1);
  });

  it('should not treat object prototype keys as sources', () => {
    const sources = createSources(['toString'], { timeoutMs: 1000 }, factories);

    expect(sources).toEqual([]);
  });

  it('should know the default providers', () => {
    const sources = createSources(['reddit', 'hackernews', 'github'], { timeoutMs: 1000 });

    expect(sources.map(s => [s.name, s.weight])).toEqual([
      ['reddit', 1.1],
      ['hackernews', 1.0],
      ['github', 1.2],
    ]);
  });
});
