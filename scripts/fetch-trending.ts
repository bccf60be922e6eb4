/**
 * Trendwire — Fetch Trending Script
 *
 * Runs one forced refresh across all configured sources and prints the
 * ranked list plus per-source health.
 *
 * Usage:
 *   npm run trending                  # Default limit
 *   npm run trending -- --limit 25    # Specific limit
 *   npm run trending -- --json        # Machine-readable output
 */

import { loadSettings } from '../src/config/settings';
import { logger } from '../src/lib/logger';
import { createTrendingEngine } from '../src/trending';

// ============================================================
// CONFIGURATION
// ============================================================

interface FetchOptions {
  limit?: number;
  json: boolean;
}

function parseArgs(args: string[]): FetchOptions {
  const options: FetchOptions = { json: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--limit' && args[i + 1]) {
      const limit = parseInt(args[i + 1], 10);
      if (Number.isInteger(limit) && limit > 0) {
        options.limit = limit;
      }
      i++;
    } else if (args[i] === '--json') {
      options.json = true;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const settings = loadSettings();
  const engine = createTrendingEngine(settings);

  const startTime = Date.now();
  const items = await engine.fetchTrending({ limit: options.limit, forceRefresh: true });
  const health = engine.snapshot().sources;

  if (options.json) {
    console.log(JSON.stringify({ items, sources: health }, null, 2));
    return;
  }

  console.log('\n' + '='.repeat(60));
  console.log('TRENDING NOW');
  console.log('='.repeat(60));
  items.forEach((item, index) => {
    const rank = String(index + 1).padStart(3);
    console.log(`${rank}. [${item.source}] ${item.title} (${item.score.toFixed(1)})`);
    console.log(`     ${item.url}`);
  });

  console.log('\n' + '-'.repeat(60));
  for (const entry of health) {
    const detail = entry.message ? ` — ${entry.message}` : '';
    console.log(`${entry.source.padEnd(12)} ${entry.status}${detail}`);
  }
  console.log('-'.repeat(60));
  console.log(`Duration: ${((Date.now() - startTime) / 1000).toFixed(2)}s`);
  console.log('='.repeat(60) + '\n');
}

main().catch(error => {
  logger.error('Fetch failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
