/**
 * Trendwire — Serve Script
 *
 * Starts the HTTP server with background refresh.
 * SIGINT/SIGTERM stop the listener, then drain the refresh loop.
 *
 * Usage:
 *   npm run serve
 */

import { loadSettings } from '../src/config/settings';
import { logger } from '../src/lib/logger';
import { startServer } from '../src/server/app';

async function main(): Promise<void> {
  const settings = loadSettings();
  const running = await startServer(settings);

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    running.close().then(
      () => process.exit(0),
      error => {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
}

main().catch(error => {
  logger.error('Server failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
