/**
 * Trendwire — HTTP Server
 *
 * Express app exposing the trending engine.
 *
 * Endpoints:
 * - GET /                  — Service banner
 * - GET /status/health     — Liveness probe
 * - GET /trending          — Ranked trending items (?limit=1..100)
 * - GET /trending/sources  — Per-source health and engine snapshot
 *
 * Run with: npm run serve
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import type { Settings } from '../config/settings';
import { logger } from '../lib/logger';
import { createTrendingEngine, type TrendingEngine } from '../trending';
import { serializeHealth } from '../trending/health';

// ============================================================
// QUERY VALIDATION
// ============================================================

export const MAX_LIMIT = 100;

const TrendingQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).optional(),
});

// ============================================================
// EXPRESS APP
// ============================================================

export function createApp(engine: TrendingEngine, settings: Pick<Settings, 'appName'>): express.Express {
  const app = express();

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: `${settings.appName} is online`,
      status: '/status/health',
      trending: '/trending',
    });
  });

  app.get('/status/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/trending', async (req: Request, res: Response, next: NextFunction) => {
    const query = TrendingQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({
        error: 'Invalid query',
        issues: query.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    try {
      const items = await engine.fetchTrending({ limit: query.data.limit });
      res.json({
        count: items.length,
        limit: query.data.limit ?? engine.defaultLimit,
        items,
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/trending/sources', (_req: Request, res: Response) => {
    res.json({
      sources: engine.getSourceHealth().map(serializeHealth),
      service: engine.snapshot(),
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in HTTP server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export interface RunningServer {
  server: Server;
  engine: TrendingEngine;
  close(): Promise<void>;
}

/**
 * Build the engine, prime its cache, start background refresh and listen.
 */
export async function startServer(settings: Settings): Promise<RunningServer> {
  const engine = createTrendingEngine(settings);

  logger.info('Priming trending cache', { sources: engine.sourceNames });
  await engine.fetchTrending({ forceRefresh: true });
  engine.registerBackgroundRefresh();

  const app = createApp(engine, settings);
  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(settings.port, () => resolve(listening));
  });
  logger.info(`${settings.appName} listening on port ${settings.port}`);

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    await engine.shutdown();
    logger.info('Server stopped');
  };

  return { server, engine, close };
}
