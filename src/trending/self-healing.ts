/**
 * Trendwire — Self-Healing Monitor
 *
 * Diagnose/heal cycle for components that can repair themselves.
 * The trending engine is exposed as one such component: a failing
 * source or a stale cache triggers a forced refresh.
 */

import { logger } from '../lib/logger';
import type { TrendingEngine } from './engine';

export type DiagnosticStatus = 'healthy' | 'unhealthy' | 'stale';

export interface Diagnostics {
  status: DiagnosticStatus;
  reason?: string;
  [detail: string]: string | undefined;
}

export interface HealableComponent {
  readonly name: string;
  diagnose(): Promise<Diagnostics>;
  heal(options: { reason: string }): Promise<void>;
}

export interface MonitorResult {
  component: string;
  status: DiagnosticStatus | 'healing';
  details: Diagnostics;
}

/**
 * Run one health check and, when needed, one healing attempt.
 */
export async function runHealthCycle(component: HealableComponent): Promise<MonitorResult> {
  const diagnostics = await component.diagnose();

  if (diagnostics.status === 'healthy') {
    return { component: component.name, status: 'healthy', details: diagnostics };
  }

  const reason = diagnostics.reason ?? 'unspecified';
  logger.warn('Healing component', { component: component.name, status: diagnostics.status, reason });
  await component.heal({ reason });

  return { component: component.name, status: 'healing', details: diagnostics };
}

/**
 * Wrap an engine as a healable component.
 * Stale means no refresh within twice the refresh interval.
 */
export function createEngineComponent(engine: TrendingEngine, clock: () => number = Date.now): HealableComponent {
  return {
    name: 'trending-engine',

    async diagnose() {
      const failing = engine
        .getSourceHealth()
        .filter(h => h.status === 'error')
        .map(h => h.source);

      if (failing.length > 0) {
        return {
          status: 'unhealthy',
          reason: `degraded sources: ${failing.join(', ')}`,
        };
      }

      const maxAgeMs = engine.refreshIntervalSeconds * 2 * 1000;
      const last = engine.lastRefreshTime;
      if (last === null || clock() - last > maxAgeMs) {
        return {
          status: 'stale',
          reason: `no refresh within ${engine.refreshIntervalSeconds * 2}s`,
        };
      }

      return { status: 'healthy' };
    },

    async heal({ reason }) {
      logger.info('Forcing trending refresh', { reason });
      await engine.fetchTrending({ forceRefresh: true });
    },
  };
}
