/**
 * Trendwire — Refresh Scheduler
 *
 * One background loop: run the task, then wait out the interval or a
 * stop signal, whichever comes first. A stop never aborts a running
 * task; it only cuts the idle wait short and waits for the loop to end.
 */

import { RefreshCycleFailure } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';

export interface RefreshSchedulerOptions {
  /** Idle time between the end of one cycle and the start of the next */
  intervalMs: number;
  /** Used in log context */
  name?: string;
  logger?: Logger;
}

/** Longest delay a single timer accepts; larger values fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolve `true` when the signal aborts, `false` after `ms` elapse.
 * Waits longer than one timer allows are split into consecutive timers.
 */
export function waitForAbort(signal: AbortSignal, ms: number): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(true);

  return new Promise(resolve => {
    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const schedule = () => {
      const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= delay;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal.removeEventListener('abort', onAbort);
        resolve(false);
      }, delay);
    };

    signal.addEventListener('abort', onAbort, { once: true });
    schedule();
  });
}

export class RefreshScheduler {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private restartAfterStop = false;
  private cycles = 0;

  constructor(
    private readonly task: () => Promise<unknown>,
    options: RefreshSchedulerOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.logger = (options.logger ?? rootLogger).child({ scheduler: options.name ?? 'refresh' });
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Start the loop. No-op while already running.
   * Called during a pending stop, the loop restarts once that stop completes.
   */
  start(): void {
    if (this.stopping) {
      this.restartAfterStop = true;
      return;
    }
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.logger.info('Starting refresh loop', { intervalMs: this.intervalMs });
    this.loop = this.run(controller.signal);
  }

  /**
   * Signal the loop to stop and wait for it to exit.
   * Also cancels a restart requested while an earlier stop was draining.
   */
  async stop(): Promise<void> {
    this.restartAfterStop = false;
    if (this.stopping) return this.stopping;

    const loop = this.loop;
    if (!loop) return;

    this.controller?.abort();
    this.stopping = this.drain(loop);
    return this.stopping;
  }

  private async drain(loop: Promise<void>): Promise<void> {
    try {
      await loop;
    } finally {
      this.loop = null;
      this.controller = null;
      this.stopping = null;
      this.logger.info('Refresh loop stopped', { cycles: this.cycles });
    }

    if (this.restartAfterStop) {
      this.restartAfterStop = false;
      this.start();
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.task();
      } catch (error) {
        const failure = new RefreshCycleFailure(error);
        this.logger.error(failure.message, { code: failure.code, error });
      }
      this.cycles++;

      const stopped = await waitForAbort(signal, this.intervalMs);
      if (stopped) break;
    }
  }
}
