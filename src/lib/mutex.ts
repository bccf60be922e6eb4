/**
 * Trendwire — Mutex
 *
 * Minimal async mutual exclusion: callers queue on a promise chain and
 * run one at a time. Used to keep cache check-then-write sequences from
 * interleaving across awaits.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(critical: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await critical();
    } finally {
      release();
    }
  }
}
