export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_WINDOW_SECONDS = 60;

export interface BatchTimerClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

const systemClock: BatchTimerClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Start-rate gate for apply operations.
 *
 * This is a burst-then-pause limiter, not a smooth one: it lets
 * `maxPerWindow` callers through as fast as they arrive, then holds the
 * next caller until the current window (measured from its first admission)
 * has elapsed, and opens a new window. It paces when operations begin and
 * knows nothing about when they finish.
 */
export class BatchTimer {
  readonly maxPerWindow: number;
  readonly windowMs: number;

  private admitted = 0;
  private windowStart: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    maxPerWindow: number,
    windowSeconds: number,
    private readonly clock: BatchTimerClock = systemClock,
  ) {
    this.maxPerWindow =
      Number.isFinite(maxPerWindow) && maxPerWindow > 0
        ? Math.floor(maxPerWindow)
        : DEFAULT_BATCH_SIZE;
    this.windowMs =
      (Number.isFinite(windowSeconds) && windowSeconds > 0
        ? windowSeconds
        : DEFAULT_WINDOW_SECONDS) * 1000;
  }

  /**
   * Resolves once the caller may start one operation. Concurrent callers
   * are admitted one at a time, in call order.
   */
  admit(): Promise<void> {
    const turn = this.tail.then(() => this.admitNext());
    this.tail = turn;
    return turn;
  }

  private async admitNext(): Promise<void> {
    const now = this.clock.now();

    if (this.windowStart === null || now - this.windowStart >= this.windowMs) {
      this.openWindow(now);
    } else if (this.admitted >= this.maxPerWindow) {
      const remaining = this.windowMs - (now - this.windowStart);
      await this.clock.sleep(remaining);
      this.openWindow(this.clock.now());
    }

    this.admitted++;
  }

  private openWindow(now: number): void {
    this.windowStart = now;
    this.admitted = 0;
  }
}
