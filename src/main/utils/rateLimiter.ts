/**
 * Request Rate Limiter
 *
 * FIFO queue-based limiter enforcing a minimum interval between consecutive
 * requests on the single catalog channel. Concurrent callers are serialised
 * and released in arrival order, so nothing bursts past the limit even if
 * files are one day processed in parallel.
 */

/** Clock and timer hooks (for testing) */
export interface RateLimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const realClock: RateLimiterClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)),
};

export class FifoRateLimiter {
  private lastRequestTime = Number.NEGATIVE_INFINITY;
  private readonly intervalMs: number;
  private readonly clock: RateLimiterClock;
  private readonly waitQueue: Array<() => void> = [];
  private isDraining = false;

  constructor(intervalMs: number, clock: RateLimiterClock = realClock) {
    this.intervalMs = Math.max(0, intervalMs);
    this.clock = clock;
  }

  /**
   * Waits until the next request slot is available.
   * All concurrent callers are queued and released in FIFO order.
   */
  waitForSlot(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
      if (!this.isDraining) {
        void this.drain();
      }
    });
  }

  /** Callers currently waiting for a slot */
  get pending(): number {
    return this.waitQueue.length;
  }

  private async drain(): Promise<void> {
    this.isDraining = true;
    while (this.waitQueue.length > 0) {
      const remaining = this.intervalMs - (this.clock.now() - this.lastRequestTime);
      if (remaining > 0) {
        await this.clock.sleep(remaining);
      }
      this.lastRequestTime = this.clock.now();
      const next = this.waitQueue.shift();
      if (next) next();
    }
    this.isDraining = false;
  }
}
