/**
 * Minimum-interval rate limiter for outbound API calls.
 * Callers are served in arrival order; each waits for its own slot.
 */

import { sleep } from './retry.js';

export class RateLimiter {
  private nextSlotAt = 0;
  private readonly minIntervalMs: number;

  constructor(
    requestsPerMinute: number,
    private readonly now: () => number = Date.now
  ) {
    if (requestsPerMinute <= 0) {
      throw new RangeError('requestsPerMinute must be positive');
    }
    this.minIntervalMs = Math.ceil(60_000 / requestsPerMinute);
  }

  /**
   * Reserve the next slot synchronously, then sleep until it opens
   */
  async waitForSlot(): Promise<void> {
    const current = this.now();
    const slot = Math.max(current, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const waitTime = slot - current;
    if (waitTime > 0) {
      await sleep(waitTime);
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    return fn();
  }
}
