/**
 * Rate Limiter
 *
 * Spaces outbound forge requests evenly: at most one request per
 * `1000 / maxPerSecond` ms, no burst beyond the first free slot.
 *
 * PURE LIB: No config access, no manager imports.
 */
import { setTimeout as sleep } from 'timers/promises';

export class RateLimiter {
  readonly maxPerSecond: number;
  readonly minIntervalMs: number;
  private lastRequestAt: number;

  constructor(maxPerSecond: number) {
    if (!Number.isFinite(maxPerSecond) || maxPerSecond <= 0) {
      throw new RangeError(`maxPerSecond must be a positive number, got ${maxPerSecond}`);
    }
    this.maxPerSecond = maxPerSecond;
    this.minIntervalMs = 1000 / maxPerSecond;
    // Start as if the last request went out long enough ago
    this.lastRequestAt = Date.now() - Math.max(1000, this.minIntervalMs);
  }

  /**
   * Resolve once the caller may issue its request.
   * The slot is reserved before sleeping, so concurrent callers queue up one
   * interval apart instead of waking together.
   */
  async wait(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.lastRequestAt + this.minIntervalMs);
    this.lastRequestAt = slot;

    const delay = slot - now;
    if (delay > 0) {
      await sleep(Math.ceil(delay));
    }
  }
}
