/**
 * Request throttle shared by every push in the process.
 * Grants at most `maxRequests` in any rolling `windowMs`, handing out slots in call order.
 */

import { systemClock, type Clock } from '../utils/clock';

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  clock?: Clock;
}

// ActiveCampaign allows 5 requests per second per account
const DEFAULT_MAX_REQUESTS = 5;
const DEFAULT_WINDOW_MS = 1000;

export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly clock: Clock;
  private grants: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? DEFAULT_MAX_REQUESTS;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.clock = options.clock ?? systemClock;

    if (this.maxRequests < 1 || this.windowMs <= 0) {
      throw new RangeError('RateLimiter needs maxRequests >= 1 and windowMs > 0');
    }
  }

  /**
   * Resolve once the caller may issue one request.
   * Waiters are served one at a time so concurrent pushes cannot overshoot the window.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    // The caller observes a rejection through `turn`; the queue itself keeps going.
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.evictExpired(now);

      if (this.grants.length < this.maxRequests) {
        this.grants.push(now);
        return;
      }

      await this.clock.sleep(this.grants[0] + this.windowMs - now);
    }
  }

  private evictExpired(now: number): void {
    while (this.grants.length > 0 && now - this.grants[0] >= this.windowMs) {
      this.grants.shift();
    }
  }
}
