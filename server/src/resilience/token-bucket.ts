import { systemClock, type Clock } from './clock.js';

export interface TokenBucketOptions {
  /** Requests allowed per window */
  capacity: number;
  windowMs: number;
}

/**
 * Token bucket where each spent token returns to the bucket one window after
 * it was taken, so no window of `windowMs` ever sees more than `capacity`
 * requests.
 *
 * `take()` waits for a token instead of failing. Accounting happens
 * synchronously between awaits, so concurrent callers never over-draw.
 */
export class TokenBucket {
  // Times at which the currently spent tokens were taken, oldest first
  private readonly spent: number[] = [];

  constructor(
    private readonly options: TokenBucketOptions,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Token bucket capacity must be a positive integer, got ${options.capacity}`);
    }
    if (options.windowMs <= 0) {
      throw new RangeError(`Token bucket window must be positive, got ${options.windowMs}`);
    }
  }

  get capacity(): number {
    return this.options.capacity;
  }

  available(): number {
    this.refill(this.clock.now());
    return this.options.capacity - this.spent.length;
  }

  /**
   * Take a token if one is free right now.
   */
  tryTake(): boolean {
    const now = this.clock.now();
    this.refill(now);
    if (this.spent.length >= this.options.capacity) return false;
    this.spent.push(now);
    return true;
  }

  /**
   * Take a token, suspending until one is free.
   */
  async take(): Promise<void> {
    while (!this.tryTake()) {
      // A failed take means the bucket is full, so spent[0] exists
      const wait = this.spent[0] + this.options.windowMs - this.clock.now();
      await this.clock.sleep(Math.max(wait, 1));
    }
  }

  private refill(now: number): void {
    while (this.spent.length > 0 && this.spent[0] + this.options.windowMs <= now) {
      this.spent.shift();
    }
  }
}
