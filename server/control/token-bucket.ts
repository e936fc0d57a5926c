/**
 * Continuous-refill token bucket. Capacity equals the rate, so a burst can
 * never exceed one second's worth of requests.
 */
export class TokenBucket {
  readonly rate: number;
  private readonly now: () => number;
  private tokens: number;
  private updatedAt: number;

  constructor(rate: number, now: () => number = Date.now) {
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new RangeError(`token bucket rate must be positive, got ${rate}`);
    }
    this.rate = rate;
    this.now = now;
    this.tokens = rate;
    this.updatedAt = now();
  }

  allow(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  remaining(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  /** Milliseconds until the next token is available. */
  retryAfterMs(): number {
    this.refill();
    return this.tokens >= 1 ? 0 : Math.ceil(((1 - this.tokens) / this.rate) * 1000);
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.updatedAt);
    this.updatedAt = now;
    this.tokens = Math.min(this.rate, this.tokens + (elapsedMs / 1000) * this.rate);
  }
}
