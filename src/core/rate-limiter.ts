/**
 * Token bucket pacing outbound requests. Every HttpClient owns one, so the
 * SEC client (10 req/s, the EDGAR fair-access ceiling) and the Finnhub
 * client (30 req/s) never share a budget. A full bucket allows a burst of
 * `requestsPerSecond` calls.
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class RateLimiter {
  private tokens: number;
  private lastRefill = Date.now();
  private readonly capacity: number;
  private readonly tokensPerMs: number;

  constructor(
    requestsPerSecond: number = 10,
    private readonly wait: Sleep = sleep
  ) {
    if (requestsPerSecond <= 0) {
      throw new RangeError('requestsPerSecond must be positive');
    }
    this.capacity = requestsPerSecond;
    this.tokens = requestsPerSecond;
    this.tokensPerMs = requestsPerSecond / 1000;
  }

  /** Resolves once a token is taken, sleeping for the shortfall if the bucket is empty */
  async acquire(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      await this.wait(Math.ceil((1 - this.tokens) / this.tokensPerMs));
      this.refill();
    }
    this.tokens -= 1;
  }

  private refill(): void {
    const now = Date.now();
    this.tokens = Math.min(this.capacity, this.tokens + (now - this.lastRefill) * this.tokensPerMs);
    this.lastRefill = now;
  }
}
