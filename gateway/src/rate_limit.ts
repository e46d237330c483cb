type Bucket = { tokens: number; lastRefillMs: number };

/**
 * Per-address token bucket. `allow` runs to completion without yielding, so
 * concurrent query tasks on the event loop never interleave inside one update.
 */
export class TokenBucketLimiter {
  private buckets = new Map<string, Bucket>();

  constructor(
    private capacity: number,
    private refillPerSec: number,
    private clock: () => number = Date.now
  ) {
    if (!(capacity >= 1) || !(refillPerSec > 0)) {
      throw new Error("INVALID_RATE_LIMIT");
    }
  }

  allow(key: string, now = this.clock()): boolean {
    const bucket = this.buckets.get(key) ?? { tokens: this.capacity, lastRefillMs: now };
    const elapsedSec = Math.max(0, (now - bucket.lastRefillMs) / 1000);
    bucket.tokens = Math.min(this.capacity, bucket.tokens + elapsedSec * this.refillPerSec);
    bucket.lastRefillMs = Math.max(bucket.lastRefillMs, now);
    this.buckets.set(key, bucket);

    if (bucket.tokens < 1) return false;
    bucket.tokens -= 1;
    return true;
  }

  tokens(key: string): number | null {
    const bucket = this.buckets.get(key);
    return bucket ? bucket.tokens : null;
  }

  size(): number {
    return this.buckets.size;
  }
}
