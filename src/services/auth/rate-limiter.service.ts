import { logger } from '../../config/logger';
import { systemClock, type Clock } from '../../utils/clock';

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetInMs: number;
}

/**
 * Fixed-window attempt counter, in memory and per process
 */
export class RateLimiterService {
  private buckets: Map<string, RateLimitBucket> = new Map();
  private lastSweepAt = 0;

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly sweepThreshold = 1000
  ) {}

  /**
   * Count one attempt against `key` and report whether it fits the window
   */
  consume(key: string, maxAttempts: number, windowMs: number): RateLimitDecision {
    const now = this.clock.now().getTime();
    // At most one sweep per window
    if (this.buckets.size >= this.sweepThreshold && now - this.lastSweepAt >= windowMs) {
      this.cleanup(now);
    }

    const bucket = this.buckets.get(key);
    if (!bucket || now >= bucket.resetAt) {
      this.buckets.set(key, { count: 1, resetAt: now + windowMs });
      return { allowed: true, remaining: maxAttempts - 1, resetInMs: windowMs };
    }

    const resetInMs = bucket.resetAt - now;
    if (bucket.count < maxAttempts) {
      bucket.count++;
      return { allowed: true, remaining: maxAttempts - bucket.count, resetInMs };
    }

    logger.warn({ key, maxAttempts, windowMs }, 'Rate limit exceeded');
    return { allowed: false, remaining: 0, resetInMs };
  }

  get bucketCount(): number {
    return this.buckets.size;
  }

  reset(key: string): void {
    this.buckets.delete(key);
  }

  private cleanup(now: number): void {
    this.lastSweepAt = now;
    let cleaned = 0;
    for (const [key, bucket] of this.buckets.entries()) {
      if (now >= bucket.resetAt) {
        this.buckets.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug({ cleaned }, 'Cleaned up expired rate limit buckets');
    }
  }
}

// Singleton instance
export const rateLimiterService = new RateLimiterService();
