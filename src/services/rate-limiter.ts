/**
 * Rate Limiter Service
 * Token Bucket throttle in front of the MYOB API (8 req/s)
 */

import { sleep } from './retry.js';

export interface RateLimiterConfig {
  /** Maximum number of tokens in the bucket (default: 8) */
  maxTokens: number;
  /** Tokens added per second (default: 8) */
  refillRate: number;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
  maxTokens: 8,
  refillRate: 8,
};

/**
 * Token Bucket Rate Limiter
 *
 * - Tokens are consumed on each request
 * - Tokens are refilled at a fixed rate over time
 * - When bucket is empty, acquire() waits exactly until the next token is due
 */
export class RateLimiter {
  private config: RateLimiterConfig;
  private tokens: number;
  private lastRefillTime: number;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.tokens = this.config.maxTokens;
    this.lastRefillTime = Date.now();
  }

  /**
   * Try to acquire a token without waiting
   * @returns true if token was acquired, false if no tokens available
   */
  tryAcquire(): boolean {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }

    return false;
  }

  /**
   * Acquire a token, waiting if necessary. Rejects with the signal's
   * reason when aborted while waiting.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    while (!this.tryAcquire()) {
      const missing = 1 - this.tokens;
      const waitMs = Math.ceil((missing / this.config.refillRate) * 1000);
      await sleep(Math.max(1, waitMs), signal);
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsedSeconds = (now - this.lastRefillTime) / 1000;
    const tokensToAdd = elapsedSeconds * this.config.refillRate;

    if (tokensToAdd > 0) {
      this.tokens = Math.min(this.config.maxTokens, this.tokens + tokensToAdd);
      this.lastRefillTime = now;
    }
  }
}
