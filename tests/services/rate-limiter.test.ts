/**
 * Rate Limiter Tests
 * Token Bucket throttle for the MYOB API (8 req/s)
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { RateLimiter } from '../../src/services/rate-limiter.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('tryAcquire', () => {
    it('should start with a full bucket of 8', () => {
      const limiter = new RateLimiter();
      const granted = Array.from({ length: 9 }, () => limiter.tryAcquire());
      expect(granted.filter(Boolean)).toHaveLength(8);
      expect(granted[8]).toBe(false);
    });

    it('should decrement available tokens on each acquire', () => {
      const limiter = new RateLimiter({ maxTokens: 3, refillRate: 1 });
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(false);
    });

    it('should refill tokens over time', () => {
      const limiter = new RateLimiter({ maxTokens: 2, refillRate: 1 });

      limiter.tryAcquire();
      limiter.tryAcquire();
      expect(limiter.tryAcquire()).toBe(false);

      vi.advanceTimersByTime(1000);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(false);

      // capped at maxTokens
      vi.advanceTimersByTime(5000);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(false);
    });
  });

  describe('acquire', () => {
    it('should resolve immediately when a token is available', async () => {
      const limiter = new RateLimiter({ maxTokens: 1, refillRate: 1 });
      await limiter.acquire();
      expect(limiter.tryAcquire()).toBe(false);
    });

    it('should wait until the next token is due', async () => {
      const limiter = new RateLimiter({ maxTokens: 1, refillRate: 4 });
      limiter.tryAcquire();

      let acquired = false;
      const pending = limiter.acquire().then(() => {
        acquired = true;
      });

      await vi.advanceTimersByTimeAsync(249);
      expect(acquired).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(acquired).toBe(true);
    });

    it('should reject when aborted while waiting', async () => {
      const limiter = new RateLimiter({ maxTokens: 1, refillRate: 1 });
      limiter.tryAcquire();
      const controller = new AbortController();

      const pending = limiter.acquire(controller.signal);
      controller.abort(new Error('Interrupted'));

      await expect(pending).rejects.toThrow('Interrupted');
    });
  });
});
