/**
 * Authentication Rate Limiting
 *
 * Sliding-window limiter for credential validation attempts, keyed by a
 * client fingerprint. State lives in this process only.
 *
 * Security Features:
 * - Per-fingerprint attempt queues
 * - Attempts older than the window are pruned on every touch
 * - Successful authentication clears the fingerprint's history
 */

import { createHash } from "crypto";
import { firstForwardedAddress } from "./trace-tag.js";

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /** Maximum attempts allowed inside the window */
  maxAttempts: number;
  /** Window length in seconds */
  windowSeconds: number;
}

/**
 * Rate limit decision with metadata
 */
export interface RateLimitResult {
  /** Whether the attempt is allowed (and was recorded) */
  allowed: boolean;
  /** Attempts left in the current window */
  remaining: number;
  /** Seconds until the oldest attempt leaves the window */
  resetIn: number;
  /** Configured maximum */
  limit: number;
}

export const DEFAULT_AUTH_RATE_LIMIT: RateLimitConfig = {
  maxAttempts: 5,
  windowSeconds: 60,
};

/** Clock returning epoch milliseconds */
export type Clock = () => number;

/**
 * Sliding Window Rate Limiter
 *
 * All methods are synchronous, so each call runs to completion before any
 * other request is serviced.
 */
export class SlidingWindowRateLimiter {
  private attempts = new Map<string, number[]>();
  private readonly config: RateLimitConfig;
  private readonly now: Clock;

  constructor(config: RateLimitConfig = DEFAULT_AUTH_RATE_LIMIT, now: Clock = Date.now) {
    if (config.maxAttempts < 1 || config.windowSeconds <= 0) {
      throw new Error("Rate limit requires maxAttempts >= 1 and windowSeconds > 0");
    }
    this.config = { ...config };
    this.now = now;
  }

  /**
   * Check and record an attempt
   *
   * @returns false when the fingerprint already used its attempts in the window
   */
  isAllowed(clientId: string): boolean {
    return this.check(clientId).allowed;
  }

  /**
   * Check and record an attempt, returning the full decision
   */
  check(clientId: string): RateLimitResult {
    const now = this.now();
    const queue = this.prune(clientId, now);

    if (queue.length >= this.config.maxAttempts) {
      return {
        allowed: false,
        remaining: 0,
        resetIn: this.resetInSeconds(queue, now),
        limit: this.config.maxAttempts,
      };
    }

    queue.push(now);
    this.attempts.set(clientId, queue);

    return {
      allowed: true,
      remaining: this.config.maxAttempts - queue.length,
      resetIn: this.resetInSeconds(queue, now),
      limit: this.config.maxAttempts,
    };
  }

  /**
   * Attempts left for a fingerprint without recording one
   */
  getRemainingAttempts(clientId: string): number {
    const queue = this.prune(clientId, this.now());
    return Math.max(0, this.config.maxAttempts - queue.length);
  }

  /**
   * Seconds until the fingerprint may try again (0 when it already may)
   */
  retryAfterSeconds(clientId: string): number {
    const now = this.now();
    const queue = this.prune(clientId, now);
    if (queue.length < this.config.maxAttempts) {
      return 0;
    }
    return this.resetInSeconds(queue, now);
  }

  /**
   * Forget a fingerprint's history (after a successful authentication)
   */
  clear(clientId: string): void {
    this.attempts.delete(clientId);
  }

  /**
   * Prune every queue and drop fingerprints with no attempts left in the window
   *
   * @returns number of fingerprints removed
   */
  cleanupOld(): number {
    const now = this.now();
    let removed = 0;
    for (const clientId of [...this.attempts.keys()]) {
      if (this.prune(clientId, now).length === 0) {
        this.attempts.delete(clientId);
        removed++;
      }
    }
    return removed;
  }

  /** Number of fingerprints currently tracked */
  size(): number {
    return this.attempts.size;
  }

  getConfig(): RateLimitConfig {
    return { ...this.config };
  }

  private prune(clientId: string, now: number): number[] {
    const windowStart = now - this.config.windowSeconds * 1000;
    const queue = (this.attempts.get(clientId) ?? []).filter((ts) => ts >= windowStart);
    if (this.attempts.has(clientId)) {
      this.attempts.set(clientId, queue);
    }
    return queue;
  }

  private resetInSeconds(queue: number[], now: number): number {
    if (queue.length === 0) {
      return 0;
    }
    const expiresAt = queue[0] + this.config.windowSeconds * 1000;
    return Math.max(1, Math.ceil((expiresAt - now) / 1000));
  }
}

/**
 * Factory function to create a rate limiter
 */
export function createRateLimiter(
  config?: Partial<RateLimitConfig>,
  now?: Clock
): SlidingWindowRateLimiter {
  return new SlidingWindowRateLimiter({ ...DEFAULT_AUTH_RATE_LIMIT, ...config }, now);
}

/**
 * Fingerprint a client for rate limiting
 *
 * Combines a hash prefix of the Authorization header with the first
 * forwarded address. Returns "unknown" when both are absent.
 */
export function generateClientId(
  authorizationHeader: string | null | undefined,
  forwardedFor: string | null | undefined
): string {
  const parts: string[] = [];
  if (authorizationHeader) {
    parts.push(createHash("sha256").update(authorizationHeader).digest("hex").slice(0, 16));
  }
  const address = firstForwardedAddress(forwardedFor);
  if (address) {
    parts.push(address);
  }
  return parts.length > 0 ? parts.join(":") : "unknown";
}
