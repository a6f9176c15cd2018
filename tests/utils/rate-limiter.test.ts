/**
 * Sliding Window Rate Limiter Tests
 *
 * Uses an injected clock so window arithmetic is exact.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createHash } from "crypto";
import {
  SlidingWindowRateLimiter,
  createRateLimiter,
  generateClientId,
  DEFAULT_AUTH_RATE_LIMIT,
} from "../../src/utils/rate-limiter.js";

const START = 1_700_000_000_000;

describe("SlidingWindowRateLimiter", () => {
  let now: number;
  let limiter: SlidingWindowRateLimiter;

  beforeEach(() => {
    now = START;
    limiter = new SlidingWindowRateLimiter({ maxAttempts: 5, windowSeconds: 60 }, () => now);
  });

  it("should allow up to maxAttempts inside the window", () => {
    const remaining: number[] = [];
    for (let i = 0; i < 5; i++) {
      const result = limiter.check("client-a");
      expect(result.allowed).toBe(true);
      remaining.push(result.remaining);
    }
    expect(remaining).toEqual([4, 3, 2, 1, 0]);
  });

  it("should reject the sixth attempt with seconds until reset", () => {
    for (let i = 0; i < 5; i++) {
      limiter.check("client-a");
    }

    now = START + 30_000;
    const result = limiter.check("client-a");

    expect(result).toEqual({ allowed: false, remaining: 0, resetIn: 30, limit: 5 });
  });

  it("should not record rejected attempts", () => {
    for (let i = 0; i < 7; i++) {
      limiter.check("client-a");
    }
    expect(limiter.getRemainingAttempts("client-a")).toBe(0);

    now = START + 60_001;
    expect(limiter.getRemainingAttempts("client-a")).toBe(5);
  });

  it("should keep an attempt that sits exactly on the window edge", () => {
    for (let i = 0; i < 5; i++) {
      limiter.check("client-a");
    }

    now = START + 60_000;
    expect(limiter.isAllowed("client-a")).toBe(false);
    expect(limiter.retryAfterSeconds("client-a")).toBe(1);

    now = START + 60_001;
    expect(limiter.isAllowed("client-a")).toBe(true);
  });

  it("should track fingerprints independently", () => {
    for (let i = 0; i < 5; i++) {
      limiter.check("client-a");
    }
    expect(limiter.isAllowed("client-a")).toBe(false);
    expect(limiter.isAllowed("client-b")).toBe(true);
  });

  it("should report zero retry delay while attempts remain", () => {
    limiter.check("client-a");
    expect(limiter.retryAfterSeconds("client-a")).toBe(0);
    expect(limiter.retryAfterSeconds("never-seen")).toBe(0);
  });

  it("should forget history on clear", () => {
    for (let i = 0; i < 5; i++) {
      limiter.check("client-a");
    }
    limiter.clear("client-a");

    expect(limiter.getRemainingAttempts("client-a")).toBe(5);
    expect(limiter.size()).toBe(0);
  });

  it("should drop idle fingerprints on cleanup", () => {
    limiter.check("client-a");
    limiter.check("client-b");
    now = START + 10_000;
    limiter.check("client-c");

    now = START + 61_000;
    expect(limiter.cleanupOld()).toBe(2);
    expect(limiter.size()).toBe(1);
  });

  it("should reject invalid configuration", () => {
    expect(() => new SlidingWindowRateLimiter({ maxAttempts: 0, windowSeconds: 60 })).toThrow(
      "Rate limit requires maxAttempts >= 1 and windowSeconds > 0"
    );
    expect(() => new SlidingWindowRateLimiter({ maxAttempts: 1, windowSeconds: 0 })).toThrow();
  });
});

describe("createRateLimiter", () => {
  it("should fill missing settings from the defaults", () => {
    expect(createRateLimiter().getConfig()).toEqual(DEFAULT_AUTH_RATE_LIMIT);
    expect(createRateLimiter({ maxAttempts: 3 }).getConfig()).toEqual({ maxAttempts: 3, windowSeconds: 60 });
  });
});

describe("generateClientId", () => {
  it("should combine a header hash prefix with the first forwarded address", () => {
    const prefix = createHash("sha256").update("Basic dGVzdA==").digest("hex").slice(0, 16);
    expect(generateClientId("Basic dGVzdA==", "10.0.0.1, 10.0.0.2")).toBe(`${prefix}:10.0.0.1`);
  });

  it("should use whichever part is present", () => {
    expect(generateClientId(null, "10.0.0.1")).toBe("10.0.0.1");
    expect(generateClientId("Bearer a.b.c", undefined)).toHaveLength(16);
  });

  it("should fall back to unknown", () => {
    expect(generateClientId(undefined, null)).toBe("unknown");
  });
});
