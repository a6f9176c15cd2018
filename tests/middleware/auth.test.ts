/**
 * Credential Validator Tests
 *
 * Test Coverage:
 * - Basic and bearer validation against the backend
 * - Format checks before any backend contact
 * - Rate limiting per client fingerprint
 * - Success clears the fingerprint's history
 * - Auth attempt metrics
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CredentialValidator } from "../../src/middleware/auth.js";
import { createMetricsCollector, type MetricsCollector } from "../../src/monitoring/metrics.js";
import { silentLogger } from "../../src/utils/logger.js";
import { SlidingWindowRateLimiter, generateClientId } from "../../src/utils/rate-limiter.js";
import { FakeConnectionProvider, supplierFor } from "../helpers/fake-connections.js";

const START = 1_700_000_000_000;
const basic = (text: string): string => `Basic ${Buffer.from(text, "utf8").toString("base64")}`;

describe("CredentialValidator", () => {
  let provider: FakeConnectionProvider;
  let limiter: SlidingWindowRateLimiter;
  let metrics: MetricsCollector;
  let validator: CredentialValidator;

  beforeEach(() => {
    provider = new FakeConnectionProvider();
    provider.passwords.set("alice", "test-secret");
    provider.tokens.set("header.payload.signature", "bob");
    limiter = new SlidingWindowRateLimiter({ maxAttempts: 5, windowSeconds: 60 }, () => START);
    metrics = createMetricsCollector({ prefix: "validator_test" });
    validator = new CredentialValidator({
      connections: supplierFor(provider),
      limiter,
      logger: silentLogger,
      metrics,
    });
  });

  describe("Basic credentials", () => {
    it("should accept a username and secret the backend accepts", async () => {
      const outcome = await validator.validate(basic("alice:test-secret"));

      expect(outcome).toEqual({ kind: "ok", principal: "alice" });
      expect(provider.validationAttempts).toEqual([
        { kind: "password", username: "alice", password: "test-secret" },
      ]);
      expect(await metrics.getCounterValue("auth_attempts_total", { status: "success" })).toBe(1);
    });

    it("should reject a secret the backend refuses", async () => {
      const outcome = await validator.validate(basic("alice:wrong"));

      expect(outcome).toEqual({ kind: "rejected" });
      expect(await metrics.getCounterValue("auth_attempts_total", { status: "failed" })).toBe(1);
    });

    it("should flag a value that is not base64 of user:secret", async () => {
      const outcome = await validator.validate("Basic !!!!");

      expect(outcome).toEqual({ kind: "invalid_format", reason: "Malformed basic credential" });
      expect(provider.validationAttempts).toHaveLength(0);
    });

    it("should flag a username outside the identifier pattern", async () => {
      const outcome = await validator.validate(basic("bad-user:test-secret"));

      expect(outcome).toEqual({ kind: "invalid_format", reason: "Invalid username format" });
      expect(provider.validationAttempts).toHaveLength(0);
    });

    it("should reject an empty secret without contacting the backend", async () => {
      const outcome = await validator.validate(basic("alice: "));

      expect(outcome).toEqual({ kind: "rejected" });
      expect(provider.validationAttempts).toHaveLength(0);
    });
  });

  describe("Bearer tokens", () => {
    it("should take the principal from the backend", async () => {
      const outcome = await validator.validate("Bearer header.payload.signature");

      expect(outcome).toEqual({ kind: "ok", principal: "bob" });
      expect(provider.validationAttempts).toEqual([{ kind: "token", token: "header.payload.signature" }]);
    });

    it("should flag a token without three segments", async () => {
      const outcome = await validator.validate("Bearer opaque");

      expect(outcome).toEqual({ kind: "invalid_format", reason: "Malformed bearer token" });
      expect(provider.validationAttempts).toHaveLength(0);
    });

    it("should reject a token the backend does not know", async () => {
      expect(await validator.validate("Bearer a.b.c")).toEqual({ kind: "rejected" });
    });

    it("should reject a blank backend identity", async () => {
      provider.tokens.set("x.y.z", "   ");
      expect(await validator.validate("Bearer x.y.z")).toEqual({ kind: "rejected" });
    });
  });

  describe("Other headers", () => {
    it("should report an unsupported scheme", async () => {
      expect(await validator.validate("Digest realm=x")).toEqual({ kind: "unsupported_scheme", scheme: "digest" });
    });

    it("should reject a scheme without a value", async () => {
      expect(await validator.validate("Basic")).toEqual({ kind: "rejected" });
    });
  });

  describe("Rate limiting", () => {
    it("should refuse the sixth attempt without contacting the backend", async () => {
      const header = basic("alice:wrong");
      for (let i = 0; i < 5; i++) {
        expect(await validator.validate(header, "10.0.0.1")).toEqual({ kind: "rejected" });
      }

      const outcome = await validator.validate(header, "10.0.0.1");

      expect(outcome).toEqual({ kind: "rate_limited", retryAfterSeconds: 60 });
      expect(provider.validationAttempts).toHaveLength(5);
      expect(await metrics.getCounterValue("rate_limit_hits_total")).toBe(1);
    });

    it("should limit each fingerprint separately", async () => {
      const header = basic("alice:wrong");
      for (let i = 0; i < 5; i++) {
        await validator.validate(header, "10.0.0.1");
      }

      expect(await validator.validate(header, "10.0.0.2")).toEqual({ kind: "rejected" });
    });

    it("should clear the fingerprint after a success", async () => {
      const header = basic("carol:test-secret");
      for (let i = 0; i < 4; i++) {
        await validator.validate(header);
      }
      expect(limiter.getRemainingAttempts(generateClientId(header, null))).toBe(1);

      provider.passwords.set("carol", "test-secret");
      expect(await validator.validate(header)).toEqual({ kind: "ok", principal: "carol" });
      expect(limiter.getRemainingAttempts(generateClientId(header, null))).toBe(5);
    });
  });
});
