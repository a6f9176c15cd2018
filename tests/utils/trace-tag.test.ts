/**
 * Trace Tag Builder Tests
 *
 * Covers:
 * - Fixed key order and omission of absent values
 * - Truncation before escaping
 * - PROXYUSER only for a resolved principal
 */

import { describe, it, expect } from "vitest";
import {
  buildTraceTag,
  sanitizeTagValue,
  firstForwardedAddress,
  MAX_TAG_VALUE_LENGTH,
} from "../../src/utils/trace-tag.js";
import type { RequestContext } from "../../src/middleware/request-context.js";

function context(overrides: Partial<RequestContext> = {}): RequestContext {
  return {
    headers: {},
    requestId: "req1",
    sessionId: "sess1",
    clientSessionId: null,
    correlationId: null,
    tenant: null,
    userAgent: null,
    forwardedFor: null,
    clientIp: null,
    authScheme: null,
    authTokenSha256: null,
    assumeUser: null,
    userId: null,
    ...overrides,
  };
}

describe("sanitizeTagValue", () => {
  it("should return an empty string for null and undefined", () => {
    expect(sanitizeTagValue(null)).toBe("");
    expect(sanitizeTagValue(undefined)).toBe("");
  });

  it("should replace semicolons and double single quotes", () => {
    expect(sanitizeTagValue("a;b'c")).toBe("a_b''c");
  });

  it("should trim surrounding whitespace", () => {
    expect(sanitizeTagValue("  x;y  ")).toBe("x_y");
  });

  it("should truncate before escaping", () => {
    expect(sanitizeTagValue("a".repeat(300))).toHaveLength(MAX_TAG_VALUE_LENGTH);
    // 256 quotes survive truncation, then each is doubled
    expect(sanitizeTagValue("'".repeat(300))).toHaveLength(512);
  });

  it("should stringify non-string values", () => {
    expect(sanitizeTagValue(42)).toBe("42");
  });
});

describe("firstForwardedAddress", () => {
  it("should take the first entry of the chain", () => {
    expect(firstForwardedAddress(" 10.0.0.1 , 192.168.1.1")).toBe("10.0.0.1");
  });

  it("should return null for an empty chain", () => {
    expect(firstForwardedAddress(undefined)).toBeNull();
    expect(firstForwardedAddress("")).toBeNull();
    expect(firstForwardedAddress(" ,10.0.0.1")).toBeNull();
  });
});

describe("buildTraceTag", () => {
  it("should emit only the static keys without a request context", () => {
    const tag = buildTraceTag({
      application: "querygate",
      profile: null,
      processId: "host:42",
      toolName: "base_readQuery",
      context: null,
    });

    expect(tag).toBe("APPLICATION=querygate;PROCESS_ID=host:42;TOOL_NAME=base_readQuery;");
  });

  it("should emit every key in fixed order", () => {
    const tag = buildTraceTag({
      application: "querygate",
      profile: "prod",
      processId: "host:42",
      toolName: "dba_whoAmI",
      context: context({
        tenant: "acme",
        clientIp: "10.0.0.1",
        userAgent: "agent/1.0",
        authScheme: "basic",
        authTokenSha256: "abcdef0123456789abcdef",
        assumeUser: "alice",
      }),
    });

    expect(tag).toBe(
      "APPLICATION=querygate;PROFILE=prod;PROCESS_ID=host:42;TOOL_NAME=dba_whoAmI;" +
        "REQUEST_ID=req1;SESSION_ID=sess1;TENANT=acme;CLIENT_IP=10.0.0.1;" +
        "USER_AGENT=agent/1.0;AUTH_SCHEME=basic;AUTH_HASH=abcdef012345;PROXYUSER=alice;"
    );
  });

  it("should escape hostile values so they cannot add keys", () => {
    const tag = buildTraceTag({
      application: "querygate",
      processId: "host:42",
      toolName: "t",
      context: context({ userAgent: "x;PROXYUSER=root'" }),
    });

    expect(tag).toContain("USER_AGENT=x_PROXYUSER=root'';");
    expect(tag).not.toContain(";PROXYUSER=");
  });

  it("should omit PROXYUSER when no principal was resolved", () => {
    const tag = buildTraceTag({
      application: "querygate",
      processId: "host:42",
      toolName: "t",
      context: context({ assumeUser: "" }),
    });

    expect(tag).toBe("APPLICATION=querygate;PROCESS_ID=host:42;TOOL_NAME=t;REQUEST_ID=req1;SESSION_ID=sess1;");
  });
});
