/**
 * Gateway Settings Tests
 *
 * Verifies defaults, environment parsing, CLI precedence and validation errors.
 */

import { describe, it, expect } from "vitest";
import { loadSettings, readCliFlags, SettingsError } from "../../src/config/settings.js";

function settingsError(fn: () => unknown): SettingsError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SettingsError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a SettingsError");
}

describe("loadSettings", () => {
  it("should apply defaults", () => {
    const settings = loadSettings([], {});

    expect(settings).toEqual({
      transport: "stdio",
      host: "localhost",
      port: 8001,
      path: "/mcp/",
      poolSize: 5,
      poolTimeoutSeconds: 30,
      authMode: "none",
      authCacheTtlSeconds: 300,
      authRateLimitAttempts: 5,
      authRateLimitWindowSeconds: 60,
      authAuditRetentionDays: 30,
      metricsEnabled: false,
      maintenanceIntervalSeconds: 60,
      loggingLevel: "WARNING",
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it("should read and normalize environment variables", () => {
    const settings = loadSettings([], {
      MCP_TRANSPORT: "Streamable-HTTP",
      MCP_PORT: "9000",
      AUTH_MODE: "BASIC",
      AUTH_CACHE_TTL: "120",
      LOGGING_LEVEL: "debug",
      METRICS_ENABLED: "true",
      DATABASE_URI: "postgres://gateway@localhost/app",
      PROFILE: "dba",
    });

    expect(settings).toMatchObject({
      transport: "streamable-http",
      port: 9000,
      authMode: "basic",
      authCacheTtlSeconds: 120,
      loggingLevel: "DEBUG",
      metricsEnabled: true,
      databaseUri: "postgres://gateway@localhost/app",
      profile: "dba",
    });
  });

  it("should apply numeric defaults to empty values", () => {
    const settings = loadSettings([], { MCP_PORT: "", POOL_SIZE: " ", AUTH_CACHE_TTL: "" });

    expect(settings.port).toBe(8001);
    expect(settings.poolSize).toBe(5);
    expect(settings.authCacheTtlSeconds).toBe(300);
  });

  it("should treat empty optional values as unset", () => {
    const settings = loadSettings([], { DATABASE_URI: "  ", PROFILE: "" });

    expect(settings.databaseUri).toBeUndefined();
    expect(settings.profile).toBeUndefined();
  });

  it("should let CLI flags override the environment", () => {
    const settings = loadSettings(["--mcp_port", "9100", "--auth_mode=none"], {
      MCP_PORT: "9000",
      AUTH_MODE: "basic",
    });

    expect(settings.port).toBe(9100);
    expect(settings.authMode).toBe("none");
  });

  it("should report an unknown transport", () => {
    const error = settingsError(() => loadSettings([], { MCP_TRANSPORT: "carrier-pigeon" }));

    expect(error.issues).toEqual(["transport: MCP_TRANSPORT must be stdio, streamable-http or sse"]);
  });

  it("should report every invalid value at once", () => {
    const error = settingsError(() => loadSettings([], { MCP_PORT: "abc", AUTH_MODE: "oauth" }));

    expect(error.issues).toEqual([
      "port: Expected number, received nan",
      "authMode: AUTH_MODE must be none or basic",
    ]);
    expect(error.message).toBe(
      "Invalid configuration: port: Expected number, received nan; authMode: AUTH_MODE must be none or basic"
    );
  });
});

describe("readCliFlags", () => {
  it("should ignore unknown flags and positionals", () => {
    expect(readCliFlags(["--unknown", "x", "--profile", "dev"])).toEqual({ profile: "dev" });
  });
});
