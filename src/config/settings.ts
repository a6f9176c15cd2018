/**
 * Gateway Settings
 *
 * Single frozen settings object built once at startup.
 * Precedence: CLI flags > environment variables > defaults.
 *
 * Environment variables:
 * - PROFILE, MCP_TRANSPORT, MCP_HOST, MCP_PORT, MCP_PATH
 * - DATABASE_URI, POOL_SIZE, POOL_TIMEOUT, TOKEN_LOGIN_USER
 * - AUTH_MODE, AUTH_CACHE_TTL, AUTH_RATE_LIMIT_ATTEMPTS, AUTH_RATE_LIMIT_WINDOW
 * - AUTH_AUDIT_DB, AUTH_AUDIT_RETENTION_DAYS, METRICS_ENABLED, METRICS_AUTH_TOKEN
 * - MAINTENANCE_INTERVAL, LOGGING_LEVEL
 */

import { parseArgs } from "util";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const TRANSPORTS = ["stdio", "streamable-http", "sse"] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

export const AUTH_MODES = ["none", "basic"] as const;
export type AuthMode = (typeof AUTH_MODES)[number];

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const lowerCase = (value: unknown): unknown =>
  typeof value === "string" ? value.trim().toLowerCase() : value;

const upperCase = (value: unknown): unknown =>
  typeof value === "string" ? value.trim().toUpperCase() : value;

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

/** Numbers from the environment; unset and empty both take the default */
const numeric = <T extends z.ZodTypeAny>(schema: T, fallback: number) =>
  z.preprocess((value) => emptyToUndefined(value) ?? fallback, schema);

const flag = z.preprocess(
  (value) => (typeof value === "string" ? ["1", "true", "yes", "on"].includes(value.toLowerCase()) : value),
  z.boolean()
);

export const SettingsSchema = z.object({
  profile: optionalString,
  transport: z.preprocess(lowerCase, z.enum(TRANSPORTS, {
    message: "MCP_TRANSPORT must be stdio, streamable-http or sse",
  })).default("stdio"),
  host: z.string().min(1).default("localhost"),
  port: numeric(z.coerce.number().int().min(0).max(65535), 8001),
  path: z.string().startsWith("/", "MCP_PATH must start with '/'").default("/mcp/"),

  databaseUri: optionalString,
  poolSize: numeric(z.coerce.number().int().positive(), 5),
  poolTimeoutSeconds: numeric(z.coerce.number().positive(), 30),
  tokenLoginUser: optionalString,

  authMode: z.preprocess(lowerCase, z.enum(AUTH_MODES, {
    message: "AUTH_MODE must be none or basic",
  })).default("none"),
  authCacheTtlSeconds: numeric(z.coerce.number().int().positive(), 300),
  authRateLimitAttempts: numeric(z.coerce.number().int().positive(), 5),
  authRateLimitWindowSeconds: numeric(z.coerce.number().int().positive(), 60),
  authAuditDb: optionalString,
  authAuditRetentionDays: numeric(z.coerce.number().int().positive(), 30),

  metricsEnabled: flag.default(false),
  metricsAuthToken: optionalString,
  maintenanceIntervalSeconds: numeric(z.coerce.number().int().positive(), 60),

  loggingLevel: z.preprocess(upperCase, z.enum(LOG_LEVELS)).default("WARNING"),
});

export type Settings = Readonly<z.infer<typeof SettingsSchema>>;

type SettingsKey = keyof z.input<typeof SettingsSchema>;

/** Environment variable backing each setting */
const ENV_NAMES: Record<SettingsKey, string> = {
  profile: "PROFILE",
  transport: "MCP_TRANSPORT",
  host: "MCP_HOST",
  port: "MCP_PORT",
  path: "MCP_PATH",
  databaseUri: "DATABASE_URI",
  poolSize: "POOL_SIZE",
  poolTimeoutSeconds: "POOL_TIMEOUT",
  tokenLoginUser: "TOKEN_LOGIN_USER",
  authMode: "AUTH_MODE",
  authCacheTtlSeconds: "AUTH_CACHE_TTL",
  authRateLimitAttempts: "AUTH_RATE_LIMIT_ATTEMPTS",
  authRateLimitWindowSeconds: "AUTH_RATE_LIMIT_WINDOW",
  authAuditDb: "AUTH_AUDIT_DB",
  authAuditRetentionDays: "AUTH_AUDIT_RETENTION_DAYS",
  metricsEnabled: "METRICS_ENABLED",
  metricsAuthToken: "METRICS_AUTH_TOKEN",
  maintenanceIntervalSeconds: "MAINTENANCE_INTERVAL",
  loggingLevel: "LOGGING_LEVEL",
};

/** CLI flag backing each overridable setting */
const CLI_FLAGS: Partial<Record<SettingsKey, string>> = {
  profile: "profile",
  transport: "mcp_transport",
  host: "mcp_host",
  port: "mcp_port",
  path: "mcp_path",
  databaseUri: "database_uri",
  authMode: "auth_mode",
  authCacheTtlSeconds: "auth_cache_ttl",
  loggingLevel: "logging_level",
};

// =============================================================================
// Errors
// =============================================================================

export class SettingsError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "SettingsError";
    this.issues = issues;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SettingsError);
    }
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Read raw setting values from the environment
 */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const raw: Record<string, string> = {};
  for (const [key, envName] of Object.entries(ENV_NAMES)) {
    const value = env[envName];
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  return raw;
}

/**
 * Parse known CLI flags (`--mcp_port 9000` or `--mcp_port=9000`).
 * Unknown flags are ignored.
 */
export function readCliFlags(argv: readonly string[]): Record<string, string> {
  const options: Record<string, { type: "string" }> = {};
  for (const flagName of Object.values(CLI_FLAGS)) {
    options[flagName] = { type: "string" };
  }

  const { values } = parseArgs({
    args: [...argv],
    options,
    strict: false,
    allowPositionals: true,
  });

  const raw: Record<string, string> = {};
  for (const [key, flagName] of Object.entries(CLI_FLAGS)) {
    const value = values[flagName];
    if (typeof value === "string") {
      raw[key] = value;
    }
  }
  return raw;
}

/**
 * Build the frozen settings object
 *
 * @param argv - CLI arguments (without node and script path)
 * @param env - Environment variables
 * @throws SettingsError listing every invalid value
 */
export function loadSettings(
  argv: readonly string[] = [],
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const merged = { ...readEnvironment(env), ...readCliFlags(argv) };
  const result = SettingsSchema.safeParse(merged);

  if (!result.success) {
    throw new SettingsError(
      result.error.errors.map((issue) => {
        const key = issue.path.join(".");
        return key ? `${key}: ${issue.message}` : issue.message;
      })
    );
  }

  return Object.freeze(result.data);
}
