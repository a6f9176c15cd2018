#!/usr/bin/env node
/**
 * querygate - Authenticated MCP gateway for PostgreSQL
 *
 * Main entry point. Wires settings, the connection provider, authentication
 * state and the tool registry, then serves MCP over the configured
 * transport (stdio, streamable-http or sse).
 */

import { config as loadDotenv } from "dotenv";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGatewayServer, SERVER_NAME } from "./app.js";
import { loadSettings, SettingsError, type Settings } from "./config/settings.js";
import { createPgConnectionSupplier } from "./db/pg-provider.js";
import { ToolInvocationGateway } from "./gateway/invocation.js";
import { ToolRegistry } from "./gateway/registry.js";
import { createAuthCache } from "./middleware/auth-cache.js";
import { CredentialValidator } from "./middleware/auth.js";
import { RequestContextCapture } from "./middleware/request-context.js";
import { createMetricsCollector } from "./monitoring/metrics.js";
import { createMaintenanceScheduler } from "./scheduler/index.js";
import { SqliteAuditStore } from "./security/audit-store.js";
import { BUILTIN_TOOLS } from "./tools/index.js";
import { startHttpGateway } from "./transports/http.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { createRateLimiter } from "./utils/rate-limiter.js";

async function main(): Promise<void> {
  loadDotenv();

  let settings: Settings;
  try {
    settings = loadSettings(process.argv.slice(2), process.env);
  } catch (err) {
    if (err instanceof SettingsError) {
      for (const issue of err.issues) {
        console.error(`[FATAL] ${issue}`);
      }
      process.exit(2);
    }
    throw err;
  }

  const logger = createLogger(settings.loggingLevel);
  logger.info("Starting gateway", {
    transport: settings.transport,
    authMode: settings.authMode,
    profile: settings.profile,
  });

  const metrics = settings.metricsEnabled
    ? createMetricsCollector({ collectDefaultMetrics: true, authToken: settings.metricsAuthToken })
    : undefined;

  const connections = createPgConnectionSupplier(settings, logger);

  const cache = createAuthCache({ ttlSeconds: settings.authCacheTtlSeconds });
  const limiter = createRateLimiter({
    maxAttempts: settings.authRateLimitAttempts,
    windowSeconds: settings.authRateLimitWindowSeconds,
  });
  const validator = new CredentialValidator({
    connections: connections.supplier,
    limiter,
    logger,
    metrics,
  });
  const audit = settings.authAuditDb ? new SqliteAuditStore(settings.authAuditDb) : undefined;

  const capture = new RequestContextCapture({
    authMode: settings.authMode,
    logger,
    cache,
    validator,
    audit,
    metrics,
  });

  const gateway = new ToolInvocationGateway({
    application: SERVER_NAME,
    authMode: settings.authMode,
    connections: connections.supplier,
    logger,
    profile: settings.profile ?? null,
    metrics,
  });
  const registry = new ToolRegistry(gateway, logger);
  registry.registerAll(BUILTIN_TOOLS);
  logger.info(`Registered ${registry.size} tools`, { tools: registry.names() });

  const maintenance = createMaintenanceScheduler(cache, limiter, logger, {
    intervalSeconds: settings.maintenanceIntervalSeconds,
    audit,
    auditRetentionDays: settings.authAuditRetentionDays,
  });
  maintenance.start();

  const createMcpServer = () =>
    createGatewayServer({ transport: settings.transport, registry, capture, logger, metrics });

  let closeTransport: () => Promise<void>;
  if (settings.transport === "stdio") {
    const server = createMcpServer();
    await server.connect(new StdioServerTransport());
    logger.info("Gateway running on stdio transport");
    closeTransport = () => server.close();
  } else {
    const http = await startHttpGateway({
      settings,
      createMcpServer,
      logger,
      metrics,
      health: () => ({
        status: connections.supplier().isLive() ? "ok" : "degraded",
        transport: settings.transport,
        authMode: settings.authMode,
        authCache: cache.getStats(),
      }),
    });
    closeTransport = () => http.close();
  }

  installShutdown(logger, async () => {
    maintenance.stop();
    await closeTransport();
    await connections.close();
    audit?.close();
  });
}

function installShutdown(logger: Logger, shutdown: () => Promise<void>): void {
  let stopping = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}; shutting down`);
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Shutdown failed", { error: err });
        process.exit(1);
      });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

// Run the server
main().catch((err) => {
  console.error("[FATAL] Server error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
