/**
 * HTTP transports
 *
 * Serves MCP over streamable HTTP (one transport and MCP server per
 * session, routed by `mcp-session-id`) or over the legacy SSE pair
 * (`GET /sse` + `POST /messages`), plus `/health` and `/metrics`.
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "http";
import { randomUUID } from "crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { Settings } from "../config/settings.js";
import { MetricsAuthError, type MetricsCollector } from "../monitoring/metrics.js";
import type { Logger } from "../utils/logger.js";

/** Largest JSON-RPC body accepted */
export const MAX_BODY_BYTES = 4 * 1024 * 1024;

export const SSE_PATH = "/sse";
export const SSE_MESSAGES_PATH = "/messages";

export interface HealthReport {
  status: "ok" | "degraded";
  [key: string]: unknown;
}

export interface HttpGatewayOptions {
  settings: Settings;
  /** Builds a fresh MCP server for each transport session */
  createMcpServer: () => Server;
  logger: Logger;
  health: () => HealthReport;
  metrics?: MetricsCollector;
}

export interface HttpGateway {
  readonly server: HttpServer;
  /** Port actually bound (useful with port 0) */
  readonly port: number;
  close(): Promise<void>;
}

class BodyError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly rpcCode: number
  ) {
    super(message);
    this.name = "BodyError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new BodyError("Payload too large", 413, -32600);
    }
    chunks.push(buffer);
  }
  const text = Buffer.concat(chunks).toString("utf8");
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new BodyError("Parse error", 400, -32700);
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  sendJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function stripTrailingSlash(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

// =============================================================================
// Gateway
// =============================================================================

export async function startHttpGateway(options: HttpGatewayOptions): Promise<HttpGateway> {
  const { settings, createMcpServer, logger, metrics } = options;
  const mcpPath = stripTrailingSlash(settings.path);

  const streamable = new Map<string, StreamableHTTPServerTransport>();
  const sse = new Map<string, SSEServerTransport>();
  const updateSessionGauge = (): void => metrics?.setActiveSessions(streamable.size + sse.size);

  const handleStreamable = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const sessionId = headerValue(req, "mcp-session-id");
    const existing = sessionId ? streamable.get(sessionId) : undefined;

    if (req.method !== "POST") {
      if (!existing) {
        sendRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
        return;
      }
      await existing.handleRequest(req, res);
      return;
    }

    const body = await readJsonBody(req);
    if (existing) {
      await existing.handleRequest(req, res, body);
      return;
    }

    if (sessionId || !isInitializeRequest(body)) {
      sendRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
      return;
    }

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        streamable.set(id, transport);
        updateSessionGauge();
        logger.info("MCP session opened", { session: id });
      },
    });
    transport.onclose = () => {
      const id = transport.sessionId;
      if (id && streamable.delete(id)) {
        updateSessionGauge();
        logger.info("MCP session closed", { session: id });
      }
    };

    await createMcpServer().connect(transport);
    await transport.handleRequest(req, res, body);
  };

  const handleSse = async (req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> => {
    if (req.method === "GET" && url.pathname === SSE_PATH) {
      const transport = new SSEServerTransport(SSE_MESSAGES_PATH, res);
      sse.set(transport.sessionId, transport);
      updateSessionGauge();
      res.on("close", () => {
        sse.delete(transport.sessionId);
        updateSessionGauge();
      });
      await createMcpServer().connect(transport);
      return;
    }

    if (req.method === "POST" && url.pathname === SSE_MESSAGES_PATH) {
      const sessionId = url.searchParams.get("sessionId");
      const transport = sessionId ? sse.get(sessionId) : undefined;
      if (!transport) {
        sendRpcError(res, 400, -32000, "Bad Request: Unknown SSE session");
        return;
      }
      const body = await readJsonBody(req);
      await transport.handlePostMessage(req, res, body);
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  };

  const handleMetrics = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (!metrics) {
      sendJson(res, 404, { error: "Metrics disabled" });
      return;
    }
    const authorization = headerValue(req, "authorization");
    const token = authorization?.toLowerCase().startsWith("bearer ")
      ? authorization.slice("bearer ".length).trim()
      : undefined;
    try {
      const text = await metrics.getMetricsText(token);
      res.writeHead(200, { "Content-Type": metrics.getRegistry().contentType });
      res.end(text);
    } catch (error) {
      if (error instanceof MetricsAuthError) {
        sendJson(res, 401, { error: error.message });
        return;
      }
      throw error;
    }
  };

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const path = stripTrailingSlash(url.pathname);

    if (req.method === "GET" && path === "/health") {
      const report = options.health();
      sendJson(res, report.status === "ok" ? 200 : 503, report);
      return;
    }
    if (req.method === "GET" && path === "/metrics") {
      await handleMetrics(req, res);
      return;
    }
    if (settings.transport === "sse") {
      await handleSse(req, res, url);
      return;
    }
    if (path === mcpPath) {
      await handleStreamable(req, res);
      return;
    }
    sendJson(res, 404, { error: "Not found" });
  };

  const server = createServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      if (error instanceof BodyError) {
        sendRpcError(res, error.statusCode, error.rpcCode, error.message);
        return;
      }
      logger.error("HTTP request failed", { path: req.url, error });
      if (!res.headersSent) {
        sendRpcError(res, 500, -32603, "Internal error");
      } else {
        res.end();
      }
    });
  });

  server.on("clientError", (error, socket) => {
    logger.warn("HTTP client error", { error });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(settings.port, settings.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : settings.port;
  logger.info(`Listening on http://${settings.host}:${port}`, {
    transport: settings.transport,
    path: settings.transport === "sse" ? SSE_PATH : settings.path,
  });

  return {
    server,
    port,
    close: async () => {
      const transports = [...streamable.values(), ...sse.values()];
      streamable.clear();
      sse.clear();
      await Promise.allSettled(transports.map((transport) => transport.close()));
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
    },
  };
}
