/**
 * HTTP Transport Integration Tests
 *
 * Starts the HTTP gateway on an ephemeral loopback port inside the test
 * process and talks to it with fetch and the MCP streamable HTTP client.
 *
 * Test Coverage:
 * - /health and /metrics endpoints
 * - Session routing errors
 * - Basic authentication from real request headers
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createGatewayServer } from "../../src/app.js";
import { loadSettings } from "../../src/config/settings.js";
import { ToolInvocationGateway } from "../../src/gateway/invocation.js";
import { ToolRegistry } from "../../src/gateway/registry.js";
import { createAuthCache } from "../../src/middleware/auth-cache.js";
import { CredentialValidator } from "../../src/middleware/auth.js";
import { RequestContextCapture } from "../../src/middleware/request-context.js";
import { createMetricsCollector } from "../../src/monitoring/metrics.js";
import { BUILTIN_TOOLS } from "../../src/tools/index.js";
import { startHttpGateway, type HttpGateway } from "../../src/transports/http.js";
import { silentLogger } from "../../src/utils/logger.js";
import { createRateLimiter } from "../../src/utils/rate-limiter.js";
import { FakeConnectionProvider, supplierFor } from "../helpers/fake-connections.js";
import { envelopeOf, textOf } from "../helpers/results.js";

const basic = (text: string): string => `Basic ${Buffer.from(text, "utf8").toString("base64")}`;

describe("HTTP gateway", () => {
  let provider: FakeConnectionProvider;
  let gateway: HttpGateway;
  let baseUrl: string;
  const clients: Client[] = [];

  beforeEach(async () => {
    provider = new FakeConnectionProvider();
    provider.passwords.set("alice", "test-secret");

    const settings = loadSettings([], {
      MCP_TRANSPORT: "streamable-http",
      MCP_HOST: "127.0.0.1",
      MCP_PORT: "0",
      AUTH_MODE: "basic",
    });
    const connections = supplierFor(provider);
    const metrics = createMetricsCollector({ prefix: "querygate", authToken: "test-secret" });
    const capture = new RequestContextCapture({
      authMode: settings.authMode,
      logger: silentLogger,
      cache: createAuthCache(),
      validator: new CredentialValidator({ connections, limiter: createRateLimiter(), logger: silentLogger }),
    });
    const invocation = new ToolInvocationGateway({
      application: "querygate",
      authMode: settings.authMode,
      connections,
      logger: silentLogger,
      processId: "host:1",
    });
    const registry = new ToolRegistry(invocation, silentLogger);
    registry.registerAll(BUILTIN_TOOLS);

    gateway = await startHttpGateway({
      settings,
      logger: silentLogger,
      metrics,
      createMcpServer: () =>
        createGatewayServer({ transport: settings.transport, registry, capture, logger: silentLogger, metrics }),
      health: () => ({ status: provider.isLive() ? "ok" : "degraded" }),
    });
    baseUrl = `http://127.0.0.1:${gateway.port}`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      await client.close();
    }
    await gateway.close();
  });

  async function connectClient(authorization: string): Promise<Client> {
    const transport = new StreamableHTTPClientTransport(new URL(`${baseUrl}/mcp`), {
      requestInit: { headers: { Authorization: authorization, "X-Forwarded-For": "10.0.0.7" } },
    });
    const client = new Client({ name: "http-test-client", version: "1.0.0" });
    await client.connect(transport);
    clients.push(client);
    return client;
  }

  describe("health", () => {
    it("should report ok while the provider is live", async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: "ok" });
    });

    it("should report degraded with 503", async () => {
      provider.live = false;

      const response = await fetch(`${baseUrl}/health/`);

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({ status: "degraded" });
    });
  });

  describe("metrics", () => {
    it("should require the metrics token", async () => {
      const response = await fetch(`${baseUrl}/metrics`);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: "Authentication required for metrics endpoint" });
    });

    it("should serve Prometheus text with the token", async () => {
      const response = await fetch(`${baseUrl}/metrics`, { headers: { Authorization: "Bearer test-secret" } });

      expect(response.status).toBe(200);
      expect(await response.text()).toContain("# TYPE querygate_requests_total counter");
    });
  });

  describe("routing", () => {
    it("should reject a non-initialize request without a session", async () => {
      const response = await fetch(`${baseUrl}/mcp`, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json, text/event-stream" },
        body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        jsonrpc: "2.0",
        error: { code: -32000, message: "Bad Request: No valid session ID provided" },
        id: null,
      });
    });

    it("should reject malformed JSON", async () => {
      const response = await fetch(`${baseUrl}/mcp`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        jsonrpc: "2.0",
        error: { code: -32700, message: "Parse error" },
        id: null,
      });
    });

    it("should answer 404 elsewhere", async () => {
      const response = await fetch(`${baseUrl}/elsewhere`);
      expect(response.status).toBe(404);
    });
  });

  describe("basic authentication over HTTP", () => {
    it("should run a tool as the authenticated principal", async () => {
      const client = await connectClient(basic("alice:test-secret"));
      provider.session.rows = [{ current_user: "alice" }];

      const result = CallToolResultSchema.parse(await client.callTool({ name: "dba_whoAmI", arguments: {} }));

      expect(envelopeOf(result)).toEqual({
        status: "success",
        results: { current_user: "alice" },
        metadata: { tool_name: "dba_whoAmI" },
      });
      expect(provider.validationAttempts).toEqual([{ kind: "password", username: "alice", password: "test-secret" }]);
      expect(provider.session.tags[0]).toMatch(
        /;CLIENT_IP=10\.0\.0\.7;(USER_AGENT=[^;]*;)?AUTH_SCHEME=basic;AUTH_HASH=[0-9a-f]{12};PROXYUSER=alice;$/
      );
    });

    it("should serve later calls in the session from the principal cache", async () => {
      const client = await connectClient(basic("alice:test-secret"));

      await client.listTools();
      await client.callTool({ name: "base_tableList", arguments: {} });

      expect(provider.validationAttempts).toHaveLength(1);
    });

    it("should deny a wrong secret", async () => {
      const client = await connectClient(basic("alice:wrong"));

      const result = CallToolResultSchema.parse(await client.callTool({ name: "dba_whoAmI", arguments: {} }));

      expect(result.isError).toBe(true);
      expect(JSON.parse(textOf(result))).toMatchObject({
        error: "Invalid credentials",
        code: "PERMISSION_DENIED",
        tool: "dba_whoAmI",
      });
      expect(provider.acquired).toEqual([]);
    });
  });
});
