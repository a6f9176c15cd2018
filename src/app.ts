/**
 * MCP server factory
 *
 * Builds an MCP Server whose `tools/list` and `tools/call` run inside
 * Request Context Capture and dispatch through the tool registry. One
 * server is created per transport session.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolResult,
  type ServerNotification,
  type ServerRequest,
} from "@modelcontextprotocol/sdk/types.js";
import type { TransportKind } from "./config/settings.js";
import type { ToolRegistry } from "./gateway/registry.js";
import { isPermissionDenied } from "./middleware/errors.js";
import { getRequestContext, type InboundRequest, type RequestContextCapture } from "./middleware/request-context.js";
import type { MetricsCollector } from "./monitoring/metrics.js";
import type { Logger } from "./utils/logger.js";

export const SERVER_NAME = "querygate";
export const SERVER_VERSION = "0.1.0";

export interface GatewayServerDependencies {
  transport: TransportKind;
  registry: ToolRegistry;
  capture: RequestContextCapture;
  logger: Logger;
  metrics?: MetricsCollector;
}

type HandlerExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

/**
 * What the capture step needs from an SDK request
 */
export function inboundFrom(extra: HandlerExtra): InboundRequest {
  return {
    sessionId: extra.sessionId,
    requestId: extra.requestId,
    headers: extra.requestInfo?.headers,
  };
}

export function createGatewayServer(deps: GatewayServerDependencies): Server {
  const { transport, registry, capture, logger, metrics } = deps;

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async (_request, extra) => {
    try {
      return await capture.run(transport, inboundFrom(extra), async () => ({
        tools: registry.list(),
      }));
    } catch (err) {
      if (isPermissionDenied(err)) {
        logger.warn(`Tool listing denied: ${err.message}`);
        throw new McpError(ErrorCode.InvalidRequest, err.message);
      }
      throw err;
    }
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;

    try {
      return await capture.run(transport, inboundFrom(extra), async () => {
        const tool = registry.get(name);
        if (!tool) {
          throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
        }
        logger.info(`Tool call received: ${name}`, { request: getRequestContext()?.requestId });
        return tool.call(args, { signal: extra.signal });
      });
    } catch (err) {
      if (!isPermissionDenied(err)) {
        throw err;
      }

      const rateLimited = err.code === "RATE_LIMITED";
      logger.warn(`${rateLimited ? "Rate limit" : "Auth"} error for ${name}: ${err.message}`);
      metrics?.incrementErrors(rateLimited ? "rate_limited" : "permission_denied");

      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(
              {
                error: err.message,
                code: rateLimited ? "RATE_LIMITED" : "PERMISSION_DENIED",
                ...(err.retryAfter !== undefined ? { retryAfter: err.retryAfter } : {}),
                tool: name,
                requestId: String(extra.requestId),
              },
              null,
              2
            ),
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}
