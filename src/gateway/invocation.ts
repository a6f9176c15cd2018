/**
 * Tool Invocation Gateway
 *
 * Adapts capability handlers into MCP tools with one invocation contract:
 * validate the caller's arguments, lease a backend session of the declared
 * kind, tag it with the request's trace tag, run the handler off the
 * caller's stack, release the session and answer with a response envelope.
 *
 * Features:
 * - One forced provider rebuild when no live pool is available
 * - Trace tag failures are fatal under basic auth, advisory otherwise
 * - Cancelled requests discard the handler result
 * - Handler failures never escape as exceptions
 */

import { hostname } from "os";
import { setImmediate as yieldToEventLoop } from "timers/promises";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AuthMode } from "../config/settings.js";
import type { ConnectionSupplier, SessionKind, SessionLease } from "../db/connection-provider.js";
import { getRequestContext } from "../middleware/request-context.js";
import { startTimer, type MetricsCollector } from "../monitoring/metrics.js";
import { toText, type Logger } from "../utils/logger.js";
import { buildTraceTag } from "../utils/trace-tag.js";
import { formatIssues } from "../utils/validation.js";
import {
  describeHandler,
  toArgumentSchema,
  toInputSchema,
  TOOL_NAME_PARAMETER,
  type CapabilityHandler,
  type HandlerDescriptor,
  type ToolInputSchema,
} from "./descriptor.js";
import { formatErrorResponse, formatTextResponse } from "./response.js";

// =============================================================================
// Types
// =============================================================================

export interface InvocationOptions {
  /** Fires when the MCP request is cancelled */
  signal?: AbortSignal;
}

/** A handler as callers see it */
export interface ExposedTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  readonly descriptor: HandlerDescriptor;
  call(args: Record<string, unknown> | undefined, options?: InvocationOptions): Promise<CallToolResult>;
}

export interface GatewayOptions {
  /** Application name carried in the trace tag */
  application: string;
  authMode: AuthMode;
  connections: ConnectionSupplier;
  logger: Logger;
  profile?: string | null;
  /** `host:pid` by default */
  processId?: string;
  /** Injected into handlers that declare a config parameter */
  featureConfig?: Readonly<Record<string, unknown>>;
  metrics?: MetricsCollector;
}

export class CancelledError extends Error {
  constructor() {
    super("Request cancelled");
    this.name = "CancelledError";
  }
}

// =============================================================================
// Gateway
// =============================================================================

export class ToolInvocationGateway {
  private options: GatewayOptions;
  private processId: string;

  constructor(options: GatewayOptions) {
    this.options = options;
    this.processId = options.processId ?? `${hostname()}:${process.pid}`;
  }

  /**
   * Wrap a handler. The descriptor and schemas are computed here, once.
   *
   * @throws HandlerDeclarationError for an invalid parameter declaration
   */
  adapt(handler: CapabilityHandler): ExposedTool {
    const descriptor = describeHandler(handler);
    const inputSchema = toInputSchema(descriptor);
    const argumentSchema = toArgumentSchema(descriptor);

    return Object.freeze({
      name: handler.name,
      description: handler.description,
      inputSchema,
      descriptor,
      call: async (args: Record<string, unknown> | undefined, options: InvocationOptions = {}) => {
        const parsed = argumentSchema.safeParse(args ?? {});
        if (!parsed.success) {
          this.options.metrics?.incrementErrors("invalid_params");
          return formatErrorResponse(`Invalid parameters: ${formatIssues(parsed.error)}`, {
            tool_name: handler.name,
          });
        }
        return this.execute(handler, descriptor, parsed.data, options.signal);
      },
    });
  }

  private async execute(
    handler: CapabilityHandler,
    descriptor: HandlerDescriptor,
    visibleArgs: Record<string, unknown>,
    signal: AbortSignal | undefined
  ): Promise<CallToolResult> {
    const { logger, metrics } = this.options;
    const toolName = handler.name;
    const context = getRequestContext();
    const timer = metrics ? startTimer(metrics, toolName) : null;

    let lease: SessionLease | null = null;
    try {
      if (descriptor.session) {
        lease = await this.acquire(descriptor.session.kind);

        const tag = buildTraceTag({
          application: this.options.application,
          profile: this.options.profile ?? null,
          processId: this.processId,
          toolName,
          context,
        });

        try {
          await lease.session.setTraceTag(tag);
          logger.debug("Trace tag applied", { tool: toolName, tag });
        } catch (error) {
          const enforced = this.options.authMode === "basic";
          metrics?.incrementTraceTagFailures(enforced);
          if (enforced) {
            logger.error("Failed to set trace tag under basic auth", { tool: toolName, error });
            timer?.end("error");
            return formatErrorResponse(
              `Cannot run tool '${toolName}': failed to set trace tag for basic auth. Error: ${errorMessage(error)}`,
              { tool_name: toolName }
            );
          }
          logger.warn("Failed to set trace tag; continuing", { tool: toolName, error });
        }
      }

      const args: Record<string, unknown> = { ...visibleArgs };
      if (descriptor.injectsToolName) {
        args[TOOL_NAME_PARAMETER] = toolName;
      }
      if (descriptor.configParameter) {
        args[descriptor.configParameter] = this.options.featureConfig ?? {};
      }

      // Never run handler code on the caller's stack
      await yieldToEventLoop();
      throwIfCancelled(signal);

      const result = await handler.run(lease?.session, Object.freeze(args));

      // A cancelled request's result is discarded
      throwIfCancelled(signal);

      const response = formatTextResponse(result);
      timer?.end(response.isError ? "error" : "success");
      return response;
    } catch (error) {
      if (error instanceof CancelledError) {
        logger.info("Tool invocation cancelled", { tool: toolName, request: context?.requestId });
        metrics?.incrementErrors("cancelled");
      } else {
        logger.error(`Error in tool ${toolName}`, { request: context?.requestId, error });
        metrics?.incrementErrors("tool_error");
      }
      timer?.end("error");
      return formatErrorResponse(errorMessage(error), { tool_name: toolName });
    } finally {
      if (lease) {
        await this.release(lease, toolName);
      }
    }
  }

  /**
   * Lease a session, rebuilding the provider once if it has no live pool
   */
  private async acquire(kind: SessionKind): Promise<SessionLease> {
    let provider = this.options.connections();
    if (!provider.isLive()) {
      this.options.logger.warn("Connection provider not live; reinitializing");
      provider = this.options.connections(true);
    }
    return provider.acquire(kind);
  }

  private async release(lease: SessionLease, toolName: string): Promise<void> {
    try {
      await lease.release();
    } catch (error) {
      this.options.logger.warn("Failed to release backend session", { tool: toolName, error });
    }
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : toText(error);
}
