/**
 * Tool Registry
 *
 * Explicit, startup-built map from tool name to exposed tool. The MCP
 * server receives it by reference; nothing registers tools globally.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "../utils/logger.js";
import type { CapabilityHandler } from "./descriptor.js";
import type { ExposedTool, ToolInvocationGateway } from "./invocation.js";

export class DuplicateToolError extends Error {
  constructor(name: string) {
    super(`Tool '${name}' is already registered`);
    this.name = "DuplicateToolError";
  }
}

export class ToolRegistry {
  private tools = new Map<string, ExposedTool>();
  private gateway: ToolInvocationGateway;
  private logger: Logger;

  constructor(gateway: ToolInvocationGateway, logger: Logger) {
    this.gateway = gateway;
    this.logger = logger;
  }

  /**
   * Adapt and register one handler
   *
   * @throws DuplicateToolError when the name is taken
   */
  register(handler: CapabilityHandler): ExposedTool {
    if (this.tools.has(handler.name)) {
      throw new DuplicateToolError(handler.name);
    }
    const tool = this.gateway.adapt(handler);
    this.tools.set(tool.name, tool);
    this.logger.debug("Registered tool", {
      tool: tool.name,
      session: tool.descriptor.session?.kind ?? "none",
      parameters: tool.descriptor.visible.map((p) => p.name),
    });
    return tool;
  }

  registerAll(handlers: readonly CapabilityHandler[]): void {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  get(name: string): ExposedTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Tool listing for `tools/list`
   */
  list(): Tool[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: {
        type: "object" as const,
        properties: tool.inputSchema.properties,
        ...(tool.inputSchema.required ? { required: tool.inputSchema.required } : {}),
      },
    }));
  }
}
