/**
 * Capability Handler Descriptors
 *
 * A capability handler declares its parameters explicitly. From that list a
 * descriptor is computed once at registration: which parameters the gateway
 * injects (session, tool name, feature config) and which the caller sees.
 * The caller-facing JSON Schema and the zod validator both derive from it.
 */

import { z } from "zod";
import type { DataPlaneSession, SessionKind } from "../db/connection-provider.js";

// =============================================================================
// Declarations
// =============================================================================

export type VisibleParameterType = "string" | "integer" | "number" | "boolean" | "string[]" | "object";

export type ParameterDefault = string | number | boolean | string[] | null;

export interface VisibleParameter {
  name: string;
  type: VisibleParameterType;
  description?: string;
  /** Applied when the caller omits the parameter */
  default?: ParameterDefault;
  /** May be omitted even without a default */
  optional?: boolean;
}

export type DeclaredParameter =
  | VisibleParameter
  | { name: string; type: "session"; session: SessionKind }
  | { name: string; type: "config" };

/** Name of the parameter that receives the tool's own name */
export const TOOL_NAME_PARAMETER = "tool_name";

/** Arguments handed to a handler, keyed by declared parameter name */
export type HandlerArgs = Readonly<Record<string, unknown>>;

export interface CapabilityHandler {
  name: string;
  description: string;
  parameters: readonly DeclaredParameter[];
  run(session: DataPlaneSession | undefined, args: HandlerArgs): unknown | Promise<unknown>;
}

/**
 * Identity helper that keeps handler literals type-checked
 */
export function defineHandler(handler: CapabilityHandler): CapabilityHandler {
  return handler;
}

// =============================================================================
// Descriptor
// =============================================================================

export interface HandlerDescriptor {
  readonly name: string;
  readonly parameterNames: readonly string[];
  /** Set when the first declared parameter is a session */
  readonly session: { readonly name: string; readonly kind: SessionKind } | null;
  /** Parameter receiving the injected feature config, if declared */
  readonly configParameter: string | null;
  /** True when `tool_name` is declared and injected */
  readonly injectsToolName: boolean;
  readonly internal: readonly string[];
  readonly visible: readonly VisibleParameter[];
}

export class HandlerDeclarationError extends Error {
  constructor(handler: string, message: string) {
    super(`Handler '${handler}': ${message}`);
    this.name = "HandlerDeclarationError";
  }
}

/**
 * Compute the descriptor for a handler
 *
 * @throws HandlerDeclarationError for duplicate names, a session parameter
 *   that is not first, or more than one config parameter
 */
export function describeHandler(handler: CapabilityHandler): HandlerDescriptor {
  const seen = new Set<string>();
  const internal: string[] = [];
  const visible: VisibleParameter[] = [];
  let session: HandlerDescriptor["session"] = null;
  let configParameter: string | null = null;
  let injectsToolName = false;

  for (const [index, parameter] of handler.parameters.entries()) {
    if (seen.has(parameter.name)) {
      throw new HandlerDeclarationError(handler.name, `duplicate parameter '${parameter.name}'`);
    }
    seen.add(parameter.name);

    if (parameter.type === "session") {
      if (index !== 0) {
        throw new HandlerDeclarationError(handler.name, "the session parameter must be declared first");
      }
      session = Object.freeze({ name: parameter.name, kind: parameter.session });
      internal.push(parameter.name);
      continue;
    }

    if (parameter.type === "config") {
      if (configParameter) {
        throw new HandlerDeclarationError(handler.name, "only one config parameter is allowed");
      }
      configParameter = parameter.name;
      internal.push(parameter.name);
      continue;
    }

    if (parameter.name === TOOL_NAME_PARAMETER) {
      injectsToolName = true;
      internal.push(parameter.name);
      continue;
    }

    visible.push(Object.freeze({ ...parameter }));
  }

  return Object.freeze({
    name: handler.name,
    parameterNames: Object.freeze(handler.parameters.map((p) => p.name)),
    session,
    configParameter,
    injectsToolName,
    internal: Object.freeze(internal),
    visible: Object.freeze(visible),
  });
}

// =============================================================================
// Caller-facing schema
// =============================================================================

export interface JsonSchemaProperty {
  type: "string" | "integer" | "number" | "boolean" | "array" | "object";
  description?: string;
  default?: ParameterDefault;
  items?: { type: "string" };
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

/**
 * JSON Schema of the visible parameters only
 */
export function toInputSchema(descriptor: HandlerDescriptor): ToolInputSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const parameter of descriptor.visible) {
    const property: JsonSchemaProperty =
      parameter.type === "string[]"
        ? { type: "array", items: { type: "string" } }
        : { type: parameter.type };
    if (parameter.description) {
      property.description = parameter.description;
    }
    if (parameter.default !== undefined) {
      property.default = parameter.default;
    } else if (!parameter.optional) {
      required.push(parameter.name);
    }
    properties[parameter.name] = property;
  }

  return required.length > 0
    ? { type: "object", properties, required }
    : { type: "object", properties };
}

function baseSchema(type: VisibleParameterType): z.ZodTypeAny {
  switch (type) {
    case "string":
      return z.string();
    case "integer":
      return z.coerce.number().int();
    case "number":
      return z.coerce.number();
    case "boolean":
      return z.boolean();
    case "string[]":
      return z.array(z.string());
    case "object":
      return z.record(z.string(), z.unknown());
  }
}

/**
 * zod validator for caller arguments. Unknown keys, including internal
 * parameter names, are stripped.
 */
export function toArgumentSchema(descriptor: HandlerDescriptor): z.ZodType<Record<string, unknown>> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const parameter of descriptor.visible) {
    let schema = baseSchema(parameter.type);
    if (parameter.default === null) {
      schema = schema.nullable().default(null);
    } else if (parameter.default !== undefined) {
      schema = schema.default(parameter.default);
    } else if (parameter.optional) {
      schema = schema.optional();
    }
    shape[parameter.name] = schema;
  }
  return z.object(shape);
}

// =============================================================================
// Argument accessors
// =============================================================================

export function stringArg(args: HandlerArgs, name: string): string {
  const value = args[name];
  if (typeof value !== "string") {
    throw new TypeError(`Parameter '${name}' must be a string`);
  }
  return value;
}

export function optionalStringArg(args: HandlerArgs, name: string): string | null {
  const value = args[name];
  if (value === undefined || value === null) {
    return null;
  }
  return stringArg(args, name);
}

export function numberArg(args: HandlerArgs, name: string): number {
  const value = args[name];
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new TypeError(`Parameter '${name}' must be a number`);
  }
  return value;
}
