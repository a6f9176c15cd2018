/**
 * Response envelope
 *
 * Every tool answers with `{status, results | message, metadata?}` rendered
 * as indented JSON text in a single MCP text content block.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

export type ResponseMetadata = Record<string, unknown>;

export type ResponseEnvelope =
  | { status: "success"; results: unknown; metadata?: ResponseMetadata }
  | { status: "error"; message: string; metadata?: ResponseMetadata };

export function createResponse(results: unknown, metadata?: ResponseMetadata): ResponseEnvelope {
  return metadata ? { status: "success", results, metadata } : { status: "success", results };
}

export function createErrorResponse(message: string, metadata?: ResponseMetadata): ResponseEnvelope {
  return metadata ? { status: "error", message, metadata } : { status: "error", message };
}

export function isEnvelope(value: unknown): value is ResponseEnvelope {
  if (typeof value !== "object" || value === null || !("status" in value)) {
    return false;
  }
  if (value.status === "success") {
    return "results" in value;
  }
  return value.status === "error" && "message" in value && typeof value.message === "string";
}

/** BigInt columns are not JSON-serializable; render them as strings */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Normalize whatever a handler returned into an envelope.
 * JSON strings are parsed so they are re-indented instead of double-encoded.
 */
export function toEnvelope(value: unknown): ResponseEnvelope {
  let candidate = value;
  if (typeof value === "string") {
    const parsed = parseJson(value);
    if (parsed.ok) {
      candidate = parsed.value;
    }
  }
  return isEnvelope(candidate) ? candidate : createResponse(candidate ?? null);
}

export function formatEnvelope(envelope: ResponseEnvelope): string {
  return JSON.stringify(envelope, jsonReplacer, 2);
}

/**
 * MCP result for a handler's return value
 */
export function formatTextResponse(value: unknown): CallToolResult {
  const envelope = toEnvelope(value);
  const result: CallToolResult = {
    content: [{ type: "text", text: formatEnvelope(envelope) }],
  };
  if (envelope.status === "error") {
    result.isError = true;
  }
  return result;
}

/**
 * MCP error result carrying an error envelope
 */
export function formatErrorResponse(message: string, metadata?: ResponseMetadata): CallToolResult {
  return {
    content: [{ type: "text", text: formatEnvelope(createErrorResponse(message, metadata)) }],
    isError: true,
  };
}
