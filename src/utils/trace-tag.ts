/**
 * Trace Tag Builder
 *
 * Builds the `KEY=value;` diagnostic string attached to every backend
 * session before a tool runs, so server-side workload logs can be joined
 * back to the MCP request that produced them.
 *
 * Security Features:
 * - Values are truncated, then `;` becomes `_` and `'` is doubled
 * - Only a short prefix of the credential hash is emitted
 */

import type { RequestContext } from "../middleware/request-context.js";

/** Longest value emitted for a single key, measured before escaping */
export const MAX_TAG_VALUE_LENGTH = 256;

/** Characters of the credential hash carried in AUTH_HASH */
export const AUTH_HASH_PREFIX_LENGTH = 12;

export interface TraceTagInput {
  /** Application name (MCP server name) */
  application: string;
  /** Active profile, if any */
  profile?: string | null;
  /** Process identity, `host:pid` */
  processId: string;
  /** Tool being invoked */
  toolName: string;
  /** Request context, absent outside a request scope */
  context?: RequestContext | null;
}

/**
 * Make a value safe to embed in a single-quoted tag
 *
 * @returns "" for null/undefined
 */
export function sanitizeTagValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value)
    .slice(0, MAX_TAG_VALUE_LENGTH)
    .replace(/;/g, "_")
    .replace(/'/g, "''")
    .trim();
}

/**
 * First address in an X-Forwarded-For chain
 */
export function firstForwardedAddress(forwardedFor: string | null | undefined): string | null {
  if (!forwardedFor) {
    return null;
  }
  const first = forwardedFor.split(",")[0]?.trim();
  return first ? first : null;
}

/**
 * Build the trace tag.
 *
 * Keys appear in a fixed order; a null/undefined value omits its pair.
 */
export function buildTraceTag(input: TraceTagInput): string {
  const parts: string[] = [];

  const add = (key: string, value: unknown): void => {
    if (value === null || value === undefined) {
      return;
    }
    parts.push(`${key}=${sanitizeTagValue(value)};`);
  };

  add("APPLICATION", input.application);
  add("PROFILE", input.profile);
  add("PROCESS_ID", input.processId);
  add("TOOL_NAME", input.toolName);

  const ctx = input.context;
  if (ctx) {
    add("REQUEST_ID", ctx.requestId);
    add("SESSION_ID", ctx.sessionId);
    add("TENANT", ctx.tenant);
    add("CLIENT_IP", ctx.clientIp);
    add("USER_AGENT", ctx.userAgent);
    add("AUTH_SCHEME", ctx.authScheme);
    add("AUTH_HASH", ctx.authTokenSha256?.slice(0, AUTH_HASH_PREFIX_LENGTH));
    if (ctx.assumeUser) {
      add("PROXYUSER", ctx.assumeUser);
    }
  }

  return parts.join("");
}
