/**
 * Authorization header parsing
 */

import { createHash } from "crypto";
import { decodeBase64Text } from "../utils/validation.js";

export interface ParsedAuthorization {
  /** Lower-cased scheme, "" when absent */
  scheme: string;
  /** Credential after the first space, "" when absent */
  value: string;
}

export interface BasicCredentials {
  username: string;
  secret: string;
}

/**
 * Split `Scheme value` on the first space
 */
export function parseAuthorizationHeader(header: string): ParsedAuthorization {
  const trimmed = header.trim();
  const space = trimmed.indexOf(" ");
  if (space === -1) {
    return { scheme: trimmed.toLowerCase(), value: "" };
  }
  return {
    scheme: trimmed.slice(0, space).toLowerCase(),
    value: trimmed.slice(space + 1).trim(),
  };
}

/**
 * Decode a basic credential into username and secret.
 * Splits at the first colon; both halves are trimmed and must be non-empty.
 */
export function parseBasicCredentials(value: string): BasicCredentials | null {
  const decoded = decodeBase64Text(value);
  if (decoded === null) {
    return null;
  }
  const colon = decoded.indexOf(":");
  if (colon === -1) {
    return null;
  }
  const username = decoded.slice(0, colon).trim();
  const secret = decoded.slice(colon + 1).trim();
  if (!username || !secret) {
    return null;
  }
  return { username, secret };
}

/**
 * SHA-256 hex of a credential value
 */
export function hashCredential(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

/**
 * Short hash prefix for logs and audit rows
 */
export function hashForAudit(value: string): string {
  return hashCredential(value).slice(0, 16);
}
