/**
 * Input Validation Module
 *
 * Zod schemas for credential shapes and principal identifiers, plus the
 * helper that turns zod issues into a single readable message.
 *
 * Security Features:
 * - Principal names limited to `[A-Za-z0-9_]{1,30}`
 * - Strict base64 alphabet and padding for basic credentials
 * - Bearer tokens must have three non-empty dot-separated segments
 */

import { z } from "zod";

// ============================================================================
// Schemas
// ============================================================================

/** Pattern accepted for usernames and assumed principals */
export const IDENTIFIER_PATTERN = /^[A-Za-z0-9_]{1,30}$/;

export const IdentifierSchema = z.string()
  .regex(IDENTIFIER_PATTERN, "Identifier must be 1-30 letters, digits or underscores");

/**
 * Structural token check: `header.payload.signature`.
 * The signature is not verified; the backend decides.
 */
export const BearerTokenSchema = z.string()
  .max(16384, "Token exceeds 16KB limit")
  .refine((token) => {
    const parts = token.split(".");
    return parts.length === 3 && parts.every((part) => part.length > 0);
  }, "Token must have three non-empty dot-separated segments");

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode strict base64 into UTF-8 text
 *
 * @returns null when the alphabet, padding or UTF-8 encoding is invalid
 */
export function decodeBase64Text(value: string): string | null {
  if (value.length === 0 || value.length % 4 !== 0 || !BASE64_PATTERN.test(value)) {
    return null;
  }
  try {
    return utf8.decode(Buffer.from(value, "base64"));
  } catch {
    return null;
  }
}

export const BasicTokenSchema = z.string()
  .max(4096, "Credential exceeds 4KB limit")
  .refine((value) => {
    const decoded = decodeBase64Text(value);
    return decoded !== null && decoded.includes(":");
  }, "Credential must be base64 of 'user:secret'");

// ============================================================================
// Validation Helper Functions
// ============================================================================

/**
 * Check a username or assumed principal against the identifier pattern
 */
export function isValidIdentifier(value: string | null | undefined): value is string {
  return typeof value === "string" && IdentifierSchema.safeParse(value).success;
}

/**
 * Check the structural shape of a bearer token
 */
export function isTokenShaped(token: string): boolean {
  return BearerTokenSchema.safeParse(token).success;
}

/**
 * Check that a basic credential decodes to `user:secret`
 */
export function isBasicToken(value: string): boolean {
  return BasicTokenSchema.safeParse(value).success;
}

/**
 * Join zod issues into `path: message, path: message`
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join(", ");
}
