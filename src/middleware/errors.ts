/**
 * Authentication-class errors raised at the request boundary
 */

export type PermissionDeniedCode =
  | "AUTH_REQUIRED"
  | "UNSUPPORTED_SCHEME"
  | "INVALID_FORMAT"
  | "INVALID_CREDENTIALS"
  | "RATE_LIMITED";

export const PERMISSION_MESSAGES: Record<PermissionDeniedCode, string> = {
  AUTH_REQUIRED: "Authentication required",
  UNSUPPORTED_SCHEME: "Unsupported auth scheme for basic mode",
  INVALID_FORMAT: "Invalid authentication format",
  INVALID_CREDENTIALS: "Invalid credentials",
  RATE_LIMITED: "Too many authentication attempts. Please try again later.",
};

/**
 * The request is not allowed to reach any handler
 */
export class PermissionDeniedError extends Error {
  public readonly code: PermissionDeniedCode;
  /** Seconds until a retry may succeed (rate limiting only) */
  public readonly retryAfter?: number;

  constructor(code: PermissionDeniedCode, retryAfter?: number) {
    super(PERMISSION_MESSAGES[code]);
    this.name = "PermissionDeniedError";
    this.code = code;
    this.retryAfter = retryAfter;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PermissionDeniedError);
    }
  }
}

export function isPermissionDenied(error: unknown): error is PermissionDeniedError {
  return error instanceof PermissionDeniedError;
}
