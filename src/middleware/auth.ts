/**
 * Credential Validator
 *
 * Proves an Authorization header against the database backend:
 * - Basic: username/secret open a throwaway session that must answer `SELECT 1`
 * - Bearer: the token opens a throwaway session; the backend names the principal
 *
 * Security Features:
 * - Rate limited per client fingerprint before any backend contact
 * - Format checks before any backend contact
 * - Validation sessions are never pooled
 * - Outcomes are tagged values, never reclassified exceptions
 */

import type {
  BackendCredentials,
  ConnectionSupplier,
  ValidationSession,
} from "../db/connection-provider.js";
import type { MetricsCollector } from "../monitoring/metrics.js";
import type { Logger } from "../utils/logger.js";
import { generateClientId, type SlidingWindowRateLimiter } from "../utils/rate-limiter.js";
import { isBasicToken, isTokenShaped, isValidIdentifier } from "../utils/validation.js";
import { parseAuthorizationHeader, parseBasicCredentials, hashForAudit } from "./credentials.js";

// =============================================================================
// Types
// =============================================================================

export type ValidationOutcome =
  | { kind: "ok"; principal: string }
  | { kind: "rate_limited"; retryAfterSeconds: number }
  | { kind: "invalid_format"; reason: string }
  | { kind: "unsupported_scheme"; scheme: string }
  | { kind: "rejected" };

export interface CredentialValidatorOptions {
  connections: ConnectionSupplier;
  limiter: SlidingWindowRateLimiter;
  logger: Logger;
  metrics?: MetricsCollector;
}

// =============================================================================
// Validator
// =============================================================================

export class CredentialValidator {
  private connections: ConnectionSupplier;
  private limiter: SlidingWindowRateLimiter;
  private logger: Logger;
  private metrics?: MetricsCollector;

  constructor(options: CredentialValidatorOptions) {
    this.connections = options.connections;
    this.limiter = options.limiter;
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  /**
   * Validate an Authorization header
   *
   * @param authorizationHeader - Raw header value (`Basic ...` / `Bearer ...`)
   * @param forwardedFor - X-Forwarded-For chain, used for the rate-limit fingerprint
   */
  async validate(authorizationHeader: string, forwardedFor?: string | null): Promise<ValidationOutcome> {
    const clientId = generateClientId(authorizationHeader, forwardedFor);
    const decision = this.limiter.check(clientId);
    if (!decision.allowed) {
      this.logger.warn("Authentication rate limit exceeded", { client: clientId });
      this.metrics?.incrementRateLimitHits();
      return { kind: "rate_limited", retryAfterSeconds: decision.resetIn };
    }

    const { scheme, value } = parseAuthorizationHeader(authorizationHeader);
    if (!scheme || !value) {
      return { kind: "rejected" };
    }

    let principal: string | null;
    switch (scheme) {
      case "basic": {
        if (!isBasicToken(value)) {
          return { kind: "invalid_format", reason: "Malformed basic credential" };
        }
        const credentials = parseBasicCredentials(value);
        if (!credentials) {
          return { kind: "rejected" };
        }
        if (!isValidIdentifier(credentials.username)) {
          return { kind: "invalid_format", reason: "Invalid username format" };
        }
        principal = await this.verifyBasic(credentials.username, credentials.secret);
        break;
      }
      case "bearer": {
        if (!isTokenShaped(value)) {
          return { kind: "invalid_format", reason: "Malformed bearer token" };
        }
        principal = await this.verifyBearer(value);
        break;
      }
      default:
        return { kind: "unsupported_scheme", scheme };
    }

    if (!principal) {
      this.metrics?.incrementAuthAttempts("failed");
      return { kind: "rejected" };
    }

    this.metrics?.incrementAuthAttempts("success");
    this.limiter.clear(clientId);
    return { kind: "ok", principal };
  }

  /**
   * Open a throwaway session as the user and run a trivial round-trip
   */
  private async verifyBasic(username: string, secret: string): Promise<string | null> {
    const ok = await this.withValidationSession(
      { kind: "password", username, password: secret },
      async (session) => {
        await session.probe();
        return true;
      },
      username
    );
    return ok ? username : null;
  }

  /**
   * Open a throwaway session with the token and ask the backend who it is
   */
  private async verifyBearer(token: string): Promise<string | null> {
    const user = await this.withValidationSession(
      { kind: "token", token },
      (session) => session.currentUser(),
      `token:${hashForAudit(token)}`
    );
    const principal = user?.trim();
    return principal ? principal : null;
  }

  private async withValidationSession<T>(
    credentials: BackendCredentials,
    work: (session: ValidationSession) => Promise<T>,
    label: string
  ): Promise<T | null> {
    try {
      const session = await this.connections().openValidationSession(credentials);
      try {
        return await work(session);
      } finally {
        await session.close();
      }
    } catch (error) {
      this.logger.debug("Backend rejected credentials", { subject: label, error });
      return null;
    }
  }
}
