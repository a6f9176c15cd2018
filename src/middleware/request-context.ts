/**
 * Request Context Capture
 *
 * Builds an immutable RequestContext for every inbound MCP request and runs
 * the rest of the request inside an AsyncLocalStorage scope, so the gateway
 * can read identity and correlation data without it being threaded through
 * handler signatures.
 *
 * Features:
 * - stdio fast path (no headers, ids synthesized)
 * - Networked path: lower-cased headers, correlation/tenant/client fields
 * - Auth mode "none": optional X-Assume-User principal
 * - Auth mode "basic": cache, validator and rate limiter before any handler
 */

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import type { AuthMode, TransportKind } from "../config/settings.js";
import type { MetricsCollector } from "../monitoring/metrics.js";
import { AuditAction, createAuditEntry, type AuditSink } from "../security/audit-store.js";
import type { Logger } from "../utils/logger.js";
import { firstForwardedAddress } from "../utils/trace-tag.js";
import { isValidIdentifier } from "../utils/validation.js";
import type { SessionPrincipalCache } from "./auth-cache.js";
import type { CredentialValidator } from "./auth.js";
import { hashCredential, parseAuthorizationHeader } from "./credentials.js";
import { PermissionDeniedError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export interface RequestContext {
  /** Lower-cased headers without credential-bearing entries */
  readonly headers: Readonly<Record<string, string>>;
  readonly requestId: string;
  readonly sessionId: string;
  /** Client-supplied X-Session-Id */
  readonly clientSessionId: string | null;
  readonly correlationId: string | null;
  readonly tenant: string | null;
  readonly userAgent: string | null;
  /** Raw X-Forwarded-For chain */
  readonly forwardedFor: string | null;
  /** First address of the forwarding chain */
  readonly clientIp: string | null;
  readonly authScheme: string | null;
  /** SHA-256 hex of the credential value after the scheme */
  readonly authTokenSha256: string | null;
  /** Resolved principal (authenticated user or accepted X-Assume-User) */
  readonly assumeUser: string | null;
  readonly userId: string | null;
}

export type RawHeaders = Record<string, string | string[] | undefined>;

/** What the transport hands over for one request */
export interface InboundRequest {
  /** Protocol-managed session id */
  sessionId?: string;
  /** JSON-RPC request id */
  requestId?: string | number;
  headers?: RawHeaders;
}

export interface RequestContextCaptureOptions {
  authMode: AuthMode;
  logger: Logger;
  cache?: SessionPrincipalCache;
  validator?: CredentialValidator;
  audit?: AuditSink;
  metrics?: MetricsCollector;
}

// =============================================================================
// Per-request scope
// =============================================================================

const requestScope = new AsyncLocalStorage<RequestContext>();

/**
 * Context of the request currently executing, if any
 */
export function getRequestContext(): RequestContext | undefined {
  return requestScope.getStore();
}

/**
 * Run `fn` with `context` visible through getRequestContext()
 */
export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return requestScope.run(context, fn);
}

/** Headers never copied into the context */
const CREDENTIAL_HEADERS = new Set(["authorization", "proxy-authorization", "cookie"]);

/**
 * Lower-case header names and flatten repeated values
 */
export function normalizeHeaders(raw: RawHeaders | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!raw) {
    return headers;
  }
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) {
      continue;
    }
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return headers;
}

function newRequestId(): string {
  return randomUUID().replace(/-/g, "");
}

// =============================================================================
// Capture
// =============================================================================

export class RequestContextCapture {
  private authMode: AuthMode;
  private logger: Logger;
  private cache?: SessionPrincipalCache;
  private validator?: CredentialValidator;
  private audit?: AuditSink;
  private metrics?: MetricsCollector;
  /** stdio has one connection per process; its session id is fixed per capture */
  private readonly stdioSessionId = randomUUID();

  constructor(options: RequestContextCaptureOptions) {
    this.authMode = options.authMode;
    this.logger = options.logger;
    this.cache = options.cache;
    this.validator = options.validator;
    this.audit = options.audit;
    this.metrics = options.metrics;

    if (this.authMode === "basic" && (!this.cache || !this.validator)) {
      throw new Error("Auth mode 'basic' requires a principal cache and a credential validator");
    }
  }

  /**
   * Build the context for one request
   *
   * @throws PermissionDeniedError when authentication fails
   */
  async capture(transport: TransportKind, request: InboundRequest): Promise<RequestContext> {
    if (transport === "stdio") {
      return this.captureStdio(request);
    }
    return this.captureNetworked(request);
  }

  /**
   * Capture, then run `next` inside the request scope
   */
  async run<T>(transport: TransportKind, request: InboundRequest, next: () => Promise<T>): Promise<T> {
    const context = await this.capture(transport, request);
    return runWithRequestContext(context, next);
  }

  private captureStdio(request: InboundRequest): RequestContext {
    return Object.freeze({
      headers: Object.freeze({}),
      requestId: newRequestId(),
      sessionId: request.sessionId || this.stdioSessionId,
      clientSessionId: null,
      correlationId: null,
      tenant: null,
      userAgent: null,
      forwardedFor: null,
      clientIp: null,
      authScheme: null,
      authTokenSha256: null,
      assumeUser: null,
      userId: null,
    });
  }

  private async captureNetworked(request: InboundRequest): Promise<RequestContext> {
    let headers: Record<string, string>;
    try {
      headers = normalizeHeaders(request.headers);
    } catch (error) {
      this.logger.debug("Malformed request headers ignored", { error });
      headers = {};
    }

    const requestId =
      request.requestId !== undefined && request.requestId !== ""
        ? String(request.requestId)
        : newRequestId();
    const sessionId = request.sessionId || requestId;

    const forwardedFor = headers["x-forwarded-for"] ?? null;
    const clientIp = firstForwardedAddress(forwardedFor);
    const userAgent = headers["user-agent"] ?? null;

    const authorization = headers["authorization"] ?? null;
    let authScheme: string | null = null;
    let authToken: string | null = null;
    if (authorization) {
      const parsed = parseAuthorizationHeader(authorization);
      authScheme = parsed.scheme || null;
      authToken = parsed.value || null;
    }
    const authTokenSha256 = authToken ? hashCredential(authToken) : null;

    const principal =
      this.authMode === "basic"
        ? await this.authenticate({ authorization, authScheme, authTokenSha256, sessionId, clientIp, userAgent, forwardedFor })
        : this.resolveAssumedUser(headers["x-assume-user"], { sessionId, clientIp, userAgent });

    const visibleHeaders = Object.fromEntries(
      Object.entries(headers).filter(([name]) => !CREDENTIAL_HEADERS.has(name))
    );

    return Object.freeze({
      headers: Object.freeze(visibleHeaders),
      requestId,
      sessionId,
      clientSessionId: headers["x-session-id"] ?? null,
      correlationId: headers["x-correlation-id"] ?? headers["correlation-id"] ?? null,
      tenant: headers["x-td-tenant"] ?? headers["x-tenant"] ?? null,
      userAgent,
      forwardedFor,
      clientIp,
      authScheme,
      authTokenSha256,
      assumeUser: principal,
      userId: principal,
    });
  }

  /**
   * Auth mode "none": accept a well-formed X-Assume-User, ignore anything else
   */
  private resolveAssumedUser(
    value: string | undefined,
    origin: { sessionId: string; clientIp: string | null; userAgent: string | null }
  ): string | null {
    if (value === undefined) {
      return null;
    }
    // Matched as received: surrounding whitespace is a mismatch
    if (isValidIdentifier(value)) {
      this.logger.info("Using assumed user from X-Assume-User", { user: value });
      this.recordAudit(AuditAction.ASSUME_USER, true, { ...origin, principal: value });
      return value;
    }
    this.logger.warn("Ignoring invalid X-Assume-User header");
    this.recordAudit(AuditAction.ASSUME_USER_REJECTED, false, {
      ...origin,
      failureReason: "Identifier pattern mismatch",
    });
    return null;
  }

  /**
   * Auth mode "basic": cache first, then the validator
   */
  private async authenticate(params: {
    authorization: string | null;
    authScheme: string | null;
    authTokenSha256: string | null;
    sessionId: string;
    clientIp: string | null;
    userAgent: string | null;
    forwardedFor: string | null;
  }): Promise<string> {
    const { authorization, authScheme, authTokenSha256, sessionId } = params;
    const origin = {
      sessionId,
      clientIp: params.clientIp,
      userAgent: params.userAgent,
      credentialHash: authTokenSha256,
    };

    if (!authorization || !this.cache || !this.validator) {
      this.recordAudit(AuditAction.MISSING_CREDENTIALS, false, { ...origin, failureReason: "No Authorization header" });
      throw new PermissionDeniedError("AUTH_REQUIRED");
    }

    if (authTokenSha256) {
      const cached = this.cache.get(sessionId, authTokenSha256);
      this.metrics?.recordCacheLookup(cached !== null);
      if (cached !== null) {
        this.logger.debug("Principal served from session cache", { session: sessionId });
        this.recordAudit(AuditAction.CACHE_HIT, true, { ...origin, principal: cached });
        return cached;
      }
    }

    if (authScheme !== "basic" && authScheme !== "bearer") {
      this.recordAudit(AuditAction.UNSUPPORTED_SCHEME, false, { ...origin, failureReason: `Scheme ${authScheme ?? "(none)"}` });
      throw new PermissionDeniedError("UNSUPPORTED_SCHEME");
    }

    const outcome = await this.validator.validate(authorization, params.forwardedFor);
    switch (outcome.kind) {
      case "ok":
        if (authTokenSha256) {
          this.cache.set(sessionId, outcome.principal, authTokenSha256);
        }
        this.logger.info("Authenticated request", { user: outcome.principal, scheme: authScheme });
        this.recordAudit(AuditAction.AUTHENTICATE, true, { ...origin, principal: outcome.principal });
        return outcome.principal;
      case "rate_limited":
        this.recordAudit(AuditAction.RATE_LIMITED, false, { ...origin, failureReason: "Too many attempts" });
        throw new PermissionDeniedError("RATE_LIMITED", outcome.retryAfterSeconds);
      case "invalid_format":
        this.logger.warn("Rejected malformed credentials", { reason: outcome.reason });
        this.recordAudit(AuditAction.INVALID_FORMAT, false, { ...origin, failureReason: outcome.reason });
        throw new PermissionDeniedError("INVALID_FORMAT");
      case "unsupported_scheme":
      case "rejected":
        this.recordAudit(AuditAction.AUTHENTICATE, false, { ...origin, failureReason: "Backend rejected credentials" });
        throw new PermissionDeniedError("INVALID_CREDENTIALS");
    }
  }

  private recordAudit(
    action: AuditAction,
    success: boolean,
    details: {
      sessionId: string;
      clientIp: string | null;
      userAgent: string | null;
      credentialHash?: string | null;
      principal?: string;
      failureReason?: string;
    }
  ): void {
    if (!this.audit) {
      return;
    }
    try {
      this.audit.record(createAuditEntry({ action, success, ...details }));
    } catch (error) {
      this.logger.error("Failed to write auth audit entry", { action, error });
    }
  }
}
