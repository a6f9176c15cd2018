/**
 * Data-plane connection contracts
 *
 * The gateway and the credential validator only see these interfaces;
 * `PgConnectionProvider` implements them over node-postgres.
 */

import type { ClientBase } from "pg";

/** `managed` = pooled session with a query helper, `raw` = dedicated driver connection */
export type SessionKind = "managed" | "raw";

export type QueryRow = Record<string, unknown>;

interface TaggableSession {
  /** Attach the diagnostic trace tag to this backend session */
  setTraceTag(tag: string): Promise<void>;
}

export interface ManagedSession extends TaggableSession {
  readonly kind: "managed";
  query(sql: string, params?: readonly unknown[]): Promise<QueryRow[]>;
}

export interface RawConnection extends TaggableSession {
  readonly kind: "raw";
  readonly client: ClientBase;
}

export type DataPlaneSession = ManagedSession | RawConnection;

/** A session on loan to exactly one invocation */
export interface SessionLease {
  readonly session: DataPlaneSession;
  release(): Promise<void>;
}

export type BackendCredentials =
  | { kind: "password"; username: string; password: string }
  | { kind: "token"; token: string };

/** Throwaway, never pooled session used only to prove a credential */
export interface ValidationSession {
  /** Trivial round-trip */
  probe(): Promise<void>;
  /** The backend's own notion of the connected identity */
  currentUser(): Promise<string>;
  close(): Promise<void>;
}

export interface ConnectionProvider {
  /** false when there is no usable pool behind the provider */
  isLive(): boolean;
  acquire(kind: SessionKind): Promise<SessionLease>;
  openValidationSession(credentials: BackendCredentials): Promise<ValidationSession>;
  close(): Promise<void>;
}

/**
 * Returns the current provider; `recreate` asks for a fresh one
 */
export type ConnectionSupplier = (recreate?: boolean) => ConnectionProvider;

/**
 * Narrow a session to the managed kind
 *
 * @throws Error when the handler was wired to a raw connection
 */
export function requireManaged(session: DataPlaneSession | undefined): ManagedSession {
  if (!session || session.kind !== "managed") {
    throw new Error("Handler requires a managed session");
  }
  return session;
}

/**
 * Narrow a session to the raw kind
 */
export function requireRaw(session: DataPlaneSession | undefined): RawConnection {
  if (!session || session.kind !== "raw") {
    throw new Error("Handler requires a raw connection");
  }
  return session;
}
