/**
 * Authentication Audit Trail
 *
 * Records every authentication decision taken at the request boundary.
 * Backed by SQLite (better-sqlite3); writes are synchronous.
 *
 * Security Features:
 * - Never stores raw credentials, only a short hash prefix
 * - Principal and failure reason recorded for incident review
 */

import Database from "better-sqlite3";

/** Audit log actions */
export enum AuditAction {
  AUTHENTICATE = "authenticate",
  CACHE_HIT = "cache_hit",
  RATE_LIMITED = "rate_limited",
  INVALID_FORMAT = "invalid_format",
  UNSUPPORTED_SCHEME = "unsupported_scheme",
  MISSING_CREDENTIALS = "missing_credentials",
  ASSUME_USER = "assume_user",
  ASSUME_USER_REJECTED = "assume_user_rejected",
}

/** Audit log entry */
export interface AuditEntry {
  action: AuditAction;
  success: boolean;
  sessionId: string | null;
  principal: string | null;
  /** First characters of the credential's SHA-256 */
  credentialHash: string | null;
  clientIp: string | null;
  userAgent: string | null;
  failureReason: string | null;
  createdAt: Date;
}

export interface AuditSink {
  record(entry: AuditEntry): void;
}

/** Audit storage that can drop old entries */
export interface PrunableAuditSink extends AuditSink {
  /** @returns number of entries removed */
  prune(olderThan: Date): number;
}

/**
 * Build an audit entry with nullable fields defaulted
 */
export function createAuditEntry(
  params: Pick<AuditEntry, "action" | "success"> & Partial<Omit<AuditEntry, "action" | "success">>
): AuditEntry {
  return {
    action: params.action,
    success: params.success,
    sessionId: params.sessionId ?? null,
    principal: params.principal ?? null,
    credentialHash: params.credentialHash ? params.credentialHash.slice(0, 12) : null,
    clientIp: params.clientIp ?? null,
    userAgent: params.userAgent ?? null,
    failureReason: params.failureReason ?? null,
    createdAt: params.createdAt ?? new Date(),
  };
}

interface AuditRow {
  action: string;
  success: number;
  session_id: string | null;
  principal: string | null;
  credential_hash: string | null;
  client_ip: string | null;
  user_agent: string | null;
  failure_reason: string | null;
  created_at: string;
}

const ACTIONS = new Map<string, AuditAction>(
  Object.values(AuditAction).map((action) => [action, action])
);

/**
 * SQLite-backed audit sink
 */
export class SqliteAuditStore implements PrunableAuditSink {
  private db: Database.Database;
  private insert: Database.Statement;

  /**
   * @param location - File path or ":memory:"
   */
  constructor(location: string) {
    this.db = new Database(location);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS auth_audit (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        action TEXT NOT NULL,
        success INTEGER NOT NULL,
        session_id TEXT,
        principal TEXT,
        credential_hash TEXT,
        client_ip TEXT,
        user_agent TEXT,
        failure_reason TEXT,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_auth_audit_created ON auth_audit(created_at);
    `);
    this.insert = this.db.prepare(`
      INSERT INTO auth_audit
        (action, success, session_id, principal, credential_hash, client_ip, user_agent, failure_reason, created_at)
      VALUES
        (@action, @success, @sessionId, @principal, @credentialHash, @clientIp, @userAgent, @failureReason, @createdAt)
    `);
  }

  record(entry: AuditEntry): void {
    this.insert.run({
      action: entry.action,
      success: entry.success ? 1 : 0,
      sessionId: entry.sessionId,
      principal: entry.principal,
      credentialHash: entry.credentialHash,
      clientIp: entry.clientIp,
      userAgent: entry.userAgent,
      failureReason: entry.failureReason,
      createdAt: entry.createdAt.toISOString(),
    });
  }

  /**
   * Most recent entries first
   */
  recent(limit = 50): AuditEntry[] {
    const rows = this.db
      .prepare<[number], AuditRow>(
        "SELECT action, success, session_id, principal, credential_hash, client_ip, user_agent, failure_reason, created_at FROM auth_audit ORDER BY id DESC LIMIT ?"
      )
      .all(limit);

    return rows.map((row) => ({
      action: ACTIONS.get(row.action) ?? AuditAction.AUTHENTICATE,
      success: row.success === 1,
      sessionId: row.session_id,
      principal: row.principal,
      credentialHash: row.credential_hash,
      clientIp: row.client_ip,
      userAgent: row.user_agent,
      failureReason: row.failure_reason,
      createdAt: new Date(row.created_at),
    }));
  }

  /**
   * Count failed decisions since a point in time
   */
  countFailuresSince(since: Date): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        "SELECT COUNT(*) AS count FROM auth_audit WHERE success = 0 AND created_at >= ?"
      )
      .get(since.toISOString());
    return row?.count ?? 0;
  }

  /**
   * Delete entries created before `olderThan`
   */
  prune(olderThan: Date): number {
    return this.db.prepare("DELETE FROM auth_audit WHERE created_at < ?").run(olderThan.toISOString()).changes;
  }

  close(): void {
    this.db.close();
  }
}
