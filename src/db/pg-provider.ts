/**
 * PostgreSQL Connection Provider
 *
 * - Managed sessions: clients borrowed from a pg.Pool
 * - Raw connections: a dedicated pg.Client per acquisition
 * - Validation sessions: a dedicated pg.Client with the caller's credentials
 *
 * The trace tag lives in the custom setting `querygate.trace_tag` and can be
 * read back with `current_setting('querygate.trace_tag', true)`.
 */

import pg from "pg";
import type { Client, ClientBase, ClientConfig, Pool, PoolClient } from "pg";
import type { Settings } from "../config/settings.js";
import type { Logger } from "../utils/logger.js";
import type {
  BackendCredentials,
  ConnectionProvider,
  ConnectionSupplier,
  ManagedSession,
  QueryRow,
  RawConnection,
  SessionKind,
  SessionLease,
  ValidationSession,
} from "./connection-provider.js";

/** Custom setting that carries the trace tag */
export const TRACE_TAG_SETTING = "querygate.trace_tag";

export interface PgProviderOptions {
  databaseUri?: string;
  poolSize?: number;
  poolTimeoutSeconds?: number;
  /** Role used when a bearer token is presented as the password */
  tokenLoginUser?: string;
}

/**
 * SQL that applies a trace tag for the rest of the backend session.
 * Expects a tag from buildTraceTag, whose values already have quotes doubled.
 */
export function traceTagStatement(tag: string): string {
  return `SET SESSION ${TRACE_TAG_SETTING} = '${tag}'`;
}

/**
 * Unverified `sub` claim of a dot-separated token, used only as the login role
 */
export function tokenSubject(token: string): string | null {
  const payload = token.split(".")[1];
  if (!payload) {
    return null;
  }
  try {
    const claims: unknown = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
    if (typeof claims === "object" && claims !== null && "sub" in claims && typeof claims.sub === "string") {
      return claims.sub;
    }
    return null;
  } catch {
    return null;
  }
}

class PgManagedSession implements ManagedSession {
  readonly kind = "managed" as const;
  private tagged = false;

  constructor(private client: PoolClient) {}

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryRow[]> {
    const result = await this.client.query<QueryRow>(sql, [...params]);
    return result.rows;
  }

  async setTraceTag(tag: string): Promise<void> {
    await this.client.query(traceTagStatement(tag));
    this.tagged = true;
  }

  /**
   * Reset the tag so the next borrower does not inherit it.
   * A client that cannot be reset is destroyed instead of pooled.
   */
  async release(logger: Logger): Promise<void> {
    if (!this.tagged) {
      this.client.release();
      return;
    }
    try {
      await this.client.query(`RESET ${TRACE_TAG_SETTING}`);
      this.client.release();
    } catch (error) {
      logger.warn("Discarding pooled connection after failed trace tag reset", { error });
      this.client.release(true);
    }
  }
}

class PgRawConnection implements RawConnection {
  readonly kind = "raw" as const;

  constructor(readonly client: ClientBase) {}

  async setTraceTag(tag: string): Promise<void> {
    await this.client.query(traceTagStatement(tag));
  }
}

class PgValidationSession implements ValidationSession {
  constructor(private client: Client) {}

  async probe(): Promise<void> {
    await this.client.query("SELECT 1");
  }

  async currentUser(): Promise<string> {
    const result = await this.client.query<{ current_user: string }>("SELECT current_user");
    const user = result.rows[0]?.current_user;
    if (!user) {
      throw new Error("Backend returned no current_user");
    }
    return user;
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

/**
 * Attach the 'error' listener every dedicated client needs
 */
export function watchClient(client: Client, purpose: "raw" | "validation", logger: Logger): Client {
  client.on("error", (error) => {
    logger.warn("Dedicated database connection failed", { purpose, error });
  });
  return client;
}

export class PgConnectionProvider implements ConnectionProvider {
  private pool: Pool | null = null;
  private closed = false;
  private options: PgProviderOptions;
  private logger: Logger;

  constructor(options: PgProviderOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;

    if (!options.databaseUri) {
      this.logger.warn("DATABASE_URI not set; database tools will fail until it is configured");
      return;
    }

    this.pool = new pg.Pool({
      connectionString: options.databaseUri,
      max: options.poolSize ?? 5,
      connectionTimeoutMillis: (options.poolTimeoutSeconds ?? 30) * 1000,
    });
    this.pool.on("error", (error) => {
      this.logger.error("Idle database connection failed", { error });
    });
  }

  isLive(): boolean {
    return this.pool !== null && !this.closed;
  }

  async acquire(kind: SessionKind): Promise<SessionLease> {
    const pool = this.requirePool();

    if (kind === "managed") {
      const session = new PgManagedSession(await pool.connect());
      return {
        session,
        release: () => session.release(this.logger),
      };
    }

    const client = watchClient(new pg.Client(this.clientConfig()), "raw", this.logger);
    await client.connect();
    return {
      session: new PgRawConnection(client),
      release: () => client.end(),
    };
  }

  async openValidationSession(credentials: BackendCredentials): Promise<ValidationSession> {
    const base = this.clientConfig();
    const config: ClientConfig =
      credentials.kind === "password"
        ? { ...base, user: credentials.username, password: credentials.password }
        : { ...base, user: this.tokenUser(credentials.token), password: credentials.token };

    const client = watchClient(new pg.Client(config), "validation", this.logger);
    await client.connect();
    return new PgValidationSession(client);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.pool) {
      await this.pool.end();
    }
  }

  private requirePool(): Pool {
    if (!this.pool || this.closed) {
      throw new Error("No database connection is configured");
    }
    return this.pool;
  }

  private clientConfig(): ClientConfig {
    if (!this.options.databaseUri) {
      throw new Error("No database connection is configured");
    }
    return {
      connectionString: this.options.databaseUri,
      connectionTimeoutMillis: (this.options.poolTimeoutSeconds ?? 30) * 1000,
    };
  }

  private tokenUser(token: string): string | undefined {
    return this.options.tokenLoginUser ?? tokenSubject(token) ?? undefined;
  }
}

/**
 * Supplier that owns the current provider and rebuilds it on request
 */
export function createPgConnectionSupplier(settings: Settings, logger: Logger): {
  supplier: ConnectionSupplier;
  close: () => Promise<void>;
} {
  const options: PgProviderOptions = {
    databaseUri: settings.databaseUri,
    poolSize: settings.poolSize,
    poolTimeoutSeconds: settings.poolTimeoutSeconds,
    tokenLoginUser: settings.tokenLoginUser,
  };
  let current = new PgConnectionProvider(options, logger);

  const supplier: ConnectionSupplier = (recreate = false) => {
    if (recreate) {
      const stale = current;
      current = new PgConnectionProvider(options, logger);
      stale.close().catch((error: unknown) => {
        logger.warn("Failed to close replaced connection pool", { error });
      });
    }
    return current;
  };

  return {
    supplier,
    close: () => current.close(),
  };
}
