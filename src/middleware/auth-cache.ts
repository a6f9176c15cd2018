/**
 * Session Principal Cache
 *
 * Remembers which principal a session authenticated as, bound to the hash
 * of the credential used. A lookup only hits when the caller presents the
 * same credential hash, so a stolen session id alone is not enough.
 *
 * Security Features:
 * - Only SHA-256 hashes of credentials are stored
 * - Fixed TTL from construction; expired entries are evicted on lookup
 * - Optional size bound (oldest entry evicted first)
 */

import type { Clock } from "../utils/rate-limiter.js";

export const DEFAULT_AUTH_CACHE_TTL_SECONDS = 300;

export interface AuthCacheEntry {
  principal: string;
  credentialHash: string;
  createdAt: number;
  expiresAt: number;
}

export interface AuthCacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredEntries: number;
  ttlSeconds: number;
}

export interface AuthCacheOptions {
  ttlSeconds?: number;
  /** Evict the oldest entry once this many sessions are cached */
  maxEntries?: number;
  now?: Clock;
}

/**
 * In-memory cache of authenticated principals keyed by session id.
 * Every method is synchronous and therefore atomic on the event loop.
 */
export class SessionPrincipalCache {
  private entries = new Map<string, AuthCacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: Clock;

  constructor(options: AuthCacheOptions = {}) {
    const ttlSeconds = options.ttlSeconds ?? DEFAULT_AUTH_CACHE_TTL_SECONDS;
    if (ttlSeconds <= 0) {
      throw new Error("Auth cache TTL must be positive");
    }
    this.ttlMs = ttlSeconds * 1000;
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? Date.now;
  }

  /**
   * Principal for a session, if cached, unexpired and bound to the same credential
   */
  get(sessionId: string, credentialHash: string): string | null {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return null;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(sessionId);
      return null;
    }

    if (entry.credentialHash !== credentialHash) {
      return null;
    }

    return entry.principal;
  }

  /**
   * Store (or replace) the principal for a session
   */
  set(sessionId: string, principal: string, credentialHash: string): void {
    if (!this.entries.has(sessionId) && this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    // Delete first so re-authenticated sessions move to the back of the eviction order
    this.entries.delete(sessionId);
    const createdAt = this.now();
    this.entries.set(sessionId, {
      principal,
      credentialHash,
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    });
  }

  /**
   * @returns true if the session was cached
   */
  invalidate(sessionId: string): boolean {
    return this.entries.delete(sessionId);
  }

  /**
   * Remove every expired entry
   *
   * @returns number of entries removed
   */
  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [sessionId, entry] of [...this.entries]) {
      if (now >= entry.expiresAt) {
        this.entries.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  getStats(): AuthCacheStats {
    const now = this.now();
    let expired = 0;
    for (const entry of this.entries.values()) {
      if (now >= entry.expiresAt) {
        expired++;
      }
    }
    return {
      totalEntries: this.entries.size,
      activeEntries: this.entries.size - expired,
      expiredEntries: expired,
      ttlSeconds: this.ttlMs / 1000,
    };
  }
}

/**
 * Create a session principal cache
 */
export function createAuthCache(options: AuthCacheOptions = {}): SessionPrincipalCache {
  return new SessionPrincipalCache(options);
}
