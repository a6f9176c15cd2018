/**
 * Maintenance Scheduler
 *
 * setInterval-based sweeper for in-memory authentication state.
 *
 * Features:
 * - Evicts expired session principals
 * - Drops idle rate-limit fingerprints
 * - Prunes old audit entries when an audit store is configured
 * - Manual trigger capability
 * - Status reporting
 * - Timer never keeps the process alive
 */

import type { SessionPrincipalCache } from "../middleware/auth-cache.js";
import type { PrunableAuditSink } from "../security/audit-store.js";
import type { Logger } from "../utils/logger.js";
import type { SlidingWindowRateLimiter } from "../utils/rate-limiter.js";

export interface MaintenanceConfig {
  /** Seconds between sweeps (default: 60) */
  intervalSeconds?: number;
  audit?: PrunableAuditSink;
  /** Days of audit history kept (default: 30) */
  auditRetentionDays?: number;
}

export interface SweepStats {
  expiredPrincipals: number;
  idleFingerprints: number;
  prunedAuditEntries: number;
}

export interface MaintenanceStatus {
  isRunning: boolean;
  intervalSeconds: number;
  lastRunTime: Date | null;
  lastRunStats: SweepStats | null;
  runCount: number;
}

export class MaintenanceScheduler {
  private cache: SessionPrincipalCache;
  private limiter: SlidingWindowRateLimiter;
  private logger: Logger;
  private intervalSeconds: number;
  private audit?: PrunableAuditSink;
  private auditRetentionDays: number;
  private now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastRunTime: Date | null = null;
  private lastRunStats: SweepStats | null = null;
  private runCount = 0;

  constructor(
    cache: SessionPrincipalCache,
    limiter: SlidingWindowRateLimiter,
    logger: Logger,
    config: MaintenanceConfig = {},
    now: () => number = () => Date.now()
  ) {
    this.cache = cache;
    this.limiter = limiter;
    this.logger = logger;
    this.intervalSeconds = config.intervalSeconds ?? 60;
    this.audit = config.audit;
    this.auditRetentionDays = config.auditRetentionDays ?? 30;
    this.now = now;
  }

  /**
   * Start periodic sweeps. No-op if already running.
   */
  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.runNow(), this.intervalSeconds * 1000);
    this.timer.unref();
    this.logger.debug("Maintenance scheduler started", { intervalSeconds: this.intervalSeconds });
  }

  /**
   * Safe to call even if not running
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.debug("Maintenance scheduler stopped");
    }
  }

  /**
   * Sweep immediately
   */
  runNow(): SweepStats {
    const stats: SweepStats = {
      expiredPrincipals: this.cache.cleanupExpired(),
      idleFingerprints: this.limiter.cleanupOld(),
      prunedAuditEntries: this.pruneAudit(),
    };
    this.lastRunTime = new Date(this.now());
    this.lastRunStats = stats;
    this.runCount++;

    if (stats.expiredPrincipals > 0 || stats.idleFingerprints > 0 || stats.prunedAuditEntries > 0) {
      this.logger.debug("Maintenance sweep", { ...stats });
    }
    return stats;
  }

  private pruneAudit(): number {
    if (!this.audit) {
      return 0;
    }
    const cutoff = new Date(this.now() - this.auditRetentionDays * 24 * 60 * 60 * 1000);
    try {
      return this.audit.prune(cutoff);
    } catch (error) {
      this.logger.error("Failed to prune auth audit entries", { error });
      return 0;
    }
  }

  getStatus(): MaintenanceStatus {
    return {
      isRunning: this.timer !== null,
      intervalSeconds: this.intervalSeconds,
      lastRunTime: this.lastRunTime,
      lastRunStats: this.lastRunStats,
      runCount: this.runCount,
    };
  }
}

export function createMaintenanceScheduler(
  cache: SessionPrincipalCache,
  limiter: SlidingWindowRateLimiter,
  logger: Logger,
  config?: MaintenanceConfig
): MaintenanceScheduler {
  return new MaintenanceScheduler(cache, limiter, logger, config);
}
