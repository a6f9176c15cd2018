/**
 * Prometheus Metrics Collector
 *
 * Provides metrics collection for the gateway:
 * - Tool request counters (per tool, per status) and latency histogram
 * - Error counters by type
 * - Authentication attempt, rate-limit and principal-cache counters
 * - Trace tag failures
 * - Active MCP sessions gauge
 */

import {
  Counter,
  Histogram,
  Gauge,
  Registry,
  collectDefaultMetrics,
} from "prom-client";

/**
 * Configuration for the metrics collector
 */
export interface MetricsConfig {
  /** Prefix for all metric names (default: "querygate") */
  prefix?: string;
  /** Default labels applied to all metrics */
  defaultLabels?: Record<string, string>;
  /** Whether to collect default Node.js metrics */
  collectDefaultMetrics?: boolean;
  /** Token required to read metrics; unset leaves the endpoint open */
  authToken?: string;
}

export type RequestStatus = "success" | "error";
export type AuthAttemptStatus = "success" | "failed";

export class MetricsAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetricsAuthError";
  }
}

/**
 * MetricsCollector class for Prometheus metrics
 */
export class MetricsCollector {
  private registry: Registry;
  private prefix: string;
  private authToken?: string;

  private requestsTotal: Counter<string>;
  private errorsTotal: Counter<string>;
  private authAttemptsTotal: Counter<string>;
  private rateLimitHitsTotal: Counter<string>;
  private authCacheLookupsTotal: Counter<string>;
  private traceTagFailuresTotal: Counter<string>;

  private requestDuration: Histogram<string>;

  private activeSessions: Gauge<string>;

  constructor(config: MetricsConfig = {}) {
    this.prefix = config.prefix || "querygate";
    this.authToken = config.authToken;

    // Create a new registry for this collector
    this.registry = new Registry();

    if (config.defaultLabels && Object.keys(config.defaultLabels).length > 0) {
      this.registry.setDefaultLabels(config.defaultLabels);
    }

    this.requestsTotal = new Counter({
      name: `${this.prefix}_requests_total`,
      help: "Total number of MCP tool invocations",
      labelNames: ["tool", "status"],
      registers: [this.registry],
    });

    this.errorsTotal = new Counter({
      name: `${this.prefix}_errors_total`,
      help: "Total number of errors by type",
      labelNames: ["type"],
      registers: [this.registry],
    });

    this.authAttemptsTotal = new Counter({
      name: `${this.prefix}_auth_attempts_total`,
      help: "Credential validations against the backend",
      labelNames: ["status"],
      registers: [this.registry],
    });

    this.rateLimitHitsTotal = new Counter({
      name: `${this.prefix}_rate_limit_hits_total`,
      help: "Credential validations refused by the rate limiter",
      registers: [this.registry],
    });

    this.authCacheLookupsTotal = new Counter({
      name: `${this.prefix}_auth_cache_lookups_total`,
      help: "Session principal cache lookups",
      labelNames: ["result"],
      registers: [this.registry],
    });

    this.traceTagFailuresTotal = new Counter({
      name: `${this.prefix}_trace_tag_failures_total`,
      help: "Failures applying the trace tag to a backend session",
      labelNames: ["enforced"],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: `${this.prefix}_request_duration_seconds`,
      help: "Tool invocation duration in seconds",
      labelNames: ["tool"],
      buckets: [0.01, 0.02, 0.05, 0.1, 0.2, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });

    this.activeSessions = new Gauge({
      name: `${this.prefix}_active_sessions`,
      help: "Open MCP transport sessions",
      registers: [this.registry],
    });

    if (config.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  getRegistry(): Registry {
    return this.registry;
  }

  incrementRequests(tool: string, status: RequestStatus): void {
    this.requestsTotal.inc({ tool, status });
  }

  incrementErrors(type: string): void {
    this.errorsTotal.inc({ type });
  }

  incrementAuthAttempts(status: AuthAttemptStatus): void {
    this.authAttemptsTotal.inc({ status });
  }

  incrementRateLimitHits(): void {
    this.rateLimitHitsTotal.inc();
  }

  recordCacheLookup(hit: boolean): void {
    this.authCacheLookupsTotal.inc({ result: hit ? "hit" : "miss" });
  }

  incrementTraceTagFailures(enforced: boolean): void {
    this.traceTagFailuresTotal.inc({ enforced: String(enforced) });
  }

  recordLatency(tool: string, durationSeconds: number): void {
    this.requestDuration.observe({ tool }, durationSeconds);
  }

  setActiveSessions(count: number): void {
    this.activeSessions.set(count);
  }

  /**
   * Get metrics in Prometheus text format
   *
   * @throws MetricsAuthError when a token is configured and does not match
   */
  async getMetricsText(authToken?: string): Promise<string> {
    this.validateAuth(authToken);
    return await this.registry.metrics();
  }

  /**
   * Current value of a counter series, 0 when it was never incremented
   */
  async getCounterValue(name: string, labels: Record<string, string> = {}): Promise<number> {
    const metrics = await this.registry.getMetricsAsJSON();
    const metric = metrics.find((m) => m.name === `${this.prefix}_${name}`);
    if (!metric) {
      return 0;
    }

    let total = 0;
    for (const value of metric.values) {
      const matches = Object.entries(labels).every(
        ([key, expected]) => String(value.labels[key]) === expected
      );
      if (matches) {
        total += value.value;
      }
    }
    return total;
  }

  reset(): void {
    this.registry.resetMetrics();
  }

  private validateAuth(providedToken: string | undefined): void {
    if (!this.authToken) {
      return;
    }
    if (!providedToken) {
      throw new MetricsAuthError("Authentication required for metrics endpoint");
    }
    if (providedToken !== this.authToken) {
      throw new MetricsAuthError("Invalid authentication token");
    }
  }
}

/**
 * Create a new MetricsCollector instance
 */
export function createMetricsCollector(config: MetricsConfig = {}): MetricsCollector {
  return new MetricsCollector(config);
}

/**
 * Timer helper for measuring a tool invocation
 */
export class MetricsTimer {
  private startTime: number;
  private collector: MetricsCollector;
  private tool: string;

  constructor(collector: MetricsCollector, tool: string) {
    this.collector = collector;
    this.tool = tool;
    this.startTime = performance.now();
  }

  /**
   * End the timer and record the duration
   */
  end(status: RequestStatus = "success"): number {
    const duration = (performance.now() - this.startTime) / 1000;
    this.collector.recordLatency(this.tool, duration);
    this.collector.incrementRequests(this.tool, status);
    return duration;
  }
}

export function startTimer(collector: MetricsCollector, tool: string): MetricsTimer {
  return new MetricsTimer(collector, tool);
}
