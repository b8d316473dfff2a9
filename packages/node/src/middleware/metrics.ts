/**
 * Prometheus metrics middleware + collector.
 *
 * Prometheus text format without prom-client. Collects:
 * - http_requests_total (counter, by method + status + path)
 * - http_request_duration_seconds (histogram, by method + path)
 * - named business counters such as lapse_token_operations_total
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

interface RequestCounter {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  count: number;
}

interface DurationHistogram {
  readonly method: string;
  readonly path: string;
  sum: number;
  count: number;
  readonly buckets: Map<number, number>; // le → count
}

interface NamedCounter {
  help: string;
  readonly series: Map<string, { readonly labels: Readonly<Record<string, string>>; count: number }>;
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function labelPairs(labels: Readonly<Record<string, string>>, quote: boolean): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => (quote ? `${k}="${v}"` : `${k}=${v}`))
    .join(",");
}

export class MetricsCollector {
  private readonly _requests = new Map<string, RequestCounter>();
  private readonly _durations = new Map<string, DurationHistogram>();
  private readonly _named = new Map<string, NamedCounter>();
  private readonly _buckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = buckets;
  }

  recordRequest(
    method: string,
    path: string,
    status: number,
    durationMs: number,
  ): void {
    const counterKey = `${method}:${path}:${String(status)}`;
    const counter = this._requests.get(counterKey);
    if (counter !== undefined) {
      counter.count++;
    } else {
      this._requests.set(counterKey, { method, path, status, count: 1 });
    }

    const histKey = `${method}:${path}`;
    const durationSec = durationMs / 1000;
    let hist = this._durations.get(histKey);
    if (hist === undefined) {
      hist = {
        method,
        path,
        sum: 0,
        count: 0,
        buckets: new Map(this._buckets.map((b) => [b, 0])),
      };
      this._durations.set(histKey, hist);
    }
    hist.sum += durationSec;
    hist.count++;
    for (const le of this._buckets) {
      if (durationSec <= le) {
        hist.buckets.set(le, (hist.buckets.get(le) ?? 0) + 1);
      }
    }
  }

  /**
   * Set the HELP line of a named counter. Counters that were never
   * described render a generic one.
   */
  describeCounter(name: string, help: string): void {
    const metric = this._named.get(name);
    if (metric !== undefined) {
      metric.help = help;
    } else {
      this._named.set(name, { help, series: new Map() });
    }
  }

  incrementCounter(name: string, labels: Readonly<Record<string, string>> = {}): void {
    let metric = this._named.get(name);
    if (metric === undefined) {
      metric = { help: "Business metric counter", series: new Map() };
      this._named.set(name, metric);
    }

    const key = labelPairs(labels, false);
    const entry = metric.series.get(key);
    if (entry !== undefined) {
      entry.count++;
    } else {
      metric.series.set(key, { labels: { ...labels }, count: 1 });
    }
  }

  /** Current value of a named counter series; 0 when never incremented. */
  counterValue(name: string, labels: Readonly<Record<string, string>> = {}): number {
    return this._named.get(name)?.series.get(labelPairs(labels, false))?.count ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    lines.push("# HELP http_requests_total Total HTTP requests");
    lines.push("# TYPE http_requests_total counter");
    for (const entry of this._requests.values()) {
      lines.push(
        `http_requests_total{method="${entry.method}",path="${entry.path}",status="${String(entry.status)}"} ${String(entry.count)}`,
      );
    }

    lines.push("# HELP http_request_duration_seconds HTTP request duration in seconds");
    lines.push("# TYPE http_request_duration_seconds histogram");
    for (const hist of this._durations.values()) {
      const base = `method="${hist.method}",path="${hist.path}"`;
      for (const [le, count] of hist.buckets) {
        lines.push(`http_request_duration_seconds_bucket{${base},le="${String(le)}"} ${String(count)}`);
      }
      lines.push(`http_request_duration_seconds_bucket{${base},le="+Inf"} ${String(hist.count)}`);
      lines.push(`http_request_duration_seconds_sum{${base}} ${String(hist.sum)}`);
      lines.push(`http_request_duration_seconds_count{${base}} ${String(hist.count)}`);
    }

    for (const [name, metric] of this._named) {
      lines.push(`# HELP ${name} ${metric.help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, count } of metric.series.values()) {
        const labelStr = labelPairs(labels, true);
        lines.push(labelStr.length > 0 ? `${name}{${labelStr}} ${String(count)}` : `${name} ${String(count)}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._requests.clear();
    this._durations.clear();
    for (const metric of this._named.values()) {
      metric.series.clear();
    }
  }
}

// =============================================================================
// Middleware
// =============================================================================

const ADDRESS_SEGMENT = /\/0x[0-9a-fA-F]{40}(?=\/|$)/g;

/**
 * Collapse account addresses so every holder shares one series.
 *
 * /api/v1/accounts/0xabc.../balance → /api/v1/accounts/:address/balance
 */
export function normalizeMetricsPath(path: string): string {
  return path.replace(ADDRESS_SEGMENT, "/:address");
}

export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    collector.recordRequest(
      c.req.method,
      normalizeMetricsPath(c.req.path),
      c.res.status,
      durationMs,
    );
  };
}
