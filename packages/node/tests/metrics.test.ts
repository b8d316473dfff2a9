/**
 * Tests for the metrics collector and GET /metrics.
 */

import { describe, it, expect } from "vitest";
import { MetricsCollector, normalizeMetricsPath } from "../src/middleware/metrics.js";
import { OPERATIONS_METRIC, REJECTIONS_METRIC } from "../src/services/token-service.js";
import { ALICE, BOB, createTestApp, jsonRequest } from "./setup.js";

describe("MetricsCollector", () => {
  it("renders request counters and histograms", () => {
    const collector = new MetricsCollector([0.1, 1]);
    collector.recordRequest("GET", "/health", 200, 50);

    const lines = collector.render().split("\n");
    expect(lines).toContain('http_requests_total{method="GET",path="/health",status="200"} 1');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",path="/health",le="0.1"} 1');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",path="/health",le="+Inf"} 1');
    expect(lines).toContain('http_request_duration_seconds_count{method="GET",path="/health"} 1');
  });

  it("renders named counters with sorted labels and their help text", () => {
    const collector = new MetricsCollector();
    collector.describeCounter("jobs_total", "Jobs run");
    collector.incrementCounter("jobs_total", { queue: "a", kind: "x" });
    collector.incrementCounter("jobs_total", { kind: "x", queue: "a" });

    const lines = collector.render().split("\n");
    expect(lines).toContain("# HELP jobs_total Jobs run");
    expect(lines).toContain('jobs_total{kind="x",queue="a"} 2');
    expect(collector.counterValue("jobs_total", { queue: "a", kind: "x" })).toBe(2);
  });

  it("clears recorded values", () => {
    const collector = new MetricsCollector();
    collector.incrementCounter("jobs_total");
    collector.clear();
    expect(collector.counterValue("jobs_total")).toBe(0);
  });
});

describe("normalizeMetricsPath", () => {
  it("collapses addresses", () => {
    expect(normalizeMetricsPath(`/api/v1/allowances/${ALICE}/${BOB}`)).toBe(
      "/api/v1/allowances/:address/:address",
    );
    expect(normalizeMetricsPath("/api/v1/token")).toBe("/api/v1/token");
  });
});

describe("GET /metrics", () => {
  it("counts token operations and rejections", async () => {
    const { app, metricsCollector } = createTestApp();
    await app.request(jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "1" }));
    await app.request(
      jsonRequest("/api/v1/transfer", "POST", { to: BOB, amount: "2" }, { "X-Account": ALICE }),
    );

    expect(metricsCollector.counterValue(OPERATIONS_METRIC, { operation: "mint" })).toBe(1);
    expect(
      metricsCollector.counterValue(REJECTIONS_METRIC, {
        operation: "transfer",
        code: "INSUFFICIENT_BALANCE",
      }),
    ).toBe(1);

    const res = await app.request("/metrics");
    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4; charset=utf-8");

    const lines = (await res.text()).split("\n");
    expect(lines).toContain(`# HELP ${OPERATIONS_METRIC} Token mutations applied, by operation`);
    expect(lines).toContain(`${OPERATIONS_METRIC}{operation="mint"} 1`);
    expect(lines).toContain(
      `${REJECTIONS_METRIC}{code="INSUFFICIENT_BALANCE",operation="transfer"} 1`,
    );
  });

  it("labels account routes without the address", async () => {
    const { app, metricsCollector } = createTestApp();
    await app.request(`/api/v1/accounts/${ALICE}/balance`);

    const lines = metricsCollector.render().split("\n");
    expect(lines).toContain(
      'http_requests_total{method="GET",path="/api/v1/accounts/:address/balance",status="200"} 1',
    );
  });

  it("can be disabled", async () => {
    const { app } = createTestApp({ enableMetrics: false });
    const res = await app.request("/metrics");
    expect(res.status).toBe(404);
  });
});
