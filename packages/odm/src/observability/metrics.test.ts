import { describe, it, expect, beforeEach } from "vitest";
import { MetricsCollector } from "./metrics.js";

describe("MetricsCollector", () => {
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = new MetricsCollector();
  });

  it("should count operations per collection", () => {
    metrics.recordOperation("people", "load");
    metrics.recordOperation("people", "insert");
    metrics.recordOperation("people", "insert");
    metrics.recordOperation("cities", "delete");

    expect(metrics.getMetrics("people")).toMatchObject({ loads: 1, inserts: 2, deletes: 0 });
    expect(metrics.getMetrics("cities")?.deletes).toBe(1);
    expect(metrics.getMetrics("towns")).toBeUndefined();
  });

  it("should compute the hit rate", () => {
    metrics.recordHit("people");
    metrics.recordHit("people");
    metrics.recordHit("people");
    metrics.recordMiss("people");

    expect(metrics.getHitRate("people")).toBe(0.75);
    expect(metrics.getHitRate("cities")).toBe(0);
  });

  it("should keep the latest write samples only", () => {
    for (let i = 0; i < 105; i++) {
      metrics.recordWriteTime("people", i);
    }

    const samples = metrics.getMetrics("people")?.writeTimeMs ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(5);
  });

  it("should compute p95 write time", () => {
    for (let i = 1; i <= 20; i++) {
      metrics.recordWriteTime("people", i);
    }

    expect(metrics.getP95WriteTime("people")).toBe(19);
    expect(metrics.getP95WriteTime("cities")).toBe(0);
  });

  it("should reset one collection or all", () => {
    metrics.recordFailure("people");
    metrics.recordFailure("cities");

    metrics.reset("people");
    expect(metrics.getMetrics("people")).toBeUndefined();
    expect(metrics.getMetrics("cities")?.failures).toBe(1);

    metrics.reset();
    expect(metrics.getAllMetrics().size).toBe(0);
  });
});
