import { describe, expect, it, vi } from "vitest";
import { createRunId, Logger, MetricsRegistry } from "../../src/observability";
import { capturingLogger } from "../helpers";

describe("Logger", () => {
  it("writes one JSON line per event with its context", () => {
    const { logger, lines } = capturingLogger("harvest");
    logger.info("section_harvested", { round: 1150, tier: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe("info");
    expect(lines[0].entry).toMatchObject({
      level: "info",
      msg: "section_harvested",
      component: "harvest",
      runId: "test-run",
      round: 1150,
      tier: 2,
    });
  });

  it("keeps the run id on child loggers", () => {
    const { logger, lines } = capturingLogger("cli");
    logger.child("fetch").warn("fetch_retry");
    expect(lines[0].entry).toMatchObject({ component: "fetch", runId: "test-run" });
  });

  it("drops events below the minimum level", () => {
    const writer = vi.fn();
    const logger = new Logger({ component: "cli", runId: "run" }, { minLevel: "warn", writer });
    logger.debug("round_probe");
    logger.info("round_resolved");
    logger.error("unit_failed");
    expect(writer).toHaveBeenCalledTimes(1);
    expect(writer.mock.calls[0][0]).toBe("error");
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("pages_fetched");
    metrics.incrementCounter("pages_fetched", 2);
    expect(metrics.getCounter("pages_fetched")).toBe(3);
    expect(metrics.getCounters().records_emitted).toBe(0);
  });

  it("summarises timers", () => {
    vi.useFakeTimers();
    try {
      const metrics = new MetricsRegistry();
      for (const duration of [10, 30]) {
        const stop = metrics.startTimer("page_fetch_ms");
        vi.advanceTimersByTime(duration);
        stop();
      }
      expect(metrics.getTimerSummaries().page_fetch_ms).toEqual({ count: 2, min: 10, max: 30, avg: 20 });
      expect(metrics.getTimerSummaries().probe_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("createRunId", () => {
  it("stamps the run with a compact UTC time and a random suffix", () => {
    expect(createRunId(new Date("2025-01-04T12:00:00.123Z"), () => 0.5)).toBe("harvest_20250104T120000Z_i00000");
  });
});
