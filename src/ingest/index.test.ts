/**
 * Tests for the ingest service over an in-memory store
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import { IngestService, ingestStatusCode, type IngestMetricResult } from "./index.js";
import { MemoryDayRecordStore } from "../store/memory.js";
import type { DayRecordStore } from "../store/types.js";
import { StoreUnavailableError } from "../utils/errors.js";
import { Logger } from "../utils/logger.js";
import { fixedClock } from "../../tests/helpers/seed.js";

const clock = fixedClock("2024-01-16T08:00:00.000Z");
const silent = new Logger({ level: "error", write: () => undefined });

function result(status: IngestMetricResult["status"], rejectedLines = 0): IngestMetricResult {
  return {
    metric: "m",
    status,
    accepted: status === "applied" ? 1 : 0,
    rejected: Array.from({ length: rejectedLines }, () => ({ line: "x", reason: "not a number" })),
  };
}

describe("IngestService", () => {
  let store: MemoryDayRecordStore;
  let service: IngestService;

  beforeEach(() => {
    store = new MemoryDayRecordStore(clock);
    service = new IngestService(store, { clock, logger: silent });
  });

  it("stores every metric of a submission", async () => {
    const outcome = await service.ingest({ steps: "9142", hrv: "38\n41\n36\n44" }, "2024-01-10");

    expect(outcome).toEqual({
      date: "2024-01-10",
      results: [
        { metric: "steps", status: "applied", accepted: 1, rejected: [] },
        { metric: "hrv", status: "applied", accepted: 4, rejected: [] },
      ],
    });
    expect(ingestStatusCode(outcome)).toBe(200);

    const day = await store.getDay("2024-01-10");
    expect(day?.steps).toBe(9142);
    expect(day?.hrv).toMatchObject({ avg: 39.75, min: 36, max: 44, sampleCount: 4 });
  });

  it("leaves the day unchanged when a submission is resent", async () => {
    const fields = { steps: "9142", hrv: "38\n41\n36\n44", heartRate: "62\n125", sleep: "Deep,60\nREM,90" };
    await service.ingest(fields, "2024-01-10");
    const first = await store.getDay("2024-01-10");

    await service.ingest(fields, "2024-01-10");
    expect(await store.getDay("2024-01-10")).toEqual(first);
  });

  it("reaches the same day regardless of metric order", async () => {
    const other = new MemoryDayRecordStore(clock);
    const otherService = new IngestService(other, { clock, logger: silent });

    await service.ingest({ hrv: "38\n41" }, "2024-01-10");
    await service.ingest({ hrv: "36\n44", steps: "9142" }, "2024-01-10");
    await otherService.ingest({ steps: "9142", hrv: "36\n44" }, "2024-01-10");
    await otherService.ingest({ hrv: "38\n41" }, "2024-01-10");

    const a = await store.getDay("2024-01-10");
    const b = await other.getDay("2024-01-10");
    expect(a?.steps).toBe(b?.steps);
    expect(a?.hrv).toEqual(b?.hrv);
  });

  it("rejects an unknown metric without blocking the others", async () => {
    const outcome = await service.ingest({ weight: "80", steps: "9142" }, "2024-01-10");

    expect(outcome.results[0]).toMatchObject({ metric: "weight", status: "rejected", accepted: 0 });
    expect(outcome.results[0].error).toContain('Unknown metric "weight"');
    expect(outcome.results[1]).toMatchObject({ metric: "steps", status: "applied" });
    expect(ingestStatusCode(outcome)).toBe(207);
  });

  it("reports per-line rejections alongside accepted samples", async () => {
    const outcome = await service.ingest({ hrv: "38\nabc" }, "2024-01-10");

    expect(outcome.results).toEqual([
      { metric: "hrv", status: "applied", accepted: 1, rejected: [{ line: "abc", reason: "not a number" }] },
    ]);
    expect(ingestStatusCode(outcome)).toBe(207);
  });

  it("rejects hex and exponent values as not numbers", async () => {
    const outcome = await service.ingest({ hrv: "0x10\n1e3\n42" }, "2024-01-10");

    expect(outcome.results).toEqual([
      {
        metric: "hrv",
        status: "applied",
        accepted: 1,
        rejected: [
          { line: "0x10", reason: "not a number" },
          { line: "1e3", reason: "not a number" },
        ],
      },
    ]);
    expect((await store.getDay("2024-01-10"))?.hrv).toMatchObject({ avg: 42, sampleCount: 1 });
  });

  it("summarizes sleep sent as bare stage labels", async () => {
    const labelled = new IngestService(store, { clock, logger: silent, sleepSampleMinutes: 5 });
    const outcome = await labelled.ingest({ sleep: "Deep\nDeep\nREM\nAwake" }, "2024-01-10");

    expect(outcome.results).toEqual([{ metric: "sleep", status: "applied", accepted: 4, rejected: [] }]);
    expect((await store.getDay("2024-01-10"))?.sleep).toEqual({
      totalMinutes: 15,
      deepMinutes: 10,
      remMinutes: 5,
      lightMinutes: 0,
      awakeMinutes: 5,
      fragmentationCount: 2,
    });
  });

  it("skips empty fields and never writes them", async () => {
    const outcome = await service.ingest({ steps: "" }, "2024-01-10");

    expect(outcome.results).toEqual([{ metric: "steps", status: "skipped", accepted: 0, rejected: [] }]);
    expect(await store.getDay("2024-01-10")).toBeNull();
  });

  it("treats date as a request parameter, not a metric", async () => {
    const outcome = await service.ingest({ date: "2024-01-10", steps: "9142" }, "2024-01-10");
    expect(outcome.results.map((r) => r.metric)).toEqual(["steps"]);
  });

  it("marks metrics the store failed to write", async () => {
    const failing: DayRecordStore = {
      getDay: vi.fn().mockResolvedValue(null),
      mergeField: vi.fn().mockRejectedValue(new StoreUnavailableError("EVAL", new Error("connection refused"))),
    };
    const failingService = new IngestService(failing, { clock, logger: silent });

    const outcome = await failingService.ingest({ steps: "9142" }, "2024-01-10");

    expect(outcome.results).toEqual([
      {
        metric: "steps",
        status: "failed",
        accepted: 0,
        rejected: [],
        error: "Health store unavailable during EVAL: connection refused",
      },
    ]);
    expect(ingestStatusCode(outcome)).toBe(500);
  });

  describe("defaultDate", () => {
    it("is yesterday in the configured zone", () => {
      expect(service.defaultDate()).toBe("2024-01-15");

      const west = new IngestService(store, {
        clock: fixedClock("2024-01-16T05:00:00.000Z"),
        timeZone: "America/Los_Angeles",
        logger: silent,
      });
      expect(west.defaultDate()).toBe("2024-01-14");
    });
  });
});

describe("ingestStatusCode", () => {
  const date = "2024-01-10";

  it("is 400 when nothing was submitted", () => {
    expect(ingestStatusCode({ date, results: [] })).toBe(400);
  });

  it("is 200 when everything applied cleanly", () => {
    expect(ingestStatusCode({ date, results: [result("applied"), result("skipped")] })).toBe(200);
  });

  it("is 207 for partial success", () => {
    expect(ingestStatusCode({ date, results: [result("applied"), result("failed")] })).toBe(207);
    expect(ingestStatusCode({ date, results: [result("applied", 1)] })).toBe(207);
    expect(ingestStatusCode({ date, results: [result("rejected"), result("failed")] })).toBe(207);
  });

  it("is 400 when only invalid input was sent", () => {
    expect(ingestStatusCode({ date, results: [result("rejected")] })).toBe(400);
  });

  it("is 500 when every write failed", () => {
    expect(ingestStatusCode({ date, results: [result("failed"), result("failed")] })).toBe(500);
  });
});
