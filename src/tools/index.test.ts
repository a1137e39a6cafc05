/**
 * Tests for MCP Tool handlers
 *
 * Tests each tool's handler against an in-memory store
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import { registerTools, DEFAULT_TREND_DAYS } from "./index.js";
import { Aggregator } from "../aggregator.js";
import { MemoryDayRecordStore } from "../store/memory.js";
import { getNoDataMessage, StoreUnavailableError } from "../utils/errors.js";
import { fixedClock, seedHrv } from "../../tests/helpers/seed.js";

// Type for captured tool handlers
type ToolHandler = (args: Record<string, unknown>) => Promise<{
  content: Array<{ type: string; text: string }>;
  isError?: boolean;
}>;

// Mock McpServer that captures registered tools
function createMockServer() {
  const tools: Map<string, { config: unknown; handler: ToolHandler }> = new Map();

  return {
    registerTool: vi.fn((name: string, config: unknown, handler: ToolHandler) => {
      tools.set(name, { config, handler });
    }),
    getToolHandler: (name: string): ToolHandler => {
      const tool = tools.get(name);
      if (!tool) throw new Error(`Tool ${name} not registered`);
      return tool.handler;
    },
    getToolCount: () => tools.size,
  };
}

async function callJson(handler: ToolHandler, args: Record<string, unknown> = {}) {
  const result = await handler(args);
  expect(result.isError).toBeUndefined();
  return JSON.parse(result.content[0].text);
}

const clock = fixedClock("2024-01-16T08:00:00.000Z");

describe("Tool Handlers", () => {
  let mockServer: ReturnType<typeof createMockServer>;
  let store: MemoryDayRecordStore;

  beforeEach(() => {
    store = new MemoryDayRecordStore(clock);
    mockServer = createMockServer();
    registerTools(mockServer as unknown as Parameters<typeof registerTools>[0], new Aggregator(store), {
      timeZone: "UTC",
      clock,
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Tool Registration
  // ─────────────────────────────────────────────────────────────

  describe("registerTools", () => {
    it("should register all 3 tools", () => {
      expect(mockServer.getToolCount()).toBe(3);
    });

    it("should register expected tool names", () => {
      for (const name of ["get_today", "get_trends", "get_recovery_status"]) {
        expect(mockServer.getToolHandler(name)).toBeDefined();
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // get_today tool
  // ─────────────────────────────────────────────────────────────

  describe("get_today", () => {
    it("should default to yesterday and report a gap", async () => {
      const data = await callJson(mockServer.getToolHandler("get_today"));

      expect(data).toEqual({ date: "2024-01-15", status: "gap", message: getNoDataMessage("2024-01-15") });
    });

    it("should return the stored record for a given date", async () => {
      await store.mergeField("2024-01-10", "steps", () => 9142);
      await seedHrv(store, { "2024-01-10": 42 });

      const data = await callJson(mockServer.getToolHandler("get_today"), { date: "2024-01-10" });

      expect(data).toEqual({
        date: "2024-01-10",
        status: "synced",
        record: {
          steps: 9142,
          hrv: { avg: 42, min: 42, max: 42, sampleCount: 1 },
          updatedAt: "2024-01-16T08:00:00.000Z",
        },
      });
    });

    it("should return an error for an impossible date", async () => {
      const result = await mockServer.getToolHandler("get_today")({ date: "2024-02-30" });

      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe(
        'Invalid date "2024-02-30": expected a calendar date in YYYY-MM-DD format'
      );
    });

    it("should return store failures as tool errors", async () => {
      vi.spyOn(store, "getDay").mockRejectedValueOnce(
        new StoreUnavailableError("HGETALL", new Error("connection refused"))
      );

      const result = await mockServer.getToolHandler("get_today")({ date: "2024-01-10" });

      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe("Health store unavailable during HGETALL: connection refused");
    });
  });

  // ─────────────────────────────────────────────────────────────
  // get_trends tool
  // ─────────────────────────────────────────────────────────────

  describe("get_trends", () => {
    it("should list synced days and gaps oldest first", async () => {
      await store.mergeField("2024-01-10", "steps", () => 9142);

      const data = await callJson(mockServer.getToolHandler("get_trends"), { days: 3, end_date: "2024-01-12" });

      expect(data).toEqual({
        startDate: "2024-01-10",
        endDate: "2024-01-12",
        windowDays: 3,
        syncedDays: 1,
        gapDays: 2,
        days: [
          { date: "2024-01-10", status: "synced", steps: 9142 },
          { date: "2024-01-11", status: "gap" },
          { date: "2024-01-12", status: "gap" },
        ],
      });
    });

    it("should default to a week ending yesterday and explain an empty window", async () => {
      const data = await callJson(mockServer.getToolHandler("get_trends"));

      expect(data.windowDays).toBe(DEFAULT_TREND_DAYS);
      expect(data.startDate).toBe("2024-01-09");
      expect(data.endDate).toBe("2024-01-15");
      expect(data.syncedDays).toBe(0);
      expect(data.message).toBe(getNoDataMessage("2024-01-09", "2024-01-15"));
    });

    it("should error on an invalid end date", async () => {
      const result = await mockServer.getToolHandler("get_trends")({ end_date: "2024-13-01" });

      expect(result.isError).toBe(true);
      expect(result.content[0].text).toContain('Invalid end_date "2024-13-01"');
    });
  });

  // ─────────────────────────────────────────────────────────────
  // get_recovery_status tool
  // ─────────────────────────────────────────────────────────────

  describe("get_recovery_status", () => {
    it("should compare the day before today with its baseline", async () => {
      await seedHrv(store, {
        "2024-01-10": 40,
        "2024-01-11": 42,
        "2024-01-12": 44,
        "2024-01-13": 46,
        "2024-01-14": 48,
        "2024-01-15": 49.5,
      });

      const data = await callJson(mockServer.getToolHandler("get_recovery_status"));

      expect(data.date).toBe("2024-01-16");
      expect(data.hrv).toEqual({
        value: 49.5,
        baseline: { available: true, value: 44, daysUsed: 5, lookbackDays: 14 },
        percentDeviation: 12.5,
      });
      expect(data.recentDays.map((day: { date: string }) => day.date)).toEqual([
        "2024-01-13",
        "2024-01-14",
        "2024-01-15",
      ]);
    });

    it("should report a missing day explicitly", async () => {
      const data = await callJson(mockServer.getToolHandler("get_recovery_status"), { date: "2024-01-12" });

      expect(data.yesterday).toEqual({ date: "2024-01-11", status: "gap" });
      expect(data.hrv.reason).toBe("no_record_for_day");
      expect(data.hrv.percentDeviation).toBeNull();
    });
  });
});
