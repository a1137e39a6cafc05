/**
 * MCP Tools for daily health records
 *
 * get_today           - one day's normalized metrics
 * get_trends          - a window of days with explicit sync gaps
 * get_recovery_status - yesterday's HRV against its rolling baseline, plus context
 *
 * Tools return raw numbers as JSON text. Interpretation is left to the agent.
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { dayDigest, type Aggregator, type DayDigest } from "../aggregator.js";
import { formatError, getNoDataMessage } from "../utils/errors.js";
import { assertIsoDate, localDate, systemClock, type Clock } from "../utils/dates.js";

export interface ToolOptions {
  /** IANA zone used to pick default dates */
  timeZone?: string;
  clock?: Clock;
  maxTrendDays?: number;
}

export const DEFAULT_TREND_DAYS = 7;

type TrendRow = { date: string; status: "gap" } | ({ date: string; status: "synced" } & DayDigest);

const dateParam = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .optional();

function jsonResult(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

function errorResult(error: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: formatError(error),
      },
    ],
    isError: true,
  };
}

// ─────────────────────────────────────────────────────────────
// Register Tools with McpServer
// ─────────────────────────────────────────────────────────────

export function registerTools(server: McpServer, aggregator: Aggregator, options: ToolOptions = {}) {
  const timeZone = options.timeZone ?? "UTC";
  const clock = options.clock ?? systemClock;
  const maxTrendDays = options.maxTrendDays ?? 90;

  // The most recent complete day: the capture shortcut syncs it each morning
  const lastCompleteDay = () => localDate(timeZone, clock, 1);

  // ─────────────────────────────────────────────────────────────
  // get_today tool
  // ─────────────────────────────────────────────────────────────
  server.registerTool(
    "get_today",
    {
      description:
        "Get all raw health data for one day: HRV, heart rate with zone minutes, respiratory rate, sleep stages, steps, exercise minutes, active energy. Defaults to the most recent complete (synced) day. Missing metrics are omitted, not zeroed; a day with nothing synced is reported as a gap.",
      inputSchema: {
        date: dateParam.describe("Day in YYYY-MM-DD format. Defaults to yesterday, the most recent synced day."),
      },
    },
    async ({ date }) => {
      try {
        const day = assertIsoDate(date ?? lastCompleteDay());
        const entry = await aggregator.dailySummary(day);

        if (entry.status === "gap") {
          return jsonResult({ ...entry, message: getNoDataMessage(day) });
        }
        return jsonResult(entry);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // ─────────────────────────────────────────────────────────────
  // get_trends tool
  // ─────────────────────────────────────────────────────────────
  server.registerTool(
    "get_trends",
    {
      description:
        "Get raw health data over multiple days, oldest first: daily HRV, resting heart rate, respiratory rate, steps, exercise minutes, active energy, heart-rate zone percentages and sleep. Days with no synced data are listed as gaps so they are never mistaken for zero activity.",
      inputSchema: {
        days: z
          .number()
          .int()
          .min(1)
          .max(maxTrendDays)
          .optional()
          .describe(`Number of days in the window (default ${DEFAULT_TREND_DAYS}, max ${maxTrendDays})`),
        end_date: dateParam.describe("Last day of the window in YYYY-MM-DD format. Defaults to yesterday."),
      },
    },
    async ({ days, end_date }) => {
      try {
        const endDate = assertIsoDate(end_date ?? lastCompleteDay(), "end_date");
        const window = await aggregator.trend(endDate, days ?? DEFAULT_TREND_DAYS);

        const rows: TrendRow[] = window.days.map((day) =>
          day.status === "synced"
            ? { date: day.date, status: "synced", ...dayDigest(day.record) }
            : { date: day.date, status: "gap" }
        );

        return jsonResult({
          startDate: window.startDate,
          endDate: window.endDate,
          windowDays: window.windowDays,
          syncedDays: window.syncedDays,
          gapDays: window.gapDays,
          ...(window.syncedDays === 0 ? { message: getNoDataMessage(window.startDate, window.endDate) } : {}),
          days: rows,
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // ─────────────────────────────────────────────────────────────
  // get_recovery_status tool
  // ─────────────────────────────────────────────────────────────
  server.registerTool(
    "get_recovery_status",
    {
      description:
        "Get recovery data: yesterday's HRV compared with its trailing 14-day baseline (percent deviation), heart-rate zone percentages, and the last 3 days of records (exercise, zones, sleep) for training context, plus the user's weekly routine if configured. Reports numbers only; when the baseline has too few days or yesterday is missing, the result says so explicitly.",
      inputSchema: {
        date: dateParam.describe("Reference day in YYYY-MM-DD format; the day before it is compared. Defaults to today."),
      },
    },
    async ({ date }) => {
      try {
        const reference = assertIsoDate(date ?? localDate(timeZone, clock));
        return jsonResult(await aggregator.recoveryStatus(reference));
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
