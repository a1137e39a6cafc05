/**
 * Ingest service: one form submission, many metrics.
 *
 * Each metric is normalized and written independently; a rejected or failed
 * metric never blocks the others in the same request.
 */

import type { DayRecordStore } from "../store/types.js";
import { applyUpdate, DEFAULT_ZONE_OPTIONS, type ZoneOptions } from "../store/updates.js";
import { formatError, ValidationError } from "../utils/errors.js";
import { localDate, systemClock, type Clock } from "../utils/dates.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { normalizeMetric, toUpdate, type NormalizeResult, type RejectedSample } from "./normalizer.js";
import { parseLines } from "./parse.js";

export type IngestMetricStatus = "applied" | "skipped" | "rejected" | "failed";

export interface IngestMetricResult {
  metric: string;
  status: IngestMetricStatus;
  /** Values that made it into the update */
  accepted: number;
  rejected: RejectedSample[];
  error?: string;
}

export interface IngestResult {
  date: string;
  results: IngestMetricResult[];
}

export type FormFields = Record<string, string | string[] | undefined>;

export interface IngestServiceOptions {
  zones?: ZoneOptions;
  /** Minutes per bare sleep stage label */
  sleepSampleMinutes?: number;
  timeZone?: string;
  clock?: Clock;
  logger?: Logger;
}

/** Form fields that are request parameters rather than metrics */
export const RESERVED_FIELDS = new Set(["date"]);

export class IngestService {
  private readonly zones: ZoneOptions;
  private readonly sleepSampleMinutes: number;
  private readonly timeZone: string;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly store: DayRecordStore,
    options: IngestServiceOptions = {}
  ) {
    this.zones = options.zones ?? DEFAULT_ZONE_OPTIONS;
    this.sleepSampleMinutes = options.sleepSampleMinutes ?? 1;
    this.timeZone = options.timeZone ?? "UTC";
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * The capture shortcut runs each morning and sends the previous day
   */
  defaultDate(): string {
    return localDate(this.timeZone, this.clock, 1);
  }

  async ingest(fields: FormFields, date: string, log: Logger = this.log): Promise<IngestResult> {
    const names = Object.keys(fields).filter((name) => !RESERVED_FIELDS.has(name));
    const results = await Promise.all(names.map((name) => this.ingestMetric(name, fields[name], date, log)));
    return { date, results };
  }

  private async ingestMetric(
    name: string,
    raw: string | string[] | undefined,
    date: string,
    log: Logger
  ): Promise<IngestMetricResult> {
    let normalized: NormalizeResult;
    try {
      normalized = normalizeMetric(name, parseLines(raw), { sleepSampleMinutes: this.sleepSampleMinutes });
    } catch (error) {
      if (error instanceof ValidationError) {
        log.warn("Rejected metric", { metric: name, reason: error.message });
        return { metric: name, status: "rejected", accepted: 0, rejected: [], error: error.message };
      }
      throw error;
    }

    const { metric, rejected } = normalized;
    if (rejected.length > 0) {
      log.warn("Rejected samples", { metric: name, date, rejected });
    }

    if (metric === undefined) {
      return { metric: name, status: rejected.length > 0 ? "rejected" : "skipped", accepted: 0, rejected };
    }

    const accepted =
      metric.kind === "discrete" ? metric.samples.length : metric.kind === "sleep" ? metric.intervals.length : 1;

    try {
      await applyUpdate(this.store, date, toUpdate(metric), this.zones);
    } catch (error) {
      log.error("Failed to store metric", error, { metric: name, date });
      return { metric: name, status: "failed", accepted: 0, rejected, error: formatError(error) };
    }

    log.info("Stored metric", { metric: name, date, accepted, rejected: rejected.length });
    return { metric: name, status: "applied", accepted, rejected };
  }
}

/**
 * HTTP status for an ingest result: 200 when everything submitted landed,
 * 207 for partial success, 400 when nothing valid was sent, 500 when every
 * metric failed on the store
 */
export function ingestStatusCode(result: IngestResult): number {
  const { results } = result;
  const applied = results.filter((r) => r.status === "applied");
  const failed = results.filter((r) => r.status === "failed");
  const rejected = results.filter((r) => r.status === "rejected");

  if (results.length === 0) return 400;
  if (applied.length === 0) {
    if (failed.length > 0) return rejected.length > 0 ? 207 : 500;
    return rejected.length > 0 ? 400 : 200;
  }

  const partial = failed.length > 0 || rejected.length > 0 || applied.some((r) => r.rejected.length > 0);
  return partial ? 207 : 200;
}
