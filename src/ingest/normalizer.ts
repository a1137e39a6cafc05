/**
 * Metric Normalizer
 *
 * Turns a metric name and its raw lines into a typed metric, then into the
 * partial update that metric makes to its day. Nothing here touches the store.
 *
 * Cumulative metrics (steps, exercise, activeEnergy) arrive as one daily
 * total and replace the stored value. Discrete metrics (hrv, heartRate,
 * respRate) arrive as samples that are added to the day's sample ledger.
 * Sleep arrives as stage intervals and is summarized into stage minutes.
 */

import { createHash } from "node:crypto";
import {
  CUMULATIVE_METRICS,
  DISCRETE_METRICS,
  METRIC_NAMES,
  type CumulativeMetricName,
  type DiscreteMetricName,
  type MetricName,
  type SleepSummary,
} from "../types.js";
import { ValidationError } from "../utils/errors.js";
import { round } from "../utils/analysis.js";
import {
  parseSampleLine,
  parseSleepLine,
  type SleepInterval,
  type SleepStage,
} from "./parse.js";
import type { DayRecordUpdate } from "../store/updates.js";

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface Sample {
  /** Timestamp, or a batch-derived id when the line carried none */
  id: string;
  value: number;
}

export type NormalizedMetric =
  | { kind: "cumulative"; name: CumulativeMetricName; total: number }
  | { kind: "discrete"; name: DiscreteMetricName; samples: Sample[] }
  | { kind: "sleep"; intervals: SleepInterval[] };

export interface RejectedSample {
  line: string;
  reason: string;
}

export interface NormalizeResult {
  /** Undefined when nothing valid was submitted */
  metric?: NormalizedMetric;
  rejected: RejectedSample[];
}

interface ValueRange {
  /** Exclusive when `minExclusive` is set */
  min: number;
  max: number;
  minExclusive?: boolean;
  unit: string;
}

/**
 * Plausible physiological ranges; samples outside are rejected one by one
 */
export const DISCRETE_RANGES: Record<DiscreteMetricName, ValueRange> = {
  hrv: { min: 0, max: 500, minExclusive: true, unit: "ms" },
  heartRate: { min: 20, max: 250, unit: "bpm" },
  respRate: { min: 1, max: 80, unit: "breaths/min" },
};

// ─────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────

export function isMetricName(name: string): name is MetricName {
  return isCumulative(name) || isDiscrete(name) || name === "sleep";
}

function isCumulative(name: string): name is CumulativeMetricName {
  return CUMULATIVE_METRICS.some((metric) => metric === name);
}

function isDiscrete(name: string): name is DiscreteMetricName {
  return DISCRETE_METRICS.some((metric) => metric === name);
}

// ─────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────

export interface NormalizeOptions {
  /** Minutes credited to a sleep line that is only a stage label */
  sleepSampleMinutes?: number;
}

/**
 * Validate a metric's raw lines into the typed metric union.
 * Throws ValidationError for an unknown metric name.
 */
export function normalizeMetric(name: string, lines: string[], options: NormalizeOptions = {}): NormalizeResult {
  if (!isMetricName(name)) {
    throw new ValidationError(
      `Unknown metric "${name}". Expected one of: ${METRIC_NAMES.join(", ")}`,
      name
    );
  }

  if (lines.length === 0) {
    return { rejected: [] };
  }

  if (isCumulative(name)) return normalizeCumulative(name, lines);
  if (isDiscrete(name)) return normalizeDiscrete(name, lines);
  return normalizeSleep(lines, options.sleepSampleMinutes ?? 1);
}

function normalizeCumulative(name: CumulativeMetricName, lines: string[]): NormalizeResult {
  const rejected: RejectedSample[] = [];
  const totals: number[] = [];

  for (const line of lines) {
    const parsed = parseSampleLine(line);
    if (!parsed.ok) {
      rejected.push({ line, reason: parsed.reason });
    } else if (parsed.value.value < 0) {
      rejected.push({ line, reason: "daily total cannot be negative" });
    } else {
      totals.push(parsed.value.value);
    }
  }

  if (totals.length > 1) {
    // Summing here would double count samples from overlapping sources
    return {
      rejected: [
        ...rejected,
        ...totals.map((total) => ({
          line: String(total),
          reason: `expected a single daily total for ${name}, got ${totals.length}`,
        })),
      ],
    };
  }

  if (totals.length === 0) {
    return { rejected };
  }

  const total = name === "activeEnergy" ? round(totals[0]) : Math.round(totals[0]);
  return { metric: { kind: "cumulative", name, total }, rejected };
}

function normalizeDiscrete(name: DiscreteMetricName, lines: string[]): NormalizeResult {
  const range = DISCRETE_RANGES[name];
  const batchId = batchHash(lines);
  const rejected: RejectedSample[] = [];
  const samples: Sample[] = [];

  lines.forEach((line, index) => {
    const parsed = parseSampleLine(line);
    if (!parsed.ok) {
      rejected.push({ line, reason: parsed.reason });
      return;
    }
    const { value, timestamp } = parsed.value;
    if (!inRange(value, range)) {
      rejected.push({ line, reason: `out of range for ${name} (${describeRange(range)})` });
      return;
    }
    samples.push({ id: timestamp ?? `b${batchId}:${index}`, value });
  });

  if (samples.length === 0) {
    return { rejected };
  }
  return { metric: { kind: "discrete", name, samples }, rejected };
}

function normalizeSleep(lines: string[], bareLabelMinutes: number): NormalizeResult {
  const rejected: RejectedSample[] = [];
  const intervals: SleepInterval[] = [];

  for (const line of lines) {
    const parsed = parseSleepLine(line, bareLabelMinutes);
    if (parsed.ok) {
      intervals.push(parsed.value);
    } else {
      rejected.push({ line, reason: parsed.reason });
    }
  }

  if (intervals.length === 0) {
    return { rejected };
  }
  return { metric: { kind: "sleep", intervals }, rejected };
}

function inRange(value: number, range: ValueRange): boolean {
  const aboveMin = range.minExclusive ? value > range.min : value >= range.min;
  return aboveMin && value <= range.max;
}

function describeRange(range: ValueRange): string {
  const open = range.minExclusive ? "(" : "[";
  return `${open}${range.min}, ${range.max}] ${range.unit}`;
}

/**
 * Short content hash of a batch, so an identical resend maps to the same ids
 */
function batchHash(lines: string[]): string {
  return createHash("sha1").update(lines.join("\n")).digest("hex").slice(0, 12);
}

// ─────────────────────────────────────────────────────────────
// Sleep summary
// ─────────────────────────────────────────────────────────────

/**
 * Sum per-stage minutes and count stage transitions.
 * Timestamped intervals are ordered by start; the rest keep submission order.
 */
export function summarizeSleep(intervals: SleepInterval[]): SleepSummary {
  const ordered = intervals.every((interval) => interval.start !== undefined)
    ? [...intervals].sort((a, b) => (a.start ?? "").localeCompare(b.start ?? ""))
    : intervals;

  const minutes: Record<SleepStage, number> = { deep: 0, rem: 0, light: 0, awake: 0 };
  let fragmentationCount = 0;
  let previous: SleepStage | undefined;

  for (const interval of ordered) {
    minutes[interval.stage] += interval.minutes;
    if (previous !== undefined && previous !== interval.stage) {
      fragmentationCount++;
    }
    previous = interval.stage;
  }

  const deepMinutes = Math.round(minutes.deep);
  const remMinutes = Math.round(minutes.rem);
  const lightMinutes = Math.round(minutes.light);

  return {
    totalMinutes: deepMinutes + remMinutes + lightMinutes,
    deepMinutes,
    remMinutes,
    lightMinutes,
    awakeMinutes: Math.round(minutes.awake),
    fragmentationCount,
  };
}

// ─────────────────────────────────────────────────────────────
// Update descriptors
// ─────────────────────────────────────────────────────────────

/**
 * The partial day update a normalized metric makes
 */
export function toUpdate(metric: NormalizedMetric): DayRecordUpdate {
  switch (metric.kind) {
    case "cumulative":
      return {
        op: "replace",
        field: metric.name === "exercise" ? "exerciseMinutes" : metric.name,
        value: metric.total,
      };
    case "discrete":
      return { op: "accumulate", field: metric.name, samples: metric.samples };
    case "sleep":
      return { op: "replace", field: "sleep", value: summarizeSleep(metric.intervals) };
  }
}
