/**
 * Read-side computations over day records: single days, trend windows,
 * the rolling HRV baseline and the recovery comparison.
 *
 * Every result reports numbers only. Missing days and missing metrics are
 * surfaced explicitly (gap entries, null values with a reason) rather than
 * filled in, so the agent can tell "not synced" from "zero".
 */

import type { DayRecord, HeartRateZones, SleepSummary, ZoneName } from "./types.js";
import { ZONE_NAMES } from "./types.js";
import type { DayRecordStore } from "./store/types.js";
import { toDayRecord } from "./store/updates.js";
import { addDays, dateRange } from "./utils/dates.js";
import { mean, percentage, round } from "./utils/analysis.js";

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type DayEntry =
  | { date: string; status: "synced"; record: DayRecord }
  | { date: string; status: "gap" };

export interface TrendWindow {
  startDate: string;
  endDate: string;
  windowDays: number;
  /** Oldest first, one entry per calendar date */
  days: DayEntry[];
  syncedDays: number;
  gapDays: number;
}

export type BaselineResult =
  | { available: true; value: number; daysUsed: number; lookbackDays: number }
  | {
      available: false;
      reason: "insufficient_data";
      daysUsed: number;
      minDays: number;
      lookbackDays: number;
    };

export type ZonePercentages = Record<ZoneName, number> & {
  trainingLoadMinutes: number;
  highIntensityMinutes: number;
};

export interface DayDigest {
  hrv?: number;
  restingHeartRate?: number;
  respiratoryRate?: number;
  steps?: number;
  exerciseMinutes?: number;
  activeEnergy?: number;
  heartRateZones?: ZonePercentages;
  sleep?: SleepSummary;
}

export type HrvComparison =
  | { value: number; baseline: BaselineResult; percentDeviation: number }
  | {
      value: number | null;
      baseline: BaselineResult;
      percentDeviation: null;
      reason: "no_record_for_day" | "no_hrv_for_day" | "insufficient_baseline";
    };

export interface RecoveryStatus {
  /** Reference date; "yesterday" is the day before it */
  date: string;
  yesterday: DayEntry;
  hrv: HrvComparison;
  heartRateZones: ZonePercentages | null;
  /** The three days before the reference date, oldest first */
  recentDays: DayEntry[];
  weeklyRoutine: Record<string, number> | null;
}

export interface AggregatorOptions {
  baselineLookbackDays?: number;
  baselineMinDays?: number;
  weeklyRoutine?: Record<string, number> | null;
}

export const RECENT_CONTEXT_DAYS = 3;

// ─────────────────────────────────────────────────────────────
// Pure helpers
// ─────────────────────────────────────────────────────────────

/**
 * Percent difference of a value from its baseline, one decimal
 * e.g., (45, 50) -> -10
 */
export function percentDeviation(value: number, baseline: number): number {
  return round(((value - baseline) / baseline) * 100, 1);
}

/**
 * Share of minutes per zone plus training-load totals, or undefined when no
 * minutes were recorded
 */
export function zonePercentages(zones: HeartRateZones): ZonePercentages | undefined {
  const total = ZONE_NAMES.reduce((sum, name) => sum + zones[name], 0);
  if (total === 0) return undefined;

  return {
    rest: percentage(zones.rest, total),
    light: percentage(zones.light, total),
    moderate: percentage(zones.moderate, total),
    hard: percentage(zones.hard, total),
    max: percentage(zones.max, total),
    trainingLoadMinutes: round(zones.moderate + zones.hard + zones.max),
    highIntensityMinutes: round(zones.hard + zones.max),
  };
}

/**
 * Compact row for trend listings; absent metrics stay absent
 */
export function dayDigest(record: DayRecord): DayDigest {
  const digest: DayDigest = {};
  if (record.hrv) digest.hrv = record.hrv.avg;
  if (record.heartRate) {
    digest.restingHeartRate = record.heartRate.min;
    const zones = zonePercentages(record.heartRate.zones);
    if (zones) digest.heartRateZones = zones;
  }
  if (record.respRate) digest.respiratoryRate = record.respRate.avg;
  if (record.steps !== undefined) digest.steps = record.steps;
  if (record.exerciseMinutes !== undefined) digest.exerciseMinutes = record.exerciseMinutes;
  if (record.activeEnergy !== undefined) digest.activeEnergy = record.activeEnergy;
  if (record.sleep) digest.sleep = record.sleep;
  return digest;
}

// ─────────────────────────────────────────────────────────────
// Aggregator
// ─────────────────────────────────────────────────────────────

export class Aggregator {
  private readonly lookbackDays: number;
  private readonly minDays: number;
  private readonly weeklyRoutine: Record<string, number> | null;

  constructor(
    private readonly store: DayRecordStore,
    options: AggregatorOptions = {}
  ) {
    this.lookbackDays = options.baselineLookbackDays ?? 14;
    this.minDays = options.baselineMinDays ?? 5;
    this.weeklyRoutine = options.weeklyRoutine ?? null;
  }

  /**
   * The stored record for one date, verbatim, or an explicit gap
   */
  async dailySummary(date: string): Promise<DayEntry> {
    const stored = await this.store.getDay(date);
    if (stored === null) {
      return { date, status: "gap" };
    }
    return { date, status: "synced", record: toDayRecord(stored) };
  }

  /**
   * One entry per date in [endDate - windowDays + 1, endDate], oldest first
   */
  async trend(endDate: string, windowDays: number): Promise<TrendWindow> {
    const dates = dateRange(endDate, windowDays);
    const days = await Promise.all(dates.map((date) => this.dailySummary(date)));
    const syncedDays = days.filter((day) => day.status === "synced").length;

    return {
      startDate: dates[0],
      endDate,
      windowDays,
      days,
      syncedDays,
      gapDays: days.length - syncedDays,
    };
  }

  /**
   * Mean daily HRV over the `lookbackDays` dates strictly before `date`,
   * counting only dates with an HRV value
   */
  async baseline(date: string, lookbackDays = this.lookbackDays, minDays = this.minDays): Promise<BaselineResult> {
    const dates = dateRange(addDays(date, -1), lookbackDays);
    const days = await Promise.all(dates.map((day) => this.dailySummary(day)));

    const values: number[] = [];
    for (const day of days) {
      if (day.status === "synced" && day.record.hrv !== undefined && Number.isFinite(day.record.hrv.avg)) {
        values.push(day.record.hrv.avg);
      }
    }

    if (values.length < minDays) {
      return {
        available: false,
        reason: "insufficient_data",
        daysUsed: values.length,
        minDays,
        lookbackDays,
      };
    }

    return {
      available: true,
      value: round(mean(values)),
      daysUsed: values.length,
      lookbackDays,
    };
  }

  /**
   * Yesterday's HRV against its own trailing baseline, with the three
   * preceding days alongside for context
   */
  async recoveryStatus(date: string): Promise<RecoveryStatus> {
    const yesterdayDate = addDays(date, -1);
    const [yesterday, baseline, recentDays] = await Promise.all([
      this.dailySummary(yesterdayDate),
      this.baseline(yesterdayDate),
      Promise.all(dateRange(yesterdayDate, RECENT_CONTEXT_DAYS).map((day) => this.dailySummary(day))),
    ]);

    const record = yesterday.status === "synced" ? yesterday.record : undefined;
    const zones = record?.heartRate ? zonePercentages(record.heartRate.zones) : undefined;

    return {
      date,
      yesterday,
      hrv: compareHrv(record, baseline),
      heartRateZones: zones ?? null,
      recentDays,
      weeklyRoutine: this.weeklyRoutine,
    };
  }
}

function compareHrv(record: DayRecord | undefined, baseline: BaselineResult): HrvComparison {
  if (record === undefined) {
    return { value: null, baseline, percentDeviation: null, reason: "no_record_for_day" };
  }
  if (record.hrv === undefined) {
    return { value: null, baseline, percentDeviation: null, reason: "no_hrv_for_day" };
  }
  const value = record.hrv.avg;
  if (!baseline.available) {
    return { value, baseline, percentDeviation: null, reason: "insufficient_baseline" };
  }
  return { value, baseline, percentDeviation: percentDeviation(value, baseline.value) };
}
