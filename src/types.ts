/**
 * Shared shapes for day records, as stored and as served.
 */

export const CUMULATIVE_METRICS = ["steps", "exercise", "activeEnergy"] as const;
export const DISCRETE_METRICS = ["hrv", "heartRate", "respRate"] as const;
export const METRIC_NAMES = [...CUMULATIVE_METRICS, ...DISCRETE_METRICS, "sleep"] as const;

export type CumulativeMetricName = (typeof CUMULATIVE_METRICS)[number];
export type DiscreteMetricName = (typeof DISCRETE_METRICS)[number];
export type MetricName = (typeof METRIC_NAMES)[number];

export const ZONE_NAMES = ["rest", "light", "moderate", "hard", "max"] as const;
export type ZoneName = (typeof ZONE_NAMES)[number];
export type HeartRateZones = Record<ZoneName, number>;

export interface DiscreteSummary {
  avg: number;
  min: number;
  max: number;
  sampleCount: number;
}

export interface HeartRateSummary extends DiscreteSummary {
  /** Minutes per zone */
  zones: HeartRateZones;
}

export interface SleepSummary {
  /** Asleep minutes: deep + REM + light */
  totalMinutes: number;
  deepMinutes: number;
  remMinutes: number;
  lightMinutes: number;
  awakeMinutes: number;
  /** Stage transitions between consecutive intervals */
  fragmentationCount: number;
}

/**
 * One calendar day as served to readers. A missing field means the metric
 * has not been synced for that day; it is never filled with zero.
 */
export interface DayRecord {
  steps?: number;
  exerciseMinutes?: number;
  activeEnergy?: number;
  hrv?: DiscreteSummary;
  heartRate?: HeartRateSummary;
  respRate?: DiscreteSummary;
  sleep?: SleepSummary;
  updatedAt?: string;
}

/** Sample id (timestamp or batch-derived) -> value */
export type SampleLedger = Record<string, number>;

export interface StoredDiscrete extends DiscreteSummary {
  samples: SampleLedger;
}

export interface StoredHeartRate extends HeartRateSummary {
  samples: SampleLedger;
}

/**
 * One calendar day as persisted: discrete metrics keep the sample ledger
 * their aggregates are recomputed from.
 */
export interface StoredDay {
  steps?: number;
  exerciseMinutes?: number;
  activeEnergy?: number;
  hrv?: StoredDiscrete;
  heartRate?: StoredHeartRate;
  respRate?: StoredDiscrete;
  sleep?: SleepSummary;
  updatedAt?: string;
}

/** Fields written by metric merges; `updatedAt` is stamped by the store */
export type DayField = Exclude<keyof StoredDay, "updatedAt">;

export type DayFieldValue<K extends DayField> = NonNullable<StoredDay[K]>;

export const DAY_FIELDS = [
  "steps",
  "exerciseMinutes",
  "activeEnergy",
  "hrv",
  "heartRate",
  "respRate",
  "sleep",
] as const satisfies readonly DayField[];
