/**
 * Application of partial day updates through the store's field merge.
 */

import type {
  DayRecord,
  DiscreteMetricName,
  SampleLedger,
  SleepSummary,
  StoredDay,
  StoredDiscrete,
  StoredHeartRate,
} from "../types.js";
import { DEFAULT_ZONE_THRESHOLDS, bucketZones, summarizeSamples } from "../utils/analysis.js";
import type { Sample } from "../ingest/normalizer.js";
import type { DayRecordStore } from "./types.js";

export type DayRecordUpdate =
  | { op: "replace"; field: "steps" | "exerciseMinutes" | "activeEnergy"; value: number }
  | { op: "replace"; field: "sleep"; value: SleepSummary }
  | { op: "accumulate"; field: DiscreteMetricName; samples: Sample[] };

export interface ZoneOptions {
  thresholds: readonly number[];
  minutesPerSample: number;
}

export const DEFAULT_ZONE_OPTIONS: ZoneOptions = {
  thresholds: DEFAULT_ZONE_THRESHOLDS,
  minutesPerSample: 1,
};

/**
 * Merge new samples into a ledger; a sample id seen before keeps its latest value
 */
export function mergeLedger(current: SampleLedger | undefined, samples: Sample[]): SampleLedger {
  const ledger: SampleLedger = { ...current };
  for (const sample of samples) {
    ledger[sample.id] = sample.value;
  }
  return ledger;
}

/**
 * Recompute a discrete metric from its full ledger after adding samples
 */
export function accumulateDiscrete(current: StoredDiscrete | undefined, samples: Sample[]): StoredDiscrete {
  const ledger = mergeLedger(current?.samples, samples);
  const summary = summarizeSamples(Object.values(ledger));
  if (summary === null) {
    throw new Error("Cannot accumulate an empty sample set");
  }
  return { ...summary, samples: ledger };
}

/**
 * Heart rate additionally re-buckets the full ledger into zones
 */
export function accumulateHeartRate(
  current: StoredHeartRate | undefined,
  samples: Sample[],
  zoneOptions: ZoneOptions = DEFAULT_ZONE_OPTIONS
): StoredHeartRate {
  const discrete = accumulateDiscrete(current, samples);
  const zones = bucketZones(Object.values(discrete.samples), zoneOptions.thresholds, zoneOptions.minutesPerSample);
  return { ...discrete, zones };
}

/**
 * Apply one update with a single field-scoped merge
 */
export async function applyUpdate(
  store: DayRecordStore,
  date: string,
  update: DayRecordUpdate,
  zoneOptions: ZoneOptions = DEFAULT_ZONE_OPTIONS
): Promise<void> {
  switch (update.op) {
    case "replace": {
      if (update.field === "sleep") {
        const value = update.value;
        await store.mergeField(date, "sleep", () => value);
      } else {
        const value = update.value;
        await store.mergeField(date, update.field, () => value);
      }
      return;
    }
    case "accumulate": {
      const samples = update.samples;
      if (update.field === "heartRate") {
        await store.mergeField(date, "heartRate", (current) => accumulateHeartRate(current, samples, zoneOptions));
      } else {
        await store.mergeField(date, update.field, (current) => accumulateDiscrete(current, samples));
      }
      return;
    }
  }
}

function withoutLedger<T extends { samples: SampleLedger }>(value: T): Omit<T, "samples"> {
  const { samples: _samples, ...rest } = value;
  return rest;
}

/**
 * Project a stored day to its served shape: sample ledgers are dropped,
 * absent fields stay absent
 */
export function toDayRecord(stored: StoredDay): DayRecord {
  const record: DayRecord = {};
  if (stored.steps !== undefined) record.steps = stored.steps;
  if (stored.exerciseMinutes !== undefined) record.exerciseMinutes = stored.exerciseMinutes;
  if (stored.activeEnergy !== undefined) record.activeEnergy = stored.activeEnergy;
  if (stored.hrv !== undefined) record.hrv = withoutLedger(stored.hrv);
  if (stored.heartRate !== undefined) record.heartRate = withoutLedger(stored.heartRate);
  if (stored.respRate !== undefined) record.respRate = withoutLedger(stored.respRate);
  if (stored.sleep !== undefined) record.sleep = stored.sleep;
  if (stored.updatedAt !== undefined) record.updatedAt = stored.updatedAt;
  return record;
}
