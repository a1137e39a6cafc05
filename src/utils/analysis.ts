/**
 * Statistical helpers for health samples
 */

import { ZONE_NAMES, type DiscreteSummary, type HeartRateZones, type ZoneName } from "../types.js";

// ============================================================================
// Basic Statistics
// ============================================================================

/**
 * Calculate the mean of an array of numbers
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Calculate min value
 */
export function min(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.min(...values);
}

/**
 * Calculate max value
 */
export function max(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.max(...values);
}

/**
 * Round to a fixed number of decimals
 * e.g., round(39.756, 2) -> 39.76
 */
export function round(value: number, decimals = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Whole-number percentage, 0 when the whole is 0
 */
export function percentage(part: number, whole: number): number {
  if (whole === 0) return 0;
  return Math.round((part / whole) * 100);
}

// ============================================================================
// Sample Summaries
// ============================================================================

/**
 * Recompute avg/min/max over a complete sample set.
 * Returns null for an empty set so callers never store a zeroed summary.
 */
export function summarizeSamples(values: number[]): DiscreteSummary | null {
  if (values.length === 0) return null;
  return {
    avg: round(mean(values)),
    min: round(min(values)),
    max: round(max(values)),
    sampleCount: values.length,
  };
}

// ============================================================================
// Heart Rate Zones
// ============================================================================

export const DEFAULT_ZONE_THRESHOLDS: readonly number[] = [100, 120, 140, 160];

/**
 * Classify one heart-rate value against ascending zone boundaries
 * e.g., with [100, 120, 140, 160]: 95 -> rest, 150 -> hard, 170 -> max
 */
export function classifyZone(bpm: number, thresholds: readonly number[] = DEFAULT_ZONE_THRESHOLDS): ZoneName {
  for (let i = 0; i < thresholds.length; i++) {
    if (bpm < thresholds[i]) return ZONE_NAMES[i];
  }
  return "max";
}

export function emptyZones(): HeartRateZones {
  return { rest: 0, light: 0, moderate: 0, hard: 0, max: 0 };
}

/**
 * Minutes per zone, each sample contributing `minutesPerSample`
 */
export function bucketZones(
  values: number[],
  thresholds: readonly number[] = DEFAULT_ZONE_THRESHOLDS,
  minutesPerSample = 1
): HeartRateZones {
  const zones = emptyZones();
  for (const bpm of values) {
    zones[classifyZone(bpm, thresholds)] += minutesPerSample;
  }
  for (const name of ZONE_NAMES) {
    zones[name] = round(zones[name]);
  }
  return zones;
}
