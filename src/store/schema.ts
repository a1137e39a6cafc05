/**
 * Zod schemas for values read back from the store
 */

import { z } from "zod";
import type { DayField, DayFieldValue, SleepSummary, StoredDiscrete, StoredHeartRate } from "../types.js";

const nonNegative = z.number().finite().nonnegative();

const discreteSchema: z.ZodType<StoredDiscrete> = z.object({
  avg: z.number().finite(),
  min: z.number().finite(),
  max: z.number().finite(),
  sampleCount: z.number().int().nonnegative(),
  samples: z.record(z.number().finite()),
});

const heartRateSchema: z.ZodType<StoredHeartRate> = z.object({
  avg: z.number().finite(),
  min: z.number().finite(),
  max: z.number().finite(),
  sampleCount: z.number().int().nonnegative(),
  samples: z.record(z.number().finite()),
  zones: z.object({
    rest: nonNegative,
    light: nonNegative,
    moderate: nonNegative,
    hard: nonNegative,
    max: nonNegative,
  }),
});

const sleepSchema: z.ZodType<SleepSummary> = z.object({
  totalMinutes: nonNegative,
  deepMinutes: nonNegative,
  remMinutes: nonNegative,
  lightMinutes: nonNegative,
  awakeMinutes: nonNegative,
  fragmentationCount: z.number().int().nonnegative(),
});

export const fieldSchemas: { [K in DayField]: z.ZodType<DayFieldValue<K>> } = {
  steps: nonNegative,
  exerciseMinutes: nonNegative,
  activeEnergy: nonNegative,
  hrv: discreteSchema,
  heartRate: heartRateSchema,
  respRate: discreteSchema,
  sleep: sleepSchema,
};

export const updatedAtSchema = z.string().datetime({ offset: true });
