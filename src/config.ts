/**
 * Configuration read from environment variables (loaded from .env by the
 * entry point). Every value is validated once at startup; a bad value fails
 * fast with the variable's name in the message.
 */

import { z } from "zod";
import { isValidZone } from "./utils/dates.js";
import { LOG_LEVEL_NAMES } from "./utils/logger.js";

// =============================================================================
// HELPERS
// =============================================================================

/**
 * dotenv loads `KEY=` as an empty string; treat it the same as an unset variable
 */
function withoutBlankValues(env: unknown): unknown {
  if (typeof env !== "object" || env === null) return env;
  return Object.fromEntries(
    Object.entries(env).filter(([, value]) => !(typeof value === "string" && value.trim() === ""))
  );
}

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

function intFromEnv(defaultValue: number, minValue: number, maxValue: number) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < minValue || parsed > maxValue) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${value}" is not an integer between ${minValue} and ${maxValue}`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

/**
 * Parse "100,120,140,160" into four strictly ascending boundaries
 */
export function parseZoneThresholds(value: string): number[] | null {
  const parts = value.split(",").map((part) => Number(part.trim()));
  if (parts.length !== 4 || parts.some((part) => !Number.isFinite(part) || part <= 0)) {
    return null;
  }
  for (let i = 1; i < parts.length; i++) {
    if (parts[i] <= parts[i - 1]) return null;
  }
  return parts;
}

/**
 * Parse "strength:4,yoga:7" into { strength: 4, yoga: 7 }.
 * Malformed items are skipped; the routine is context for the agent, not math.
 */
export function parseWeeklyRoutine(value: string | undefined): Record<string, number> | null {
  if (!value) return null;
  const routine: Record<string, number> = {};
  for (const item of value.split(",")) {
    const separator = item.indexOf(":");
    if (separator === -1) continue;
    const name = item.slice(0, separator).trim();
    const days = Number(item.slice(separator + 1).trim());
    if (name !== "" && Number.isInteger(days)) {
      routine[name] = days;
    }
  }
  return Object.keys(routine).length > 0 ? routine : null;
}

// =============================================================================
// SCHEMA
// =============================================================================

const envSchema = z.preprocess(
  withoutBlankValues,
  z
    .object({
      PORT: intFromEnv(3000, 1, 65535),
      API_KEY: optionalSecret,
      MCP_SECRET: optionalSecret,
      STORE_DRIVER: z.enum(["redis", "memory"]).default("redis"),
      UPSTASH_REDIS_REST_URL: z.string().url().optional(),
      UPSTASH_REDIS_REST_TOKEN: optionalSecret,
      STORE_KEY_PREFIX: z.string().min(1).default("health:"),
      STORE_CAS_MAX_ATTEMPTS: intFromEnv(8, 1, 100),
      TZ_NAME: z.string().optional(),
      HR_ZONE_THRESHOLDS: z
        .string()
        .default("100,120,140,160")
        .transform((value, ctx) => {
          const thresholds = parseZoneThresholds(value);
          if (thresholds === null) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `"${value}" must be four ascending positive numbers, e.g. 100,120,140,160`,
            });
            return z.NEVER;
          }
          return thresholds;
        }),
      HR_SAMPLE_MINUTES: z.coerce.number().positive().max(60).default(1),
      SLEEP_SAMPLE_MINUTES: z.coerce.number().positive().max(60).default(1),
      BASELINE_LOOKBACK_DAYS: intFromEnv(14, 1, 365),
      BASELINE_MIN_DAYS: intFromEnv(5, 1, 365),
      MAX_TREND_DAYS: intFromEnv(90, 1, 366),
      EXERCISE_DAYS_PER_WEEK: z.string().optional(),
      LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).default("info"),
      NODE_ENV: z.string().optional(),
    })
    .superRefine((env, ctx) => {
      if (env.STORE_DRIVER === "redis" && (!env.UPSTASH_REDIS_REST_URL || !env.UPSTASH_REDIS_REST_TOKEN)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["UPSTASH_REDIS_REST_URL"],
          message: "UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN are required when STORE_DRIVER=redis",
        });
      }
      if (env.BASELINE_MIN_DAYS > env.BASELINE_LOOKBACK_DAYS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["BASELINE_MIN_DAYS"],
          message: "must not exceed BASELINE_LOOKBACK_DAYS",
        });
      }
      if (env.TZ_NAME !== undefined && !isValidZone(env.TZ_NAME)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["TZ_NAME"],
          message: `"${env.TZ_NAME}" is not a known IANA time zone`,
        });
      }
    })
);

// =============================================================================
// TYPES
// =============================================================================

export type StoreConfig =
  | { driver: "memory"; keyPrefix: string; casMaxAttempts: number }
  | { driver: "redis"; url: string; token: string; keyPrefix: string; casMaxAttempts: number };

export interface AppConfig {
  port: number;
  apiKey?: string;
  mcpSecret?: string;
  store: StoreConfig;
  /** IANA zone used only to derive default dates from the clock */
  timeZone: string;
  zones: {
    thresholds: number[];
    minutesPerSample: number;
  };
  /** Minutes credited to a sleep line that carries only a stage label */
  sleepSampleMinutes: number;
  baseline: {
    lookbackDays: number;
    minDays: number;
  };
  maxTrendDays: number;
  weeklyRoutine: Record<string, number> | null;
  logLevel: (typeof LOG_LEVEL_NAMES)[number];
  jsonLogs: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

// =============================================================================
// LOADING
// =============================================================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const common = { keyPrefix: parsed.STORE_KEY_PREFIX, casMaxAttempts: parsed.STORE_CAS_MAX_ATTEMPTS };
  const store: StoreConfig =
    parsed.STORE_DRIVER === "redis" && parsed.UPSTASH_REDIS_REST_URL && parsed.UPSTASH_REDIS_REST_TOKEN
      ? { driver: "redis", url: parsed.UPSTASH_REDIS_REST_URL, token: parsed.UPSTASH_REDIS_REST_TOKEN, ...common }
      : { driver: "memory", ...common };

  return {
    port: parsed.PORT,
    apiKey: parsed.API_KEY,
    mcpSecret: parsed.MCP_SECRET,
    store,
    timeZone: parsed.TZ_NAME ?? "UTC",
    zones: {
      thresholds: parsed.HR_ZONE_THRESHOLDS,
      minutesPerSample: parsed.HR_SAMPLE_MINUTES,
    },
    sleepSampleMinutes: parsed.SLEEP_SAMPLE_MINUTES,
    baseline: {
      lookbackDays: parsed.BASELINE_LOOKBACK_DAYS,
      minDays: parsed.BASELINE_MIN_DAYS,
    },
    maxTrendDays: parsed.MAX_TREND_DAYS,
    weeklyRoutine: parseWeeklyRoutine(parsed.EXERCISE_DAYS_PER_WEEK),
    logLevel: parsed.LOG_LEVEL,
    jsonLogs: parsed.NODE_ENV === "production",
  };
}
