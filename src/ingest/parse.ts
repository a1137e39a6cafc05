/**
 * Parsing of form-encoded payloads from the capture shortcut.
 *
 * Each metric arrives as one form field whose value is a newline-separated
 * list. Numeric metrics send `<value>` or `<ISO timestamp>,<value>` per line;
 * sleep sends `<stage>,<minutes>`, `<stage>,<start ISO>,<end ISO>` or a bare
 * `<stage>` label per sample.
 */

import { DateTime } from "luxon";
import { normalizeTimestamp } from "../utils/dates.js";

export type SleepStage = "deep" | "rem" | "light" | "awake";

export interface RawSample {
  value: number;
  timestamp?: string;
}

export interface SleepInterval {
  stage: SleepStage;
  minutes: number;
  /** Present when the line carried start/end timestamps */
  start?: string;
}

export type LineResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Split a raw field value into trimmed, non-empty lines.
 * Shortcuts may double-encode values and mix \r\n, \r and \n.
 */
export function parseLines(raw: string | string[] | undefined): string[] {
  if (raw === undefined) return [];
  const joined = Array.isArray(raw) ? raw.join("\n") : raw;
  return safeDecode(joined)
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Not percent-encoded (a literal "%" in the text); use as received
    return value;
  }
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/**
 * Parse a plain decimal number
 * e.g., "42.5" -> 42.5, "42bpm" -> null, "0x10" -> null, "1e3" -> null
 */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse `<value>` or `<timestamp>,<value>`
 */
export function parseSampleLine(line: string): LineResult<RawSample> {
  const parts = line.split(",").map((part) => part.trim());

  if (parts.length === 1) {
    const value = parseNumber(parts[0]);
    return value === null
      ? { ok: false, reason: "not a number" }
      : { ok: true, value: { value } };
  }

  if (parts.length === 2) {
    const timestamp = normalizeTimestamp(parts[0]);
    if (timestamp === null) return { ok: false, reason: "invalid timestamp" };
    const value = parseNumber(parts[1]);
    if (value === null) return { ok: false, reason: "not a number" };
    return { ok: true, value: { value, timestamp } };
  }

  return { ok: false, reason: "expected <value> or <timestamp>,<value>" };
}

/**
 * Map a stage label to its canonical stage
 * e.g., "Core" -> light, "Wake" -> awake
 */
export function parseSleepStage(label: string): SleepStage | null {
  const normalized = label.trim().toLowerCase();
  if (normalized.includes("rem")) return "rem";
  if (normalized.includes("deep")) return "deep";
  if (normalized.includes("core") || normalized.includes("light") || normalized === "asleep") return "light";
  if (normalized.includes("awake") || normalized.includes("wake")) return "awake";
  return null;
}

/**
 * Parse `<stage>,<minutes>`, `<stage>,<start>,<end>` or a bare `<stage>`.
 * A bare label is one stage sample worth `bareLabelMinutes`.
 */
export function parseSleepLine(line: string, bareLabelMinutes = 1): LineResult<SleepInterval> {
  const parts = line.split(",").map((part) => part.trim());
  const stage = parseSleepStage(parts[0]);
  if (stage === null) return { ok: false, reason: `unknown sleep stage "${parts[0]}"` };

  if (parts.length === 1) {
    return { ok: true, value: { stage, minutes: bareLabelMinutes } };
  }

  if (parts.length === 2) {
    const minutes = parseNumber(parts[1]);
    if (minutes === null || minutes < 0) return { ok: false, reason: "invalid duration" };
    return { ok: true, value: { stage, minutes } };
  }

  if (parts.length === 3) {
    const start = DateTime.fromISO(parts[1], { setZone: true });
    const end = DateTime.fromISO(parts[2], { setZone: true });
    if (!start.isValid || !end.isValid) return { ok: false, reason: "invalid timestamp" };
    const minutes = end.diff(start, "minutes").minutes;
    if (minutes < 0) return { ok: false, reason: "interval ends before it starts" };
    const startIso = start.toUTC().toISO();
    return { ok: true, value: { stage, minutes, ...(startIso === null ? {} : { start: startIso }) } };
  }

  return { ok: false, reason: "expected <stage>,<minutes> or <stage>,<start>,<end>" };
}
