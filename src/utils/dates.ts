/**
 * Calendar date helpers. Dates are plain YYYY-MM-DD strings throughout;
 * arithmetic happens in UTC so a day is always 24 hours.
 */

import { DateTime } from "luxon";
import { ValidationError } from "./errors.js";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function toDateString(dt: DateTime, source: string): string {
  const iso = dt.toISODate();
  if (iso === null) {
    throw new ValidationError(`Invalid date "${source}": ${dt.invalidReason ?? "unparseable"}`);
  }
  return iso;
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD format
 * e.g., "2024-02-30" -> false
 */
export function isIsoDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value) && DateTime.fromISO(value, { zone: "utc" }).isValid;
}

/**
 * Validate a YYYY-MM-DD string, throwing a ValidationError otherwise
 */
export function assertIsoDate(value: string, field = "date"): string {
  if (!isIsoDate(value)) {
    throw new ValidationError(`Invalid ${field} "${value}": expected a calendar date in YYYY-MM-DD format`, field);
  }
  return value;
}

/**
 * Add days to a YYYY-MM-DD date string
 */
export function addDays(date: string, days: number): string {
  return toDateString(DateTime.fromISO(date, { zone: "utc" }).plus({ days }), date);
}

/**
 * List `days` consecutive dates ending at `endDate`, oldest first
 * e.g., ("2024-01-12", 3) -> ["2024-01-10", "2024-01-11", "2024-01-12"]
 */
export function dateRange(endDate: string, days: number): string[] {
  const dates: string[] = [];
  for (let offset = days - 1; offset >= 0; offset--) {
    dates.push(addDays(endDate, -offset));
  }
  return dates;
}

/**
 * The calendar date `daysAgo` days before the clock's current date in `zone`
 */
export function localDate(zone: string, clock: Clock = systemClock, daysAgo = 0): string {
  const now = DateTime.fromJSDate(clock(), { zone });
  return toDateString(now.minus({ days: daysAgo }), zone);
}

/**
 * Parse an ISO 8601 timestamp and normalize it to UTC, or return null
 * e.g., "2024-01-10T07:30:00-05:00" -> "2024-01-10T12:30:00.000Z"
 */
export function normalizeTimestamp(value: string): string | null {
  const dt = DateTime.fromISO(value, { setZone: true });
  if (!dt.isValid) return null;
  return dt.toUTC().toISO();
}

/**
 * Check that an IANA zone name is known to the runtime
 */
export function isValidZone(zone: string): boolean {
  return DateTime.local().setZone(zone).isValid;
}

/**
 * Current instant as an ISO timestamp
 */
export function nowIso(clock: Clock = systemClock): string {
  return clock().toISOString();
}
