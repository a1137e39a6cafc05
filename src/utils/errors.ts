/**
 * Custom error types and helpers for better error messages
 */

/**
 * Raised for input that cannot be accepted: unknown metric names,
 * malformed dates, a cumulative batch with more than one total.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * The key-value store could not be reached or answered with an error.
 * Transient: callers may retry the whole request, the core never does.
 */
export class StoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    public readonly cause?: unknown
  ) {
    super(getStoreErrorMessage(operation, cause));
    this.name = "StoreUnavailableError";
  }
}

/**
 * A field-level compare-and-swap lost every attempt to concurrent writers.
 */
export class StoreConflictError extends Error {
  constructor(
    public readonly key: string,
    public readonly field: string,
    public readonly attempts: number
  ) {
    super(
      `Concurrent updates kept conflicting on ${key} (${field}) after ${attempts} attempts. ` +
        "Please resend this metric."
    );
    this.name = "StoreConflictError";
  }
}

function getStoreErrorMessage(operation: string, cause: unknown): string {
  const detail = cause instanceof Error ? cause.message : undefined;
  return detail
    ? `Health store unavailable during ${operation}: ${detail}`
    : `Health store unavailable during ${operation}. Please try again in a few minutes.`;
}

/**
 * Format an error for display to the user
 */
export function formatError(error: unknown): string {
  if (
    error instanceof ValidationError ||
    error instanceof StoreUnavailableError ||
    error instanceof StoreConflictError
  ) {
    return error.message;
  }

  if (error instanceof Error) {
    // Check for common network errors
    if (error.message.includes("fetch failed") || error.message.includes("ENOTFOUND")) {
      return "Network error: Unable to connect to the health store. Check your connection settings.";
    }
    if (error.message.includes("ETIMEDOUT") || error.message.includes("timeout")) {
      return "Request timed out: the health store took too long to respond. Please try again.";
    }
    return error.message;
  }

  return "An unknown error occurred";
}

/**
 * Get helpful context for "no data" situations
 */
export function getNoDataMessage(startDate: string, endDate?: string): string {
  const dateRange = endDate && endDate !== startDate
    ? `${startDate} to ${endDate}`
    : startDate;

  return [
    `No health data synced for ${dateRange}.`,
    "",
    "This could mean:",
    "• The capture shortcut hasn't run yet - it syncs the previous day each morning",
    "• The watch wasn't worn during this period",
    "• A metric request failed and needs to be resent",
  ].join("\n");
}
