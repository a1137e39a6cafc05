import type { DayField, DayFieldValue, StoredDay } from "../types.js";

/**
 * Pure function of a field's current value (undefined when absent).
 * May run more than once for one merge when a write races another.
 */
export type FieldUpdater<K extends DayField> = (current: DayFieldValue<K> | undefined) => DayFieldValue<K>;

/**
 * Per-date record store with field-scoped merges.
 *
 * Implementations must make `mergeField` atomic for its field: two merges of
 * different fields of one date both survive, and two merges of the same field
 * compose (neither updater's input is lost).
 */
export interface DayRecordStore {
  /** The stored day, or null when nothing was ever written for it */
  getDay(date: string): Promise<StoredDay | null>;

  mergeField<K extends DayField>(date: string, field: K, updater: FieldUpdater<K>): Promise<DayFieldValue<K>>;
}
