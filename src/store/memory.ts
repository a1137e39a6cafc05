/**
 * In-process day record store for local development and tests.
 *
 * A merge reads, runs the updater and writes without yielding to the event
 * loop in between, so it is atomic within one process.
 */

import type { DayField, DayFieldValue, StoredDay } from "../types.js";
import { nowIso, systemClock, type Clock } from "../utils/dates.js";
import type { DayRecordStore, FieldUpdater } from "./types.js";

export class MemoryDayRecordStore implements DayRecordStore {
  private days = new Map<string, StoredDay>();

  constructor(private readonly clock: Clock = systemClock) {}

  async getDay(date: string): Promise<StoredDay | null> {
    const day = this.days.get(date);
    return day ? structuredClone(day) : null;
  }

  async mergeField<K extends DayField>(
    date: string,
    field: K,
    updater: FieldUpdater<K>
  ): Promise<DayFieldValue<K>> {
    const day: StoredDay = this.days.get(date) ?? {};
    const current = day[field] ?? undefined;
    const next = updater(structuredClone(current));
    day[field] = structuredClone(next);
    day.updatedAt = nowIso(this.clock);
    this.days.set(date, day);
    return next;
  }
}
