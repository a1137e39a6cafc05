/**
 * Day record store on Upstash Redis.
 *
 * Each date is one hash (`health:<date>`), each metric one JSON-encoded hash
 * field. Merges are optimistic: read the field, run the updater, then commit
 * with a Lua compare-and-swap that only writes if the field still holds what
 * was read. A lost race re-reads and tries again.
 */

import { Redis } from "@upstash/redis";
import type { DayField, DayFieldValue, StoredDay } from "../types.js";
import { DAY_FIELDS } from "../types.js";
import { StoreConflictError, StoreUnavailableError } from "../utils/errors.js";
import { nowIso, systemClock, type Clock } from "../utils/dates.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { fieldSchemas, updatedAtSchema } from "./schema.js";
import type { DayRecordStore, FieldUpdater } from "./types.js";

/**
 * The subset of the Upstash client this store calls
 */
export interface RedisHashClient {
  hget(key: string, field: string): Promise<unknown>;
  hgetall(key: string): Promise<unknown>;
  eval(script: string, keys: string[], args: string[]): Promise<unknown>;
}

export interface RedisStoreOptions {
  keyPrefix?: string;
  maxAttempts?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * KEYS[1] hash key
 * ARGV[1] field, ARGV[2] "1" if the field was present when read,
 * ARGV[3] value read, ARGV[4] new value, ARGV[5] updatedAt
 */
export const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('HGET', KEYS[1], ARGV[1])
if ARGV[2] == '1' then
  if current ~= ARGV[3] then return 0 end
elseif current then
  return 0
end
redis.call('HSET', KEYS[1], ARGV[1], ARGV[4], 'updatedAt', ARGV[5])
return 1
`;

export const UPDATED_AT_FIELD = "updatedAt";

export function createUpstashClient(url: string, token: string): Redis {
  // Raw strings back from HGET are what the compare-and-swap compares against
  return new Redis({ url, token, automaticDeserialization: false });
}

export class RedisDayRecordStore implements DayRecordStore {
  private readonly keyPrefix: string;
  private readonly maxAttempts: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly client: RedisHashClient,
    options: RedisStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? "health:";
    this.maxAttempts = options.maxAttempts ?? 8;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
  }

  key(date: string): string {
    return `${this.keyPrefix}${date}`;
  }

  async getDay(date: string): Promise<StoredDay | null> {
    const key = this.key(date);
    const raw = await this.call("HGETALL", () => this.client.hgetall(key));
    const fields = toFieldMap(raw);
    if (fields === null || Object.keys(fields).length === 0) {
      return null;
    }

    const day: StoredDay = {};
    for (const field of DAY_FIELDS) {
      if (fields[field] === undefined) continue;
      assignField(day, field, this.decode(key, field, fields[field]));
    }

    const updatedAt = updatedAtSchema.safeParse(fields[UPDATED_AT_FIELD]);
    if (updatedAt.success) {
      day.updatedAt = updatedAt.data;
    }
    return day;
  }

  async mergeField<K extends DayField>(
    date: string,
    field: K,
    updater: FieldUpdater<K>
  ): Promise<DayFieldValue<K>> {
    const key = this.key(date);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const raw = await this.call("HGET", () => this.client.hget(key, field));
      const encoded = raw === null || raw === undefined ? null : encodeRaw(raw);
      const current = encoded === null ? undefined : this.decode(key, field, encoded);

      const next = updater(current);
      const args = [field, encoded === null ? "0" : "1", encoded ?? "", JSON.stringify(next), nowIso(this.clock)];
      const committed = await this.call("EVAL", () =>
        this.client.eval(COMPARE_AND_SET_SCRIPT, [key], args)
      );

      if (Number(committed) === 1) {
        if (attempt > 1) {
          this.log.debug("Field merge committed after retry", { key, field, attempt });
        }
        return next;
      }
      this.log.debug("Field changed during merge, retrying", { key, field, attempt });
    }

    throw new StoreConflictError(key, field, this.maxAttempts);
  }

  /**
   * Parse and validate one stored field. Unreadable values are treated as
   * absent (and logged) so a corrupt field never reaches readers as data.
   */
  private decode<K extends DayField>(key: string, field: K, raw: unknown): DayFieldValue<K> | undefined {
    let value: unknown = raw;
    if (typeof raw === "string") {
      try {
        value = JSON.parse(raw);
      } catch (error) {
        this.log.warn("Ignoring unparseable stored field", {
          key,
          field,
          error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
      }
    }

    const schema = fieldSchemas[field];
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      this.log.warn("Ignoring invalid stored field", { key, field, issues: parsed.error.issues });
      return undefined;
    }
    return parsed.data;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }
  }
}

function assignField<K extends DayField>(day: StoredDay, field: K, value: DayFieldValue<K> | undefined): void {
  if (value !== undefined) {
    day[field] = value;
  }
}

function encodeRaw(raw: unknown): string {
  return typeof raw === "string" ? raw : JSON.stringify(raw);
}

/**
 * HGETALL comes back as an object, or as a flat [field, value, ...] array
 * when the client skips deserialization
 */
export function toFieldMap(raw: unknown): Record<string, unknown> | null {
  if (raw === null || raw === undefined) return null;

  if (Array.isArray(raw)) {
    const map: Record<string, unknown> = {};
    for (let i = 0; i + 1 < raw.length; i += 2) {
      map[String(raw[i])] = raw[i + 1];
    }
    return map;
  }

  if (typeof raw === "object") {
    return Object.fromEntries(Object.entries(raw));
  }

  return null;
}
