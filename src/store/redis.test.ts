import { describe, it, expect, vi, beforeEach } from "vitest";
import { RedisDayRecordStore, toFieldMap } from "./redis.js";
import { accumulateDiscrete } from "./updates.js";
import { StoreConflictError, StoreUnavailableError } from "../utils/errors.js";
import { Logger } from "../utils/logger.js";
import { FakeRedis } from "../../tests/helpers/fakeRedis.js";

const clock = () => new Date("2024-01-11T08:00:00.000Z");
const DATE = "2024-01-10";
const KEY = "health:2024-01-10";

describe("RedisDayRecordStore", () => {
  let redis: FakeRedis;
  let write: ReturnType<typeof vi.fn>;
  let store: RedisDayRecordStore;

  beforeEach(() => {
    redis = new FakeRedis();
    write = vi.fn();
    store = new RedisDayRecordStore(redis, {
      clock,
      maxAttempts: 3,
      logger: new Logger({ level: "warn", json: true, write }),
    });
  });

  it("keys each date under the prefix", () => {
    expect(store.key(DATE)).toBe(KEY);
    expect(new RedisDayRecordStore(redis, { keyPrefix: "test:" }).key(DATE)).toBe("test:2024-01-10");
  });

  it("returns null for a date never written", async () => {
    expect(await store.getDay(DATE)).toBeNull();
  });

  it("writes each metric as a JSON hash field with updatedAt", async () => {
    await store.mergeField(DATE, "steps", () => 9142);

    expect(redis.hashes.get(KEY)?.get("steps")).toBe("9142");
    expect(redis.hashes.get(KEY)?.get("updatedAt")).toBe("2024-01-11T08:00:00.000Z");
    expect(await store.getDay(DATE)).toEqual({ steps: 9142, updatedAt: "2024-01-11T08:00:00.000Z" });
  });

  it("merges different fields of one date independently", async () => {
    await Promise.all([
      store.mergeField(DATE, "steps", () => 9142),
      store.mergeField(DATE, "hrv", (current) => accumulateDiscrete(current, [{ id: "a", value: 40 }])),
    ]);
    const day = await store.getDay(DATE);
    expect(day?.steps).toBe(9142);
    expect(day?.hrv?.avg).toBe(40);
  });

  it("retries when the field changes between read and write", async () => {
    let injected = false;
    redis.beforeEval = () => {
      if (injected) return;
      injected = true;
      redis.set(KEY, "hrv", JSON.stringify(accumulateDiscrete(undefined, [{ id: "other", value: 50 }])));
    };

    const result = await store.mergeField(DATE, "hrv", (current) =>
      accumulateDiscrete(current, [{ id: "mine", value: 40 }])
    );

    expect(redis.eval).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ avg: 45, min: 40, max: 50, sampleCount: 2, samples: { other: 50, mine: 40 } });
  });

  it("throws StoreConflictError when every attempt loses", async () => {
    let counter = 0;
    redis.beforeEval = () => {
      counter++;
      redis.set(KEY, "steps", String(counter));
    };

    await expect(store.mergeField(DATE, "steps", () => 9142)).rejects.toThrow(StoreConflictError);
    expect(redis.eval).toHaveBeenCalledTimes(3);
  });

  it("treats an unparseable stored field as absent", async () => {
    redis.set(KEY, "hrv", "{not json");
    redis.set(KEY, "steps", "9142");

    expect(await store.getDay(DATE)).toEqual({ steps: 9142 });
    expect(JSON.parse(write.mock.calls[0][0]).message).toBe("Ignoring unparseable stored field");
  });

  it("treats a field that fails validation as absent", async () => {
    redis.set(KEY, "steps", "-3");

    expect(await store.getDay(DATE)).toEqual({});
    expect(JSON.parse(write.mock.calls[0][0]).message).toBe("Ignoring invalid stored field");
  });

  it("overwrites a corrupt field on the next merge", async () => {
    redis.set(KEY, "hrv", "{not json");

    await store.mergeField(DATE, "hrv", (current) => accumulateDiscrete(current, [{ id: "a", value: 40 }]));

    expect((await store.getDay(DATE))?.hrv).toEqual({ avg: 40, min: 40, max: 40, sampleCount: 1, samples: { a: 40 } });
  });

  it("reads HGETALL replies in flat array form", async () => {
    redis.hgetall.mockResolvedValueOnce(["steps", "9142", "updatedAt", "2024-01-11T08:00:00.000Z"]);
    expect(await store.getDay(DATE)).toEqual({ steps: 9142, updatedAt: "2024-01-11T08:00:00.000Z" });
  });

  it("wraps client failures in StoreUnavailableError", async () => {
    redis.hgetall.mockRejectedValueOnce(new Error("connection refused"));
    await expect(store.getDay(DATE)).rejects.toThrow(StoreUnavailableError);

    redis.hget.mockRejectedValueOnce(new Error("connection refused"));
    await expect(store.mergeField(DATE, "steps", () => 1)).rejects.toThrow(
      "Health store unavailable during HGET: connection refused"
    );
  });
});

describe("toFieldMap", () => {
  it("accepts objects and flat arrays", () => {
    expect(toFieldMap({ steps: "1" })).toEqual({ steps: "1" });
    expect(toFieldMap(["steps", "1", "sleep"])).toEqual({ steps: "1" });
  });

  it("returns null for anything else", () => {
    expect(toFieldMap(null)).toBeNull();
    expect(toFieldMap("steps")).toBeNull();
  });
});
