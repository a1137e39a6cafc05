/**
 * Wiring shared by both transports: store, aggregator, ingest service and a
 * factory for MCP servers with the tools registered.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppConfig } from "./config.js";
import { Aggregator } from "./aggregator.js";
import { IngestService } from "./ingest/index.js";
import { MemoryDayRecordStore } from "./store/memory.js";
import { createUpstashClient, RedisDayRecordStore } from "./store/redis.js";
import type { DayRecordStore } from "./store/types.js";
import { registerTools } from "./tools/index.js";
import { systemClock, type Clock } from "./utils/dates.js";
import type { Logger } from "./utils/logger.js";

export const SERVER_NAME = "health-recovery-mcp";

export interface AppContext {
  config: AppConfig;
  store: DayRecordStore;
  aggregator: Aggregator;
  ingest: IngestService;
  clock: Clock;
  logger: Logger;
  version: string;
  createServer: () => McpServer;
}

export function createStore(config: AppConfig, logger: Logger, clock: Clock = systemClock): DayRecordStore {
  if (config.store.driver === "redis") {
    return new RedisDayRecordStore(createUpstashClient(config.store.url, config.store.token), {
      keyPrefix: config.store.keyPrefix,
      maxAttempts: config.store.casMaxAttempts,
      clock,
      logger,
    });
  }
  logger.warn("Using in-memory store; data is lost when the process exits");
  return new MemoryDayRecordStore(clock);
}

export function createAppContext(
  config: AppConfig,
  logger: Logger,
  version: string,
  overrides: { store?: DayRecordStore; clock?: Clock } = {}
): AppContext {
  const clock = overrides.clock ?? systemClock;
  const store = overrides.store ?? createStore(config, logger, clock);

  const aggregator = new Aggregator(store, {
    baselineLookbackDays: config.baseline.lookbackDays,
    baselineMinDays: config.baseline.minDays,
    weeklyRoutine: config.weeklyRoutine,
  });

  const ingest = new IngestService(store, {
    zones: config.zones,
    sleepSampleMinutes: config.sleepSampleMinutes,
    timeZone: config.timeZone,
    clock,
    logger,
  });

  const createServer = () => {
    const server = new McpServer({ name: SERVER_NAME, version });
    registerTools(server, aggregator, {
      timeZone: config.timeZone,
      clock,
      maxTrendDays: config.maxTrendDays,
    });
    return server;
  };

  return { config, store, aggregator, ingest, clock, logger, version, createServer };
}
