#!/usr/bin/env node
/**
 * Health Recovery MCP Server
 *
 * Ingests daily metrics from a phone capture shortcut and exposes them to
 * agents through MCP tools.
 *
 * CLI:
 *   health-recovery-mcp          - Start the MCP server (stdio transport)
 *   health-recovery-mcp --http   - Start the HTTP server (MCP + ingest endpoint)
 */
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import { z } from "zod";

import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { createAppContext } from "./server.js";
import { Logger } from "./utils/logger.js";

// Read version from package.json (src/ when run from sources, dist/src/ when built)
const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const packageSchema = z.object({ version: z.string() });
  for (const candidate of [resolve(__dirname, "..", "package.json"), resolve(__dirname, "..", "..", "package.json")]) {
    if (!existsSync(candidate)) continue;
    const parsed = packageSchema.safeParse(JSON.parse(readFileSync(candidate, "utf-8")));
    if (parsed.success) return parsed.data.version;
  }
  return "0.0.0";
}

// ─────────────────────────────────────────────────────────────
// CLI
// ─────────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const useHttpTransport = args.includes("--http") || args.includes("-H");

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = loadConfigOrExit();
  const logger = new Logger({ level: config.logLevel, json: config.jsonLogs });
  const context = createAppContext(config, logger, readVersion());

  if (useHttpTransport) {
    // HTTP transport for remote deployment; also serves the ingest endpoint
    const { startHttpServer } = await import("./transports/http.js");
    await startHttpServer(context);
  } else {
    // Stdio transport for local MCP clients
    const server = context.createServer();
    await server.connect(new StdioServerTransport());
    logger.info("Health recovery MCP server running on stdio", { store: config.store.driver });
  }
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
