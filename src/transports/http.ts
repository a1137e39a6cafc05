/**
 * HTTP Transport
 *
 * Routes:
 *   GET  /health  - liveness (no auth)
 *   GET  /ingest  - describes the ingest endpoint
 *   POST /ingest  - form-encoded metrics from the capture shortcut (API_KEY bearer)
 *   POST /, /mcp  - MCP Streamable HTTP, stateless (MCP_SECRET bearer or ?key=)
 *
 * Stateless: every MCP request gets its own server and transport, so any
 * number of instances can run behind a load balancer. All shared state lives
 * in the store.
 */
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { randomUUID, timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { z } from "zod";
import type { AppContext } from "../server.js";
import { SERVER_NAME } from "../server.js";
import { ingestStatusCode, type IngestService } from "../ingest/index.js";
import { isIsoDate } from "../utils/dates.js";
import { formatError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

// ─────────────────────────────────────────────────────────────
// Request logging
// ─────────────────────────────────────────────────────────────

const requestLoggers = new WeakMap<Request, Logger>();

export function getRequestLogger(req: Request, fallback: Logger): Logger {
  return requestLoggers.get(req) ?? fallback;
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = randomUUID();
    const log = logger.child(requestId);
    const startTime = Date.now();
    requestLoggers.set(req, log);
    res.setHeader("X-Request-Id", requestId);

    log.debug("Incoming request", { method: req.method, path: req.path });
    res.on("finish", () => {
      const context = { method: req.method, path: req.path, statusCode: res.statusCode, durationMs: Date.now() - startTime };
      if (res.statusCode >= 500) log.error("Request completed", undefined, context);
      else if (res.statusCode >= 400) log.warn("Request completed", context);
      else log.info("Request completed", context);
    });
    next();
  };
}

// ─────────────────────────────────────────────────────────────
// Authentication
// ─────────────────────────────────────────────────────────────

function tokensMatch(provided: string, expected: string): boolean {
  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);
  return providedBuf.length === expectedBuf.length && timingSafeEqual(providedBuf, expectedBuf);
}

/**
 * Bearer token check. No secret configured means the route is open.
 */
export function requireBearer(secret: string | undefined, options: { allowQueryKey?: boolean } = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!secret) return next();

    const authHeader = req.headers.authorization;
    const [scheme, token] = authHeader ? authHeader.split(" ") : [];
    const queryKey = options.allowQueryKey && typeof req.query.key === "string" ? req.query.key : undefined;

    if ((scheme === "Bearer" && token !== undefined && tokensMatch(token, secret)) || (queryKey !== undefined && tokensMatch(queryKey, secret))) {
      next();
      return;
    }

    res.status(401).json({ error: authHeader || queryKey ? "Invalid credentials" : "Missing Authorization header" });
  };
}

// ─────────────────────────────────────────────────────────────
// Ingest
// ─────────────────────────────────────────────────────────────

const formBodySchema = z.record(z.union([z.string(), z.array(z.string())]));

export const INGEST_DESCRIPTION = {
  endpoint: "ingest",
  method: "POST",
  contentType: "application/x-www-form-urlencoded",
  description:
    "Receives health data from the capture shortcut. One form field per metric, newline-separated values. " +
    "Optional date=YYYY-MM-DD (defaults to yesterday).",
  metrics: {
    cumulative: ["steps", "exercise", "activeEnergy"],
    discrete: ["hrv", "heartRate", "respRate"],
    sleep: ["sleep"],
  },
} as const;

export function createIngestHandler(ingest: IngestService, logger: Logger): RequestHandler {
  return async (req, res) => {
    const log = getRequestLogger(req, logger);
    const parsed = formBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      log.warn("Invalid ingest body", { issues: parsed.error.issues });
      res.status(400).json({ ok: false, error: "Expected a form-encoded body of metric fields" });
      return;
    }

    const fields = parsed.data;
    const requestedDate = fields.date;
    if (requestedDate !== undefined && (typeof requestedDate !== "string" || !isIsoDate(requestedDate))) {
      res.status(400).json({ ok: false, error: "Invalid date: expected YYYY-MM-DD" });
      return;
    }

    const date = requestedDate ?? ingest.defaultDate();
    try {
      const result = await ingest.ingest(fields, date, log);
      const status = ingestStatusCode(result);
      res.status(status).json({ ok: status === 200, ...result });
    } catch (error) {
      log.error("Ingest failed", error, { date });
      res.status(500).json({ ok: false, date, error: formatError(error) });
    }
  };
}

// ─────────────────────────────────────────────────────────────
// MCP
// ─────────────────────────────────────────────────────────────

function createMcpHandler(context: AppContext): RequestHandler {
  return async (req, res) => {
    const log = getRequestLogger(req, context.logger);
    const server = context.createServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        log.warn("Failed to close MCP transport", { error: formatError(error) });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error("MCP request error", error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  };
}

const methodNotAllowed: RequestHandler = (_req, res) => {
  res.status(405).json({
    jsonrpc: "2.0",
    error: { code: -32000, message: "Method not allowed: this server is stateless, use POST" },
    id: null,
  });
};

// ─────────────────────────────────────────────────────────────
// HTTP Server
// ─────────────────────────────────────────────────────────────

export function createHttpApp(context: AppContext): express.Express {
  const { config, logger } = context;
  const app = express();

  // Behind a platform load balancer
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(requestLogger(logger));

  // CORS for remote clients
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type, Authorization, Mcp-Session-Id");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // Health check endpoint (no auth required)
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", service: SERVER_NAME, version: context.version });
  });

  // ── Ingest ───────────────────────────────────────────────

  app.get("/ingest", (_req, res) => {
    res.json(INGEST_DESCRIPTION);
  });
  app.post(
    "/ingest",
    requireBearer(config.apiKey),
    express.urlencoded({ extended: false, limit: "5mb" }),
    createIngestHandler(context.ingest, logger)
  );

  // ── MCP Endpoint ─────────────────────────────────────────

  const mcpAuth = requireBearer(config.mcpSecret, { allowQueryKey: true });
  const mcpHandler = createMcpHandler(context);
  for (const path of ["/", "/mcp"]) {
    app.post(path, mcpAuth, express.json({ limit: "1mb" }), mcpHandler);
    app.get(path, mcpAuth, methodNotAllowed);
    app.delete(path, mcpAuth, methodNotAllowed);
  }

  return app;
}

export function startHttpServer(context: AppContext): Promise<Server> {
  const { config, logger } = context;
  const app = createHttpApp(context);

  if (!config.apiKey || !config.mcpSecret) {
    logger.warn("Authentication not fully configured", {
      ingestProtected: Boolean(config.apiKey),
      mcpProtected: Boolean(config.mcpSecret),
    });
  }

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, "0.0.0.0", (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info("HTTP server listening", {
        port: config.port,
        mcp: "POST / (or /mcp)",
        ingest: "POST /ingest",
        health: "GET /health",
      });
      resolve(server);
    });
  });
}
