/**
 * Leveled logger. Every line goes to stderr: stdout carries the MCP stdio
 * transport and must only ever contain protocol messages.
 * - Development (NODE_ENV !== 'production'): Pretty, colored output
 * - Production: one JSON object per line
 */

// ANSI color codes for terminal output
const colors = {
  cyan: "\u001B[36m",
  dim: "\u001B[2m",
  gray: "\u001B[90m",
  red: "\u001B[31m",
  reset: "\u001B[0m",
  yellow: "\u001B[33m",
} as const;

export type LogContext = Record<string, unknown>;

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  requestId?: string;
  /** Sink for formatted lines; defaults to console.error */
  write?: (line: string) => void;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  requestId?: string;
  context?: LogContext;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly requestId?: string;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.LOG_LEVEL ?? "";
    this.level = options.level ?? (isLogLevel(envLevel) ? envLevel : "info");
    this.json = options.json ?? process.env.NODE_ENV === "production";
    this.requestId = options.requestId;
    this.write = options.write ?? ((line) => console.error(line));
  }

  /**
   * Create a child logger bound to a request id
   */
  child(requestId: string): Logger {
    return new Logger({ level: this.level, json: this.json, requestId, write: this.write });
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log("error", message, context, error);
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      requestId: this.requestId,
      context: context && Object.keys(context).length > 0 ? context : undefined,
      error: formatErrorEntry(error),
    };

    this.write(this.json ? JSON.stringify(entry) : formatPretty(entry));
  }
}

function formatErrorEntry(error: unknown): LogEntry["error"] {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    return { message: error.message, name: error.name, stack: error.stack };
  }
  return { message: typeof error === "string" ? error : JSON.stringify(error), name: "UnknownError" };
}

function formatPretty(entry: LogEntry): string {
  const levelColors: Record<LogLevel, string> = {
    debug: colors.gray,
    info: colors.cyan,
    warn: colors.yellow,
    error: colors.red,
  };

  const color = levelColors[entry.level];
  const timestamp = `${colors.dim}${entry.timestamp}${colors.reset}`;
  const level = `${color}${entry.level.toUpperCase().padEnd(5)}${colors.reset}`;
  const requestId = entry.requestId ? `${colors.dim}[${entry.requestId}]${colors.reset} ` : "";

  let output = `${timestamp} ${level} ${requestId}${entry.message}`;

  if (entry.context) {
    output += `\n  ${colors.dim}${JSON.stringify(entry.context)}${colors.reset}`;
  }

  if (entry.error) {
    output += `\n  ${colors.red}${entry.error.name}: ${entry.error.message}${colors.reset}`;
  }

  return output;
}

// Shared instance for code outside a request
export const logger = new Logger();
