/**
 * OCI Extension — Logging
 *
 * Structured subsystem logger with levels, pluggable transports, child
 * loggers, contextual fields and redaction. The default transport writes to
 * stderr: stdout is reserved for MCP protocol frames.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type OciLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type OciLogEntry = {
  timestamp: Date;
  level: OciLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  operation?: string;
  resourceId?: string;
  method?: string;
};

export type LogFormatter = (entry: OciLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: OciLogEntry): void;
}

export interface OciLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): OciLogger;
  withContext(context: LogContext): OciLogger;
  isLevelEnabled(level: OciLogLevel): boolean;
}

export type LogContext = {
  operation?: string;
  resourceId?: string;
  method?: string;
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<OciLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: OciLogLevel, minLevel: OciLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is OciLogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<OciLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const { colors = false, timestamps = true, includeMetadata = true } = options ?? {};

  return (entry: OciLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.operation) contextParts.push(`op=${entry.operation}`);
    if (entry.resourceId) contextParts.push(`resource=${entry.resourceId}`);
    if (entry.method) contextParts.push(`method=${entry.method}`);
    if (contextParts.length > 0) {
      const ctx = contextParts.join(" ");
      parts.push(colors ? `${COLORS.dim}(${ctx})${COLORS.reset}` : `(${ctx})`);
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

/** Writes formatted lines to a stream (stderr unless told otherwise). */
export class StreamTransport implements LogTransport {
  name = "stream";
  private formatter: LogFormatter;
  private stream: { write: (chunk: string) => unknown };

  constructor(options?: { formatter?: LogFormatter; stream?: { write: (chunk: string) => unknown } }) {
    this.stream = options?.stream ?? process.stderr;
    this.formatter = options?.formatter ?? createDefaultFormatter({ colors: process.stderr.isTTY === true });
  }

  write(entry: OciLogEntry): void {
    this.stream.write(`${this.formatter(entry)}\n`);
  }
}

/** Keeps entries in memory. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: OciLogEntry[] = [];

  write(entry: OciLogEntry): void {
    this.entries.push(entry);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export const DEFAULT_REDACT_PATTERNS = [
  "-----BEGIN [A-Z ]*PRIVATE KEY-----[\\s\\S]*?-----END [A-Z ]*PRIVATE KEY-----",
  "pass_phrase=\\S+",
];

export class OciLoggerImpl implements OciLogger {
  readonly subsystem: string;
  private level: OciLogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: OciLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new StreamTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? DEFAULT_REDACT_PATTERNS).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): OciLogger {
    return new OciLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): OciLogger {
    return new OciLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  isLevelEnabled(level: OciLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: OciLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: OciLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      operation: this.context.operation,
      resourceId: this.context.resourceId,
      method: this.context.method,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (error) {
        // Transport failures never reach the caller.
        process.stderr.write(`[oci] log transport ${transport.name} failed: ${String(error)}\n`);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createOciLogger(
  subsystem: string,
  options?: { level?: OciLogLevel; transports?: LogTransport[]; redactPatterns?: string[] },
): OciLogger {
  return new OciLoggerImpl({
    subsystem: `oci/${subsystem}`,
    level: options?.level ?? "info",
    transports: options?.transports,
    redactPatterns: options?.redactPatterns,
  });
}
