/**
 * Logging Subsystem
 *
 * Structured, levelled logging with subsystem names, bound context
 * (category, region, account role, resource address) and pluggable
 * transports.
 */

import { createWriteStream, type WriteStream } from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Context fields attached to every entry a logger writes
 */
export type LogContext = {
  category?: string;
  region?: string;
  role?: string;
  address?: string;
};

/**
 * Log entry structure
 */
export type LogEntry = LogContext & {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
};

/**
 * Log formatter function type
 */
export type LogFormatter = (entry: LogEntry) => string;

/**
 * Log transport interface
 */
export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
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

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Default log formatter with color support
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stdout.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }

    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.category) contextParts.push(`category=${entry.category}`);
    if (entry.role) contextParts.push(`role=${entry.role}`);
    if (entry.region) contextParts.push(`region=${entry.region}`);
    if (entry.address) contextParts.push(`address=${entry.address}`);
    if (contextParts.length > 0) {
      parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Console Transport
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

// =============================================================================
// File Transport
// =============================================================================

/**
 * Buffered, append-only file transport.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private stream: WriteStream | null = null;
  private failed = false;

  constructor(options: { filePath: string; formatter?: LogFormatter; bufferSize?: number }) {
    this.filePath = options.filePath;
    this.formatter =
      options.formatter ?? createDefaultFormatter({ colors: false, timestamps: true, includeMetadata: true });
    this.bufferSize = options.bufferSize ?? 100;
  }

  write(entry: LogEntry): void {
    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) {
      this.drain();
    }
  }

  async flush(): Promise<void> {
    this.drain();
  }

  async close(): Promise<void> {
    this.drain();
    const stream = this.stream;
    this.stream = null;
    if (!stream || this.failed) return;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  private drain(): void {
    if (this.buffer.length === 0) return;
    if (this.failed) {
      this.buffer = [];
      return;
    }
    this.stream ??= this.open();
    this.stream.write(this.buffer.join("\n") + "\n");
    this.buffer = [];
  }

  private open(): WriteStream {
    const stream = createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (err) => {
      if (this.failed) return;
      this.failed = true;
      console.error(`Log file ${this.filePath} could not be written: ${err.message}`);
    });
    return stream;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

class SubsystemLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
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

  child(name: string): Logger {
    return new SubsystemLogger({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): Logger {
    return new SubsystemLogger({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      ...this.context,
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        console.error(`Log transport ${transport.name} failed:`, err);
      }
    }
  }
}

/**
 * Create a root logger.
 */
export function createLogger(options: {
  subsystem?: string;
  level?: LogLevel;
  transports?: LogTransport[];
} = {}): Logger {
  return new SubsystemLogger({
    subsystem: options.subsystem ?? "guardduty-sync",
    level: options.level,
    transports: options.transports,
  });
}

/**
 * Flush and close every transport that supports it.
 */
export async function closeTransports(transports: LogTransport[]): Promise<void> {
  for (const transport of transports) {
    await transport.flush?.();
    await transport.close?.();
  }
}
