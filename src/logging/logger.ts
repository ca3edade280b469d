/**
 * Logging Subsystem
 *
 * Structured, levelled logging for the HCL pipeline. Output goes to stderr
 * by default so that rendered HCL on stdout stays clean.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
};

export type LogFormatter = (entry: LogEntry) => string;

/** Anything text can be written to: `process.stderr`, a test buffer. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

export interface HclLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): HclLogger;
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
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
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
 * Default log formatter: `<timestamp> <LEVEL> [subsystem] message {meta}`.
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
}): LogFormatter {
  const { colors = process.stderr.isTTY ?? false, timestamps = true } = options ?? {};
  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Stream Transport
// =============================================================================

/**
 * Writes formatted entries, one per line, to a text sink (stderr by default).
 */
export class StreamTransport implements LogTransport {
  name = "stream";
  private formatter: LogFormatter;
  private sink: TextSink;

  constructor(options?: { formatter?: LogFormatter; sink?: TextSink }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.sink = options?.sink ?? process.stderr;
  }

  write(entry: LogEntry): void {
    this.sink.write(`${this.formatter(entry)}\n`);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class HclLoggerImpl implements HclLogger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];

  constructor(options: { subsystem: string; level?: LogLevel; transports?: LogTransport[] }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new StreamTransport()];
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

  child(name: string): HclLogger {
    return new HclLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
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
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createHclLogger(
  subsystem: string,
  options?: { level?: LogLevel; transports?: LogTransport[] },
): HclLogger {
  return new HclLoggerImpl({
    subsystem: `hclprint/${subsystem}`,
    level: options?.level,
    transports: options?.transports,
  });
}

let globalLogger: HclLogger | null = null;

/**
 * Get or create the process-wide logger, optionally as a named child.
 */
export function getHclLogger(subsystem?: string): HclLogger {
  if (!globalLogger) {
    globalLogger = new HclLoggerImpl({ subsystem: "hclprint" });
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setHclLogger(logger: HclLogger): void {
  globalLogger = logger;
}
