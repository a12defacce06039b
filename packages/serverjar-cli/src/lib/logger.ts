// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;

export type LogThreshold = (typeof LOG_LEVEL_NAMES)[number];

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

/**
 * Destination for formatted lines. Split by stream so warnings never end up
 * mixed into command output on stdout.
 */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface LoggerOptions {
  level: LogThreshold;
  json: boolean;
  sink?: LogSink;
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const consoleSink: LogSink = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * info/debug go to stdout, warn/error to stderr. JSON mode emits one
 * object per line for log collectors.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  function formatMessage(level: LogLevel, message: string, meta: LogMeta): string {
    const timestamp = now().toISOString();

    if (options.json) {
      const entry: LogEntry = {
        timestamp,
        level,
        message,
        ...meta,
      };
      return JSON.stringify(entry, replaceErrors);
    }

    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, replaceErrors)}` : "";
    return `${prefix} ${message}${metaStr}`;
  }

  function log(level: LogLevel, message: string, meta: LogMeta = {}, defaultMeta: LogMeta = {}): void {
    if (LOG_LEVELS[level] < minLevel) return;

    const formatted = formatMessage(level, message, { ...defaultMeta, ...meta });

    if (level === "warn" || level === "error") {
      sink.stderr(formatted);
    } else {
      sink.stdout(formatted);
    }
  }

  function createLoggerInstance(defaultMeta: LogMeta = {}): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, defaultMeta),
      info: (msg, meta) => log("info", msg, meta, defaultMeta),
      warn: (msg, meta) => log("warn", msg, meta, defaultMeta),
      error: (msg, meta) => log("error", msg, meta, defaultMeta),
      child: (childMeta) => createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance();
}

// Error instances stringify to {} by default.
function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Create a no-op logger that discards all messages.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
