/**
 * Micro-logger — level filtering over console.*
 *
 * A logger is created once at startup and passed down to every component;
 * there is no module-level logging state. `child()` binds context that is
 * merged into every entry.
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import type { LogLevel, LogMeta, Logger, LoggerOptions } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants";

export function isLogLevel(value: string): value is LogLevel {
  return (
    value === "debug" || value === "info" || value === "warn" || value === "error"
  );
}

/**
 * Narrow an arbitrary string (e.g. LOG_LEVEL) to a LogLevel
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) {
    return null;
  }
  const lowered = value.trim().toLowerCase();
  return isLogLevel(lowered) ? lowered : null;
}

/**
 * Format meta object as JSON string
 */
export function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Format a single log line
 */
export function formatLine(
  level: LogLevel,
  message: string,
  meta: LogMeta | undefined,
  now: Date = new Date(),
): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
}

type Sink = {
  minLevel: number;
  file?: string;
};

function write(sink: Sink, level: LogLevel, message: string, meta?: LogMeta) {
  if (LOG_LEVELS[level] < sink.minLevel) {
    return;
  }

  const line = formatLine(level, message, meta);

  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }

  if (sink.file) {
    appendFileSync(sink.file, line + "\n", "utf-8");
  }
}

function bind(sink: Sink, context: LogMeta): Logger {
  const merge = (meta?: LogMeta): LogMeta | undefined =>
    Object.keys(context).length === 0 ? meta : { ...context, ...meta };

  return {
    debug: (message, meta) => write(sink, "debug", message, merge(meta)),
    info: (message, meta) => write(sink, "info", message, merge(meta)),
    warn: (message, meta) => write(sink, "warn", message, merge(meta)),
    error: (message, meta) => write(sink, "error", message, merge(meta)),
    child: (extra) => bind(sink, { ...context, ...extra }),
  };
}

/**
 * Create the process logger
 *
 * When `file` is given its parent directory is created and every written
 * line is appended to it as well.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? DEFAULT_LOG_LEVEL;

  if (options.file) {
    mkdirSync(dirname(options.file), { recursive: true });
  }

  return bind(
    { minLevel: LOG_LEVELS[level], file: options.file },
    options.context ?? {},
  );
}

/**
 * Logger that drops everything
 */
export function createSilentLogger(): Logger {
  const silent: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silent,
  };
  return silent;
}
