/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

/**
 * Logging sink passed explicitly to every component.
 *
 * `child` returns a sink that merges the given context into every entry.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(context: LogMeta): Logger;
}

export type LoggerOptions = {
  /** Minimum level written (defaults to "info") */
  level?: LogLevel;
  /** Optional file that receives a copy of every written line */
  file?: string;
  /** Context merged into every entry */
  context?: LogMeta;
};
