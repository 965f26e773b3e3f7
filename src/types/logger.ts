/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured fields appended to a log line as JSON
 */
export type LogMeta = Record<string, unknown>;

/**
 * Bound logger, as returned by withContext() in @/logger
 *
 * Extraction stages take one of these so the document label follows every
 * line they write.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
