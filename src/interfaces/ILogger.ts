/**
 * Logger Interface
 *
 * Services depend on this abstraction rather than on pino directly, so tests
 * can hand them a jest mock and assert on what was logged.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /**
   * Debug level - per-request tracing, cache hits and misses
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - normal progress: files written, catalog fetched
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - degraded but recoverable: cache disk failures, unknown exchange codes
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - failed operations that end the current command
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - unrecoverable errors before exit
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * @param context - Optional context name for logger (e.g., "InstrumentService")
   */
  createLogger(context?: string): ILogger;
}
