/**
 * Structured logger used across the packaging pipeline
 */
export interface ManifestLogger {
  trace(msg: string, meta?: Record<string, unknown>): void;

  debug(msg: string, meta?: Record<string, unknown>): void;

  info(msg: string, meta?: Record<string, unknown>): void;

  warn(msg: string, meta?: Record<string, unknown>): void;

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Log fatal errors; the CLI uses this right before exiting non-zero
   */
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  isLevelEnabled(level: LogLevel): boolean;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): ManifestLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

/**
 * Configuration options for the logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Pretty-print through pino-pretty (default: false)
   */
  pretty?: boolean;

  /**
   * Output file; stdout when unset
   */
  destination?: string;

  options?: {
    timestamp?: boolean;
  };
}

/**
 * Logger context for binding additional metadata
 */
export interface LoggerContext {
  component?: string;
  applicationId?: string;
  mode?: string;
  [key: string]: unknown;
}
