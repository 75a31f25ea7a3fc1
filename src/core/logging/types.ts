/**
 * Structured logger used across the operator
 */
export interface OperatorLogger {
  trace(msg: string, meta?: Record<string, unknown>): void;

  debug(msg: string, meta?: Record<string, unknown>): void;

  info(msg: string, meta?: Record<string, unknown>): void;

  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log an error; the error's name, message and stack are serialized under `error`
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): OperatorLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Configuration options for the operator logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Pretty-print through pino-pretty (default: false)
   */
  pretty?: boolean | undefined;

  /**
   * Output file; stdout when unset or "stdout"
   */
  destination?: string | undefined;

  options?:
    | {
        /**
         * Include timestamp in logs (default: true)
         */
        timestamp?: boolean | undefined;
      }
    | undefined;
}

/**
 * Context bound to component loggers
 */
export interface LoggerContext {
  component?: string;

  /**
   * Name of the managed application
   */
  app?: string;

  namespace?: string;

  [key: string]: unknown;
}
