import type { LoggerConfig, LogLevel } from './types.js';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  options: {
    timestamp: true,
  },
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get logger configuration from environment variables
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  // Set log level from environment
  const envLevel = env.OPERATOR_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    config.level = envLevel;
  }

  // Enable pretty printing in development
  if (env.NODE_ENV === 'development' || env.OPERATOR_LOG_PRETTY === 'true') {
    config.pretty = true;
  }

  // Write to a file instead of stdout
  if (env.OPERATOR_LOG_DESTINATION) {
    config.destination = env.OPERATOR_LOG_DESTINATION;
  }

  // Configure timestamp option
  if (env.OPERATOR_LOG_TIMESTAMP === 'false') {
    config.options = { ...config.options, timestamp: false };
  }

  return config;
}

/**
 * Validate logger configuration
 */
export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(
      `Invalid log level: ${String(config.level)}. Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  if (config.destination !== undefined && config.destination.trim() === '') {
    throw new Error('Log destination must be a non-empty path');
  }
}
