export {
  createContextLogger,
  createLogger,
  getApplicationLogger,
  getComponentLogger,
  logger,
} from './logger.js';
export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, LOG_LEVELS, validateLoggerConfig } from './config.js';
export type { LoggerConfig, LoggerContext, LogLevel, OperatorLogger } from './types.js';
