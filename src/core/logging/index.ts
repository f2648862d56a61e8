export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, LOG_ENV_VARS, validateLoggerConfig } from './config.js';
export {
  configureLogger,
  createContextLogger,
  createLogger,
  getApplicationLogger,
  getComponentLogger,
  logger,
} from './logger.js';
export type { LogLevel, LoggerConfig, LoggerContext, ManifestLogger } from './types.js';
export { LOG_LEVELS } from './types.js';
