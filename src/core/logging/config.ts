import { LOG_LEVELS, type LogLevel, type LoggerConfig } from './types.js';

export const LOG_ENV_VARS = {
  level: 'SIMKUBE_LOG_LEVEL',
  pretty: 'SIMKUBE_LOG_PRETTY',
  destination: 'SIMKUBE_LOG_DESTINATION',
  timestamp: 'SIMKUBE_LOG_TIMESTAMP',
} as const;

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
 * Logger settings from the SIMKUBE_LOG_* variables; unknown levels fall back
 * to the default
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv): LoggerConfig {
  const level = env[LOG_ENV_VARS.level]?.toLowerCase();
  const destination = env[LOG_ENV_VARS.destination];

  return {
    ...DEFAULT_LOGGER_CONFIG,
    ...(level && isLogLevel(level) && { level }),
    ...(env[LOG_ENV_VARS.pretty] === 'true' && { pretty: true }),
    ...(destination && { destination }),
    ...(env[LOG_ENV_VARS.timestamp] === 'false' && {
      options: { ...DEFAULT_LOGGER_CONFIG.options, timestamp: false },
    }),
  };
}

export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(`Invalid log level: ${config.level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  if (config.destination !== undefined && config.destination.trim() === '') {
    throw new Error('Log destination must not be empty');
  }
}
