import pino from 'pino';
import { DEFAULT_LOGGER_CONFIG, validateLoggerConfig } from './config.js';
import type { LoggerConfig, LoggerContext, LogLevel, ManifestLogger } from './types.js';

type Meta = Record<string, unknown>;
type PinoMethod = Exclude<LogLevel, 'silent'>;

/**
 * ManifestLogger backed by a pino instance
 */
class PinoLogger implements ManifestLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Meta): void {
    this.write('trace', msg, meta);
  }

  debug(msg: string, meta?: Meta): void {
    this.write('debug', msg, meta);
  }

  info(msg: string, meta?: Meta): void {
    this.write('info', msg, meta);
  }

  warn(msg: string, meta?: Meta): void {
    this.write('warn', msg, meta);
  }

  error(msg: string, error?: Error, meta?: Meta): void {
    this.write('error', msg, error ? { ...meta, err: error } : meta);
  }

  fatal(msg: string, error?: Error, meta?: Meta): void {
    this.write('fatal', msg, error ? { ...meta, err: error } : meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  child(bindings: Meta): ManifestLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }

  private write(level: PinoMethod, msg: string, meta: Meta | undefined): void {
    this.pinoLogger[level](meta ?? {}, msg);
  }
}

function transportFor(config: LoggerConfig): pino.TransportSingleOptions | undefined {
  if (config.pretty) {
    return {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    };
  }
  if (config.destination && config.destination !== 'stdout') {
    return { target: 'pino/file', options: { destination: config.destination, mkdir: true } };
  }
  return undefined;
}

/**
 * Create a standalone logger; unset settings take the defaults
 */
export function createLogger(config?: Partial<LoggerConfig>): ManifestLogger {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };
  validateLoggerConfig(finalConfig);

  const options: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    serializers: { err: pino.stdSerializers.err },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  const transport = transportFor(finalConfig);
  return new PinoLogger(transport ? pino(options, pino.transport(transport)) : pino(options));
}

export function createContextLogger(context: LoggerContext, config?: Partial<LoggerConfig>): ManifestLogger {
  return createLogger(config).child(context);
}

let rootLogger: ManifestLogger = createLogger();

/**
 * Replace the process-wide logger. Loggers handed out earlier by
 * getComponentLogger and getApplicationLogger follow the new configuration.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  rootLogger = createLogger(config);
}

/**
 * Child of the process-wide logger, bound lazily so that module-level
 * loggers pick up configuration applied after import
 */
class RootChildLogger implements ManifestLogger {
  private boundTo: ManifestLogger | undefined;
  private bound: ManifestLogger | undefined;

  constructor(private readonly bindings: Meta) {}

  trace(msg: string, meta?: Meta): void {
    this.current().trace(msg, meta);
  }

  debug(msg: string, meta?: Meta): void {
    this.current().debug(msg, meta);
  }

  info(msg: string, meta?: Meta): void {
    this.current().info(msg, meta);
  }

  warn(msg: string, meta?: Meta): void {
    this.current().warn(msg, meta);
  }

  error(msg: string, error?: Error, meta?: Meta): void {
    this.current().error(msg, error, meta);
  }

  fatal(msg: string, error?: Error, meta?: Meta): void {
    this.current().fatal(msg, error, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.current().isLevelEnabled(level);
  }

  child(bindings: Meta): ManifestLogger {
    return new RootChildLogger({ ...this.bindings, ...bindings });
  }

  private current(): ManifestLogger {
    if (this.bound === undefined || this.boundTo !== rootLogger) {
      this.boundTo = rootLogger;
      this.bound = rootLogger.child(this.bindings);
    }
    return this.bound;
  }
}

/**
 * Process-wide logger; the CLI configures it from SIMKUBE_LOG_*
 */
export const logger: ManifestLogger = new RootChildLogger({});

export function getComponentLogger(component: string, additionalContext?: Meta): ManifestLogger {
  return logger.child({ component, ...additionalContext });
}

export function getApplicationLogger(applicationId: string, additionalContext?: Meta): ManifestLogger {
  return logger.child({ applicationId, ...additionalContext });
}
