import { pino, type Logger, type LoggerOptions } from 'pino';
import { getConfig, type AppConfig } from '../config/index.js';

let logger: Logger | null = null;

/**
 * pino options for a configuration: pretty output when enabled, and the
 * engine's queue and timeout settings in every line so that a trace can be
 * read without the environment that produced it
 */
export function buildLoggerOptions(config: AppConfig): LoggerOptions {
  return {
    level: config.logging.level,
    transport: config.logging.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,queueCapacity,executeTimeoutMs',
          },
        }
      : undefined,
    base: {
      service: 'flowgraph',
      env: config.env,
      queueCapacity: config.sockets.queueCapacity,
      executeTimeoutMs: config.engine.executeTimeoutMs,
    },
  };
}

/**
 * Create or get the application logger
 */
export function getLogger(): Logger {
  if (!logger) {
    logger = pino(buildLoggerOptions(getConfig()));
  }
  return logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return getLogger().child(context);
}

/**
 * Forget the application logger so the next use reads the configuration
 * again. Child loggers created before keep the old settings.
 * @internal Exported for testing
 */
export function resetLogger(): void {
  logger = null;
}

export type { Logger };
