/**
 * Logger interface for observability
 *
 * This interface is intentionally framework-agnostic to work with any logger
 * (winston, pino, bunyan, or simple console). `createLogger` gives a
 * winston-backed one.
 *
 * Example usage:
 * ```typescript
 * const logger = createLogger(loadLoggerConfig());
 * const result = parseMember(payload, { logger });
 * ```
 */

import winston from 'winston';
import { loadLoggerConfig, type LoggerConfig } from './config/logger-config';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(meta: LogMeta): Logger;
}

const noop = (): void => {};

export const SILENT_LOGGER: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => SILENT_LOGGER,
};

function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );
  }

  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    })
  );
}

function adapt(instance: winston.Logger): Logger {
  return {
    debug: (message, meta) => void instance.debug(message, meta ?? {}),
    info: (message, meta) => void instance.info(message, meta ?? {}),
    warn: (message, meta) => void instance.warn(message, meta ?? {}),
    error: (message, meta) => void instance.error(message, meta ?? {}),
    child: (meta) => adapt(instance.child(meta)),
  };
}

/**
 * Create a winston-backed logger writing to the console.
 *
 * @param config - Defaults to {@link loadLoggerConfig} over `process.env`
 * @param transports - Replaces the console transport, e.g. to capture output
 */
export function createLogger(
  config: LoggerConfig = loadLoggerConfig(),
  transports: winston.transport[] = [new winston.transports.Console({ level: config.level })]
): Logger {
  return adapt(
    winston.createLogger({
      level: config.level,
      format: createFormat(config),
      transports,
      exitOnError: false,
    })
  );
}

/**
 * Create a logger for a specific component
 *
 * @example
 * ```typescript
 * const logger = createComponentLogger(createLogger(), 'member-patch');
 * logger.debug('Serialized member patch', { fields: ['name'] });
 * ```
 */
export function createComponentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
