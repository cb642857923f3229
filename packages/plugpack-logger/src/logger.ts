/**
 * Core Logger Implementation
 *
 * Progress goes to stdout; warnings and errors go to stderr so they never
 * mix with normal output such as the artifact path.
 */

import winston from 'winston';
import { Logger, LoggerConfig, LogMetadata } from './types';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

export const STDERR_LEVELS = ['error', 'warn'];

function flattenError(metadata?: LogMetadata): LogMetadata | undefined {
  const error = metadata?.error;
  if (error instanceof Error) {
    return {
      ...metadata,
      error: error.message,
      stack: error.stack,
    };
  }
  return metadata;
}

function wrap(winstonLogger: winston.Logger): Logger {
  return {
    debug(message: string, metadata?: LogMetadata) {
      winstonLogger.debug(message, metadata);
    },

    info(message: string, metadata?: LogMetadata) {
      winstonLogger.info(message, metadata);
    },

    warn(message: string, metadata?: LogMetadata) {
      winstonLogger.warn(message, metadata);
    },

    error(message: string, metadata?: LogMetadata) {
      winstonLogger.error(message, flattenError(metadata));
    },

    child(metadata: LogMetadata): Logger {
      return wrap(winstonLogger.child(metadata));
    },

    getWinstonLogger() {
      return winstonLogger;
    },
  };
}

/**
 * Create a Winston logger instance with standardized configuration
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    service,
    level = 'info',
    enableConsole = true,
    format: logFormat,
    colors = true,
    silent = false,
    transports: extraTransports = [],
    metadata = {},
    environment = process.env.NODE_ENV || 'development',
  } = config;

  const useJsonFormat = logFormat === 'json' || (logFormat === undefined && environment === 'production');

  const prettyLine = printf(({ level: lvl, message, service: svc, timestamp: ts, ...meta }) => {
    const metaPart = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(ts)} [${lvl}] [${String(svc)}] ${String(message)}${metaPart}`;
  });

  const loggerFormat = useJsonFormat
    ? combine(errors({ stack: true }), timestamp(), json())
    : colors
      ? combine(errors({ stack: true }), colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), prettyLine)
      : combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), prettyLine);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ stderrLevels: STDERR_LEVELS }));
  }

  transports.push(...extraTransports);

  const winstonLogger = winston.createLogger({
    level,
    silent,
    format: loggerFormat,
    defaultMeta: { service, environment, ...metadata },
    transports,
    exitOnError: false,
  });

  return wrap(winstonLogger);
}

/**
 * Logger that drops everything; default for library calls without a logger
 */
export function createSilentLogger(): Logger {
  return createLogger({ service: 'plugpack', silent: true, enableConsole: false });
}
