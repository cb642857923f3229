/**
 * Type definitions for @plugpack/logger
 */

import type winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LoggerConfig {
  /** Component name (required) */
  service: string;

  /** Log level (default: 'info') */
  level?: LogLevel;

  /** Enable console transport (default: true) */
  enableConsole?: boolean;

  /** Log format (default: 'json' in production, 'pretty' otherwise) */
  format?: LogFormat;

  /** Use colors in the pretty format (default: true) */
  colors?: boolean;

  /** Drop every message, e.g. for library use in tests */
  silent?: boolean;

  /** Additional transports, appended after the built-in ones */
  transports?: winston.transport[];

  /** Additional metadata to include in all logs */
  metadata?: LogMetadata;

  /** Environment (default: process.env.NODE_ENV) */
  environment?: string;
}

export interface LogMetadata {
  [key: string]: unknown;
}

export interface Logger {
  /** Log debug message */
  debug(message: string, metadata?: LogMetadata): void;

  /** Log info message */
  info(message: string, metadata?: LogMetadata): void;

  /** Log warning message (stderr) */
  warn(message: string, metadata?: LogMetadata): void;

  /** Log error message (stderr) */
  error(message: string, metadata?: LogMetadata): void;

  /** Create child logger with additional context */
  child(metadata: LogMetadata): Logger;

  /** Get Winston logger instance (for advanced use) */
  getWinstonLogger(): winston.Logger;
}
