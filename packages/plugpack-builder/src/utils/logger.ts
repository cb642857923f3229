/**
 * CLI logger
 */

import { createLogger, Logger, LogLevel } from '@plugpack/logger';
import type { BuilderConfig } from './config';

export interface CliLogOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export function createCliLogger(config: BuilderConfig, options: CliLogOptions = {}): Logger {
  let level: LogLevel = config.logLevel;
  if (options.verbose) {
    level = 'debug';
  } else if (options.quiet) {
    level = 'error';
  }

  return createLogger({
    service: 'plugpack',
    level,
    format: config.logFormat,
    colors: config.logFormat === 'pretty' && process.stderr.isTTY === true,
  });
}
