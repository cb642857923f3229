/**
 * @plugpack/logger
 * Logging package for the plugin build pipeline
 */

export { createLogger, createSilentLogger, STDERR_LEVELS } from './logger';
export type {
  Logger,
  LoggerConfig,
  LogMetadata,
  LogLevel,
  LogFormat,
} from './types';
