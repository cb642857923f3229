/**
 * @plugpack/errors
 * Error hierarchy for the plugin build pipeline
 */

export { AppError, ErrorSeverity } from './base-error';
export type { ErrorContext } from './base-error';
export {
  UnsupportedFormatVersionError,
  ValidationFailedError,
  StagePlanError,
  AssemblyIOError,
  MissingCommandError,
  HookError,
  ConfigurationError,
  InternalError,
} from './errors';
export type { ValidationViolation, ViolationLocation, ViolationSeverity } from './errors';
export { isAppError, toAppError } from './factory';
