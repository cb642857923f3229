/**
 * Specific Error Classes
 * Build pipeline failures, one class per failure kind
 */

import { AppError, ErrorContext, ErrorSeverity } from './base-error';

export type ViolationSeverity = 'error' | 'warning';

export interface ViolationLocation {
  /** Document the problem was found in, e.g. `metadata.yaml` */
  document: string;
  /** Path inside the document, e.g. `releases[0].repository_path` */
  path: string;
}

export interface ValidationViolation {
  location: ViolationLocation;
  ruleId: string;
  message: string;
  severity: ViolationSeverity;
}

export class UnsupportedFormatVersionError extends AppError {
  code = 'UNSUPPORTED_FORMAT_VERSION';
  exitCode = 2;
  severity = ErrorSeverity.HIGH;
  readonly formatVersion: string;

  constructor(formatVersion: string, supported: readonly string[]) {
    super(
      `metadata.yaml: package_format_version "${formatVersion}" is not supported`,
      { formatVersion, supported: [...supported] },
      `Use one of: ${supported.join(', ')}`
    );
    this.formatVersion = formatVersion;
  }
}

/**
 * Aggregate of every accumulated violation of one validation run.
 * Holds warnings too so callers can present them with the errors.
 */
export class ValidationFailedError extends AppError {
  code = 'VALIDATION_FAILED';
  exitCode = 1;
  severity = ErrorSeverity.MEDIUM;
  readonly violations: readonly ValidationViolation[];

  constructor(violations: readonly ValidationViolation[]) {
    const errorCount = violations.filter((v) => v.severity === 'error').length;
    super(
      `Plugin validation failed with ${errorCount} error(s)`,
      { errorCount, total: violations.length },
      'Fix the reported problems and run the build again'
    );
    this.violations = violations;
  }

  get errors(): ValidationViolation[] {
    return this.violations.filter((v) => v.severity === 'error');
  }

  get warnings(): ValidationViolation[] {
    return this.violations.filter((v) => v.severity === 'warning');
  }
}

export class StagePlanError extends AppError {
  code = 'STAGE_PLAN_ERROR';
  exitCode = 3;
  severity = ErrorSeverity.MEDIUM;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Give the conflicting tasks distinct stage priorities, e.g. "post_deployment/20"');
  }
}

export class AssemblyIOError extends AppError {
  code = 'ASSEMBLY_IO_ERROR';
  exitCode = 4;
  severity = ErrorSeverity.HIGH;

  constructor(message: string, context?: ErrorContext, originalError?: unknown) {
    super(
      message,
      {
        ...context,
        originalError: originalError instanceof Error ? originalError.message : undefined
      },
      'Check disk space and permissions of the output directory'
    );
  }
}

export class MissingCommandError extends AppError {
  code = 'MISSING_COMMAND';
  exitCode = 5;
  severity = ErrorSeverity.MEDIUM;
  readonly commands: readonly string[];

  constructor(commands: readonly string[]) {
    super(
      `Cannot find commands "${commands.join(', ')}"`,
      { commands: [...commands] },
      'Install the required commands and try again'
    );
    this.commands = commands;
  }
}

export class HookError extends AppError {
  code = 'HOOK_FAILED';
  exitCode = 6;
  severity = ErrorSeverity.MEDIUM;

  constructor(hookPath: string, exitCode: number | undefined, output?: string) {
    super(
      `Pre-build hook ${hookPath} failed${exitCode === undefined ? '' : ` with exit code ${exitCode}`}`,
      { hookPath, hookExitCode: exitCode, output },
      'Run the hook by hand to see its full output'
    );
  }
}

/** Exit code 78 is EX_CONFIG from sysexits.h */
export class ConfigurationError extends AppError {
  code = 'INVALID_CONFIGURATION';
  exitCode = 78;
  severity = ErrorSeverity.HIGH;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Check the PLUGPACK_* environment variables and the .env file');
  }
}

export class InternalError extends AppError {
  code = 'INTERNAL_ERROR';
  exitCode = 70;
  severity = ErrorSeverity.CRITICAL;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'This is a bug in plugpack; please report it with the full output');
  }
}
