/**
 * Rendering of violations and failures for the terminal
 */

import chalk from 'chalk';
import type { Writable } from 'stream';
import { toAppError, ValidationViolation } from '@plugpack/errors';
import { formatViolation } from '../validation/violations';
import { writeLine } from './context';

export function printViolations(stream: Writable, violations: readonly ValidationViolation[]): void {
  for (const v of violations) {
    const line = formatViolation(v);
    writeLine(stream, v.severity === 'error' ? chalk.red(line) : chalk.yellow(line));
  }
}

/**
 * @returns the exit code for the error
 */
export function printFailure(stream: Writable, error: unknown): number {
  const failure = toAppError(error);
  writeLine(stream, chalk.red(`Error: ${failure.message}`));
  if (failure.suggestion) {
    writeLine(stream, chalk.gray(`  ${failure.suggestion}`));
  }
  return failure.exitCode;
}
