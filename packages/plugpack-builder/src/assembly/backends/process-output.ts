/**
 * Narrowing of child-process failures raised by execa
 */

export interface ProcessFailure {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  all?: string;
  message: string;
}

export function isProcessFailure(error: unknown): error is Error & ProcessFailure {
  return error instanceof Error && ('exitCode' in error || 'stderr' in error);
}

/**
 * Last lines of a failed command's output, for error context
 */
export function outputTail(failure: ProcessFailure, lines = 20): string {
  const text = failure.all ?? [failure.stdout, failure.stderr].filter(Boolean).join('\n');
  return text.split('\n').slice(-lines).join('\n');
}
