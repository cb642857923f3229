/**
 * What the commands write to and build with. The CLI entry point uses the
 * process streams; tests substitute their own.
 */

import type { Writable } from 'stream';
import type { Logger } from '@plugpack/logger';
import type { BuildOptions } from '../pipeline/build';

export interface CommandContext {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  /** Records the process exit code */
  exit(code: number): void;
  /** Replaces the logger built from configuration */
  logger?: Logger;
  /** Backends and hook runner handed to the pipeline */
  buildOptions?: Pick<BuildOptions, 'nativePackager' | 'repositoryIndexer' | 'hookRunner'>;
}

export function processContext(): CommandContext {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    exit: (code: number) => {
      process.exitCode = code;
    },
  };
}

export function writeLine(stream: Writable, line = ''): void {
  stream.write(`${line}\n`);
}
