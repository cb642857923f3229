/**
 * Native packager backed by rpmbuild
 */

import execa from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { AssemblyIOError } from '@plugpack/errors';
import type { Logger } from '@plugpack/logger';
import { isProcessFailure, outputTail } from './process-output';
import type { NativePackageRequest, NativePackager } from './types';

export class RpmbuildPackager implements NativePackager {
  readonly name = 'rpmbuild';
  readonly requiredCommands = ['rpmbuild'] as const;

  constructor(private readonly logger?: Logger) {}

  async buildPackage(request: NativePackageRequest): Promise<string> {
    const args = ['-vv', '--nodeps', '--define', `_topdir ${request.buildRoot}`, '-bb', request.specFile];
    this.logger?.debug('Running rpmbuild', { args });

    try {
      await execa('rpmbuild', args, { cwd: request.buildRoot, all: true });
    } catch (error) {
      if (isProcessFailure(error)) {
        throw new AssemblyIOError(
          `rpmbuild failed${error.exitCode === undefined ? '' : ` with exit code ${error.exitCode}`}`,
          { specFile: request.specFile, output: outputTail(error) },
          error
        );
      }
      throw error;
    }

    const produced = path.join(request.buildRoot, 'RPMS', 'noarch', request.packageFileName);
    if (!(await fs.pathExists(produced))) {
      throw new AssemblyIOError(`rpmbuild did not produce ${request.packageFileName}`, {
        expected: produced,
      });
    }
    return produced;
  }
}
