/**
 * Pre-build hook execution
 */

import execa from 'execa';
import path from 'path';
import { HookError } from '@plugpack/errors';
import { isProcessFailure, outputTail } from '../assembly/backends/process-output';
import { findExecutable } from '../assembly/backends/commands';
import { PRE_BUILD_HOOK_FILE } from '../types/plugin';

export interface HookRunner {
  /**
   * Runs an executable hook with `cwd` as working directory
   *
   * @throws HookError when the hook exits unsuccessfully
   */
  run(hookPath: string, cwd: string): Promise<void>;
}

export class ExecaHookRunner implements HookRunner {
  async run(hookPath: string, cwd: string): Promise<void> {
    try {
      await execa(hookPath, [], { cwd, all: true });
    } catch (error) {
      if (isProcessFailure(error)) {
        throw new HookError(hookPath, error.exitCode, outputTail(error));
      }
      throw error;
    }
  }
}

/**
 * @returns the hook path when the plugin root has an executable pre_build_hook
 */
export async function findPreBuildHook(pluginRoot: string): Promise<string | null> {
  return findExecutable(path.join(path.resolve(pluginRoot), PRE_BUILD_HOOK_FILE));
}
