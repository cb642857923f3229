/**
 * Repository indexer backed by createrepo
 */

import execa from 'execa';
import { AssemblyIOError } from '@plugpack/errors';
import type { Logger } from '@plugpack/logger';
import { isProcessFailure, outputTail } from './process-output';
import type { RepositoryIndexer } from './types';

export class CreaterepoIndexer implements RepositoryIndexer {
  readonly name = 'createrepo';
  readonly requiredCommands = ['createrepo'] as const;

  constructor(private readonly logger?: Logger) {}

  async index(repositoryDir: string): Promise<void> {
    this.logger?.debug('Running createrepo', { repositoryDir });

    try {
      await execa('createrepo', ['-o', repositoryDir, repositoryDir], { all: true });
    } catch (error) {
      if (isProcessFailure(error)) {
        throw new AssemblyIOError(
          `createrepo failed for ${repositoryDir}`,
          { repositoryDir, output: outputTail(error) },
          error
        );
      }
      throw error;
    }
  }
}
