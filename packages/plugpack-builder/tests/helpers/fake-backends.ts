/**
 * Packaging backends that run in process
 */

import fs from 'fs-extra';
import path from 'path';
import type { NativePackager, NativePackageRequest, RepositoryIndexer } from '../../src/assembly/backends/types';
import type { HookRunner } from '../../src/pipeline/hooks';

/**
 * Produces the expected package file with the rendered spec as content
 */
export class FakePackager implements NativePackager {
  readonly name = 'fake-packager';
  readonly requiredCommands = ['fake-rpmbuild'];
  readonly requests: NativePackageRequest[] = [];
  readonly specs: string[] = [];

  async buildPackage(request: NativePackageRequest): Promise<string> {
    this.requests.push(request);
    const spec = await fs.readFile(request.specFile, 'utf-8');
    this.specs.push(spec);

    const produced = path.join(request.buildRoot, 'RPMS', 'noarch', request.packageFileName);
    await fs.ensureDir(path.dirname(produced));
    await fs.writeFile(produced, spec);
    return produced;
  }
}

export class FakeIndexer implements RepositoryIndexer {
  readonly name = 'fake-indexer';
  readonly requiredCommands = ['fake-createrepo'];
  readonly indexed: string[] = [];

  constructor(private readonly writeRepomd = true) {}

  async index(repositoryDir: string): Promise<void> {
    this.indexed.push(repositoryDir);
    if (this.writeRepomd) {
      await fs.ensureDir(path.join(repositoryDir, 'repodata'));
      await fs.writeFile(
        path.join(repositoryDir, 'repodata', 'repomd.xml'),
        '<?xml version="1.0" encoding="UTF-8"?>\n<repomd xmlns="http://linux.duke.edu/metadata/repo"></repomd>\n'
      );
    }
  }
}

export class RecordingHookRunner implements HookRunner {
  readonly calls: Array<{ hookPath: string; cwd: string }> = [];

  constructor(private readonly effect?: (cwd: string) => Promise<void>) {}

  async run(hookPath: string, cwd: string): Promise<void> {
    this.calls.push({ hookPath, cwd });
    if (this.effect) {
      await this.effect(cwd);
    }
  }
}
