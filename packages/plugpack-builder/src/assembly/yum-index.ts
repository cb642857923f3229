/**
 * yum repository index. Packages are gathered under `Packages/` and the
 * indexer backend regenerates `repodata/`.
 */

import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'path';
import { AssemblyIOError } from '@plugpack/errors';
import type { RepositoryIndexer } from './backends/types';

export const YUM_PACKAGES_DIR = 'Packages';
export const REPOMD_FILE = path.join('repodata', 'repomd.xml');

export async function writeYumIndex(repositoryDir: string, indexer: RepositoryIndexer): Promise<number> {
  const packagesDir = path.join(repositoryDir, YUM_PACKAGES_DIR);
  await fs.ensureDir(packagesDir);

  const rpms = await fg('*.rpm', { cwd: repositoryDir, onlyFiles: true });
  for (const file of rpms.sort()) {
    await fs.move(path.join(repositoryDir, file), path.join(packagesDir, file), { overwrite: true });
  }

  await indexer.index(repositoryDir);
  await verifyYumIndex(repositoryDir);

  return rpms.length;
}

/**
 * @throws AssemblyIOError when `repodata/repomd.xml` is missing or not a repomd document
 */
export async function verifyYumIndex(repositoryDir: string): Promise<void> {
  const repomd = path.join(repositoryDir, REPOMD_FILE);
  if (!(await fs.pathExists(repomd))) {
    throw new AssemblyIOError(`yum repository index in ${repositoryDir} is invalid: ${REPOMD_FILE} was not written`, {
      repositoryDir,
    });
  }
  const text = await fs.readFile(repomd, 'utf-8');
  if (!/<repomd[\s>]/.test(text)) {
    throw new AssemblyIOError(`yum repository index in ${repositoryDir} is invalid: ${REPOMD_FILE} is not a repomd document`, {
      repositoryDir,
    });
  }
}
