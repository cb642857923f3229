/**
 * Copies a plugin tree into a staging directory
 */

import fs from 'fs-extra';
import path from 'path';

/** Never staged, wherever they appear */
const EXCLUDED_NAMES = new Set(['.build', '.git']);

/** Previous build artifacts left at the plugin root */
const ROOT_ARTIFACT_PATTERN = /\.(fp|rpm)$/;

function isInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export interface StageOptions {
  /** Absolute paths skipped with everything below them */
  excludeDirs?: readonly string[];
}

function isStaged(root: string, absolute: string, excluded: readonly string[]): boolean {
  if (excluded.some((dir) => isInside(absolute, dir))) {
    return false;
  }
  const relative = path.relative(root, absolute);
  if (relative.split(path.sep).some((segment) => EXCLUDED_NAMES.has(segment))) {
    return false;
  }
  return !(path.dirname(relative) === '.' && ROOT_ARTIFACT_PATTERN.test(relative));
}

/**
 * Top-level entries are copied one by one: the staging directory may
 * itself live inside the plugin root when the output directory does.
 */
export async function stagePluginTree(pluginRoot: string, stagingDir: string, options: StageOptions = {}): Promise<void> {
  const root = path.resolve(pluginRoot);
  const excluded = (options.excludeDirs ?? []).map((dir) => path.resolve(dir));

  await fs.ensureDir(stagingDir);
  for (const name of (await fs.readdir(root)).sort()) {
    const source = path.join(root, name);
    if (!isStaged(root, source, excluded)) {
      continue;
    }
    await fs.copy(source, path.join(stagingDir, name), {
      dereference: false,
      filter: (entry: string) => isStaged(root, path.resolve(entry), excluded),
    });
  }
}

export function isPathInside(child: string, parent: string): boolean {
  return isInside(path.resolve(child), path.resolve(parent));
}
