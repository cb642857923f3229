/**
 * Gzip tarballs of a staged tree with sorted entries and fixed timestamps,
 * so the same input always yields the same bytes.
 */

import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'path';
import { pipeline } from 'stream/promises';
import * as tar from 'tar-stream';
import { createGzip } from 'zlib';

export const BUNDLE_MTIME = new Date('2000-01-01T00:00:00Z');

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Writes `sourceDir` as `<prefix>/...` into a gzip tarball at `outFile`
 *
 * @returns the archived file paths relative to `sourceDir`
 */
export async function writeBundle(sourceDir: string, prefix: string, outFile: string): Promise<string[]> {
  const entries = (
    await fg('**/*', { cwd: sourceDir, onlyFiles: false, dot: true, followSymbolicLinks: false })
  ).sort(byCodeUnit);

  await fs.ensureDir(path.dirname(outFile));

  const pack = tar.pack();
  const written = pipeline(pack, createGzip({ level: 9 }), fs.createWriteStream(outFile));
  const files: string[] = [];

  try {
    pack.entry({ name: `${prefix}/`, type: 'directory', mode: 0o755, mtime: BUNDLE_MTIME });

    for (const relative of entries) {
      const absolute = path.join(sourceDir, relative);
      const stat = await fs.lstat(absolute);
      const name = `${prefix}/${relative}`;

      if (stat.isDirectory()) {
        pack.entry({ name: `${name}/`, type: 'directory', mode: 0o755, mtime: BUNDLE_MTIME });
      } else if (stat.isSymbolicLink()) {
        pack.entry({ name, type: 'symlink', linkname: await fs.readlink(absolute), mtime: BUNDLE_MTIME });
        files.push(relative);
      } else if (stat.isFile()) {
        const mode = stat.mode & 0o111 ? 0o755 : 0o644;
        pack.entry({ name, type: 'file', mode, mtime: BUNDLE_MTIME }, await fs.readFile(absolute));
        files.push(relative);
      }
    }
    pack.finalize();
  } catch (error) {
    pack.destroy(error instanceof Error ? error : undefined);
    // The pipeline rejects with the same error
    await written.catch(() => undefined);
    throw error;
  }

  await written;
  return files;
}
