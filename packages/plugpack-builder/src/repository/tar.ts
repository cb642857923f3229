/**
 * Reading single entries out of in-memory tarballs
 */

import * as tar from 'tar-stream';

function normalizeEntryName(name: string): string {
  return name.replace(/^\.\//, '');
}

/**
 * Resolves with the content of the first regular file called `wanted`
 * (a leading `./` is ignored), or null when the archive has none.
 * Rejects when the tarball is malformed.
 */
export function readTarEntry(buffer: Buffer, wanted: string): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const extract = tar.extract();
    let found: Buffer | null = null;

    extract.on('entry', (header, stream, next) => {
      const chunks: Buffer[] = [];
      const isWanted = found === null && header.type === 'file' && normalizeEntryName(header.name) === wanted;

      stream.on('data', (chunk: unknown) => {
        if (isWanted && Buffer.isBuffer(chunk)) {
          chunks.push(chunk);
        }
      });

      stream.on('end', () => {
        if (isWanted) {
          found = Buffer.concat(chunks);
        }
        next();
      });

      stream.resume();
    });

    extract.on('finish', () => resolve(found));
    extract.on('error', (error: Error) => reject(error));

    extract.end(buffer);
  });
}
