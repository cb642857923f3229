/**
 * Integrity Manifest Generator
 *
 * SHA-256 digests of staged files, kept sorted by path so that identical
 * trees always serialize to identical bytes. The text form is the one
 * `sha256sum -c` reads.
 */

import { createHash } from 'crypto';
import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'path';

export const MANIFEST_FILE = 'checksums.sha256';

export interface ManifestEntry {
  /** Relative, `/`-separated */
  path: string;
  /** Lower-case hex SHA-256 */
  digest: string;
}

export interface IntegrityManifest {
  algorithm: 'sha256';
  entries: ManifestEntry[];
}

export interface GenerateManifestOptions {
  /** Relative paths to leave out, e.g. the manifest file itself */
  exclude?: readonly string[];
}

export class ManifestFormatError extends Error {}

const LINE_PATTERN = /^([0-9a-f]{64}) [ *](.+)$/;

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export async function digestFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  await new Promise<void>((resolve, reject) => {
    const stream = fs.createReadStream(filePath);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve());
    stream.on('error', reject);
  });
  return hash.digest('hex');
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join('/');
}

/**
 * @param files relative paths to digest; every regular file under `rootDir` when omitted
 */
export async function generateManifest(
  rootDir: string,
  files?: readonly string[],
  options: GenerateManifestOptions = {}
): Promise<IntegrityManifest> {
  const excluded = new Set((options.exclude ?? []).map(toPosix));
  const candidates = files
    ? files.map(toPosix)
    : await fg('**/*', { cwd: rootDir, onlyFiles: true, dot: true, followSymbolicLinks: false });

  const paths = [...new Set(candidates)].filter((file) => !excluded.has(file)).sort(byCodeUnit);

  const entries: ManifestEntry[] = [];
  for (const file of paths) {
    entries.push({ path: file, digest: await digestFile(path.join(rootDir, file)) });
  }

  return { algorithm: 'sha256', entries };
}

export function serializeManifest(manifest: IntegrityManifest): string {
  return [...manifest.entries]
    .sort((a, b) => byCodeUnit(a.path, b.path))
    .map((entry) => `${entry.digest}  ${entry.path}\n`)
    .join('');
}

export function parseManifest(text: string): IntegrityManifest {
  const entries: ManifestEntry[] = [];
  text.split('\n').forEach((line, index) => {
    if (line.length === 0) {
      return;
    }
    const match = LINE_PATTERN.exec(line);
    if (!match) {
      throw new ManifestFormatError(`line ${index + 1} is not "<sha256>  <path>"`);
    }
    entries.push({ digest: match[1], path: match[2] });
  });
  entries.sort((a, b) => byCodeUnit(a.path, b.path));
  return { algorithm: 'sha256', entries };
}

/**
 * @returns paths whose content is missing or differs from the manifest, sorted
 */
export async function verifyManifest(rootDir: string, manifest: IntegrityManifest): Promise<string[]> {
  const mismatched: string[] = [];
  for (const entry of manifest.entries) {
    const filePath = path.join(rootDir, entry.path);
    if (!(await fs.pathExists(filePath)) || (await digestFile(filePath)) !== entry.digest) {
      mismatched.push(entry.path);
    }
  }
  return mismatched.sort(byCodeUnit);
}

export function manifestToRecord(manifest: IntegrityManifest): Record<string, string> {
  const record: Record<string, string> = {};
  for (const entry of manifest.entries) {
    record[entry.path] = entry.digest;
  }
  return record;
}
