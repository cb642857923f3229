/**
 * Flat apt repository index: Packages, Packages.gz and Release.
 *
 * The index is written natively and read back afterwards; a repository
 * without a consistent Release file is never shipped.
 */

import { createHash } from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import { gunzipSync, gzipSync } from 'zlib';
import { AssemblyIOError } from '@plugpack/errors';
import { ControlFields, controlField, parseControl, serializeControl } from '../repository/control';
import { readDebPackage } from '../repository/deb';
import { listPackages } from '../repository/inspector';
import { renderAptRelease, ReleaseChecksum } from '../templates/apt-release';

export const PACKAGES_FILE = 'Packages';
export const PACKAGES_GZ_FILE = 'Packages.gz';
export const RELEASE_FILE = 'Release';

/** Fields recomputed for the index entry */
const INDEX_FIELDS = new Set(['filename', 'size', 'md5sum', 'sha1', 'sha256']);

const DEB_NAME_PATTERN = /^([^_]+)_([^_]+)_([^_]+)\.deb$/;

export interface AptIndexOptions {
  /** Release `Origin` and `Label` */
  origin: string;
  /** Plugin `major.minor` */
  version: string;
  suite?: string;
}

function digest(algorithm: 'md5' | 'sha1' | 'sha256', data: Buffer): string {
  return createHash(algorithm).update(data).digest('hex');
}

function checksum(file: string, data: Buffer): ReleaseChecksum {
  return {
    file,
    size: data.length,
    md5: digest('md5', data),
    sha1: digest('sha1', data),
    sha256: digest('sha256', data),
  };
}

async function controlFor(filePath: string, relative: string): Promise<ControlFields> {
  const info = await readDebPackage(await fs.readFile(filePath));
  if (info.controlVerified) {
    return info.control.filter(([key]) => !INDEX_FIELDS.has(key.toLowerCase()));
  }

  // Control archive in a compression we do not read: fall back to the file name
  const match = DEB_NAME_PATTERN.exec(path.basename(relative));
  if (!match) {
    throw new AssemblyIOError(`Cannot index ${relative}: its control data is unreadable and its name is not <package>_<version>_<arch>.deb`, {
      file: relative,
    });
  }
  return [
    ['Package', match[1]],
    ['Version', match[2]],
    ['Architecture', match[3]],
  ];
}

export interface AptIndexResult {
  packages: number;
  architectures: string[];
}

export async function writeAptIndex(repositoryDir: string, options: AptIndexOptions): Promise<AptIndexResult> {
  const stanzas: string[] = [];
  const architectures = new Set<string>();

  for (const relative of await listPackages(repositoryDir, 'ubuntu')) {
    const filePath = path.join(repositoryDir, relative);
    const data = await fs.readFile(filePath);
    const control = await controlFor(filePath, relative);
    const sums = checksum(relative, data);

    architectures.add(controlField(control, 'Architecture') ?? 'all');
    stanzas.push(
      serializeControl([
        ...control,
        ['Filename', `./${relative.split(path.sep).join('/')}`],
        ['Size', String(sums.size)],
        ['MD5sum', sums.md5],
        ['SHA1', sums.sha1],
        ['SHA256', sums.sha256],
      ])
    );
  }

  const packages = Buffer.from(stanzas.join('\n'), 'utf-8');
  const packagesGz = gzipSync(packages, { level: 9 });

  await fs.writeFile(path.join(repositoryDir, PACKAGES_FILE), packages);
  await fs.writeFile(path.join(repositoryDir, PACKAGES_GZ_FILE), packagesGz);

  const release = renderAptRelease({
    origin: options.origin,
    label: options.origin,
    version: options.version,
    suite: options.suite ?? 'stable',
    architectures: architectures.size > 0 ? [...architectures].sort() : ['all'],
    components: ['main'],
    checksums: [checksum(PACKAGES_FILE, packages), checksum(PACKAGES_GZ_FILE, packagesGz)],
  });
  await fs.writeFile(path.join(repositoryDir, RELEASE_FILE), release, 'utf-8');

  await verifyAptIndex(repositoryDir);

  return { packages: stanzas.length, architectures: [...architectures].sort() };
}

/**
 * Reads Release back and checks that it lists Packages and Packages.gz
 * with their current sizes and SHA-256 digests, and that Packages.gz
 * decompresses to Packages.
 *
 * @throws AssemblyIOError when anything is missing or inconsistent
 */
export async function verifyAptIndex(repositoryDir: string): Promise<void> {
  const fail = (reason: string): never => {
    throw new AssemblyIOError(`apt repository index in ${repositoryDir} is invalid: ${reason}`, { repositoryDir });
  };

  const releasePath = path.join(repositoryDir, RELEASE_FILE);
  if (!(await fs.pathExists(releasePath))) {
    fail(`${RELEASE_FILE} was not written`);
  }

  const release = parseControl(await fs.readFile(releasePath, 'utf-8'));
  const sha256 = controlField(release, 'SHA256');
  if (!sha256) {
    fail(`${RELEASE_FILE} has no SHA256 section`);
  }

  const listed = new Map<string, { size: number; digest: string }>();
  for (const line of (sha256 ?? '').split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length === 3) {
      listed.set(parts[2], { digest: parts[0], size: Number(parts[1]) });
    }
  }

  const contents = new Map<string, Buffer>();
  for (const file of [PACKAGES_FILE, PACKAGES_GZ_FILE]) {
    const filePath = path.join(repositoryDir, file);
    if (!(await fs.pathExists(filePath))) {
      fail(`${file} was not written`);
    }
    const data = await fs.readFile(filePath);
    const entry = listed.get(file);
    if (!entry || entry.size !== data.length || entry.digest !== digest('sha256', data)) {
      fail(`${RELEASE_FILE} does not match ${file}`);
    }
    contents.set(file, data);
  }

  let unpacked: Buffer;
  try {
    unpacked = gunzipSync(contents.get(PACKAGES_GZ_FILE) ?? Buffer.alloc(0));
  } catch (error) {
    throw new AssemblyIOError(`${PACKAGES_GZ_FILE} in ${repositoryDir} is not valid gzip data`, { repositoryDir }, error);
  }
  if (!unpacked.equals(contents.get(PACKAGES_FILE) ?? Buffer.alloc(0))) {
    fail(`${PACKAGES_GZ_FILE} does not decompress to ${PACKAGES_FILE}`);
  }
}
