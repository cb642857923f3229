/**
 * Repository Inspector
 *
 * Every OS package shipped in a release repository must be structurally
 * sound, and its file name must agree with the metadata inside it.
 * One violation is reported per broken file.
 */

import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'path';
import type { ValidationViolation } from '@plugpack/errors';
import type { OsKind } from '../types/plugin';
import { violation } from '../validation/violations';
import { controlField } from './control';
import { DebFormatError, expectedDebFileName, readDebPackage } from './deb';
import { expectedRpmFileName, readRpmPackage, RpmFormatError } from './rpm';

export const REPOSITORY_CORRUPTION = 'repository-corruption';
export const REPOSITORY_UNVERIFIED_CONTROL = 'repository-unverified-control';

const PACKAGE_EXTENSIONS: Record<OsKind, string> = {
  ubuntu: 'deb',
  centos: 'rpm',
};

export interface InspectOptions {
  /** Document name used in violation locations; defaults to `repositories/<os>/<repository>` */
  document?: string;
}

/** `<package>_<version>_<arch>.deb` */
const DEB_NAME_PATTERN = /^[^_]+_[^_]+_[^_]+\.deb$/;
/** `<name>-<version>-<release>.<arch>.rpm` */
const RPM_NAME_PATTERN = /^.+-[^-]+-[^-]+\.[^.]+\.rpm$/;

export async function listPackages(repositoryPath: string, os: OsKind): Promise<string[]> {
  const files = await fg(`**/*.${PACKAGE_EXTENSIONS[os]}`, {
    cwd: repositoryPath,
    onlyFiles: true,
    dot: false,
  });
  return files.sort();
}

async function inspectDeb(filePath: string, relative: string, document: string): Promise<ValidationViolation | null> {
  try {
    const info = await readDebPackage(await fs.readFile(filePath));
    if (!info.controlVerified) {
      return violation(
        document,
        relative,
        REPOSITORY_UNVERIFIED_CONTROL,
        `${relative}: control archive ${info.controlMember} uses a compression that is not read; package metadata was not checked`,
        'warning'
      );
    }
    const fileName = path.basename(relative);
    if (DEB_NAME_PATTERN.test(fileName) && fileName !== expectedDebFileName(info.control)) {
      return violation(
        document,
        relative,
        REPOSITORY_CORRUPTION,
        `${relative}: file name does not match package ${controlField(info.control, 'Package')} ` +
          `version ${controlField(info.control, 'Version')} (${controlField(info.control, 'Architecture')})`
      );
    }
    return null;
  } catch (error) {
    if (error instanceof DebFormatError) {
      return violation(document, relative, REPOSITORY_CORRUPTION, `${relative}: corrupted package: ${error.message}`);
    }
    throw error;
  }
}

async function inspectRpm(filePath: string, relative: string, document: string): Promise<ValidationViolation | null> {
  try {
    const info = readRpmPackage(await fs.readFile(filePath));
    const fileName = path.basename(relative);
    if (RPM_NAME_PATTERN.test(fileName) && fileName !== expectedRpmFileName(info)) {
      return violation(
        document,
        relative,
        REPOSITORY_CORRUPTION,
        `${relative}: file name does not match package ${info.name}-${info.version}-${info.release}.${info.arch}`
      );
    }
    return null;
  } catch (error) {
    if (error instanceof RpmFormatError) {
      return violation(document, relative, REPOSITORY_CORRUPTION, `${relative}: corrupted package: ${error.message}`);
    }
    throw error;
  }
}

/**
 * @returns one violation per broken package; nothing when the directory does not exist
 */
export async function inspect(
  repositoryPath: string,
  os: OsKind,
  options: InspectOptions = {}
): Promise<ValidationViolation[]> {
  if (!(await fs.pathExists(repositoryPath))) {
    return [];
  }

  const document = options.document ?? `repositories/${os}/${path.basename(repositoryPath)}`;
  const violations: ValidationViolation[] = [];

  for (const relative of await listPackages(repositoryPath, os)) {
    const filePath = path.join(repositoryPath, relative);
    const found =
      os === 'ubuntu' ? await inspectDeb(filePath, relative, document) : await inspectRpm(filePath, relative, document);
    if (found) {
      violations.push(found);
    }
  }

  return violations;
}
