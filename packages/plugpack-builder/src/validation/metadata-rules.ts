/**
 * metadata.yaml checks: field rules of the version schema, unknown keys
 * and the directories each release points at.
 */

import fs from 'fs-extra';
import path from 'path';
import type { ValidationViolation } from '@plugpack/errors';
import { isMapping } from '../loader/document-loader';
import type { PluginSchema } from '../schema/types';
import { METADATA_FILE, OsKind, PluginDescriptor } from '../types/plugin';
import { violation } from './violations';
import { issuesToViolations } from './zod-issues';

const RELEASE_PATH_FIELDS = ['deployment_scripts_path', 'repository_path'] as const;

export interface MetadataCheck {
  violations: ValidationViolation[];
  /** Present when every field rule passed */
  descriptor?: PluginDescriptor;
}

/**
 * A repository declared by a release whose directory exists
 */
export interface ReleaseRepository {
  os: OsKind;
  /** As written in metadata.yaml */
  repositoryPath: string;
}

export function checkMetadataFields(schema: PluginSchema, content: Record<string, unknown>): MetadataCheck {
  const violations: ValidationViolation[] = [];

  const parsed = schema.metadata.safeParse(content);
  if (!parsed.success) {
    violations.push(...issuesToViolations(METADATA_FILE, parsed.error.issues, content));
  }

  const declared = new Set(schema.metadataFields);
  for (const key of Object.keys(content)) {
    if (!declared.has(key)) {
      violations.push(
        violation(
          METADATA_FILE,
          [key],
          'unknown-field',
          `unknown field "${key}" is ignored by package format ${schema.formatVersion}`,
          'warning'
        )
      );
    }
  }

  return parsed.success ? { violations, descriptor: parsed.data } : { violations };
}

function isPluginRelativePath(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    !path.isAbsolute(value) &&
    !value.split(/[\\/]/).includes('..')
  );
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

function isOsKind(value: unknown): value is OsKind {
  return value === 'ubuntu' || value === 'centos';
}

/**
 * Checks release directories on disk. Values that fail the field rules are
 * skipped here; they are already reported.
 */
export async function checkReleasePaths(
  root: string,
  content: Record<string, unknown>
): Promise<{ violations: ValidationViolation[]; repositories: ReleaseRepository[] }> {
  const violations: ValidationViolation[] = [];
  const repositories: ReleaseRepository[] = [];
  const seen = new Set<string>();

  const releases = Array.isArray(content.releases) ? content.releases : [];

  for (const [index, entry] of releases.entries()) {
    if (!isMapping(entry)) {
      continue;
    }

    for (const field of RELEASE_PATH_FIELDS) {
      const value = entry[field];
      if (!isPluginRelativePath(value)) {
        continue;
      }
      if (!(await isDirectory(path.join(root, value)))) {
        violations.push(
          violation(
            METADATA_FILE,
            ['releases', index, field],
            'missing-path',
            `directory "${value}" does not exist in the plugin`
          )
        );
        continue;
      }

      const os = entry.os;
      if (field === 'repository_path' && isOsKind(os)) {
        const key = `${os}\u0000${path.normalize(value)}`;
        if (!seen.has(key)) {
          seen.add(key);
          repositories.push({ os, repositoryPath: value });
        }
      }
    }
  }

  return { violations, repositories };
}
