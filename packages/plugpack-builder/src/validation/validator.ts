/**
 * Validator
 *
 * Applies the schema of the declared package format to the documents of a
 * plugin tree and to its release repositories. Every check runs; problems
 * are accumulated, never thrown one by one. The only exception is an
 * unsupported format version, since nothing else can be checked without
 * a schema.
 */

import path from 'path';
import type { ValidationViolation } from '@plugpack/errors';
import { isMapping, PluginDocuments } from '../loader/document-loader';
import { inspect } from '../repository/inspector';
import { schemaFor } from '../schema/registry';
import type { PluginSchema } from '../schema/types';
import type { EnvironmentConfig, FormatVersion, PluginDescriptor, TaskDescriptor } from '../types/plugin';
import { METADATA_FILE } from '../types/plugin';
import { checkEnvironment, EnvironmentCheck } from './environment-rules';
import { checkMetadataFields, checkReleasePaths } from './metadata-rules';
import { checkTasks, TaskCheck } from './task-rules';
import { hasErrors, normalizeViolations, violation } from './violations';

/**
 * A plugin tree that passed validation, ready for planning and assembly
 */
export interface ValidatedPlugin {
  root: string;
  schema: PluginSchema;
  descriptor: PluginDescriptor;
  tasks: TaskDescriptor[];
  environment: EnvironmentConfig;
}

export interface ValidationReport {
  /** Unset when metadata.yaml could not be read */
  formatVersion?: FormatVersion;
  /** Deduplicated and sorted */
  violations: ValidationViolation[];
  /** Set only when no violation is an error */
  plugin?: ValidatedPlugin;
}

/**
 * Reads the declared format version without validating anything else.
 * `found` is false when metadata.yaml is unusable; the loader or the
 * top-level type check reports why.
 */
export function declaredFormatVersion(documents: PluginDocuments): { found: boolean; value: unknown } {
  const content = documents.metadata.content;
  if (!documents.metadata.readable || !isMapping(content)) {
    return { found: false, value: undefined };
  }
  return { found: true, value: content.package_format_version };
}

/**
 * @throws UnsupportedFormatVersionError when metadata.yaml declares an unknown package_format_version
 */
export function resolveSchema(documents: PluginDocuments): PluginSchema | null {
  const declared = declaredFormatVersion(documents);
  return declared.found ? schemaFor(declared.value) : null;
}

export async function validate(documents: PluginDocuments): Promise<ValidationReport> {
  const violations: ValidationViolation[] = [...documents.violations];
  const metadata = documents.metadata.content;

  if (documents.metadata.readable && !isMapping(metadata)) {
    violations.push(violation(METADATA_FILE, [], 'document-type', 'expected a mapping at the top level'));
  }

  const schema = resolveSchema(documents);
  if (!schema || !isMapping(metadata)) {
    return { violations: normalizeViolations(violations) };
  }

  const fields = checkMetadataFields(schema, metadata);
  violations.push(...fields.violations);

  const releases = await checkReleasePaths(documents.root, metadata);
  violations.push(...releases.violations);

  const tasks: TaskCheck = documents.tasks.readable ? checkTasks(schema, documents.tasks.content) : { violations: [] };
  violations.push(...tasks.violations);

  const pluginName = typeof metadata.name === 'string' ? metadata.name : null;
  const environment: EnvironmentCheck = documents.environment.readable
    ? checkEnvironment(schema, documents.environment.content, pluginName)
    : { violations: [] };
  violations.push(...environment.violations);

  for (const repository of releases.repositories) {
    violations.push(
      ...(await inspect(path.join(documents.root, repository.repositoryPath), repository.os, {
        document: repository.repositoryPath,
      }))
    );
  }

  const report: ValidationReport = {
    formatVersion: schema.formatVersion,
    violations: normalizeViolations(violations),
  };

  if (!hasErrors(report.violations) && fields.descriptor && tasks.tasks && environment.environment) {
    report.plugin = {
      root: documents.root,
      schema,
      descriptor: fields.descriptor,
      tasks: tasks.tasks,
      environment: environment.environment,
    };
  }

  return report;
}
