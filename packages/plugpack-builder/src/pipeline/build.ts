/**
 * Build Pipeline
 *
 * build(pluginRoot, outputPath) = load → resolve schema → pre-build hook →
 * validate → plan → command check → assemble. Expected failures come back
 * as the error side of a Result; anything else is a bug and is thrown.
 */

import path from 'path';
import {
  AssemblyIOError,
  HookError,
  InternalError,
  MissingCommandError,
  StagePlanError,
  UnsupportedFormatVersionError,
  ValidationFailedError,
  ValidationViolation,
} from '@plugpack/errors';
import { createSilentLogger, Logger } from '@plugpack/logger';
import { assemble, AssembledPackage } from '../assembly/assembler';
import { findMissingCommands } from '../assembly/backends/commands';
import { CreaterepoIndexer } from '../assembly/backends/createrepo';
import { RpmbuildPackager } from '../assembly/backends/rpmbuild';
import type { NativePackager, RepositoryIndexer } from '../assembly/backends/types';
import { loadPluginDocuments } from '../loader/document-loader';
import { plan, PlannedStep, TiePolicy } from '../stages/planner';
import { err, ok, Result } from '../types/result';
import { resolveSchema, validate, ValidatedPlugin, ValidationReport } from '../validation/validator';
import { hasErrors } from '../validation/violations';
import { ExecaHookRunner, findPreBuildHook, HookRunner } from './hooks';

export interface BuildArtifact extends AssembledPackage {
  plan: PlannedStep[];
  /** Non-blocking violations found during validation */
  warnings: ValidationViolation[];
}

export type BuildFailure =
  | ValidationFailedError
  | UnsupportedFormatVersionError
  | StagePlanError
  | AssemblyIOError
  | MissingCommandError
  | HookError;

export interface CheckOptions {
  logger?: Logger;
}

export interface BuildOptions extends CheckOptions {
  /** Tasks sharing stage and priority (default: declaration-order) */
  ties?: TiePolicy;
  nativePackager?: NativePackager;
  repositoryIndexer?: RepositoryIndexer;
  hookRunner?: HookRunner;
  /** Look up backend commands on PATH before assembling (default: true) */
  checkCommands?: boolean;
  /** Environment used for the PATH lookup (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function asBuildFailure(error: unknown): BuildFailure | null {
  if (
    error instanceof ValidationFailedError ||
    error instanceof UnsupportedFormatVersionError ||
    error instanceof StagePlanError ||
    error instanceof AssemblyIOError ||
    error instanceof MissingCommandError ||
    error instanceof HookError
  ) {
    return error;
  }
  return null;
}

function requiredCommands(plugin: ValidatedPlugin, packager: NativePackager, indexer: RepositoryIndexer): string[] {
  if (plugin.schema.layout === 'legacy-bundle') {
    return [];
  }
  const commands = [...packager.requiredCommands];
  if (plugin.descriptor.releases.some((release) => release.os === 'centos')) {
    commands.push(...indexer.requiredCommands);
  }
  return commands;
}

/**
 * Loads and validates a plugin tree without building it
 */
export async function checkPlugin(
  pluginRoot: string,
  options: CheckOptions = {}
): Promise<Result<ValidationReport, UnsupportedFormatVersionError>> {
  const logger = options.logger ?? createSilentLogger();
  const documents = await loadPluginDocuments(pluginRoot);

  try {
    const report = await validate(documents);
    logger.debug('Validated plugin', {
      root: documents.root,
      formatVersion: report.formatVersion,
      violations: report.violations.length,
    });
    return ok(report);
  } catch (error) {
    if (error instanceof UnsupportedFormatVersionError) {
      return err(error);
    }
    throw error;
  }
}

async function runBuild(pluginRoot: string, outputPath: string, options: BuildOptions): Promise<BuildArtifact> {
  const root = path.resolve(pluginRoot);
  let logger = options.logger ?? createSilentLogger();

  let documents = await loadPluginDocuments(root);
  const schema = resolveSchema(documents);

  if (schema) {
    logger = logger.child({ formatVersion: schema.formatVersion });

    const hook = await findPreBuildHook(root);
    if (hook) {
      logger.info('Running pre-build hook', { hook });
      await (options.hookRunner ?? new ExecaHookRunner()).run(hook, root);
      // The hook may generate or rewrite plugin files
      documents = await loadPluginDocuments(root);
    }
  }

  const report = await validate(documents);
  for (const warning of report.violations.filter((v) => v.severity === 'warning')) {
    logger.warn(warning.message, { document: warning.location.document, path: warning.location.path, rule: warning.ruleId });
  }
  if (hasErrors(report.violations)) {
    throw new ValidationFailedError(report.violations);
  }

  const plugin = report.plugin;
  if (!plugin) {
    throw new InternalError('Validation passed without producing a plugin', { root });
  }
  logger = logger.child({ plugin: plugin.descriptor.name });
  logger.info('Plugin is valid', { tasks: plugin.tasks.length });

  const steps = plan(plugin.tasks, { vocabulary: plugin.schema.stages, ties: options.ties });
  logger.debug('Planned tasks', { steps: steps.map((step) => `${step.kind}:${step.task.id}`) });

  const packager = options.nativePackager ?? new RpmbuildPackager(logger);
  const indexer = options.repositoryIndexer ?? new CreaterepoIndexer(logger);

  if (options.checkCommands ?? true) {
    const missing = await findMissingCommands(requiredCommands(plugin, packager, indexer), options.env);
    if (missing.length > 0) {
      throw new MissingCommandError(missing);
    }
  }

  const assembled = await assemble(plugin, outputPath, { logger, packager, indexer });
  logger.info('Plugin built', { packagePath: assembled.packagePath });

  return {
    ...assembled,
    plan: steps,
    warnings: report.violations.filter((v) => v.severity === 'warning'),
  };
}

/**
 * Builds the plugin at `pluginRoot` into `outputPath`.
 * Callers must serialize builds that share an output path.
 */
export async function build(
  pluginRoot: string,
  outputPath: string,
  options: BuildOptions = {}
): Promise<Result<BuildArtifact, BuildFailure>> {
  try {
    return ok(await runBuild(pluginRoot, outputPath, options));
  } catch (error) {
    const failure = asBuildFailure(error);
    if (failure) {
      return err(failure);
    }
    throw error;
  }
}
