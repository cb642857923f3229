/**
 * plugpack validate <plugin-path>
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { ValidationFailedError } from '@plugpack/errors';
import { checkPlugin } from '../pipeline/build';
import { hasErrors } from '../validation/violations';
import { BuilderConfig, loadBuilderConfig } from '../utils/config';
import { createCliLogger } from '../utils/logger';
import { CommandContext, writeLine } from './context';
import { printFailure, printViolations } from './report';

interface ValidateCommandOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export async function validateCommand(
  pluginPath: string,
  options: ValidateCommandOptions,
  context: CommandContext
): Promise<void> {
  let config: BuilderConfig;
  try {
    config = loadBuilderConfig(context.env);
  } catch (error) {
    context.exit(printFailure(context.stderr, error));
    return;
  }

  const logger = context.logger ?? createCliLogger(config, options);
  const result = await checkPlugin(pluginPath, { logger });
  if (!result.ok) {
    context.exit(printFailure(context.stderr, result.error));
    return;
  }

  const report = result.value;
  printViolations(context.stderr, report.violations);

  if (hasErrors(report.violations)) {
    const failure = new ValidationFailedError(report.violations);
    writeLine(context.stderr, chalk.red(failure.message));
    context.exit(failure.exitCode);
    return;
  }

  if (!options.quiet) {
    writeLine(context.stdout, chalk.green(`${pluginPath} is a valid plugin (package format ${report.formatVersion})`));
  }
  context.exit(0);
}

export function createValidateCommand(context: CommandContext): Command {
  return new Command('validate')
    .description('Check a plugin against the schema of its package format')
    .argument('<plugin-path>', 'Plugin directory')
    .option('-v, --verbose', 'Debug logging', false)
    .option('-q, --quiet', 'Errors only', false)
    .action(async (pluginPath: string, options: ValidateCommandOptions) => {
      await validateCommand(pluginPath, options, context);
    });
}
