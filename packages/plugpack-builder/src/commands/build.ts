/**
 * plugpack build <plugin-path>
 */

import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import path from 'path';
import { ValidationFailedError } from '@plugpack/errors';
import { build } from '../pipeline/build';
import { BuilderConfig, loadBuilderConfig } from '../utils/config';
import { createCliLogger } from '../utils/logger';
import { CommandContext, writeLine } from './context';
import { printFailure, printViolations } from './report';

interface BuildCommandOptions {
  output?: string;
  strictTies?: boolean;
  skipCommandCheck?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export async function buildCommand(
  pluginPath: string,
  options: BuildCommandOptions,
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
  const outputPath = path.resolve(options.output ?? config.outputDir ?? path.join(pluginPath, 'dist'));

  const spinner = ora({
    text: `Building ${pluginPath}`,
    stream: context.stdout,
    isSilent: options.quiet === true,
  }).start();

  const result = await build(pluginPath, outputPath, {
    ...context.buildOptions,
    ties: options.strictTies ? 'error' : config.stageTies,
    checkCommands: options.skipCommandCheck ? false : config.checkCommands,
    logger,
    env: context.env,
  });

  if (result.ok) {
    const artifact = result.value;
    spinner.succeed(`Built ${path.basename(artifact.packagePath)} (package format ${artifact.formatVersion})`);
    printViolations(context.stderr, artifact.warnings);
    writeLine(context.stdout, artifact.packagePath);
    context.exit(0);
    return;
  }

  const error = result.error;
  spinner.fail('Build failed');
  if (error instanceof ValidationFailedError) {
    printViolations(context.stderr, error.violations);
    writeLine(context.stderr, chalk.red(error.message));
    context.exit(error.exitCode);
    return;
  }
  context.exit(printFailure(context.stderr, error));
}

export function createBuildCommand(context: CommandContext): Command {
  return new Command('build')
    .description('Validate a plugin and build its package')
    .argument('<plugin-path>', 'Plugin directory')
    .option('-o, --output <dir>', 'Output directory (default: <plugin-path>/dist)')
    .option('--strict-ties', 'Fail when tasks share stage and priority', false)
    .option('--skip-command-check', 'Do not look up packaging commands on PATH', false)
    .option('-v, --verbose', 'Debug logging', false)
    .option('-q, --quiet', 'Errors only', false)
    .action(async (pluginPath: string, options: BuildCommandOptions) => {
      await buildCommand(pluginPath, options, context);
    });
}
