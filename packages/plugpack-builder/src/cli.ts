/**
 * CLI setup and command registration
 */

import { Command } from 'commander';
import { createBuildCommand } from './commands/build';
import { CommandContext, processContext } from './commands/context';
import { createValidateCommand } from './commands/validate';

export const VERSION = '1.0.0';

export function createCLI(context: CommandContext = processContext()): Command {
  const program = new Command();

  program
    .name('plugpack')
    .description('Validate deployment plugins and build their packages')
    .version(VERSION, '-V, --version', 'Output the current version');

  program.addCommand(createBuildCommand(context));
  program.addCommand(createValidateCommand(context));

  return program;
}

export async function runCLI(argv: readonly string[] = process.argv, context?: CommandContext): Promise<void> {
  await createCLI(context).parseAsync([...argv]);
}
