#!/usr/bin/env node

/**
 * plugpack entry point
 */

import chalk from 'chalk';
import { runCLI } from './cli';

runCLI().catch((error: unknown) => {
  process.stderr.write(`${chalk.red.bold('Fatal error:')} ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 70;
});
