/**
 * Builder settings from the environment (and an optional .env file)
 */

import { ConfigLoader, ConfigSchema } from '@plugpack/config';
import { ConfigurationError } from '@plugpack/errors';
import type { LogFormat, LogLevel } from '@plugpack/logger';
import { TIE_POLICIES, TiePolicy } from '../stages/planner';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json'];

export const builderConfigSchema: ConfigSchema = {
  logLevel: {
    env: 'PLUGPACK_LOG_LEVEL',
    type: 'enum',
    values: LOG_LEVELS,
    default: 'info',
    description: 'Minimum level written by the logger',
  },
  logFormat: {
    env: 'PLUGPACK_LOG_FORMAT',
    type: 'enum',
    values: LOG_FORMATS,
    default: 'pretty',
    description: 'Log line format',
  },
  stageTies: {
    env: 'PLUGPACK_STAGE_TIES',
    type: 'enum',
    values: TIE_POLICIES,
    default: 'declaration-order',
    description: 'Handling of tasks that share stage and priority',
  },
  checkCommands: {
    env: 'PLUGPACK_CHECK_COMMANDS',
    type: 'boolean',
    default: true,
    description: 'Check that packaging commands are on PATH before building',
  },
  outputDir: {
    env: 'PLUGPACK_OUTPUT_DIR',
    type: 'string',
    description: 'Default output directory; <plugin>/dist when unset',
  },
};

export interface BuilderConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  stageTies: TiePolicy;
  checkCommands: boolean;
  outputDir?: string;
}

function pick<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

/**
 * @throws ConfigurationError when a variable holds a value outside its schema
 */
export function loadBuilderConfig(env: NodeJS.ProcessEnv = process.env): BuilderConfig {
  const loader = new ConfigLoader({ schema: builderConfigSchema, env });
  try {
    loader.load();
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  const outputDir = loader.getString('outputDir');
  return {
    logLevel: pick(LOG_LEVELS, loader.get('logLevel'), 'info'),
    logFormat: pick(LOG_FORMATS, loader.get('logFormat'), 'pretty'),
    stageTies: pick(TIE_POLICIES, loader.get('stageTies'), 'declaration-order'),
    checkCommands: loader.getBoolean('checkCommands') ?? true,
    ...(outputDir ? { outputDir } : {}),
  };
}
