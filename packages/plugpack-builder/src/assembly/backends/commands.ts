/**
 * Lookup of executables on PATH
 */

import fs from 'fs-extra';
import path from 'path';

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) {
      return false;
    }
    await fs.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * @returns the absolute path of `command`, or null when it is not found
 */
export async function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  if (command.includes('/') || command.includes(path.sep)) {
    const resolved = path.resolve(command);
    return (await isExecutable(resolved)) ? resolved : null;
  }

  const extensions = process.platform === 'win32' ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];
  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (!dir) {
      continue;
    }
    for (const extension of extensions) {
      const candidate = path.join(dir, command + extension);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

/**
 * @returns the commands that could not be found, in the given order without repeats
 */
export async function findMissingCommands(
  commands: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  const missing: string[] = [];
  for (const command of new Set(commands)) {
    if ((await findExecutable(command, env)) === null) {
      missing.push(command);
    }
  }
  return missing;
}
