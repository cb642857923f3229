/**
 * Document Loader
 *
 * Reads the YAML documents of a plugin tree. Problems reading or parsing a
 * document are returned as violations so that all of them reach the author
 * in one run.
 */

import fs from 'fs-extra';
import path from 'path';
import * as yaml from 'js-yaml';
import type { ValidationViolation } from '@plugpack/errors';
import { ENVIRONMENT_CONFIG_FILE, METADATA_FILE, TASKS_FILE } from '../types/plugin';
import { violation } from '../validation/violations';

export interface LoadedDocument {
  /** File name relative to the plugin root */
  name: string;
  exists: boolean;
  /** Parsed YAML; `null` for an empty or unreadable document */
  content: unknown;
  /** False when the file is missing, cannot be read or is not valid YAML */
  readable: boolean;
}

export interface PluginDocuments {
  root: string;
  metadata: LoadedDocument;
  tasks: LoadedDocument;
  environment: LoadedDocument;
  violations: ValidationViolation[];
}

async function loadDocument(root: string, name: string, violations: ValidationViolation[]): Promise<LoadedDocument> {
  const filePath = path.join(root, name);

  if (!(await fs.pathExists(filePath))) {
    violations.push(violation(name, [], 'missing-document', `${name} is missing from the plugin directory`));
    return { name, exists: false, content: null, readable: false };
  }

  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    violations.push(violation(name, [], 'document-read', `${name} could not be read: ${reason}`));
    return { name, exists: true, content: null, readable: false };
  }

  try {
    const content = yaml.load(text, { filename: name });
    return { name, exists: true, content: content === undefined ? null : content, readable: true };
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      violations.push(
        violation(name, [], 'document-syntax', `invalid YAML at line ${error.mark.line + 1}: ${error.reason}`)
      );
      return { name, exists: true, content: null, readable: false };
    }
    throw error;
  }
}

export async function loadPluginDocuments(pluginRoot: string): Promise<PluginDocuments> {
  const root = path.resolve(pluginRoot);
  const violations: ValidationViolation[] = [];

  const metadata = await loadDocument(root, METADATA_FILE, violations);
  const tasks = await loadDocument(root, TASKS_FILE, violations);
  const environment = await loadDocument(root, ENVIRONMENT_CONFIG_FILE, violations);

  return { root, metadata, tasks, environment, violations };
}

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
