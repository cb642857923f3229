/**
 * Field rules shared by the version schemas.
 * Each version still lists its complete document shape itself.
 */

import path from 'path';
import { z } from 'zod';

export const PLUGIN_GROUPS = [
  'network',
  'storage',
  'storage::cinder',
  'storage::glance',
  'hypervisor',
  'monitoring',
  'equipment',
] as const;

export const ATTRIBUTE_TYPES = ['text', 'password', 'checkbox', 'select', 'radio', 'textarea'] as const;

export const nonEmptyString = z.string().min(1, 'must not be empty');

export const pluginName = z
  .string()
  .regex(/^[a-z0-9_-]+$/, 'must contain only lowercase letters, digits, "_" and "-"');

export const semanticVersion = z
  .string()
  .regex(/^\d+\.\d+\.\d+$/, 'must be a version of the form x.y.z, e.g. 1.0.0');

export const stringList = z.array(nonEmptyString).min(1, 'must list at least one entry');

export const homepageUrl = z.string().url('must be a URL, e.g. https://example.com/my-plugin');

export const groupTags = z.array(z.enum(PLUGIN_GROUPS));

export const relativePath = nonEmptyString.refine(
  (value) => !path.isAbsolute(value) && !value.split(/[\\/]/).includes('..'),
  'must be a relative path inside the plugin directory'
);

export const release = z
  .object({
    os: z.enum(['ubuntu', 'centos']),
    os_version: nonEmptyString,
    deployment_mode: z.enum(['ha', 'multinode']),
    deployment_scripts_path: relativePath,
    repository_path: relativePath,
  })
  .passthrough();

const ROLE_SELECTOR_MESSAGE = 'must be "*" or a non-empty list of role names';

export const roleSelector = z.union([z.literal('*'), z.array(nonEmptyString).min(1, ROLE_SELECTOR_MESSAGE)], {
  errorMap: () => ({ message: ROLE_SELECTOR_MESSAGE }),
});

export const parameterMap = z.record(z.unknown());

export const restriction = z.union(
  [
    nonEmptyString,
    z.object({
      condition: nonEmptyString,
      message: z.string().optional(),
      action: z.string().optional(),
    }),
  ],
  {
    errorMap: () => ({ message: 'must be an expression or a {condition, message, action} mapping' }),
  }
);
