/**
 * Package format 3.0.0
 *
 * Native package layout with install hooks: pre_install.sh,
 * post_install.sh and uninstall.sh from the plugin root are embedded in
 * the package. `groups` is mandatory (it may be empty).
 */

import { z } from 'zod';
import type { SchemaV3 } from './types';
import {
  ATTRIBUTE_TYPES,
  groupTags,
  homepageUrl,
  nonEmptyString,
  parameterMap,
  pluginName,
  release,
  restriction,
  roleSelector,
  semanticVersion,
  stringList,
} from './fields';

const metadata = z
  .object({
    name: pluginName,
    title: nonEmptyString,
    version: semanticVersion,
    package_format_version: z.literal('3.0.0'),
    description: z.string(),
    groups: groupTags,
    licenses: stringList,
    authors: stringList,
    homepage: homepageUrl,
    releases: z.array(release).min(1, 'must declare at least one release'),
  })
  .passthrough();

const task = z
  .object({
    id: nonEmptyString,
    type: z.enum(['puppet', 'shell', 'reboot']),
    stage: nonEmptyString,
    role: roleSelector,
    parameters: parameterMap.optional(),
  })
  .passthrough();

const attribute = z
  .object({
    type: z.enum(ATTRIBUTE_TYPES),
    label: nonEmptyString,
    description: z.string().optional(),
    weight: z.number().optional(),
    value: z.unknown().optional(),
    required: z.boolean().optional(),
    restrictions: z.array(restriction).optional(),
  })
  .passthrough();

export const schemaV3: SchemaV3 = Object.freeze({
  formatVersion: '3.0.0',
  layout: 'native-package',
  metadata,
  metadataFields: Object.freeze(Object.keys(metadata.shape)),
  task,
  taskIdRequired: true,
  taskTypes: Object.freeze({
    puppet: {
      parameters: z
        .object({ puppet_manifest: nonEmptyString, puppet_modules: nonEmptyString })
        .passthrough(),
      requiresTimeout: true,
      timeoutHint: 'the number of seconds to wait for the puppet run to finish',
    },
    shell: {
      parameters: z.object({ cmd: nonEmptyString }).passthrough(),
      requiresTimeout: true,
      timeoutHint: 'the number of seconds to wait for the command to finish',
    },
    reboot: {
      parameters: z.object({}).passthrough(),
      requiresTimeout: true,
      timeoutHint: 'the number of seconds to wait for the node to come back after the restart',
    },
  }),
  attribute,
  stages: Object.freeze({
    stages: Object.freeze(['pre_deployment', 'deployment', 'post_deployment']),
    rebootTaskType: 'reboot',
  }),
  installHooks: true,
} as const);
