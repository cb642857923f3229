/**
 * Package format 1.0.0
 *
 * Legacy bundle layout. Pre- and post-deployment stages only; authors,
 * licenses and homepage are optional.
 */

import { z } from 'zod';
import type { SchemaV1 } from './types';
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
    package_format_version: z.literal('1.0.0'),
    description: z.string(),
    groups: groupTags.optional(),
    licenses: stringList.optional(),
    authors: stringList.optional(),
    homepage: homepageUrl.optional(),
    releases: z.array(release).min(1, 'must declare at least one release'),
  })
  .passthrough();

const task = z
  .object({
    id: nonEmptyString.optional(),
    type: z.enum(['puppet', 'shell']),
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

export const schemaV1: SchemaV1 = Object.freeze({
  formatVersion: '1.0.0',
  layout: 'legacy-bundle',
  metadata,
  metadataFields: Object.freeze(Object.keys(metadata.shape)),
  task,
  taskIdRequired: false,
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
  }),
  attribute,
  stages: Object.freeze({
    stages: Object.freeze(['pre_deployment', 'post_deployment']),
    rebootTaskType: null,
  }),
  installHooks: false,
} as const);
