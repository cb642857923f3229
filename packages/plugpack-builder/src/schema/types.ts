/**
 * Schema Registry types
 *
 * A schema is a closed, immutable description of one package-format
 * version. Versions are separate variants; none is derived from another.
 */

import type { z } from 'zod';
import type { EnvironmentAttribute, FormatVersion, PluginDescriptor } from '../types/plugin';

export type OutputLayout = 'legacy-bundle' | 'native-package';

/**
 * Stage names known to one format version, in execution order.
 * Passed to the planner explicitly; there is no process-wide vocabulary.
 */
export interface StageVocabulary {
  readonly stages: readonly string[];
  /** Task type planned as a reboot marker, or null when the version has none */
  readonly rebootTaskType: string | null;
}

export interface TaskTypeRule {
  /** Structural checks of `parameters`, timeout excluded */
  readonly parameters: z.ZodTypeAny;
  readonly requiresTimeout: boolean;
  /** Why the timeout matters for this type; used in the missing-timeout message */
  readonly timeoutHint: string;
}

/**
 * Task entry as accepted by the task shape rules, before ids are defaulted
 */
export interface RawTask {
  id?: string;
  type: string;
  stage: string;
  role: '*' | string[];
  parameters?: Record<string, unknown>;
}

interface SchemaDefinition<V extends FormatVersion, L extends OutputLayout> {
  readonly formatVersion: V;
  readonly layout: L;
  readonly metadata: z.ZodType<PluginDescriptor, z.ZodTypeDef, unknown>;
  /** Top-level metadata keys this version declares; others are warned about */
  readonly metadataFields: readonly string[];
  readonly task: z.ZodType<RawTask, z.ZodTypeDef, unknown>;
  readonly taskIdRequired: boolean;
  readonly taskTypes: Readonly<Record<string, TaskTypeRule>>;
  readonly attribute: z.ZodType<EnvironmentAttribute, z.ZodTypeDef, unknown>;
  readonly stages: StageVocabulary;
  /** Package pre_install.sh / post_install.sh / uninstall.sh into the native package */
  readonly installHooks: boolean;
}

export type SchemaV1 = SchemaDefinition<'1.0.0', 'legacy-bundle'>;
export type SchemaV2 = SchemaDefinition<'2.0.0', 'native-package'>;
export type SchemaV3 = SchemaDefinition<'3.0.0', 'native-package'>;

export type PluginSchema = SchemaV1 | SchemaV2 | SchemaV3;
