export { schemaFor, isSupportedFormatVersion, supportedFormatVersions } from './registry';
export type {
  OutputLayout,
  PluginSchema,
  RawTask,
  SchemaV1,
  SchemaV2,
  SchemaV3,
  StageVocabulary,
  TaskTypeRule,
} from './types';
