/**
 * plugpack builder
 *
 * Validates plugin trees against the schema of their package format and
 * builds legacy bundles or native packages from them.
 */

export { build, checkPlugin, ExecaHookRunner, findPreBuildHook } from './pipeline';
export type { BuildArtifact, BuildFailure, BuildOptions, CheckOptions, HookRunner } from './pipeline';

export { schemaFor, isSupportedFormatVersion, supportedFormatVersions } from './schema';
export type { OutputLayout, PluginSchema, StageVocabulary, TaskTypeRule } from './schema';

export { loadPluginDocuments } from './loader/document-loader';
export type { LoadedDocument, PluginDocuments } from './loader/document-loader';

export { validate, resolveSchema } from './validation/validator';
export type { ValidatedPlugin, ValidationReport } from './validation/validator';
export { formatViolation, hasErrors, normalizeViolations } from './validation/violations';

export { inspect } from './repository/inspector';

export { parseStage, plan, TIE_POLICIES } from './stages/planner';
export type { ParsedStage, PlannedStep, PlanOptions, TiePolicy } from './stages/planner';

export {
  assemble,
  CreaterepoIndexer,
  RpmbuildPackager,
  verifyAptIndex,
  verifyYumIndex,
  writeAptIndex,
  writeBundle,
  writeYumIndex,
} from './assembly';
export type { AssembledPackage, AssembleOptions, NativePackager, NativePackageRequest, RepositoryIndexer } from './assembly';

export { generateManifest, parseManifest, serializeManifest, verifyManifest, MANIFEST_FILE } from './manifest/integrity';
export type { IntegrityManifest, ManifestEntry } from './manifest/integrity';

export { createCLI, runCLI } from './cli';
export { ok, err } from './types/result';
export type { Result } from './types/result';
export * from './types/plugin';
