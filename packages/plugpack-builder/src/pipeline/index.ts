export { build, checkPlugin } from './build';
export type { BuildArtifact, BuildFailure, BuildOptions, CheckOptions } from './build';
export { ExecaHookRunner, findPreBuildHook } from './hooks';
export type { HookRunner } from './hooks';
