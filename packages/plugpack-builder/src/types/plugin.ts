/**
 * Plugin tree types
 *
 * Documents are read as untyped YAML first; these are the shapes that
 * survive validation.
 */

export type FormatVersion = '1.0.0' | '2.0.0' | '3.0.0';

export type OsKind = 'ubuntu' | 'centos';

export type DeploymentMode = 'ha' | 'multinode';

export type PluginGroup =
  | 'network'
  | 'storage'
  | 'storage::cinder'
  | 'storage::glance'
  | 'hypervisor'
  | 'monitoring'
  | 'equipment';

export interface Release {
  os: OsKind;
  os_version: string;
  deployment_mode: DeploymentMode;
  /** Relative to the plugin root */
  deployment_scripts_path: string;
  /** Relative to the plugin root */
  repository_path: string;
}

/**
 * metadata.yaml
 */
export interface PluginDescriptor {
  name: string;
  title: string;
  /** Plugin version, `x.y.z` */
  version: string;
  package_format_version: FormatVersion;
  description: string;
  groups?: PluginGroup[];
  licenses?: string[];
  authors?: string[];
  homepage?: string;
  releases: Release[];
}

/**
 * Opaque, ordered task payload. Only the per-type structural keys are
 * checked; everything else is passed through untouched.
 */
export type TaskParameters = ReadonlyMap<string, unknown>;

/**
 * One entry of tasks.yaml
 */
export interface TaskDescriptor {
  id: string;
  type: string;
  /** `<stage name>[/<priority>]`, e.g. `post_deployment/20` */
  stage: string;
  role: '*' | string[];
  parameters: TaskParameters;
}

export type AttributeType = 'text' | 'password' | 'checkbox' | 'select' | 'radio' | 'textarea';

export type Restriction = string | { condition: string; message?: string; action?: string };

export interface EnvironmentAttribute {
  type: AttributeType;
  label: string;
  description?: string;
  weight?: number;
  /** Default value shown in the UI */
  value?: unknown;
  required?: boolean;
  restrictions?: Restriction[];
}

/**
 * environment_config.yaml
 */
export interface EnvironmentConfig {
  attributes?: Record<string, EnvironmentAttribute>;
}

export const METADATA_FILE = 'metadata.yaml';
export const TASKS_FILE = 'tasks.yaml';
export const ENVIRONMENT_CONFIG_FILE = 'environment_config.yaml';
export const PRE_BUILD_HOOK_FILE = 'pre_build_hook';
