/**
 * Type definitions for @plugpack/config
 */

export type ConfigValue = string | number | boolean;

export interface ConfigSchema {
  [key: string]: ConfigField;
}

export interface ConfigField {
  /** Environment variable name (default: envPrefix + KEY) */
  env?: string;

  /** Default value if not provided */
  default?: ConfigValue;

  /** Whether this field is required */
  required?: boolean;

  /** Field type; strings from the environment are converted to it */
  type?: 'string' | 'number' | 'boolean' | 'enum';

  /** Allowed values for `enum` fields */
  values?: readonly string[];

  /** Validation function */
  validate?: (value: ConfigValue) => boolean | string;

  /** Description of the field */
  description?: string;
}

export interface ConfigOptions {
  /** Configuration schema */
  schema: ConfigSchema;

  /** Path to .env file (default: .env) */
  envFilePath?: string;

  /** Whether to load .env file (default: true) */
  loadEnvFile?: boolean;

  /** Prefix for environment variables (e.g., 'PLUGPACK_') */
  envPrefix?: string;

  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ValidationError[];
  config: Record<string, ConfigValue | undefined>;
}
