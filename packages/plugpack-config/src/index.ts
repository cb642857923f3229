/**
 * @plugpack/config
 * Environment-driven configuration for plugpack
 */

export { ConfigLoader } from './config-loader';
export { validateConfig } from './validators/schema-validator';
export type {
  ConfigField,
  ConfigOptions,
  ConfigSchema,
  ConfigValidationResult,
  ConfigValue,
  ValidationError,
} from './types';
