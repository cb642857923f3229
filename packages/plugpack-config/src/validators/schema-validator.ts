/**
 * Schema Validator
 * Validates configuration against schema
 */

import { ConfigSchema, ConfigValidationResult, ConfigValue, ValidationError } from '../types';

export function validateConfig(
  config: Record<string, ConfigValue | undefined>,
  schema: ConfigSchema
): ConfigValidationResult {
  const errors: ValidationError[] = [];

  for (const [key, field] of Object.entries(schema)) {
    const value = config[key];

    if (field.required && (value === undefined || value === '')) {
      errors.push({
        field: key,
        message: 'Required field is missing',
        value,
      });
      continue;
    }

    if (value === undefined) {
      continue;
    }

    if (field.type) {
      const typeError = validateType(key, value, field.type, field.values);
      if (typeError) {
        errors.push(typeError);
        continue;
      }
    }

    if (field.validate) {
      const result = field.validate(value);
      if (result !== true) {
        errors.push({
          field: key,
          message: typeof result === 'string' ? result : 'Validation failed',
          value,
        });
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    config,
  };
}

function validateType(
  field: string,
  value: ConfigValue,
  type: NonNullable<ConfigSchema[string]['type']>,
  values?: readonly string[]
): ValidationError | null {
  switch (type) {
    case 'string':
      if (typeof value !== 'string') {
        return { field, message: 'Must be a string', value };
      }
      break;

    case 'number':
      if (typeof value !== 'number' || isNaN(value)) {
        return { field, message: 'Must be a number', value };
      }
      break;

    case 'boolean':
      if (typeof value !== 'boolean') {
        return { field, message: 'Must be a boolean', value };
      }
      break;

    case 'enum':
      if (typeof value !== 'string' || !(values ?? []).includes(value)) {
        return { field, message: `Must be one of: ${(values ?? []).join(', ')}`, value };
      }
      break;
  }

  return null;
}
