/**
 * environment_config.yaml checks
 *
 * `attributes` is optional. When present, every attribute carries its own
 * required keys, required attributes have a usable default and
 * restrictions only reference declared attributes.
 */

import type { ValidationViolation } from '@plugpack/errors';
import { isMapping } from '../loader/document-loader';
import type { PluginSchema } from '../schema/types';
import { ENVIRONMENT_CONFIG_FILE, EnvironmentAttribute, EnvironmentConfig } from '../types/plugin';
import { PathSegment, violation } from './violations';
import { issuesToViolations } from './zod-issues';

export interface EnvironmentCheck {
  violations: ValidationViolation[];
  environment?: EnvironmentConfig;
}

/**
 * `attr.value` or `settings:<namespace>.attr.value`. Names preceded by
 * `:` or `.` belong to another expression part and are not matched.
 */
const REFERENCE_PATTERN = /(?<![\w:.-])(?:settings:([A-Za-z0-9_-]+)\.)?([A-Za-z_][A-Za-z0-9_]*)\.value\b/g;

export interface AttributeReference {
  /** Settings namespace, undefined for a bare `attr.value` */
  namespace?: string;
  attribute: string;
}

export function findAttributeReferences(expression: string): AttributeReference[] {
  return [...expression.matchAll(REFERENCE_PATTERN)].map((match) => ({
    namespace: match[1],
    attribute: match[2],
  }));
}

function restrictionExpressions(restrictions: unknown): Array<{ at: PathSegment[]; expression: string }> {
  if (!Array.isArray(restrictions)) {
    return [];
  }
  const found: Array<{ at: PathSegment[]; expression: string }> = [];
  restrictions.forEach((entry: unknown, index: number) => {
    if (typeof entry === 'string') {
      found.push({ at: [index], expression: entry });
    } else if (isMapping(entry) && typeof entry.condition === 'string') {
      found.push({ at: [index, 'condition'], expression: entry.condition });
    }
  });
  return found;
}

export function checkEnvironment(schema: PluginSchema, content: unknown, pluginName: string | null): EnvironmentCheck {
  const document: unknown = content === null ? {} : content;
  if (!isMapping(document)) {
    return {
      violations: [violation(ENVIRONMENT_CONFIG_FILE, [], 'document-type', 'expected a mapping at the top level')],
    };
  }

  const rawAttributes = document.attributes;
  if (rawAttributes === undefined || rawAttributes === null) {
    return { violations: [], environment: {} };
  }
  if (!isMapping(rawAttributes)) {
    return {
      violations: [
        violation(
          ENVIRONMENT_CONFIG_FILE,
          ['attributes'],
          'field-type',
          '"attributes" must be a mapping of attribute names to attribute definitions'
        ),
      ],
    };
  }

  const violations: ValidationViolation[] = [];
  const attributes: Record<string, EnvironmentAttribute> = {};
  const declared = new Set(Object.keys(rawAttributes));

  for (const [name, raw] of Object.entries(rawAttributes)) {
    const at: PathSegment[] = ['attributes', name];

    const parsed = schema.attribute.safeParse(raw);
    if (parsed.success) {
      attributes[name] = parsed.data;
    } else {
      violations.push(...issuesToViolations(ENVIRONMENT_CONFIG_FILE, parsed.error.issues, raw, at));
    }

    if (!isMapping(raw)) {
      continue;
    }

    if (raw.required === true && 'value' in raw && (raw.value === null || raw.value === '')) {
      violations.push(
        violation(
          ENVIRONMENT_CONFIG_FILE,
          [...at, 'value'],
          'required-attribute-default',
          `attribute "${name}" is required but its default value is empty; provide a default or drop "required"`
        )
      );
    }

    for (const { at: offset, expression } of restrictionExpressions(raw.restrictions)) {
      for (const reference of findAttributeReferences(expression)) {
        const local = reference.namespace === undefined || reference.namespace === pluginName;
        if (local && !declared.has(reference.attribute)) {
          violations.push(
            violation(
              ENVIRONMENT_CONFIG_FILE,
              [...at, 'restrictions', ...offset],
              'restriction-reference',
              `restriction "${expression}" references undeclared attribute "${reference.attribute}"`
            )
          );
        }
      }
    }
  }

  return violations.length === 0 ? { violations, environment: { attributes } } : { violations };
}
