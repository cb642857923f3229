/**
 * Translation of zod issues into validation violations
 */

import type { ZodIssue } from 'zod';
import type { ValidationViolation } from '@plugpack/errors';
import { isMapping } from '../loader/document-loader';
import { formatPath, PathSegment, violation } from './violations';

function valueAt(input: unknown, segments: readonly PathSegment[]): unknown {
  let current: unknown = input;
  for (const segment of segments) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isMapping(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * @param input the value that was parsed, used to tell missing fields from wrong ones
 * @param base  where `input` sits inside its document
 */
export function issuesToViolations(
  document: string,
  issues: readonly ZodIssue[],
  input: unknown,
  base: readonly PathSegment[] = []
): ValidationViolation[] {
  return issues.map((issue) => {
    const full = [...base, ...issue.path];
    const field = formatPath(full);

    if (full.length === 0) {
      const got = issue.code === 'invalid_type' ? `, got ${issue.received}` : '';
      return violation(document, full, 'document-type', `expected a mapping at the top level${got}`);
    }

    if (valueAt(input, issue.path) === undefined) {
      return violation(document, full, 'required-field', `missing required field "${field}"`);
    }

    switch (issue.code) {
      case 'invalid_type':
        return violation(document, full, 'field-type', `"${field}" must be ${issue.expected}, got ${issue.received}`);
      case 'invalid_enum_value':
        return violation(
          document,
          full,
          'enum-value',
          `"${field}" has value "${String(issue.received)}"; allowed values are: ${issue.options.join(', ')}`
        );
      case 'invalid_literal':
        return violation(document, full, 'enum-value', `"${field}" must be ${JSON.stringify(issue.expected)}`);
      case 'invalid_union':
        return violation(document, full, 'field-type', `"${field}" ${issue.message}`);
      default:
        return violation(document, full, 'field-format', `"${field}" ${issue.message}`);
    }
  });
}
