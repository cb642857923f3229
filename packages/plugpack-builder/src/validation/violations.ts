/**
 * Helpers for building and ordering validation violations
 */

import type { ValidationViolation, ViolationSeverity } from '@plugpack/errors';

export type PathSegment = string | number;

export function formatPath(segments: readonly PathSegment[]): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out.length === 0 ? '(document)' : out;
}

export function violation(
  document: string,
  segments: readonly PathSegment[] | string,
  ruleId: string,
  message: string,
  severity: ViolationSeverity = 'error'
): ValidationViolation {
  return {
    location: { document, path: typeof segments === 'string' ? segments : formatPath(segments) },
    ruleId,
    message,
    severity,
  };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Violations form a set: duplicates are dropped and the order is fixed by
 * document, path, rule and message.
 */
export function normalizeViolations(violations: readonly ValidationViolation[]): ValidationViolation[] {
  const seen = new Map<string, ValidationViolation>();
  for (const v of violations) {
    const key = [v.location.document, v.location.path, v.ruleId, v.message, v.severity].join('\u0000');
    if (!seen.has(key)) {
      seen.set(key, v);
    }
  }

  return [...seen.values()].sort(
    (a, b) =>
      compare(a.location.document, b.location.document) ||
      compare(a.location.path, b.location.path) ||
      compare(a.ruleId, b.ruleId) ||
      compare(a.message, b.message)
  );
}

export function hasErrors(violations: readonly ValidationViolation[]): boolean {
  return violations.some((v) => v.severity === 'error');
}

export function formatViolation(v: ValidationViolation): string {
  return `${v.location.document}:${v.location.path} [${v.ruleId}] ${v.message}`;
}
