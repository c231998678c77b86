/**
 * Case Checks
 *
 * One pure predicate per supported naming convention, and the key check
 * that turns a failed predicate into a CaseError.
 */

import { CaseError, ImproperlyConfigured } from './errors';
import { CaseConvention, CasePredicate, KeyCheck } from './types';

export const CASE_CONVENTIONS: readonly CaseConvention[] = [
  'camelCase',
  'snake_case',
  'kebab-case',
  'PascalCase',
];

export function isCaseConvention(value: unknown): value is CaseConvention {
  return typeof value === 'string' && (CASE_CONVENTIONS as readonly string[]).includes(value);
}

// ─── Predicates ─────────────────────────────────────────────────────────────

const CAMEL_CASE = /^[a-z][a-zA-Z0-9]*$/;
const PASCAL_CASE = /^[A-Z][a-zA-Z0-9]*$/;
const SNAKE_CASE = /^[a-z][a-z0-9]*(?:_[a-z0-9]+)*$/;
const KEBAB_CASE = /^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/;

// The empty key stands in for additionalProperties and passes every check.

export function isCamelCase(key: string): boolean {
  return key === '' || CAMEL_CASE.test(key);
}

export function isPascalCase(key: string): boolean {
  return key === '' || PASCAL_CASE.test(key);
}

export function isSnakeCase(key: string): boolean {
  return key === '' || SNAKE_CASE.test(key);
}

export function isKebabCase(key: string): boolean {
  return key === '' || KEBAB_CASE.test(key);
}

export const CASE_PREDICATES: Record<CaseConvention, CasePredicate> = {
  camelCase: isCamelCase,
  snake_case: isSnakeCase,
  'kebab-case': isKebabCase,
  PascalCase: isPascalCase,
};

// ─── Key Check ──────────────────────────────────────────────────────────────

/**
 * Build the key check for a convention.
 */
export function caseCheck(convention: CaseConvention): KeyCheck {
  if (!isCaseConvention(convention)) {
    throw new ImproperlyConfigured(
      `Unsupported case convention \`${String(convention)}\`. ` +
        `Expected one of: ${CASE_CONVENTIONS.join(', ')}`
    );
  }
  const predicate = CASE_PREDICATES[convention];

  return (key: string, path?: string): void => {
    if (!predicate(key)) {
      throw new CaseError(key, convention, path);
    }
  };
}
