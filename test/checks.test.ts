/**
 * Tests for the Case Checks
 */

import {
  CASE_CONVENTIONS,
  CASE_PREDICATES,
  caseCheck,
  isCaseConvention,
  isCamelCase,
  isKebabCase,
  isPascalCase,
  isSnakeCase,
} from '../src/core/checks';
import { CaseError } from '../src/core/errors';
import { captureError } from './helpers';

describe('Case Checks', () => {
  // ─── Predicates ───────────────────────────────────────────────────────

  describe('camelCase', () => {
    test.each(['fooBar', 'id', 'address2', 'a', 'fooBAR'])('accepts %s', (key) => {
      expect(isCamelCase(key)).toBe(true);
    });

    test.each(['FooBar', 'foo_bar', 'foo-bar', '2fa', 'foo bar', '@_id'])('rejects %s', (key) => {
      expect(isCamelCase(key)).toBe(false);
    });
  });

  describe('PascalCase', () => {
    test.each(['FooBar', 'A', 'Address2'])('accepts %s', (key) => {
      expect(isPascalCase(key)).toBe(true);
    });

    test.each(['fooBar', 'Foo_Bar', 'Foo-Bar'])('rejects %s', (key) => {
      expect(isPascalCase(key)).toBe(false);
    });
  });

  describe('snake_case', () => {
    test.each(['foo_bar', 'foo', 'address_2', 'date_created'])('accepts %s', (key) => {
      expect(isSnakeCase(key)).toBe(true);
    });

    test.each(['fooBar', 'foo__bar', '_foo', 'foo_', 'Foo_bar', 'foo-bar'])('rejects %s', (key) => {
      expect(isSnakeCase(key)).toBe(false);
    });
  });

  describe('kebab-case', () => {
    test.each(['foo-bar', 'foo', 'x-nullable'])('accepts %s', (key) => {
      expect(isKebabCase(key)).toBe(true);
    });

    test.each(['foo_bar', 'fooBar', '-foo', 'foo--bar'])('rejects %s', (key) => {
      expect(isKebabCase(key)).toBe(false);
    });
  });

  test('the empty key satisfies every convention', () => {
    for (const convention of CASE_CONVENTIONS) {
      expect(CASE_PREDICATES[convention]('')).toBe(true);
    }
  });

  // ─── Conventions ──────────────────────────────────────────────────────

  describe('isCaseConvention', () => {
    test('accepts the four supported conventions', () => {
      expect(CASE_CONVENTIONS.every((c) => isCaseConvention(c))).toBe(true);
    });

    test('rejects anything else', () => {
      expect(isCaseConvention('camelcase')).toBe(false);
      expect(isCaseConvention('UPPER_CASE')).toBe(false);
      expect(isCaseConvention(undefined)).toBe(false);
    });
  });

  // ─── caseCheck ────────────────────────────────────────────────────────

  describe('caseCheck', () => {
    test('passes properly cased keys', () => {
      expect(() => caseCheck('camelCase')('fooBar')).not.toThrow();
      expect(() => caseCheck('snake_case')('foo_bar')).not.toThrow();
    });

    test('throws a CaseError naming the key and convention', () => {
      const error = captureError(() => caseCheck('camelCase')('date_created'));
      expect(error).toBeInstanceOf(CaseError);
      expect(error).toHaveProperty('message', 'The property `date_created` is not properly camelCased');
      expect(error).toHaveProperty('key', 'date_created');
      expect(error).toHaveProperty('convention', 'camelCase');
    });

    test('includes the path when one is given', () => {
      const error = captureError(() => caseCheck('snake_case')('ownerAsString', '$.owner.ownerAsString'));
      expect(error).toHaveProperty(
        'message',
        'The property `ownerAsString` is not properly snake_cased\n\nPath: $.owner.ownerAsString'
      );
      expect(error).toHaveProperty('path', '$.owner.ownerAsString');
    });

    test.each([
      ['kebab-case', 'kebab-cased'],
      ['PascalCase', 'PascalCased'],
    ] as const)('labels %s violations as %s', (convention, label) => {
      expect(() => caseCheck(convention)('some_key')).toThrow(
        `The property \`some_key\` is not properly ${label}`
      );
    });
  });
});
