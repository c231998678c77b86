/**
 * Tests for the Schema Accessors
 */

import {
  listTypes,
  readType,
  readItems,
  readProperties,
  readAdditionalProperties,
  isNullable,
  indexSchema,
  isMapping,
  isSequence,
} from '../src/core/openapi';
import { OpenAPISchemaError, SwaggerDocumentationError } from '../src/core/errors';
import { RecordingLogger, captureError } from './helpers';

const example = {
  title: 'Other stuff',
  required: ['foo'],
  type: 'object',
  properties: { foo: { title: 'Foo', type: 'string', minLength: 1 } },
};

const additionalExample = {
  title: 'Other stuff',
  required: ['foo'],
  type: 'object',
  additionalProperties: { title: 'Foo', type: 'string', minLength: 1 },
};

describe('Schema Accessors', () => {
  // ─── Guards ───────────────────────────────────────────────────────────

  describe('Guards', () => {
    test('isMapping accepts plain objects only', () => {
      expect(isMapping({})).toBe(true);
      expect(isMapping([])).toBe(false);
      expect(isMapping(null)).toBe(false);
      expect(isMapping('object')).toBe(false);
    });

    test('isSequence accepts arrays only', () => {
      expect(isSequence([])).toBe(true);
      expect(isSequence({ length: 0 })).toBe(false);
    });
  });

  // ─── listTypes ────────────────────────────────────────────────────────

  test('lists the seven supported types', () => {
    expect(listTypes()).toEqual(['string', 'boolean', 'integer', 'number', 'file', 'object', 'array']);
  });

  // ─── readType ─────────────────────────────────────────────────────────

  describe('readType', () => {
    test('returns a supported type', () => {
      expect(readType({ type: 'object' })).toBe('object');
      expect(readType({ type: 'string' })).toBe('string');
    });

    test.each([
      ['an empty object', {}],
      ['null', null],
      ['undefined', undefined],
      ['a string', 'not a dict'],
      ['an array', [{ type: 'object' }]],
      ['an empty type', { type: '' }],
      ['a list of types', { type: ['string', 'null'] }],
      ['a numeric type', { type: 5 }],
    ])('rejects %s', (_label, item) => {
      expect(() => readType(item)).toThrow(OpenAPISchemaError);
      expect(() => readType(item)).toThrow(
        'Schema item has an invalid `type` attribute. The type should be a single string.'
      );
    });

    test('rejects unsupported type names and renders the node', () => {
      const error = captureError(() => readType({ type: 'bogus' }));
      expect(error).toBeInstanceOf(OpenAPISchemaError);
      expect(error).toHaveProperty(
        'message',
        "Schema item has an invalid `type` attribute. The type `bogus` is not supported.\n\nSchema item: { type: 'bogus' }"
      );
    });

    test('ignores inherited properties', () => {
      const item: Record<string, unknown> = Object.create({ type: 'object' });
      expect(() => readType(item)).toThrow(OpenAPISchemaError);
    });
  });

  // ─── readItems ────────────────────────────────────────────────────────

  describe('readItems', () => {
    test('returns the items node unchanged', () => {
      expect(readItems({ items: 'test' })).toBe('test');
      const items = { type: 'integer' };
      expect(readItems({ type: 'array', items })).toBe(items);
    });

    test('throws when items are missing', () => {
      expect(() => readItems({ 'no-items': 'woops' })).toThrow(OpenAPISchemaError);
      expect(() => readItems({})).toThrow('Array is missing an `items` attribute.');
    });

    test('throws for non-object nodes', () => {
      expect(() => readItems(null)).toThrow(OpenAPISchemaError);
    });
  });

  // ─── readProperties ───────────────────────────────────────────────────

  describe('readProperties', () => {
    test('returns named properties unchanged', () => {
      expect(readProperties(example)).toBe(example.properties);
      expect(readProperties(example)).toEqual({ foo: { title: 'Foo', type: 'string', minLength: 1 } });
    });

    test('maps additionalProperties to the empty key', () => {
      expect(readProperties(additionalExample)).toEqual({
        '': { title: 'Foo', type: 'string', minLength: 1 },
      });
    });

    test('prefers properties when both are present', () => {
      const both = { type: 'object', properties: { a: { type: 'string' } }, additionalProperties: { type: 'integer' } };
      expect(readProperties(both)).toEqual({ a: { type: 'string' } });
    });

    test('throws when neither is present', () => {
      expect(() => readProperties({})).toThrow(OpenAPISchemaError);
      expect(() => readProperties({ type: 'object' })).toThrow('Object is missing a `properties` attribute.');
    });

    test('throws when properties is not an object', () => {
      expect(() => readProperties({ type: 'object', properties: ['a'] })).toThrow(OpenAPISchemaError);
    });
  });

  // ─── readAdditionalProperties ─────────────────────────────────────────

  describe('readAdditionalProperties', () => {
    test('returns the additionalProperties node', () => {
      expect(readAdditionalProperties(additionalExample)).toBe(additionalExample.additionalProperties);
    });

    test('throws when absent', () => {
      expect(() => readAdditionalProperties({})).toThrow(
        'Object is missing a `additionalProperties` attribute.'
      );
    });
  });

  // ─── isNullable ───────────────────────────────────────────────────────

  describe('isNullable', () => {
    test('recognises both flag spellings with the string "true"', () => {
      expect(isNullable({ title: 'ID', type: 'integer', 'x-nullable': 'true' })).toBe(true);
      expect(isNullable({ title: 'First name', type: 'string', nullable: 'true' })).toBe(true);
    });

    test('does not recognise a boolean true', () => {
      expect(isNullable({ nullable: true })).toBe(false);
      expect(isNullable({ 'x-nullable': true })).toBe(false);
    });

    test.each([[2], [''], [null], [undefined], [-1], [{}], [{ nullable: 'false' }]])(
      'returns false for %p',
      (item) => {
        expect(isNullable(item)).toBe(false);
      }
    );
  });

  // ─── indexSchema ──────────────────────────────────────────────────────

  describe('indexSchema', () => {
    test('returns the indexed value and logs the lookup', () => {
      const logger = new RecordingLogger();
      expect(indexSchema({ paths: { '/': {} } }, 'paths', '', logger)).toEqual({ '/': {} });
      expect(logger.messages).toEqual(['Indexing schema by `paths`']);
    });

    test('throws a documentation error with the addon appended', () => {
      const error = captureError(() => indexSchema({}, 'paths', '\n\nhint', new RecordingLogger()));
      expect(error).toBeInstanceOf(SwaggerDocumentationError);
      expect(error).toHaveProperty(
        'message',
        'Failed indexing schema.\n\nError: Unsuccessfully tried to index the OpenAPI schema by `paths`.\n\nhint'
      );
    });

    test('does not find inherited keys', () => {
      expect(() => indexSchema({}, 'toString', '', new RecordingLogger())).toThrow(SwaggerDocumentationError);
    });

    test('throws when the schema is not an object', () => {
      expect(() => indexSchema('paths', 'paths', '', new RecordingLogger())).toThrow(SwaggerDocumentationError);
    });
  });
});
