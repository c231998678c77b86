/**
 * Schema Accessors
 *
 * Safe field extraction from OpenAPI schema nodes. This is not an OpenAPI
 * parser: it reads only the keywords needed to walk `object` and `array`
 * nodes, and turns missing or invalid structure into typed errors instead
 * of lookup failures.
 */

import { inspect } from 'util';
import { OpenAPISchemaError, SwaggerDocumentationError } from './errors';
import { LoggerProvider, SchemaNode, TypeName } from './types';
import { defaultLogger } from '../logger/console-logger';

const TYPE_NAMES: readonly TypeName[] = [
  'string',
  'boolean',
  'integer',
  'number',
  'file',
  'object',
  'array',
];

// ─── Guards ─────────────────────────────────────────────────────────────────

export function isMapping(value: unknown): value is SchemaNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSequence(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function hasKey(node: SchemaNode, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(node, key);
}

function isTypeName(value: string): value is TypeName {
  return (TYPE_NAMES as readonly string[]).includes(value);
}

/**
 * Render a node for error messages.
 */
export function describeNode(node: unknown): string {
  return inspect(node, { depth: 4, breakLength: Infinity });
}

// ─── Accessors ──────────────────────────────────────────────────────────────

/**
 * Supported schema item types.
 */
export function listTypes(): TypeName[] {
  return [...TYPE_NAMES];
}

/**
 * Read the `type` of a schema item.
 *
 * The value must be a single type name, not an array of types. OpenAPI has
 * no `null` type; nullability is a separate flag (see isNullable).
 */
export function readType(item: unknown): TypeName {
  const type = isMapping(item) && hasKey(item, 'type') ? item.type : undefined;

  if (typeof type !== 'string' || type === '') {
    throw new OpenAPISchemaError(
      'Schema item has an invalid `type` attribute. The type should be a single string.' +
        `\n\nSchema item: ${describeNode(item)}`
    );
  }
  if (!isTypeName(type)) {
    throw new OpenAPISchemaError(
      `Schema item has an invalid \`type\` attribute. The type \`${type}\` is not supported.` +
        `\n\nSchema item: ${describeNode(item)}`
    );
  }
  return type;
}

/**
 * Read the `items` of an array. Callers must already know the node is an array.
 */
export function readItems(array: unknown): unknown {
  if (!isMapping(array) || !hasKey(array, 'items')) {
    throw new OpenAPISchemaError(
      `Array is missing an \`items\` attribute.\n\nArray schema: ${describeNode(array)}`
    );
  }
  return array.items;
}

export function readAdditionalProperties(schemaObject: unknown): unknown {
  if (!isMapping(schemaObject) || !hasKey(schemaObject, 'additionalProperties')) {
    throw new OpenAPISchemaError(
      'Object is missing a `additionalProperties` attribute.' +
        `\n\nObject schema: ${describeNode(schemaObject)}`
    );
  }
  return schemaObject.additionalProperties;
}

/**
 * Read the `properties` of an object.
 *
 * An object declaring only `additionalProperties` is returned as a single
 * property under the empty-string key, so callers can iterate both shapes
 * the same way. The empty key satisfies every case convention.
 */
export function readProperties(schemaObject: unknown): SchemaNode {
  if (isMapping(schemaObject) && hasKey(schemaObject, 'properties')) {
    const properties = schemaObject.properties;
    if (isMapping(properties)) return properties;
  } else if (isMapping(schemaObject) && hasKey(schemaObject, 'additionalProperties')) {
    return { '': readAdditionalProperties(schemaObject) };
  }
  throw new OpenAPISchemaError(
    `Object is missing a \`properties\` attribute.\n\nObject schema: ${describeNode(schemaObject)}`
  );
}

/**
 * Whether a schema item allows null.
 *
 * OpenAPI 3 spells this `nullable`, Swagger 2 generators the vendor
 * extension `x-nullable`. Only the string value "true" counts: a boolean
 * `true` is not recognised.
 */
export function isNullable(schemaItem: unknown): boolean {
  if (!isMapping(schemaItem)) return false;

  for (const nullableKey of ['nullable', 'x-nullable']) {
    if (hasKey(schemaItem, nullableKey) && schemaItem[nullableKey] === 'true') {
      return true;
    }
  }
  return false;
}

/**
 * Index a schema by key, raising a documentation error when the key is absent.
 *
 * @param errorAddon Extra context appended to the error message
 */
export function indexSchema(
  schema: unknown,
  variable: string,
  errorAddon = '',
  logger: LoggerProvider = defaultLogger
): unknown {
  logger.debug(`Indexing schema by \`${variable}\``);
  if (!isMapping(schema) || !hasKey(schema, variable)) {
    throw new SwaggerDocumentationError(
      'Failed indexing schema.\n\n' +
        `Error: Unsuccessfully tried to index the OpenAPI schema by \`${variable}\`.` +
        errorAddon
    );
  }
  return schema[variable];
}
