/**
 * openapi-case-tester
 *
 * Assert that API responses and OpenAPI schemas use one key-case convention.
 *
 * @example
 * ```typescript
 * import { CaseTester } from 'openapi-case-tester';
 *
 * const tester = new CaseTester({ case: 'camelCase' });
 *
 * // Throws CaseError naming the first miscased key
 * tester.validateResponse(res.body, ['legacy_id']);
 * tester.validateSchema(tester.responseSchema(openapi, '/users/{id}', 'get', 200));
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { CaseTester, validateResponseCase, validateSchemaCase } from './tester';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  CaseConvention,
  CasePredicate,
  KeyCheck,
  SchemaNode,
  TypeName,
  LogLevel,
  LoggerProvider,
  Settings,
  WalkOptions,
  ResponseSchemaEntry,
  FailureKind,
  CaseFailure,
  CaseReport,
  DocumentReport,
  ReportFormat,
  InputFormat,
  InputRole,
  CaseTesterOptions,
} from './core/types';

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  CaseTesterError,
  CaseError,
  OpenAPISchemaError,
  SwaggerDocumentationError,
  ImproperlyConfigured,
} from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export {
  listTypes,
  readType,
  readItems,
  readProperties,
  readAdditionalProperties,
  isNullable,
  indexSchema,
  isMapping,
  isSequence,
} from './core/openapi';
export {
  CASE_CONVENTIONS,
  CASE_PREDICATES,
  isCaseConvention,
  isCamelCase,
  isSnakeCase,
  isKebabCase,
  isPascalCase,
  caseCheck,
} from './core/checks';
export { ResponseCaseTester, SchemaCaseTester, conditionalCheck } from './core/walker';
export { listResponseSchemas, responseSchema } from './core/document';
export { formatReport } from './core/reporter';

// ─── Settings & Logging ─────────────────────────────────────────────────────
export { DEFAULT_SETTINGS, resolveSettings, loadSettingsFile } from './config';
export { ConsoleLogger } from './logger/console-logger';

// ─── Format Parsers ─────────────────────────────────────────────────────────
export {
  parseJson,
  isJson,
  parseXml,
  isXml,
  xmlMarkupKeys,
  XML_ATTRIBUTE_PREFIX,
  XML_TEXT_KEY,
  parseYaml,
  autoParse,
  detectFormat,
} from './formats';
