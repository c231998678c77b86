/**
 * Error taxonomy.
 *
 * - CaseError: a key violates the active case convention
 * - OpenAPISchemaError: the schema under test is structurally invalid
 * - SwaggerDocumentationError: an expected path/method/status is missing from a document
 * - ImproperlyConfigured: the tester's own settings are invalid
 */

import { CaseConvention } from './types';

export const CASE_LABEL: Record<CaseConvention, string> = {
  camelCase: 'camelCased',
  snake_case: 'snake_cased',
  'kebab-case': 'kebab-cased',
  PascalCase: 'PascalCased',
};

export class CaseTesterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class CaseError extends CaseTesterError {
  readonly key: string;
  readonly convention: CaseConvention;
  readonly path?: string;

  constructor(key: string, convention: CaseConvention, path?: string) {
    const location = path ? `\n\nPath: ${path}` : '';
    super(`The property \`${key}\` is not properly ${CASE_LABEL[convention]}${location}`);
    this.key = key;
    this.convention = convention;
    this.path = path;
  }
}

export class OpenAPISchemaError extends CaseTesterError {}

export class SwaggerDocumentationError extends CaseTesterError {}

export class ImproperlyConfigured extends CaseTesterError {}
