/**
 * CaseTester — Main API
 *
 * The entry point for test suites. Provides a simple API for:
 * - Checking response payloads for miscased keys
 * - Checking OpenAPI schemas, single or whole documents, for miscased properties
 * - Reporting the outcome instead of throwing, when a summary is wanted
 */

import {
  CaseConvention,
  CaseFailure,
  CaseReport,
  CaseTesterOptions,
  DocumentReport,
  LoggerProvider,
  ReportFormat,
  ResponseSchemaEntry,
  Settings,
  WalkOptions,
} from './core/types';
import { caseCheck } from './core/checks';
import { CaseError, OpenAPISchemaError, SwaggerDocumentationError } from './core/errors';
import { ResponseCaseTester, SchemaCaseTester } from './core/walker';
import { listResponseSchemas, responseSchema } from './core/document';
import { formatReport } from './core/reporter';
import { resolveSettings } from './config';
import { ConsoleLogger } from './logger/console-logger';

// ─── Free Functions ─────────────────────────────────────────────────────────

function walkOptions(settings: Settings, ignoreKeys: string[], logger?: LoggerProvider): WalkOptions {
  return {
    check: caseCheck(settings.case),
    ignoreKeys: [...settings.ignoreCase, ...ignoreKeys],
    logger: logger ?? new ConsoleLogger(settings.logLevel),
  };
}

/**
 * Verify that every object key in a response payload follows the configured convention.
 *
 * @throws CaseError on the first miscased key
 */
export function validateResponseCase(
  responseData: unknown,
  ignoreKeys: string[] = [],
  settings: Settings = resolveSettings()
): void {
  new ResponseCaseTester(responseData, walkOptions(settings, ignoreKeys));
}

/**
 * Verify that every property name in an OpenAPI schema follows the configured convention.
 *
 * @throws CaseError on the first miscased property
 * @throws OpenAPISchemaError when the schema is structurally invalid
 */
export function validateSchemaCase(
  schemaDocument: unknown,
  ignoreKeys: string[] = [],
  settings: Settings = resolveSettings()
): void {
  new SchemaCaseTester(schemaDocument, walkOptions(settings, ignoreKeys));
}

// ─── CaseTester Class ───────────────────────────────────────────────────────

export class CaseTester {
  private readonly settings: Settings;
  private readonly logger: LoggerProvider;

  constructor(options: CaseTesterOptions = {}) {
    const { logger, ...rest } = options;
    this.settings = resolveSettings(rest);
    this.logger = logger ?? new ConsoleLogger(this.settings.logLevel);
  }

  get convention(): CaseConvention {
    return this.settings.case;
  }

  /**
   * Throw on the first miscased key in a response payload.
   */
  validateResponse(responseData: unknown, ignoreCase: string[] = []): void {
    new ResponseCaseTester(responseData, walkOptions(this.settings, ignoreCase, this.logger));
  }

  /**
   * Throw on the first miscased property, or structural problem, in a schema.
   *
   * @param root Location label used in error paths (default '#')
   */
  validateSchema(schema: unknown, ignoreCase: string[] = [], root?: string): void {
    new SchemaCaseTester(schema, { ...walkOptions(this.settings, ignoreCase, this.logger), root });
  }

  /**
   * Throw on the first failure across every response schema of an OpenAPI document.
   */
  validateDocument(document: unknown, ignoreCase: string[] = []): void {
    for (const entry of this.responseSchemasOf(document)) {
      this.logger.debug(`Checking ${entry.method.toUpperCase()} ${entry.route} ${entry.status}`);
      this.validateSchema(entry.schema, ignoreCase, entry.pointer);
    }
  }

  /**
   * Look up the response schema for one endpoint of a document.
   */
  responseSchema(document: unknown, route: string, method: string, status: number | string): unknown {
    return responseSchema(document, route, method, status, this.logger);
  }

  /**
   * Like validateResponse, but returns a report.
   */
  checkResponse(responseData: unknown, ignoreCase: string[] = [], target = 'response'): CaseReport {
    return this.run(target, () => this.validateResponse(responseData, ignoreCase));
  }

  /**
   * Like validateSchema, but returns a report.
   */
  checkSchema(schema: unknown, ignoreCase: string[] = [], target = 'schema'): CaseReport {
    return this.run(target, () => this.validateSchema(schema, ignoreCase));
  }

  /**
   * Check each response schema of a document independently, one result per schema.
   */
  checkDocument(document: unknown, ignoreCase: string[] = []): DocumentReport {
    const results = this.responseSchemasOf(document).map((entry) => {
      const media = entry.mediaType ? ` (${entry.mediaType})` : '';
      const target = `${entry.method.toUpperCase()} ${entry.route} ${entry.status}${media}`;
      return this.run(target, () => this.validateSchema(entry.schema, ignoreCase, entry.pointer));
    });

    const passed = results.filter((r) => r.passed).length;
    return {
      convention: this.settings.case,
      results,
      summary: {
        checked: results.length,
        passed,
        failed: results.length - passed,
      },
    };
  }

  /**
   * Format a report.
   */
  format(report: CaseReport | DocumentReport, format: ReportFormat = 'console'): string {
    return formatReport(report, format);
  }

  // ─── Private Helpers ────────────────────────────────────────────────────

  private responseSchemasOf(document: unknown): ResponseSchemaEntry[] {
    const entries = listResponseSchemas(document);
    if (entries.length === 0) {
      this.logger.warn('No response schemas found in document; check that it has a `paths` object');
    }
    return entries;
  }

  private run(target: string, validate: () => void): CaseReport {
    try {
      validate();
    } catch (error) {
      const failure = toFailure(error);
      if (!failure) throw error;
      return {
        target,
        convention: this.settings.case,
        passed: false,
        failure,
      };
    }
    return { target, convention: this.settings.case, passed: true };
  }
}

/**
 * Failures a report records; anything else (bad settings, bugs) propagates.
 */
function toFailure(error: unknown): CaseFailure | null {
  if (error instanceof CaseError) {
    return { kind: 'case', message: error.message, key: error.key, path: error.path };
  }
  if (error instanceof OpenAPISchemaError) {
    return { kind: 'schema', message: error.message };
  }
  if (error instanceof SwaggerDocumentationError) {
    return { kind: 'documentation', message: error.message };
  }
  return null;
}
