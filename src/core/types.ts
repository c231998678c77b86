/**
 * Shared type definitions for openapi-case-tester.
 */

// ─── Case Conventions ───────────────────────────────────────────────────────

export type CaseConvention = 'camelCase' | 'snake_case' | 'kebab-case' | 'PascalCase';

/** A pure test of one key against one naming convention */
export type CasePredicate = (key: string) => boolean;

/**
 * Checks a single key and throws a CaseError when it is miscased.
 * `path` locates the key inside the tree being walked.
 */
export type KeyCheck = (key: string, path?: string) => void;

// ─── Schema Nodes ───────────────────────────────────────────────────────────

/** One node of an OpenAPI schema document. Only a handful of keywords are read. */
export type SchemaNode = Record<string, unknown>;

export type TypeName = 'string' | 'boolean' | 'integer' | 'number' | 'file' | 'object' | 'array';

// ─── Logging ────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerProvider {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ─── Settings ───────────────────────────────────────────────────────────────

export interface Settings {
  /** Convention every checked key must follow (default: camelCase) */
  case: CaseConvention;

  /** Keys exempt from case checks in every call */
  ignoreCase: string[];

  /** Minimum level of the default console logger (default: warn) */
  logLevel: LogLevel;
}

// ─── Walkers ────────────────────────────────────────────────────────────────

export interface WalkOptions {
  /** The active convention's key check */
  check: KeyCheck;

  /** Keys exempt from the check for this walk only */
  ignoreKeys?: Iterable<string>;

  logger?: LoggerProvider;

  /** Location label of the root node ('$' for data, '#' for schemas) */
  root?: string;
}

// ─── Documents ──────────────────────────────────────────────────────────────

export interface ResponseSchemaEntry {
  route: string;
  method: string;
  status: string;

  /** Media type the schema is declared under (OpenAPI 3 only) */
  mediaType?: string;

  /** JSON pointer to the schema inside the document */
  pointer: string;

  schema: unknown;
}

// ─── Reports ────────────────────────────────────────────────────────────────

export type FailureKind = 'case' | 'schema' | 'documentation';

export interface CaseFailure {
  kind: FailureKind;
  message: string;

  /** Offending key, for case failures */
  key?: string;

  /** Location of the offending key, for case failures */
  path?: string;
}

export interface CaseReport {
  /** What was checked (e.g. 'response', 'schema', 'GET /users 200') */
  target: string;

  convention: CaseConvention;
  passed: boolean;
  failure?: CaseFailure;
}

export interface DocumentReport {
  convention: CaseConvention;
  results: CaseReport[];
  summary: {
    checked: number;
    passed: number;
    failed: number;
  };
}

export type ReportFormat = 'console' | 'json' | 'markdown';

// ─── Inputs ─────────────────────────────────────────────────────────────────

export type InputFormat = 'json' | 'xml' | 'yaml';

/** What a parsed input is, used to label parse failures */
export type InputRole = 'response body' | 'schema document' | 'OpenAPI document' | 'input';

// ─── Tester Options ─────────────────────────────────────────────────────────

export interface CaseTesterOptions {
  /** Convention to enforce (default: camelCase) */
  case?: CaseConvention;

  /** Keys exempt from every check made by this tester */
  ignoreCase?: string[];

  /** Level for the default console logger (default: warn) */
  logLevel?: LogLevel;

  /** Custom logger; overrides logLevel */
  logger?: LoggerProvider;
}
