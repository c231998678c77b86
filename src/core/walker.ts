/**
 * Key-Case Walkers
 *
 * Two depth-first walkers that apply a key check to every object key they
 * meet: one over response data (plain objects and arrays), one over OpenAPI
 * schema trees (nodes whose container-ness is declared by `type`).
 *
 * Both run during construction and stop at the first failing key.
 */

import { hasKey, isMapping, isSequence, readItems, readProperties, readType } from './openapi';
import { KeyCheck, LoggerProvider, WalkOptions } from './types';
import { defaultLogger } from '../logger/console-logger';

// ─── Shared Plumbing ────────────────────────────────────────────────────────

/**
 * Check a key's case unless it is ignored.
 */
export function conditionalCheck(
  key: string,
  check: KeyCheck,
  ignoredKeys: ReadonlySet<string>,
  path: string,
  logger: LoggerProvider = defaultLogger
): void {
  if (ignoredKeys.has(key)) {
    logger.debug(`Skipping case check for ignored key \`${key}\``);
    return;
  }
  check(key, path);
}

/**
 * Escape a JSON pointer segment.
 */
export function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

abstract class CaseWalker {
  protected readonly check: KeyCheck;
  protected readonly ignoredKeys: ReadonlySet<string>;
  protected readonly logger: LoggerProvider;

  protected constructor(options: WalkOptions) {
    this.check = options.check;
    this.ignoredKeys = new Set(options.ignoreKeys ?? []);
    this.logger = options.logger ?? defaultLogger;
  }

  protected checkKey(key: string, path: string): void {
    conditionalCheck(key, this.check, this.ignoredKeys, path, this.logger);
  }
}

// ─── Response Data ──────────────────────────────────────────────────────────

/**
 * Walks response data (typically a parsed JSON body) and checks every object key.
 */
export class ResponseCaseTester extends CaseWalker {
  constructor(responseData: unknown, options: WalkOptions) {
    super(options);
    const root = options.root ?? '$';

    if (isMapping(responseData)) {
      this.testDict(responseData, root);
    } else if (isSequence(responseData)) {
      this.testList(responseData, root);
    } else {
      this.logger.debug('Skipping case check');
    }
  }

  private testDict(dictionary: Record<string, unknown>, path: string): void {
    for (const [key, value] of Object.entries(dictionary)) {
      const keyPath = `${path}.${key}`;
      this.checkKey(key, keyPath);
      if (isMapping(value)) {
        this.testDict(value, keyPath);
      } else if (isSequence(value)) {
        this.testList(value, keyPath);
      }
    }
  }

  private testList(items: unknown[], path: string): void {
    items.forEach((item, index) => {
      if (isMapping(item)) {
        this.testDict(item, `${path}[${index}]`);
      } else if (isSequence(item)) {
        this.testList(item, `${path}[${index}]`);
      }
    });
  }
}

// ─── Schema Documents ───────────────────────────────────────────────────────

/**
 * Walks an OpenAPI schema and checks every property name of every object node.
 */
export class SchemaCaseTester extends CaseWalker {
  constructor(schema: unknown, options: WalkOptions) {
    super(options);
    const root = options.root ?? '#';

    const type = readType(schema);
    if (type === 'object') {
      this.logger.debug('root -> dict');
      this.testDict(schema, root);
    } else if (type === 'array') {
      this.logger.debug('root -> list');
      this.testList(schema, root);
    } else {
      this.logger.debug('Skipping case check');
    }
  }

  private testDict(obj: unknown, path: string): void {
    const properties = readProperties(obj);
    const named = isMapping(obj) && hasKey(obj, 'properties');

    for (const [key, value] of Object.entries(properties)) {
      const keyPath = named ? `${path}/properties/${escapePointer(key)}` : `${path}/additionalProperties`;
      this.checkKey(key, keyPath);

      const type = readType(value);
      if (type === 'object') {
        this.logger.debug('dict -> dict');
        this.testDict(value, keyPath);
      } else if (type === 'array') {
        this.logger.debug('dict -> list');
        this.testList(value, keyPath);
      }
    }
  }

  private testList(array: unknown, path: string): void {
    const item = readItems(array);
    const itemPath = `${path}/items`;

    const type = readType(item);
    if (type === 'object') {
      this.logger.debug('list -> dict');
      this.testDict(item, itemPath);
    } else if (type === 'array') {
      this.logger.debug('list -> list');
      this.testList(item, itemPath);
    }
  }
}
