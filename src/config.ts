/**
 * Settings
 *
 * Resolves the tester's settings from a partial object or a JSON/YAML file.
 * Settings are handed to a tester when it is built; nothing here is global.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYamlDocument } from 'yaml';
import { CASE_CONVENTIONS, isCaseConvention } from './core/checks';
import { ImproperlyConfigured } from './core/errors';
import { isMapping } from './core/openapi';
import { LogLevel, Settings } from './core/types';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  case: 'camelCase',
  ignoreCase: [],
  logLevel: 'warn',
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate a partial settings object and fill in defaults.
 */
export function resolveSettings(input: unknown = {}): Settings {
  if (input === undefined || input === null) return { ...DEFAULT_SETTINGS, ignoreCase: [] };
  if (!isMapping(input)) {
    throw new ImproperlyConfigured('Settings must be an object');
  }

  const settings: Settings = { ...DEFAULT_SETTINGS, ignoreCase: [] };

  if (input.case !== undefined) {
    if (!isCaseConvention(input.case)) {
      throw new ImproperlyConfigured(
        `Invalid \`case\` setting \`${String(input.case)}\`. Expected one of: ${CASE_CONVENTIONS.join(', ')}`
      );
    }
    settings.case = input.case;
  }

  if (input.ignoreCase !== undefined) {
    if (!isStringList(input.ignoreCase)) {
      throw new ImproperlyConfigured('Invalid `ignoreCase` setting. Expected a list of strings');
    }
    settings.ignoreCase = [...input.ignoreCase];
  }

  if (input.logLevel !== undefined) {
    if (!isLogLevel(input.logLevel)) {
      throw new ImproperlyConfigured(
        `Invalid \`logLevel\` setting \`${String(input.logLevel)}\`. Expected one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    settings.logLevel = input.logLevel;
  }

  return settings;
}

/**
 * Read settings from a `.json`, `.yaml` or `.yml` file.
 */
export function loadSettingsFile(filePath: string): Settings {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ImproperlyConfigured(
      `Unable to read settings file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const ext = path.extname(filePath).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === '.json' ? JSON.parse(content) : parseYamlDocument(content);
  } catch (error) {
    throw new ImproperlyConfigured(
      `Unable to parse settings file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return resolveSettings(parsed);
}
